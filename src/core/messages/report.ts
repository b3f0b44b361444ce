import type { StoredMessage } from "../ports/MessageLogPort";

export function createMessageReport(messages: readonly StoredMessage[]): string {
  if (messages.length === 0) return "No messages found.";

  const uniqueChats = new Set(messages.map(m => m.chatId)).size;
  const uniqueUsers = new Set(messages.map(m => m.userId)).size;

  const byType = new Map<string, number>();
  const byChat = new Map<string, number>();
  for (const m of messages) {
    byType.set(m.messageType, (byType.get(m.messageType) ?? 0) + 1);
    const title = m.chatTitle || "Unknown";
    byChat.set(title, (byChat.get(title) ?? 0) + 1);
  }

  // Sort estable: en empate gana el chat visto primero
  const topChats = Array.from(byChat.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, 5);

  return [
    "MESSAGE SUMMARY REPORT",
    "=====================",
    `Total Messages: ${messages.length}`,
    `Unique Chats: ${uniqueChats}`,
    `Unique Users: ${uniqueUsers}`,
    "",
    "Message Types:",
    ...Array.from(byType.entries(), ([type, n]) => `  ${type}: ${n}`),
    "",
    "Most Active Chats:",
    ...topChats.map(([chat, n]) => `  ${chat}: ${n} messages`),
  ].join("\n");
}
