export const replies = {
  hello: "Hello! I'm listening to this chat.",

  ocrEnabled: "✅ Ollama image processing enabled! Send images to extract text.",
  ocrDisabled: "❌ Ollama image processing disabled.",
  ocrStatus: (enabled: boolean) =>
    `🤖 Ollama image processing is currently ${enabled ? "enabled" : "disabled"}.\n` +
    "Use /ollama on or /ollama off to toggle.",

  tooShort: "📝 Answer too short to evaluate. Please provide a more detailed response.",

  noText: (kind: "photo" | "document") =>
    `❌ No readable text found in this ${kind === "document" ? "document" : "image"}. ` +
    "The image may not contain text, or the text may be too blurry/small to read.",
};
