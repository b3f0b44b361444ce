import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Client } from "@libsql/client";
import { createDb } from "../../db/db";
import { migrateOnce } from "../../db/migrate";
import { LibsqlMessageLog } from "./LibsqlMessageLog";
import type { MessageRecord } from "../../core/types/NormalizedMessage";
import type { MessageAnalysis } from "../../core/messages/analysis";

function record(overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    timestamp: "2024-05-02T10:15:00.000Z",
    messageId: 1,
    chatId: "-100",
    chatTitle: "Biology 12B",
    chatType: "supergroup",
    userId: "7",
    username: "ana",
    firstName: "Ana",
    lastName: null,
    text: "hello",
    messageType: "text",
    hasMedia: false,
    mediaType: null,
    isForwarded: false,
    replyToMessage: null,
    ...overrides,
  };
}

const ANALYSIS: MessageAnalysis = {
  isHighlighted: false,
  mentions: ["leo"],
  hashtags: [],
  urls: [],
  wordCount: 2,
  charCount: 10,
  hasSpecialContent: true,
};

describe("LibsqlMessageLog", () => {
  let dir: string;
  let db: Client;
  let log: LibsqlMessageLog;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "msglog-"));
    db = createDb(`file:${join(dir, "log.db")}`);
    await migrateOnce(db);
    log = new LibsqlMessageLog(db);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    db.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("round-trips a record with its analysis", async () => {
    const photo = record({
      messageId: 2,
      text: "[Photo]",
      messageType: "photo",
      hasMedia: true,
      mediaType: "photo",
      isForwarded: true,
      replyToMessage: 1,
    });
    await log.append(photo, ANALYSIS);

    expect(await log.load()).toEqual([{ ...photo, analysis: ANALYSIS }]);
  });

  it("stores a null analysis when none is given", async () => {
    await log.append(record());
    const [row] = await log.load();
    expect(row?.analysis).toBeNull();
    expect(row?.username).toBe("ana");
  });

  it("returns the most recent messages in arrival order when limited", async () => {
    for (const id of [1, 2, 3, 4]) await log.append(record({ messageId: id }));
    expect((await log.load(2)).map(m => m.messageId)).toEqual([3, 4]);
    expect((await log.load()).map(m => m.messageId)).toEqual([1, 2, 3, 4]);
  });

  it("filters by chat and by user", async () => {
    await log.append(record({ messageId: 1, chatId: "a", userId: "u1" }));
    await log.append(record({ messageId: 2, chatId: "b", userId: "u1" }));
    await log.append(record({ messageId: 3, chatId: "a", userId: "u2" }));

    expect((await log.byChat("a")).map(m => m.messageId)).toEqual([1, 3]);
    expect((await log.byUser("u1")).map(m => m.messageId)).toEqual([1, 2]);
    expect(await log.byChat("missing")).toEqual([]);
  });

  it("skips rows it cannot read", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await log.append(record({ messageId: 1 }));
    await db.execute(`INSERT INTO message_log (timestamp, message_id, chat_id, chat_title, chat_type, user_id, first_name,
      text, message_type, has_media, is_forwarded) VALUES ('t', 2, 'c', 'x', 'private', 'u', 'F', 'x', 'hologram', 0, 0)`);

    expect((await log.load()).map(m => m.messageId)).toEqual([1]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("migrates once per client", async () => {
    const p1 = migrateOnce(db);
    const p2 = migrateOnce(db);
    expect(p1).toBe(p2);
    await p1;
  });
});
