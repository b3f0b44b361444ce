import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TelegramAdapter, type ImageHandler } from "./TelegramAdapter";
import { MessageAnalyzer, type MessageAnalysis } from "../../../core/messages/analysis";
import type { MessageLogPort, StoredMessage } from "../../../core/ports/MessageLogPort";
import { NotifierPort, type ChatAction, type SendTextOptions } from "../../../core/ports/NotifierPort";
import type { ImageJob, PipelineOutcome } from "../../../core/pipeline/AnswerPipeline";
import type { MessageRecord } from "../../../core/types/NormalizedMessage";

class MemoryLog implements MessageLogPort {
  readonly rows: StoredMessage[] = [];
  fail = false;
  async append(record: MessageRecord, analysis?: MessageAnalysis): Promise<void> {
    if (this.fail) throw new Error("database is locked");
    this.rows.push({ ...record, analysis: analysis ?? null });
  }
  async load(): Promise<StoredMessage[]> {
    return this.rows;
  }
  async byChat(chatId: string): Promise<StoredMessage[]> {
    return this.rows.filter(r => r.chatId === chatId);
  }
  async byUser(userId: string): Promise<StoredMessage[]> {
    return this.rows.filter(r => r.userId === userId);
  }
}

class RecordingNotifier extends NotifierPort {
  readonly texts: string[] = [];
  async sendText(_chatId: string, text: string, _opts?: SendTextOptions): Promise<void> {
    this.texts.push(text);
  }
  async sendChatAction(_chatId: string, _action: ChatAction): Promise<void> {}
}

class StubPipeline implements ImageHandler {
  readonly jobs: ImageJob[] = [];
  async handleImage(job: ImageJob): Promise<PipelineOutcome> {
    this.jobs.push(job);
    return { status: "no_text" };
  }
}

function textUpdate(text: string, chat: Record<string, unknown> = { id: 100, type: "private" }) {
  return {
    update_id: 1,
    message: { message_id: 9, date: 1714644900, text, from: { id: 5, first_name: "Leo" }, chat },
  };
}

const photoUpdate = {
  update_id: 2,
  message: {
    message_id: 10,
    date: 1714644900,
    from: { id: 5, first_name: "Leo" },
    chat: { id: 100, type: "private" },
    photo: [{ file_id: "ph-1", file_size: 500 }],
  },
};

describe("TelegramAdapter", () => {
  let log: MemoryLog;
  let notifier: RecordingNotifier;
  let pipeline: StubPipeline;
  let adapter: TelegramAdapter;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    log = new MemoryLog();
    notifier = new RecordingNotifier();
    pipeline = new StubPipeline();
    adapter = new TelegramAdapter(log, notifier, pipeline, new MessageAnalyzer(["exam"]));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs every message with its analysis", async () => {
    await adapter.handleUpdate(textUpdate("exam moved, see #schedule"));
    expect(log.rows).toHaveLength(1);
    expect(log.rows[0]?.analysis).toEqual({
      isHighlighted: true,
      mentions: [],
      hashtags: ["schedule"],
      urls: [],
      wordCount: 4,
      charCount: 25,
      hasSpecialContent: true,
    });
  });

  it("ignores updates that are not messages", async () => {
    await expect(adapter.handleUpdate({ update_id: 3, edited_message: {} })).resolves.toEqual({ kind: "ignored" });
    expect(log.rows).toEqual([]);
  });

  it("answers /hello", async () => {
    const handled = await adapter.handleUpdate(textUpdate("/hello"));
    expect(handled.kind).toBe("command");
    expect(notifier.texts).toEqual(["Hello! I'm listening to this chat."]);
  });

  it("toggles image processing with /ollama", async () => {
    expect(adapter.isImageProcessingEnabled()).toBe(false);

    await adapter.handleUpdate(textUpdate("/ollama on"));
    expect(adapter.isImageProcessingEnabled()).toBe(true);
    await adapter.handleUpdate(textUpdate("/ollama"));
    await adapter.handleUpdate(textUpdate("/ollama disable"));
    expect(adapter.isImageProcessingEnabled()).toBe(false);

    expect(notifier.texts).toEqual([
      "✅ Ollama image processing enabled! Send images to extract text.",
      "🤖 Ollama image processing is currently enabled.\nUse /ollama on or /ollama off to toggle.",
      "❌ Ollama image processing disabled.",
    ]);
  });

  it("accepts commands addressed to the bot by name", async () => {
    await adapter.handleUpdate(textUpdate("/hello@grader_bot"));
    expect(notifier.texts).toEqual(["Hello! I'm listening to this chat."]);
  });

  it("sends photos to the pipeline only while image processing is enabled", async () => {
    await expect(adapter.handleUpdate(photoUpdate)).resolves.toMatchObject({ kind: "logged" });
    expect(pipeline.jobs).toEqual([]);

    adapter.setImageProcessing(true);
    await expect(adapter.handleUpdate(photoUpdate)).resolves.toMatchObject({
      kind: "image",
      outcome: { status: "no_text" },
    });
    expect(pipeline.jobs).toEqual([{ chatId: "100", messageId: 10, fileId: "ph-1", kind: "photo" }]);
    expect(log.rows).toHaveLength(2);
  });

  it("warns about important messages", async () => {
    await adapter.handleUpdate(textUpdate("This is IMPORTANT for Friday"));
    expect(console.warn).toHaveBeenCalledWith("[TelegramAdapter] Mensaje importante de Leo: This is IMPORTANT for Friday");
    expect(notifier.texts).toEqual([]);
  });

  it("keeps handling the message when the log write fails", async () => {
    log.fail = true;
    await adapter.handleUpdate(textUpdate("/hello"));
    expect(notifier.texts).toEqual(["Hello! I'm listening to this chat."]);
  });
});
