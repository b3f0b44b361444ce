import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";
import { GuideRepository } from "./GuideRepository";
import { ExtractorPort } from "../ports/ExtractorPort";

/** Extractor falso: responde según el nombre del archivo. */
class FakeExtractor extends ExtractorPort {
  readonly calls: string[] = [];

  constructor(private readonly texts: Record<string, string | null | Error>) {
    super();
  }

  async extractText(imagePath: string): Promise<string | null> {
    const name = basename(imagePath);
    this.calls.push(name);
    const t = this.texts[name];
    if (t instanceof Error) throw t;
    return t ?? null;
  }

  currentModel(): string {
    return "fake-vision";
  }
}

let dir: string;

async function touch(...names: string[]): Promise<void> {
  for (const n of names) await writeFile(join(dir, n), "img");
}

describe("GuideRepository", () => {
  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "guide-"));
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("loads image files in filename order and ignores other extensions", async () => {
    await touch("b.png", "a.JPG", "c.jpeg", "notes.txt", "d.gif");
    const extractor = new FakeExtractor({ "a.JPG": " first ", "b.png": "second", "c.jpeg": "third" });
    const repo = new GuideRepository(extractor, dir);

    await expect(repo.load()).resolves.toBe(true);
    expect(extractor.calls).toEqual(["a.JPG", "b.png", "c.jpeg"]);
    expect(repo.sections()).toEqual([
      { sourceId: "a.JPG", content: "first" },
      { sourceId: "b.png", content: "second" },
      { sourceId: "c.jpeg", content: "third" },
    ]);
  });

  it("skips files whose extraction fails or is empty", async () => {
    await touch("1.jpg", "2.jpg", "3.jpg", "4.jpg");
    const extractor = new FakeExtractor({ "1.jpg": new Error("boom"), "2.jpg": null, "3.jpg": "   ", "4.jpg": "kept" });
    const repo = new GuideRepository(extractor, dir);

    await expect(repo.load()).resolves.toBe(true);
    expect(repo.sections()).toEqual([{ sourceId: "4.jpg", content: "kept" }]);
  });

  it("returns false when every extraction is empty", async () => {
    await touch("1.jpg");
    const repo = new GuideRepository(new FakeExtractor({ "1.jpg": "" }), dir);
    await expect(repo.load()).resolves.toBe(false);
    expect(repo.sections()).toEqual([]);
  });

  it("returns false for a missing folder without throwing", async () => {
    const repo = new GuideRepository(new FakeExtractor({}), join(dir, "missing"));
    await expect(repo.load()).resolves.toBe(false);
    expect(repo.sections()).toEqual([]);
  });

  it("returns false for a folder with no guide images", async () => {
    await touch("readme.md");
    const extractor = new FakeExtractor({});
    await expect(new GuideRepository(extractor, dir).load()).resolves.toBe(false);
    expect(extractor.calls).toEqual([]);
  });

  it("scans only once, sharing the in-flight load between concurrent callers", async () => {
    await touch("a.jpg");
    const extractor = new FakeExtractor({ "a.jpg": "content" });
    const repo = new GuideRepository(extractor, dir);

    const [x, y] = await Promise.all([repo.load(), repo.load()]);
    const z = await repo.load();

    expect([x, y, z]).toEqual([true, true, true]);
    expect(extractor.calls).toEqual(["a.jpg"]);
  });

  it("caches a failed load as well", async () => {
    const extractor = new FakeExtractor({ "a.jpg": "late" });
    const repo = new GuideRepository(extractor, dir);

    await expect(repo.load()).resolves.toBe(false);
    await touch("a.jpg");
    await expect(repo.load()).resolves.toBe(false);
    expect(extractor.calls).toEqual([]);
  });
});
