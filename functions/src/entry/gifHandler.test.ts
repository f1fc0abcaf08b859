import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { GifUploader } from "../core/media/storageUploader";
import { createFakeFetch, FakeImageClient, FakeLlm, FakeResponse, RecordingLogger, testConfig } from "../testing/fakes";
import { createGifHandler } from "./gifHandler";

class FakeUploader implements GifUploader {
  readonly uploaded: string[] = [];
  readonly bytes: number[] = [];

  constructor(
    private readonly failWith: Error | null = null,
    private readonly delayMs = 0
  ) {}

  async upload(localPath: string): Promise<string> {
    if (this.failWith) throw this.failWith;
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    this.bytes.push((await readFile(localPath)).length);
    this.uploaded.push(localPath);
    return `https://storage.test/gifs/${path.basename(localPath)}`;
  }
}

describe("generateGif", () => {
  let tmpDir = "";
  let png = new Uint8Array();

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "gif-handler-"));
    png = new Uint8Array(
      await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 0, g: 128, b: 255 } } })
        .png()
        .toBuffer()
    );
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function setup(uploader: FakeUploader, images = new FakeImageClient()) {
    const { fetch } = createFakeFetch(() => new Response(png, { status: 200 }));
    const logger = new RecordingLogger();
    const handler = createGifHandler({
      config: testConfig({ GIF_FRAME_SIZE: "4" }),
      logger,
      ai: () => ({ llm: new FakeLlm([]), images }),
      fetch,
      uploader: () => uploader,
      tmpDir,
      now: () => new Date(Date.UTC(2024, 2, 5, 7, 8, 9)),
    });
    return { handler, logger };
  }

  async function post(handler: ReturnType<typeof setup>["handler"], body: unknown) {
    const res = new FakeResponse();
    await handler({ method: "POST", body }, res);
    return res;
  }

  it("uploads the GIF and removes the temp file", async () => {
    const uploader = new FakeUploader();
    const { handler } = setup(uploader);

    const res = await post(handler, { prompt: "a waving cat" });

    expect(res.statusCode).toBe(200);
    expect(uploader.uploaded).toHaveLength(1);
    const name = path.basename(uploader.uploaded[0] ?? "");
    expect(name).toBe("generated_20240305_070809.gif");
    expect(res.body).toEqual({ gif_url: `https://storage.test/gifs/${name}`, frames_generated: 2 });
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("removes the temp file when the upload fails", async () => {
    const { handler, logger } = setup(new FakeUploader(new Error("bucket not found")));

    const res = await post(handler, { prompt: "a waving cat" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "bucket not found" });
    expect(logger.messages("error")).toEqual(["gif_failed"]);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("answers 500 when image generation fails", async () => {
    const uploader = new FakeUploader();
    const { handler } = setup(uploader, new FakeImageClient(new Error("content policy")));

    const res = await post(handler, { prompt: "a waving cat" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "content policy" });
    expect(uploader.uploaded).toEqual([]);
  });

  it("keeps concurrent requests from sharing a temp file", async () => {
    const uploader = new FakeUploader(null, 20);
    const { handler } = setup(uploader);

    const [first, second] = await Promise.all([
      post(handler, { prompt: "a waving cat" }),
      post(handler, { prompt: "a sleeping dog" }),
    ]);

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
    expect(new Set(uploader.uploaded).size).toBe(2);
    expect(uploader.bytes.every((n) => n > 0)).toBe(true);
    expect(await readdir(tmpDir)).toEqual([]);
  });
});
