// functions/src/core/media/animationPipeline.ts

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import sharp from "sharp";

import type { AppConfig } from "../../config";
import type { ImageClient } from "../llm/openaiClient";
import type { LoggerLike } from "../logging/logger";
import type { FetchLike } from "../research/http";
import { encodeAnimatedGif, type RgbFrame } from "./gifEncoder";

export type AnimationDeps = {
  images: ImageClient;
  fetch: FetchLike;
  logger: LoggerLike;
  image: AppConfig["image"];
  timeoutMs: number;
  tmpDir?: string;
  now?: () => Date;
};

export function framePrompts(prompt: string): [string, string] {
  return [`${prompt}, first frame`, `${prompt}, second frame, slight variation`];
}

/** UTC, YYYYMMDD_HHMMSS */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

async function download(deps: AnimationDeps, url: string): Promise<Buffer> {
  const res = await deps.fetch(url, { signal: AbortSignal.timeout(deps.timeoutMs) });
  if (!res.ok) throw new Error(`Image download failed with status ${res.status}`);
  return Buffer.from(await res.arrayBuffer());
}

async function toFrame(image: Buffer, size: number): Promise<RgbFrame> {
  const { data, info } = await sharp(image)
    .resize(size, size, { fit: "fill" })
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}

/**
 * Generates two frames, encodes them as a looping GIF and writes it into a
 * directory of its own under the temp dir, so concurrent requests never
 * share a path. Resolves to the file path; the caller uploads it and then
 * calls discardAnimation. Nothing is written unless both frames were produced.
 */
export async function generateAnimation(deps: AnimationDeps, prompt: string): Promise<string> {
  const size = deps.image.frameSize;
  const frames: RgbFrame[] = [];

  for (const framePrompt of framePrompts(prompt)) {
    const url = await deps.images.generateImageUrl(framePrompt);
    frames.push(await toFrame(await download(deps, url), size));
  }

  const gif = encodeAnimatedGif(frames, { delayMs: deps.image.frameDurationMs, loop: 0 });

  const now = deps.now ?? (() => new Date());
  const dir = await mkdtemp(path.join(deps.tmpDir ?? os.tmpdir(), "gif-"));
  const file = path.join(dir, `generated_${fileTimestamp(now())}.gif`);

  try {
    await writeFile(file, gif);
  } catch (e) {
    await rm(dir, { recursive: true, force: true });
    throw e;
  }

  deps.logger.info("gif_created", { file, bytes: gif.length, frames: frames.length });
  return file;
}

/** Removes a file from generateAnimation together with its directory. */
export async function discardAnimation(file: string): Promise<void> {
  await rm(path.dirname(file), { recursive: true, force: true });
}
