// functions/src/core/media/gifEncoder.ts
// Animated GIF from raw RGB frames, on a fixed 6x6x6 colour cube.

import { GifWriter } from "omggif";

export type RgbFrame = {
  data: Buffer; // width * height * 3 bytes, row-major RGB
  width: number;
  height: number;
};

export type GifOptions = {
  delayMs: number;
  loop?: number; // 0 = forever
};

const LEVELS = 6;
const STEP = 255 / (LEVELS - 1);

function buildPalette(): number[] {
  const palette: number[] = [];
  for (let r = 0; r < LEVELS; r++) {
    for (let g = 0; g < LEVELS; g++) {
      for (let b = 0; b < LEVELS; b++) {
        palette.push((Math.round(r * STEP) << 16) | (Math.round(g * STEP) << 8) | Math.round(b * STEP));
      }
    }
  }
  // GIF palettes must have a power-of-two length
  while (palette.length < 256) palette.push(0);
  return palette;
}

const PALETTE = buildPalette();

function level(channel: number): number {
  return Math.round(channel / STEP);
}

function toIndexed(frame: RgbFrame): number[] {
  const pixels = frame.width * frame.height;
  const out = new Array<number>(pixels);
  for (let i = 0; i < pixels; i++) {
    const o = i * 3;
    out[i] = level(frame.data[o] ?? 0) * 36 + level(frame.data[o + 1] ?? 0) * 6 + level(frame.data[o + 2] ?? 0);
  }
  return out;
}

export function encodeAnimatedGif(frames: readonly RgbFrame[], options: GifOptions): Buffer {
  const first = frames[0];
  if (!first) throw new Error("At least one frame is required");

  const { width, height } = first;
  for (const f of frames) {
    if (f.width !== width || f.height !== height) throw new Error("All frames must share one size");
    if (f.data.length !== width * height * 3) throw new Error("Frame data is not packed RGB");
  }

  // generous: LZW output stays well under 2 bytes per pixel
  const buf = Buffer.alloc(width * height * frames.length * 2 + 4096);
  const writer = new GifWriter(buf, width, height, { loop: options.loop ?? 0, palette: PALETTE });
  const delay = Math.round(options.delayMs / 10); // GIF delays are in 1/100 s

  for (const f of frames) {
    writer.addFrame(0, 0, width, height, toIndexed(f), { delay });
  }

  return buf.subarray(0, writer.end());
}
