/**
 * Encode a framebuffer as a PNG image using pngjs.
 * Each CHIP-8 pixel becomes a `scale`×`scale` square.
 */

import { PNG } from "pngjs";
import type { Framebuffer } from "@/cpu/chip8/types";

export interface SnapshotOptions {
  /** Output pixels per framebuffer pixel. */
  scale?: number;
  /** RGB for lit pixels. */
  foreground?: [number, number, number];
  /** RGB for unlit pixels. */
  background?: [number, number, number];
}

const DEFAULT_SCALE = 8;
const DEFAULT_FOREGROUND: [number, number, number] = [255, 255, 255];
const DEFAULT_BACKGROUND: [number, number, number] = [25, 25, 25];

export function framebufferToPng(frame: Framebuffer, options: SnapshotOptions = {}): Buffer {
  const scale = Math.max(1, Math.floor(options.scale ?? DEFAULT_SCALE));
  const fg = options.foreground ?? DEFAULT_FOREGROUND;
  const bg = options.background ?? DEFAULT_BACKGROUND;

  const width = frame.width * scale;
  const height = frame.height * scale;
  const png = new PNG({ width, height });
  const rgba = png.data;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const color = frame.getPixel(Math.floor(x / scale), Math.floor(y / scale)) ? fg : bg;
      const dst = (y * width + x) * 4;
      rgba[dst] = color[0];
      rgba[dst + 1] = color[1];
      rgba[dst + 2] = color[2];
      rgba[dst + 3] = 255;
    }
  }

  return PNG.sync.write(png);
}
