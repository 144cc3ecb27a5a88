/**
 * CHIP-8 Display: 64×32 monochrome framebuffer
 *
 * Only CLS and DRW change the buffer. Sprites are 8 pixels wide and XORed
 * onto the screen; each pixel position wraps modulo the screen size on
 * both axes. A draw reports a collision when any pixel that was set
 * becomes cleared.
 *
 * After each CLS/DRW the engine calls present(), which hands the buffer to
 * the attached renderer (render-on-write).
 */

import {
  type Framebuffer,
  type Renderer,
  SCREEN_WIDTH,
  SCREEN_HEIGHT,
  SPRITE_WIDTH,
} from '@/cpu/chip8/types';
import type { Screen } from '@/cpu/chip8/chip8';

// Half-block glyphs for two stacked pixels: [top][bottom]
const BLOCK_CHARS = [
  [' ', '▄'],
  ['▀', '█'],
];

/**
 * Render a framebuffer as text, two pixel rows per line using half blocks.
 * Returns height / 2 lines of `width` characters.
 */
export function framebufferToLines(frame: Framebuffer): string[] {
  const lines: string[] = [];
  for (let y = 0; y < frame.height; y += 2) {
    let line = '';
    for (let x = 0; x < frame.width; x++) {
      const top = frame.getPixel(x, y) ? 1 : 0;
      const bottom = frame.getPixel(x, y + 1) ? 1 : 0;
      line += BLOCK_CHARS[top][bottom];
    }
    lines.push(line);
  }
  return lines;
}

export class Chip8Display implements Screen, Framebuffer {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;

  /** One byte per pixel, row-major. */
  private pixels: Uint8Array = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  private renderer: Renderer | null = null;

  /** Number of times present() has been called since the last reset. */
  presentCount = 0;

  setRenderer(renderer: Renderer | null): void {
    this.renderer = renderer;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) return false;
    return this.pixels[y * SCREEN_WIDTH + x] !== 0;
  }

  clear(): void {
    this.pixels.fill(0);
  }

  xorSprite(x: number, y: number, rows: Uint8Array): boolean {
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row];
      const py = (y + row) % SCREEN_HEIGHT;
      for (let bit = 0; bit < SPRITE_WIDTH; bit++) {
        if ((bits & (0x80 >> bit)) === 0) continue;
        const px = (x + bit) % SCREEN_WIDTH;
        const index = py * SCREEN_WIDTH + px;
        if (this.pixels[index]) collision = true;
        this.pixels[index] ^= 1;
      }
    }
    return collision;
  }

  present(): void {
    this.presentCount++;
    if (this.renderer) {
      this.renderer.present(this);
    }
  }

  /** The screen as SCREEN_HEIGHT / 2 lines of half-block text. */
  getScreenLines(): string[] {
    return framebufferToLines(this);
  }

  /** Copy of the raw pixel buffer (1 = lit). */
  snapshot(): Uint8Array {
    return this.pixels.slice();
  }

  /** Clear the screen and the present counter. The renderer stays attached. */
  reset(): void {
    this.pixels.fill(0);
    this.presentCount = 0;
  }
}
