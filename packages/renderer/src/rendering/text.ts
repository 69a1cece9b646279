/**
 * Bitmap text rendering
 *
 * All text uses the compact 3x5 font, scaled up by an integer factor
 * so the info panel stays legible on larger frames. Lowercase letters
 * share the uppercase glyphs.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { RGBA, Frame, Point } from "@clockface/core";
import { setPixel } from "@clockface/core";

// Compact 3x5 font dimensions
export const CHAR_WIDTH = 3;
export const CHAR_HEIGHT = 5;

const FONT_PATH = fileURLToPath(new URL("./font-3x5.json", import.meta.url));

/**
 * Load the glyph table: each char maps to 5 rows of "101"-style bit strings
 */
function loadFont(): Map<string, number[]> {
  const raw: unknown = JSON.parse(readFileSync(FONT_PATH, "utf-8"));
  if (typeof raw !== "object" || raw === null) {
    throw new Error(`Invalid font file: ${FONT_PATH}`);
  }

  const glyphs = new Map<string, number[]>();
  for (const [char, rows] of Object.entries(raw)) {
    if (!Array.isArray(rows) || rows.length !== CHAR_HEIGHT) {
      throw new Error(`Invalid glyph for "${char}" in ${FONT_PATH}`);
    }
    glyphs.set(char, rows.map((row) => parseInt(String(row), 2)));
  }
  return glyphs;
}

const TINY_FONT = loadFont();

/**
 * Look up a glyph bitmap, falling back to the uppercase form
 */
export function getCharBitmap(char: string): number[] | undefined {
  return TINY_FONT.get(char) ?? TINY_FONT.get(char.toUpperCase());
}

/**
 * Calculate the pixel width of a text string
 * (3px char + 1px space, times scale)
 */
export function measureText(text: string, scale = 1): number {
  const length = Array.from(text).length;
  if (length === 0) return 0;
  return (length * (CHAR_WIDTH + 1) - 1) * scale;
}

/**
 * Pixel height of a line of text
 */
export function textHeight(scale = 1): number {
  return CHAR_HEIGHT * scale;
}

/**
 * Draw text on a frame with its top-left corner at (startX, startY)
 */
export function drawText(
  frame: Frame,
  text: string,
  startX: number,
  startY: number,
  color: RGBA,
  scale = 1
): void {
  let cursorX = startX;

  for (const char of text) {
    const bitmap = getCharBitmap(char);
    // If character is missing, treat as space (advance cursor but draw nothing)
    if (bitmap) {
      for (let row = 0; row < CHAR_HEIGHT; row++) {
        for (let col = 0; col < CHAR_WIDTH; col++) {
          const bit = (bitmap[row] >> (CHAR_WIDTH - 1 - col)) & 1;
          if (bit) {
            fillBlock(frame, cursorX + col * scale, startY + row * scale, scale, color);
          }
        }
      }
    }
    cursorX += (CHAR_WIDTH + 1) * scale;
  }
}

/**
 * Draw text centered on a point
 */
export function drawCenteredText(
  frame: Frame,
  text: string,
  center: Point,
  color: RGBA,
  scale = 1
): void {
  const x = Math.round(center.x - measureText(text, scale) / 2);
  const y = Math.round(center.y - textHeight(scale) / 2);
  drawText(frame, text, x, y, color, scale);
}

function fillBlock(frame: Frame, x: number, y: number, size: number, color: RGBA): void {
  for (let dy = 0; dy < size; dy++) {
    for (let dx = 0; dx < size; dx++) {
      setPixel(frame, x + dx, y + dy, color);
    }
  }
}
