/**
 * Frame buffer primitives
 *
 * Frame format:
 * - width x height pixels
 * - RGB (3 bytes per pixel), row-major
 * - Base64 encoded on the wire
 */

import type { Frame, RGB, RGBA } from "./types";

/** Bytes per pixel (RGB) */
export const BYTES_PER_PIXEL = 3;

/**
 * Create an empty frame filled with a single color
 */
export function createSolidFrame(
  width: number,
  height: number,
  color: RGB = { r: 0, g: 0, b: 0 }
): Frame {
  const frame: Frame = {
    width,
    height,
    pixels: new Uint8Array(width * height * BYTES_PER_PIXEL),
  };
  fillFrame(frame, color);
  return frame;
}

/**
 * Overwrite every pixel of a frame with one color
 */
export function fillFrame(frame: Frame, color: RGB): void {
  for (let i = 0; i < frame.width * frame.height; i++) {
    const offset = i * BYTES_PER_PIXEL;
    frame.pixels[offset] = color.r;
    frame.pixels[offset + 1] = color.g;
    frame.pixels[offset + 2] = color.b;
  }
}

/**
 * Blend one channel of a translucent source over the destination
 */
export function blendChannel(src: number, dst: number, alpha: number): number {
  const a = alpha / 255;
  return Math.round(src * a + dst * (1 - a));
}

/**
 * Set a single pixel in a frame.
 * Colors with alpha below 255 are blended over the existing pixel.
 */
export function setPixel(
  frame: Frame,
  x: number,
  y: number,
  color: RGBA
): void {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return; // Out of bounds, silently ignore
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  const alpha = color.a ?? 255;

  if (alpha >= 255) {
    frame.pixels[offset] = color.r;
    frame.pixels[offset + 1] = color.g;
    frame.pixels[offset + 2] = color.b;
    return;
  }
  const dst = alpha > 0 ? getPixel(frame, x, y) : null;
  if (!dst) return;

  frame.pixels[offset] = blendChannel(color.r, dst.r, alpha);
  frame.pixels[offset + 1] = blendChannel(color.g, dst.g, alpha);
  frame.pixels[offset + 2] = blendChannel(color.b, dst.b, alpha);
}

/**
 * Get a pixel color from a frame
 */
export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  return {
    r: frame.pixels[offset],
    g: frame.pixels[offset + 1],
    b: frame.pixels[offset + 2],
  };
}

/**
 * Encode frame pixels to base64 for the wire
 */
export function encodeFrameToBase64(frame: Frame): string {
  return Buffer.from(frame.pixels).toString("base64");
}
