/**
 * Shape rasterization onto frames
 */

import type { Frame, Point, RGBA } from "./types";
import { setPixel } from "./frame";

/**
 * Fill a disc: every pixel with (x-cx)^2 + (y-cy)^2 <= r^2
 */
export function fillCircle(
  frame: Frame,
  center: Point,
  radius: number,
  color: RGBA
): void {
  if (radius < 0) return;
  const r2 = radius * radius;
  const top = Math.max(0, Math.ceil(center.y - radius));
  const bottom = Math.min(frame.height - 1, Math.floor(center.y + radius));

  for (let y = top; y <= bottom; y++) {
    const dy = y - center.y;
    const span = Math.sqrt(r2 - dy * dy);
    const left = Math.max(0, Math.ceil(center.x - span));
    const right = Math.min(frame.width - 1, Math.floor(center.x + span));
    for (let x = left; x <= right; x++) {
      setPixel(frame, x, y, color);
    }
  }
}

/**
 * Squared distance from (px, py) to the segment a-b
 */
export function distanceToSegmentSq(px: number, py: number, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  let t = lengthSq === 0 ? 0 : ((px - a.x) * dx + (py - a.y) * dy) / lengthSq;
  t = Math.max(0, Math.min(1, t));
  const cx = a.x + t * dx - px;
  const cy = a.y + t * dy - py;
  return cx * cx + cy * cy;
}

/**
 * Draw a line segment of the given width.
 * Width <= 1 steps along the major axis (one pixel per step);
 * wider lines cover every pixel within width/2 of the segment.
 */
export function drawLine(
  frame: Frame,
  from: Point,
  to: Point,
  width: number,
  color: RGBA
): void {
  if (width <= 1) {
    drawThinLine(frame, from, to, color);
    return;
  }

  const half = width / 2;
  const halfSq = half * half;
  const minX = Math.max(0, Math.floor(Math.min(from.x, to.x) - half));
  const maxX = Math.min(frame.width - 1, Math.ceil(Math.max(from.x, to.x) + half));
  const minY = Math.max(0, Math.floor(Math.min(from.y, to.y) - half));
  const maxY = Math.min(frame.height - 1, Math.ceil(Math.max(from.y, to.y) + half));

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if (distanceToSegmentSq(x, y, from, to) <= halfSq) {
        setPixel(frame, x, y, color);
      }
    }
  }
}

function drawThinLine(frame: Frame, from: Point, to: Point, color: RGBA): void {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const steps = Math.max(Math.abs(Math.round(dx)), Math.abs(Math.round(dy)));

  if (steps === 0) {
    setPixel(frame, Math.round(from.x), Math.round(from.y), color);
    return;
  }

  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    setPixel(frame, Math.round(from.x + dx * t), Math.round(from.y + dy * t), color);
  }
}
