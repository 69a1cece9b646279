/**
 * Drawing surfaces
 *
 * The clock renderer only talks to a Surface. FrameSurface rasterizes
 * into an RGB frame for presentation; RecordingSurface keeps the list
 * of operations so a render pass can be inspected.
 */

import type { Frame, Point, RGB, RGBA } from "@clockface/core";
import { createSolidFrame, drawLine, fillCircle, fillFrame } from "@clockface/core";
import { drawCenteredText } from "./text.js";

export interface Surface {
  readonly width: number;
  readonly height: number;
  /** Paint the whole surface one color */
  fill(color: RGB): void;
  fillCircle(center: Point, radius: number, color: RGBA): void;
  line(from: Point, to: Point, width: number, color: RGBA): void;
  /** Draw a single line of text centered on a point */
  text(text: string, center: Point, color: RGBA): void;
}

export class FrameSurface implements Surface {
  readonly frame: Frame;

  constructor(
    width: number,
    height: number,
    private readonly textScale = 1
  ) {
    this.frame = createSolidFrame(width, height);
  }

  get width(): number {
    return this.frame.width;
  }

  get height(): number {
    return this.frame.height;
  }

  fill(color: RGB): void {
    fillFrame(this.frame, color);
  }

  fillCircle(center: Point, radius: number, color: RGBA): void {
    fillCircle(this.frame, center, radius, color);
  }

  line(from: Point, to: Point, width: number, color: RGBA): void {
    drawLine(this.frame, from, to, width, color);
  }

  text(text: string, center: Point, color: RGBA): void {
    drawCenteredText(this.frame, text, center, color, this.textScale);
  }
}

/** Recorded colors are the caller's objects, so they stay read-only */
export type DrawOp =
  | { op: "fill"; color: Readonly<RGB> }
  | { op: "circle"; center: Point; radius: number; color: Readonly<RGBA> }
  | { op: "line"; from: Point; to: Point; width: number; color: Readonly<RGBA> }
  | { op: "text"; text: string; center: Point; color: Readonly<RGBA> };

export class RecordingSurface implements Surface {
  readonly ops: DrawOp[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  fill(color: RGB): void {
    this.ops.push({ op: "fill", color });
  }

  fillCircle(center: Point, radius: number, color: RGBA): void {
    this.ops.push({ op: "circle", center, radius, color });
  }

  line(from: Point, to: Point, width: number, color: RGBA): void {
    this.ops.push({ op: "line", from, to, width, color });
  }

  text(text: string, center: Point, color: RGBA): void {
    this.ops.push({ op: "text", text, center, color });
  }

  clear(): void {
    this.ops.length = 0;
  }
}
