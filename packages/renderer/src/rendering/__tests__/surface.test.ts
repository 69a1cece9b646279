/**
 * Tests for drawing surfaces
 */

import { describe, it, expect } from "vitest";
import { getPixel } from "@clockface/core";
import { FrameSurface, RecordingSurface } from "../surface.js";

describe("FrameSurface", () => {
  it("exposes the frame dimensions", () => {
    const surface = new FrameSurface(20, 10);
    expect(surface.width).toBe(20);
    expect(surface.height).toBe(10);
    expect(surface.frame.pixels.length).toBe(20 * 10 * 3);
  });

  it("rasterizes fill, circle and line operations", () => {
    const surface = new FrameSurface(20, 20);
    surface.fill({ r: 30, g: 30, b: 30 });
    surface.fillCircle({ x: 10, y: 10 }, 3, { r: 100, g: 100, b: 100 });
    surface.line({ x: 0, y: 0 }, { x: 19, y: 0 }, 1, { r: 255, g: 0, b: 0 });

    expect(getPixel(surface.frame, 19, 19)).toEqual({ r: 30, g: 30, b: 30 });
    expect(getPixel(surface.frame, 10, 13)).toEqual({ r: 100, g: 100, b: 100 });
    expect(getPixel(surface.frame, 7, 0)).toEqual({ r: 255, g: 0, b: 0 });
  });

  it("draws text at its configured scale", () => {
    const surface = new FrameSurface(20, 20, 2);
    surface.fill({ r: 0, g: 0, b: 0 });
    // "1" at scale 2 is 6x10, centered on (10, 10) -> top-left (7, 5)
    surface.text("1", { x: 10, y: 10 }, { r: 255, g: 255, b: 255 });

    expect(getPixel(surface.frame, 9, 5)).toEqual({ r: 255, g: 255, b: 255 });
    expect(getPixel(surface.frame, 7, 5)).toEqual({ r: 0, g: 0, b: 0 });
  });
});

describe("RecordingSurface", () => {
  it("records operations in order", () => {
    const surface = new RecordingSurface(100, 100);
    surface.fill({ r: 1, g: 2, b: 3 });
    surface.text("HI", { x: 50, y: 5 }, { r: 0, g: 0, b: 0 });
    surface.fillCircle({ x: 50, y: 50 }, 20, { r: 9, g: 9, b: 9 });
    surface.line({ x: 0, y: 0 }, { x: 10, y: 10 }, 2, { r: 0, g: 0, b: 0, a: 50 });

    expect(surface.ops).toEqual([
      { op: "fill", color: { r: 1, g: 2, b: 3 } },
      { op: "text", text: "HI", center: { x: 50, y: 5 }, color: { r: 0, g: 0, b: 0 } },
      { op: "circle", center: { x: 50, y: 50 }, radius: 20, color: { r: 9, g: 9, b: 9 } },
      {
        op: "line",
        from: { x: 0, y: 0 },
        to: { x: 10, y: 10 },
        width: 2,
        color: { r: 0, g: 0, b: 0, a: 50 },
      },
    ]);
  });

  it("clears recorded operations", () => {
    const surface = new RecordingSurface(10, 10);
    surface.fill({ r: 0, g: 0, b: 0 });
    surface.clear();
    expect(surface.ops).toEqual([]);
  });
});
