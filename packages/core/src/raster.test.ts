import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel } from "./frame";
import { distanceToSegmentSq, drawLine, fillCircle } from "./raster";

const WHITE = { r: 255, g: 255, b: 255 };
const BLACK = { r: 0, g: 0, b: 0 };

describe("fillCircle", () => {
  it("covers pixels within the radius", () => {
    const frame = createSolidFrame(11, 11);
    fillCircle(frame, { x: 5, y: 5 }, 2, WHITE);

    expect(getPixel(frame, 5, 5)).toEqual(WHITE);
    expect(getPixel(frame, 7, 5)).toEqual(WHITE);
    expect(getPixel(frame, 5, 3)).toEqual(WHITE);
    expect(getPixel(frame, 6, 6)).toEqual(WHITE);
  });

  it("leaves pixels outside the radius alone", () => {
    const frame = createSolidFrame(11, 11);
    fillCircle(frame, { x: 5, y: 5 }, 2, WHITE);

    expect(getPixel(frame, 7, 6)).toEqual(BLACK);
    expect(getPixel(frame, 5, 2)).toEqual(BLACK);
    expect(getPixel(frame, 8, 5)).toEqual(BLACK);
  });

  it("clips discs that extend past the frame edge", () => {
    const frame = createSolidFrame(4, 4);
    fillCircle(frame, { x: 0, y: 0 }, 10, WHITE);
    expect(getPixel(frame, 3, 3)).toEqual(WHITE);
  });
});

describe("drawLine", () => {
  it("covers pixels within half the width of the segment", () => {
    const frame = createSolidFrame(11, 11);
    drawLine(frame, { x: 2, y: 5 }, { x: 8, y: 5 }, 3, WHITE);

    expect(getPixel(frame, 5, 5)).toEqual(WHITE);
    expect(getPixel(frame, 5, 6)).toEqual(WHITE);
    expect(getPixel(frame, 5, 4)).toEqual(WHITE);
    expect(getPixel(frame, 5, 7)).toEqual(BLACK);
    expect(getPixel(frame, 1, 5)).toEqual(WHITE);
    expect(getPixel(frame, 0, 5)).toEqual(BLACK);
  });

  it("steps one pixel at a time for thin lines", () => {
    const frame = createSolidFrame(5, 3);
    drawLine(frame, { x: 0, y: 0 }, { x: 4, y: 2 }, 1, WHITE);

    expect(getPixel(frame, 0, 0)).toEqual(WHITE);
    expect(getPixel(frame, 2, 1)).toEqual(WHITE);
    expect(getPixel(frame, 4, 2)).toEqual(WHITE);
    expect(getPixel(frame, 0, 2)).toEqual(BLACK);
  });

  it("blends each covered pixel once for translucent colors", () => {
    const frame = createSolidFrame(11, 11, { r: 100, g: 100, b: 100 });
    drawLine(frame, { x: 2, y: 5 }, { x: 8, y: 5 }, 4, { r: 0, g: 0, b: 0, a: 128 });
    // 100 * (1 - 128/255) = 49.8
    expect(getPixel(frame, 5, 5)).toEqual({ r: 50, g: 50, b: 50 });
  });
});

describe("distanceToSegmentSq", () => {
  it("measures to the nearest endpoint beyond the segment", () => {
    expect(distanceToSegmentSq(0, 5, { x: 0, y: 0 }, { x: 0, y: 3 })).toBe(4);
  });

  it("measures perpendicular distance alongside the segment", () => {
    expect(distanceToSegmentSq(3, 1, { x: 0, y: 0 }, { x: 0, y: 3 })).toBe(9);
  });

  it("handles zero-length segments", () => {
    expect(distanceToSegmentSq(3, 4, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(25);
  });
});
