/**
 * Color themes for the clock face
 */

import type { RGB, RGBA } from "@clockface/core";

export type ThemeName = "light" | "dark";

type Color = Readonly<RGB>;

export interface Theme {
  readonly name: ThemeName;
  readonly background: Color;
  readonly faceOuter: Color;
  readonly faceMiddle: Color;
  readonly faceInner: Color;
  readonly handHour: Color;
  readonly handMinute: Color;
  readonly handSecond: Color;
  readonly mark: Color;
  /** Drawn beneath each hand; translucent */
  readonly shadow: Readonly<RGBA>;
  readonly text: Color;
}

function rgb(r: number, g: number, b: number): Color {
  return Object.freeze({ r, g, b });
}

function rgba(r: number, g: number, b: number, a: number): Readonly<RGBA> {
  return Object.freeze({ r, g, b, a });
}

export const THEMES: Readonly<Record<ThemeName, Theme>> = Object.freeze({
  light: Object.freeze({
    name: "light",
    background: rgb(225, 239, 240),
    faceOuter: rgb(45, 45, 45),
    faceMiddle: rgb(229, 229, 229),
    faceInner: rgb(255, 255, 255),
    handHour: rgb(45, 45, 45),
    handMinute: rgb(45, 45, 45),
    handSecond: rgb(255, 0, 0),
    mark: rgb(45, 45, 45),
    shadow: rgba(0, 0, 0, 50),
    text: rgb(0, 0, 0),
  }),
  dark: Object.freeze({
    name: "dark",
    background: rgb(30, 30, 30),
    faceOuter: rgb(100, 100, 100),
    faceMiddle: rgb(70, 70, 70),
    faceInner: rgb(50, 50, 50),
    handHour: rgb(255, 255, 255),
    handMinute: rgb(200, 200, 200),
    handSecond: rgb(255, 69, 0),
    mark: rgb(255, 255, 255),
    shadow: rgba(0, 0, 0, 80),
    text: rgb(255, 255, 255),
  }),
});

// Night runs from 18:00 to 05:59 local time
const DARK_FROM_HOUR = 18;
const DARK_UNTIL_HOUR = 6;

/**
 * Pick the theme for an hour of the day (0-23)
 */
export function selectTheme(hour: number): ThemeName {
  return hour >= DARK_FROM_HOUR || hour < DARK_UNTIL_HOUR ? "dark" : "light";
}
