/**
 * Analog clock renderer
 *
 * Holds the clock state for one display and issues the draw sequence
 * for a frame: background, info panel, layered face, hour marks,
 * shadowed hands, center cap.
 */

import type { Point } from "@clockface/core";
import type { WeatherClient } from "../weather/types.js";
import {
  advanceClockState,
  createClockState,
  WEATHER_UNAVAILABLE,
  type ClockState,
} from "./clock-state.js";
import type { Surface } from "./surface.js";
import { THEMES, type Theme } from "./themes.js";

/**
 * Where the clock sits on the surface
 */
export interface ClockGeometry {
  center: Point;
  /** Outer face radius */
  radius: number;
  /** Vertical center of the date/weather line */
  infoPanelY: number;
}

export const DEFAULT_GEOMETRY: ClockGeometry = {
  center: { x: 300, y: 300 },
  radius: 250,
  infoPanelY: 50,
};

/** Source of local wall-clock time */
export interface ClockSource {
  now(): Date;
}

export const systemClock: ClockSource = {
  now: () => new Date(),
};

export interface ClockRendererOptions {
  weather: WeatherClient;
  geometry?: ClockGeometry;
  clock?: ClockSource;
}

// Bezel layout, in pixels inward from the outer radius
const MIDDLE_FACE_INSET = 30;
const INNER_FACE_INSET = 40;
const MARK_OUTER_INSET = 20;
const MARK_INNER_INSET = 40;
const MARK_WIDTH = 5;
const HOUR_MARKS = 12;

const SHADOW_OFFSET = 5;
const CENTER_CAP_RADIUS = 10;

interface HandSpec {
  angle: (state: ClockState) => number;
  /** Fraction of the outer radius */
  length: number;
  width: number;
  color: (theme: Theme) => Theme["handHour"];
}

const HANDS: readonly HandSpec[] = [
  { angle: (s) => s.hourAngle, length: 0.5, width: 8, color: (t) => t.handHour },
  { angle: (s) => s.minuteAngle, length: 0.7, width: 6, color: (t) => t.handMinute },
  { angle: (s) => s.secondAngle, length: 0.9, width: 3, color: (t) => t.handSecond },
];

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * End point of a hand. 0 degrees points at 12 o'clock and angles grow clockwise.
 */
export function handEndpoint(center: Point, angleDegrees: number, length: number): Point {
  const rad = toRadians(angleDegrees - 90);
  return {
    x: center.x + length * Math.cos(rad),
    y: center.y + length * Math.sin(rad),
  };
}

/**
 * Point on the dial for an hour mark, measured from +x with y flipped to screen space
 */
export function markPoint(center: Point, angleDegrees: number, radius: number): Point {
  const rad = toRadians(angleDegrees);
  return {
    x: center.x + radius * Math.cos(rad),
    y: center.y - radius * Math.sin(rad),
  };
}

export class ClockRenderer {
  readonly state: ClockState = createClockState();
  readonly geometry: ClockGeometry;
  private readonly weather: WeatherClient;
  private readonly clock: ClockSource;

  constructor(options: ClockRendererOptions) {
    this.weather = options.weather;
    this.geometry = options.geometry ?? DEFAULT_GEOMETRY;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Build a renderer and load the weather before the first frame.
   * Aborting `signal` cancels the fetch; the fallback text is shown.
   */
  static async create(options: ClockRendererOptions, signal?: AbortSignal): Promise<ClockRenderer> {
    const renderer = new ClockRenderer(options);
    await renderer.refreshWeather(signal);
    renderer.update();
    return renderer;
  }

  /**
   * Recompute angles, date line and theme from the clock source
   */
  update(): void {
    advanceClockState(this.state, this.clock.now());
  }

  /**
   * Fetch weather once; any failure shows the fallback text
   */
  async refreshWeather(signal?: AbortSignal): Promise<void> {
    const result = await this.weather.fetchWeather(signal);
    this.state.weatherText = result.ok ? result.text.trim() : WEATHER_UNAVAILABLE;
  }

  get theme(): Theme {
    return THEMES[this.state.theme];
  }

  /**
   * Issue the full draw sequence for the current state
   */
  draw(surface: Surface): void {
    const theme = this.theme;

    surface.fill(theme.background);
    this.drawInfoPanel(surface, theme);
    this.drawFace(surface, theme);
    this.drawHourMarks(surface, theme);
    for (const hand of HANDS) {
      this.drawHand(surface, theme, hand);
    }
    surface.fillCircle(this.geometry.center, CENTER_CAP_RADIUS, theme.faceOuter);
  }

  private drawInfoPanel(surface: Surface, theme: Theme): void {
    const { currentDateText, weatherText } = this.state;
    surface.text(
      `${currentDateText} | ${weatherText}`,
      { x: this.geometry.center.x, y: this.geometry.infoPanelY },
      theme.text
    );
  }

  private drawFace(surface: Surface, theme: Theme): void {
    const { center, radius } = this.geometry;
    surface.fillCircle(center, radius, theme.faceOuter);
    surface.fillCircle(center, radius - MIDDLE_FACE_INSET, theme.faceMiddle);
    surface.fillCircle(center, radius - INNER_FACE_INSET, theme.faceInner);
  }

  private drawHourMarks(surface: Surface, theme: Theme): void {
    const { center, radius } = this.geometry;
    for (let i = 0; i < HOUR_MARKS; i++) {
      const angle = i * (360 / HOUR_MARKS);
      surface.line(
        markPoint(center, angle, radius - MARK_OUTER_INSET),
        markPoint(center, angle, radius - MARK_INNER_INSET),
        MARK_WIDTH,
        theme.mark
      );
    }
  }

  private drawHand(surface: Surface, theme: Theme, hand: HandSpec): void {
    const { center, radius } = this.geometry;
    const end = handEndpoint(center, hand.angle(this.state), radius * hand.length);

    // Shadow first so the hand sits on top of it
    surface.line(
      { x: center.x + SHADOW_OFFSET, y: center.y + SHADOW_OFFSET },
      { x: end.x + SHADOW_OFFSET, y: end.y + SHADOW_OFFSET },
      hand.width,
      theme.shadow
    );
    surface.line(center, end, hand.width, hand.color(theme));
  }
}
