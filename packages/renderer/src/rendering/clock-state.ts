/**
 * Time-derived clock state: hand angles, date line and theme
 */

import { selectTheme, type ThemeName } from "./themes.js";

export const WEATHER_PENDING = "Fetching...";
export const WEATHER_UNAVAILABLE = "Weather unavailable";

export interface ClockState {
  /** Degrees clockwise from 12 o'clock, [0, 360) */
  hourAngle: number;
  minuteAngle: number;
  /** Continuous: includes the fraction of the current second */
  secondAngle: number;
  currentDateText: string;
  weatherText: string;
  theme: ThemeName;
}

export interface HandAngles {
  hourAngle: number;
  minuteAngle: number;
  secondAngle: number;
}

const DAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/**
 * Compute hand angles from local wall-clock time.
 * Hour hand creeps half a degree per minute; the second hand sweeps.
 */
export function computeHandAngles(now: Date): HandAngles {
  const hour = now.getHours() % 12;
  const minute = now.getMinutes();
  const second = now.getSeconds() + now.getMilliseconds() / 1000;

  return {
    hourAngle: hour * 30 + minute * 0.5,
    minuteAngle: minute * 6,
    secondAngle: second * 6,
  };
}

/**
 * Long date, e.g. "Sunday, October 18, 2026" (day zero-padded)
 */
export function formatLongDate(now: Date): string {
  const day = String(now.getDate()).padStart(2, "0");
  return `${DAYS[now.getDay()]}, ${MONTHS[now.getMonth()]} ${day}, ${now.getFullYear()}`;
}

/**
 * Create the initial state before the first update
 */
export function createClockState(): ClockState {
  return {
    hourAngle: 0,
    minuteAngle: 0,
    secondAngle: 0,
    currentDateText: "",
    weatherText: WEATHER_PENDING,
    theme: "light",
  };
}

/**
 * Recompute every time-derived field; weather text is carried over
 */
export function advanceClockState(state: ClockState, now: Date): void {
  const angles = computeHandAngles(now);
  state.hourAngle = angles.hourAngle;
  state.minuteAngle = angles.minuteAngle;
  state.secondAngle = angles.secondAngle;
  state.currentDateText = formatLongDate(now);
  state.theme = selectTheme(now.getHours());
}
