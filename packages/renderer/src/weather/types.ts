/**
 * Weather service types
 */

export type WeatherFetchErrorKind = "status" | "transport" | "timeout" | "aborted";

export interface WeatherFetchError {
  kind: WeatherFetchErrorKind;
  message: string;
  /** HTTP status, present for kind "status" */
  status?: number;
}

export type WeatherResult =
  | { ok: true; text: string }
  | { ok: false; error: WeatherFetchError };

export interface WeatherClientOptions {
  /** Plain-text endpoint returning "<temperature> <condition>" */
  url?: string;
  /** Abort the request after this many ms; 0 waits indefinitely */
  timeoutMs?: number;
  /** Cancels the request from outside, e.g. on shutdown */
  signal?: AbortSignal;
}

export interface WeatherClient {
  fetchWeather(signal?: AbortSignal): Promise<WeatherResult>;
}
