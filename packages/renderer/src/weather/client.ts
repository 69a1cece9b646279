/**
 * Plain-text weather client
 * One GET per call, no retry. Failures come back as values, never thrown.
 * A cancelled request is not logged; the caller asked for it.
 */

import type {
  WeatherClient,
  WeatherClientOptions,
  WeatherFetchError,
  WeatherResult,
} from "./types.js";

export const DEFAULT_WEATHER_URL = "https://wttr.in/?format=%t+%C";
export const DEFAULT_WEATHER_TIMEOUT_MS = 10_000;

function cancelled(): WeatherResult {
  return { ok: false, error: { kind: "aborted", message: "Request cancelled" } };
}

function failure(error: WeatherFetchError): WeatherResult {
  console.warn(`[weather] Fetch failed (${error.kind}): ${error.message}`);
  return { ok: false, error };
}

/**
 * Fetch current conditions once
 */
export async function fetchWeather(options: WeatherClientOptions = {}): Promise<WeatherResult> {
  const { url = DEFAULT_WEATHER_URL, timeoutMs = DEFAULT_WEATHER_TIMEOUT_MS, signal } = options;

  if (signal?.aborted) {
    return cancelled();
  }

  const controller = new AbortController();
  const timeoutId = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : null;
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { Accept: "text/plain" },
      signal: controller.signal,
    });

    if (response.status !== 200) {
      // Release the connection; the body is never read
      await response.body?.cancel();
      return failure({
        kind: "status",
        status: response.status,
        message: `Weather request failed: ${response.status}`,
      });
    }

    const body = await response.text();
    return { ok: true, text: body.trim() };
  } catch (error) {
    if (signal?.aborted) {
      return cancelled();
    }
    if (controller.signal.aborted) {
      return failure({ kind: "timeout", message: `No response within ${timeoutMs}ms` });
    }
    return failure({
      kind: "transport",
      message: error instanceof Error ? error.message : String(error),
    });
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Bind options into a client the renderer can hold on to
 */
export function createWeatherClient(options: WeatherClientOptions = {}): WeatherClient {
  return {
    fetchWeather: (signal) => fetchWeather({ ...options, signal: signal ?? options.signal }),
  };
}
