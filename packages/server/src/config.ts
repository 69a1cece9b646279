/**
 * Server configuration
 *
 * Values come from .env.local (repo root) and the process environment,
 * with CLI flags taking precedence. Everything has a default.
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import {
  DEFAULT_WEATHER_TIMEOUT_MS,
  DEFAULT_WEATHER_URL,
  type ClockGeometry,
} from "@clockface/renderer";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Path to the env file (in repo root)
export const ENV_FILE = resolve(__dirname, "../../../.env.local");

export interface ServerConfig {
  weatherUrl: string;
  weatherTimeoutMs: number;
  /** 0 = fetch once at startup only */
  weatherRefreshMs: number;
  port: number;
  fps: number;
  /** Square frame edge in pixels */
  size: number;
  textScale: number;
}

/** Raw string overrides, as parsed from CLI flags */
export type ConfigOverrides = Partial<Record<keyof ServerConfig, string>>;

export const DEFAULT_CONFIG: ServerConfig = {
  weatherUrl: DEFAULT_WEATHER_URL,
  weatherTimeoutMs: DEFAULT_WEATHER_TIMEOUT_MS,
  weatherRefreshMs: 0,
  port: 8080,
  fps: 60,
  size: 600,
  textScale: 2,
};

const ENV_KEYS: Record<keyof ServerConfig, string> = {
  weatherUrl: "CLOCKFACE_WEATHER_URL",
  weatherTimeoutMs: "CLOCKFACE_WEATHER_TIMEOUT_MS",
  weatherRefreshMs: "CLOCKFACE_WEATHER_REFRESH_MS",
  port: "CLOCKFACE_PORT",
  fps: "CLOCKFACE_FPS",
  size: "CLOCKFACE_SIZE",
  textScale: "CLOCKFACE_TEXT_SCALE",
};

interface IntegerRange {
  min: number;
  max: number;
}

const INTEGER_SETTINGS = [
  "weatherTimeoutMs",
  "weatherRefreshMs",
  "port",
  "fps",
  "size",
  "textScale",
] as const;

type IntegerSetting = (typeof INTEGER_SETTINGS)[number];

const RANGES: Record<IntegerSetting, IntegerRange> = {
  weatherTimeoutMs: { min: 0, max: 300_000 },
  weatherRefreshMs: { min: 0, max: 86_400_000 },
  port: { min: 0, max: 65_535 },
  fps: { min: 1, max: 120 },
  size: { min: 200, max: 2000 },
  textScale: { min: 1, max: 8 },
};

const FLAG_NAMES: Record<keyof ServerConfig, string> = {
  weatherUrl: "weather-url",
  weatherTimeoutMs: "weather-timeout",
  weatherRefreshMs: "weather-refresh",
  port: "port",
  fps: "fps",
  size: "size",
  textScale: "text-scale",
};

export class ConfigError extends Error {
  constructor(
    readonly setting: string,
    message: string
  ) {
    super(`${setting}: ${message}`);
    this.name = "ConfigError";
  }
}

function parseInteger(setting: string, raw: string, range: IntegerRange): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(setting, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(trimmed, 10);
  if (value < range.min || value > range.max) {
    throw new ConfigError(setting, `must be between ${range.min} and ${range.max}, got ${value}`);
  }
  return value;
}

function parseUrl(setting: string, raw: string): string {
  const trimmed = raw.trim();
  try {
    new URL(trimmed);
    return trimmed;
  } catch {
    throw new ConfigError(setting, `expected a URL, got "${raw}"`);
  }
}

/**
 * Load .env.local into process.env (existing variables win)
 */
export function loadEnvFile(path = ENV_FILE): void {
  loadDotenv({ path });
}

/**
 * Build the config from environment variables and flag overrides
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ServerConfig {
  const raw = (key: keyof ServerConfig): { setting: string; value: string } | undefined => {
    const flag = overrides[key];
    if (flag !== undefined) return { setting: `--${FLAG_NAMES[key]}`, value: flag };
    const fromEnv = env[ENV_KEYS[key]];
    if (fromEnv !== undefined && fromEnv !== "") return { setting: ENV_KEYS[key], value: fromEnv };
    return undefined;
  };

  const url = raw("weatherUrl");
  const config: ServerConfig = {
    ...DEFAULT_CONFIG,
    weatherUrl: url ? parseUrl(url.setting, url.value) : DEFAULT_CONFIG.weatherUrl,
  };

  for (const key of INTEGER_SETTINGS) {
    const entry = raw(key);
    if (entry) {
      config[key] = parseInteger(entry.setting, entry.value, RANGES[key]);
    }
  }

  return config;
}


/**
 * Scale the 600px reference layout to the configured frame size
 */
export function geometryForSize(size: number): ClockGeometry {
  const center = Math.floor(size / 2);
  return {
    center: { x: center, y: center },
    radius: Math.round((size * 250) / 600),
    infoPanelY: Math.round((size * 50) / 600),
  };
}
