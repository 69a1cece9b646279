export * from "./client.js";
export type {
  WeatherClient,
  WeatherClientOptions,
  WeatherFetchError,
  WeatherFetchErrorKind,
  WeatherResult,
} from "./types.js";
