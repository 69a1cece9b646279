#!/usr/bin/env node
/**
 * clockface CLI
 */

import { program } from "commander";
import { ConfigError, loadEnvFile, resolveConfig, type ConfigOverrides } from "./config.js";
import { runClockServer } from "./server.js";

interface CliOptions {
  weatherUrl?: string;
  weatherTimeout?: string;
  weatherRefresh?: string;
  port?: string;
  fps?: string;
  size?: string;
  textScale?: string;
}

program
  .name("clockface")
  .description("Render an analog clock and stream it to WebSocket viewers")
  .version("0.1.0")
  .option("--weather-url <url>", "weather endpoint returning plain text")
  .option("--weather-timeout <ms>", "weather request timeout, 0 for none")
  .option("--weather-refresh <ms>", "weather refresh interval, 0 to fetch once")
  .option("--port <port>", "WebSocket server port")
  .option("--fps <fps>", "target frame rate")
  .option("--size <px>", "frame edge length in pixels")
  .option("--text-scale <n>", "info panel text scale")
  .action(async (options: CliOptions) => {
    loadEnvFile();

    const overrides: ConfigOverrides = {
      weatherUrl: options.weatherUrl,
      weatherTimeoutMs: options.weatherTimeout,
      weatherRefreshMs: options.weatherRefresh,
      port: options.port,
      fps: options.fps,
      size: options.size,
      textScale: options.textScale,
    };

    try {
      const config = resolveConfig(process.env, overrides);
      await runClockServer(config);
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Invalid configuration: ${error.message}`);
      } else {
        console.error("Clock server error:", error);
      }
      process.exit(1);
    }

    process.exit(0);
  });

program.parse();
