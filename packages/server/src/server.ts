/**
 * Clock server
 *
 * Wires the renderer to the WebSocket presenter and runs the render
 * loop until a quit request arrives.
 */

import {
  ClockRenderer,
  FrameSurface,
  createWeatherClient,
  type ClockSource,
  type WeatherClient,
} from "@clockface/renderer";
import { geometryForSize, type ServerConfig } from "./config.js";
import { createWebSocketPresenter, type WebSocketPresenter } from "./presenter.js";
import { QuitSignal, bindProcessSignals, type QuitReason } from "./quit-signal.js";
import { RenderLoop } from "./render-loop.js";

export interface RunClockServerOptions {
  quit?: QuitSignal;
  /** Route SIGINT/SIGTERM into the quit signal (default: true) */
  processSignals?: boolean;
  /** Replace the HTTP weather client */
  weather?: WeatherClient;
  clock?: ClockSource;
  /** Called once the presenter is listening, before the first frame */
  onReady?: (presenter: WebSocketPresenter) => void;
}

export interface ClockServerResult {
  frames: number;
  reason: QuitReason | null;
}

/**
 * Run the clock until quit; resolves after the presenter is closed
 */
export async function runClockServer(
  config: ServerConfig,
  options: RunClockServerOptions = {}
): Promise<ClockServerResult> {
  const quit = options.quit ?? new QuitSignal();
  const unbindSignals = options.processSignals === false ? () => {} : bindProcessSignals(quit);
  let refreshTimer: ReturnType<typeof setInterval> | undefined;

  try {
    const presenter = await createWebSocketPresenter({
      port: config.port,
      onQuitRequest: () => quit.request("viewer"),
    });

    console.log("Clock server running");
    console.log(`  WebSocket: ws://localhost:${presenter.port}`);
    console.log(`  Frame: ${config.size}x${config.size} @ ${config.fps} fps`);
    console.log();

    // Quit during the startup fetch cancels it instead of waiting it out
    const startup = new AbortController();
    let stopWaiting = () => {};
    const quitting = new Promise<null>((resolve) => {
      const cancelStartup = () => {
        startup.abort();
        resolve(null);
      };
      if (quit.requested) cancelStartup();
      else stopWaiting = quit.onQuit(cancelStartup);
    });

    const creating = ClockRenderer.create(
      {
        weather:
          options.weather ??
          createWeatherClient({ url: config.weatherUrl, timeoutMs: config.weatherTimeoutMs }),
        geometry: geometryForSize(config.size),
        clock: options.clock,
      },
      startup.signal
    );

    let started: ClockRenderer | null;
    try {
      started = await Promise.race([creating, quitting]);
    } catch (error) {
      await presenter.close();
      throw error;
    } finally {
      stopWaiting();
    }

    if (!started) {
      creating.catch((error) => console.error("[weather] Startup fetch failed after quit:", error));
      await presenter.close();
      console.log(`[server] Stopped during startup (${quit.reason ?? "unknown"})`);
      return { frames: 0, reason: quit.reason };
    }
    const renderer = started;
    console.log(`[weather] ${renderer.state.weatherText}`);

    if (config.weatherRefreshMs > 0) {
      refreshTimer = setInterval(() => {
        renderer.refreshWeather().catch((error) => {
          console.error("[weather] Refresh failed:", error);
        });
      }, config.weatherRefreshMs);
    }

    options.onReady?.(presenter);

    const loop = new RenderLoop({
      renderer,
      surface: new FrameSurface(config.size, config.size, config.textScale),
      presenter,
      quit,
      fps: config.fps,
    });
    const frames = await loop.run();

    console.log(`[server] Stopped after ${frames} frames (${quit.reason ?? "unknown"})`);
    return { frames, reason: quit.reason };
  } finally {
    if (refreshTimer) clearInterval(refreshTimer);
    unbindSignals();
  }
}
