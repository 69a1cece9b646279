/**
 * Render loop
 *
 * One iteration per frame: poll input -> update -> draw -> present,
 * then sleep out the rest of the frame budget. Ends when the quit
 * signal fires, after which the presenter is closed.
 */

import type { Surface } from "@clockface/renderer";
import type { Frame } from "@clockface/core";
import { createFramePacer, type FramePacer } from "./frame-pacer.js";
import type { FramePresenter } from "./presenter.js";
import type { QuitSignal } from "./quit-signal.js";

/** What the loop drives each frame */
export interface Renderable {
  update(): void;
  draw(surface: Surface): void;
}

/** A surface whose pixels can be presented */
export interface FrameTarget extends Surface {
  readonly frame: Frame;
}

export interface RenderLoopOptions {
  renderer: Renderable;
  surface: FrameTarget;
  presenter: FramePresenter;
  quit: QuitSignal;
  fps?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RenderLoop {
  private readonly pacer: FramePacer;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: RenderLoopOptions) {
    this.pacer = createFramePacer({ fps: options.fps, now: options.now });
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Frames rendered so far */
  get frameCount(): number {
    return this.pacer.getFrameCount();
  }

  /**
   * Run a single iteration. Returns false, without rendering, once quit is requested.
   */
  tick(): boolean {
    const { renderer, surface, presenter, quit } = this.options;

    if (quit.requested) return false;

    this.pacer.begin();
    renderer.update();
    renderer.draw(surface);
    presenter.present(surface.frame);
    return true;
  }

  /**
   * Loop until quit; always releases the presenter on the way out
   */
  async run(): Promise<number> {
    try {
      while (this.tick()) {
        await this.sleep(this.pacer.remaining());
      }
    } finally {
      await this.options.presenter.close();
    }
    return this.frameCount;
  }
}
