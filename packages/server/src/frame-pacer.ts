/**
 * Fixed-rate frame pacing
 *
 * After each frame is presented the loop sleeps for whatever is left of
 * the frame budget (1000 / fps ms). Frames that overrun get no sleep.
 */

export interface FramePacerOptions {
  /** Target frames per second (default: 60) */
  fps?: number;
  /** Millisecond clock (default: performance.now) */
  now?: () => number;
}

const DEFAULT_FPS = 60;

/**
 * Milliseconds to sleep after a frame that took `elapsedMs`
 */
export function calculateFrameDelay(elapsedMs: number, fps: number = DEFAULT_FPS): number {
  const budget = 1000 / fps;
  return Math.max(0, budget - elapsedMs);
}

/**
 * Create a pacer that tracks the start of the current frame
 */
export function createFramePacer(options: FramePacerOptions = {}) {
  const fps = options.fps ?? DEFAULT_FPS;
  const now = options.now ?? (() => performance.now());
  let frameStart = now();
  let frames = 0;

  return {
    /** Target rate */
    fps,

    /** Mark the start of a frame */
    begin: () => {
      frameStart = now();
      frames++;
    },

    /** Sleep time left in the current frame's budget */
    remaining: (): number => calculateFrameDelay(now() - frameStart, fps),

    /** Frames begun so far */
    getFrameCount: () => frames,
  };
}

export type FramePacer = ReturnType<typeof createFramePacer>;
