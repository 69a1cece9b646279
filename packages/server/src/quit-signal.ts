/**
 * Quit signal
 * Fires once, from a process signal or a viewer's quit request.
 */

import { EventEmitter } from "events";

export type QuitReason = "SIGINT" | "SIGTERM" | "viewer";

export class QuitSignal {
  private readonly emitter = new EventEmitter();
  private quitReason: QuitReason | null = null;

  get requested(): boolean {
    return this.quitReason !== null;
  }

  get reason(): QuitReason | null {
    return this.quitReason;
  }

  /** Request shutdown; later requests are ignored */
  request(reason: QuitReason): void {
    if (this.quitReason !== null) return;
    this.quitReason = reason;
    this.emitter.emit("quit", reason);
  }

  /** Listen for the quit request; returns an unsubscribe function */
  onQuit(listener: (reason: QuitReason) => void): () => void {
    this.emitter.once("quit", listener);
    return () => {
      this.emitter.off("quit", listener);
    };
  }
}

/** The parts of `process` the signal binding needs */
export interface SignalSource {
  on(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
  off(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
}

/**
 * Route SIGINT/SIGTERM into the quit signal; returns an unbind function
 */
export function bindProcessSignals(
  quit: QuitSignal,
  source: SignalSource = process
): () => void {
  const onInt = () => quit.request("SIGINT");
  const onTerm = () => quit.request("SIGTERM");
  source.on("SIGINT", onInt);
  source.on("SIGTERM", onTerm);

  return () => {
    source.off("SIGINT", onInt);
    source.off("SIGTERM", onTerm);
  };
}
