/**
 * Core types for the clock face
 */

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** RGB color with optional alpha (0 = transparent, 255 = opaque) */
export interface RGBA extends RGB {
  a?: number;
}

/** Point in frame coordinates (y grows downward) */
export interface Point {
  x: number;
  y: number;
}

/** A single frame of pixel data */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/** WebSocket message types */
export type WsMessageType = "frame" | "ping" | "pong" | "quit";

/** WebSocket message envelope */
export interface WsMessage {
  type: WsMessageType;
  payload: unknown;
  timestamp: number;
}

/** Frame message payload */
export interface FramePayload {
  frame: {
    width: number;
    height: number;
    /** Base64-encoded RGB pixel data */
    data: string;
  };
}
