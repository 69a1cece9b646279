/**
 * WebSocket frame presenter
 *
 * Broadcasts each finished frame to connected viewers. The most recent
 * frame is kept so a viewer that connects mid-run gets a picture at once.
 */

import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { Frame, FramePayload, WsMessage, WsMessageType } from "@clockface/core";
import { encodeFrameToBase64 } from "@clockface/core";

export interface FramePresenter {
  present(frame: Frame): void;
  /** Release the display: disconnect viewers and stop listening */
  close(): Promise<void>;
}

export interface WebSocketPresenterOptions {
  port: number;
  host?: string;
  /** Called when a viewer asks the clock to quit */
  onQuitRequest?: () => void;
}

export interface WebSocketPresenter extends FramePresenter {
  /** Bound port (useful when listening on port 0) */
  readonly port: number;
  readonly clientCount: number;
}

function frameMessage(frame: Frame): string {
  const payload: FramePayload = {
    frame: {
      width: frame.width,
      height: frame.height,
      data: encodeFrameToBase64(frame),
    },
  };
  const message: WsMessage = { type: "frame", payload, timestamp: Date.now() };
  return JSON.stringify(message);
}

const MESSAGE_TYPES: readonly WsMessageType[] = ["frame", "ping", "pong", "quit"];

function isMessageType(value: unknown): value is WsMessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

/**
 * Parse a viewer message; throws on invalid JSON, null on unknown shapes
 */
export function parseMessage(data: RawData | string): WsMessage | null {
  const parsed: unknown = JSON.parse(data.toString());
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) {
    return null;
  }
  if (!isMessageType(parsed.type)) {
    return null;
  }
  return {
    type: parsed.type,
    payload: "payload" in parsed ? parsed.payload : {},
    timestamp: Date.now(),
  };
}

/**
 * Start listening; resolves once the server is bound
 */
export function createWebSocketPresenter(
  options: WebSocketPresenterOptions
): Promise<WebSocketPresenter> {
  const clients = new Set<WebSocket>();
  let lastFrame: Frame | null = null;

  const wss = new WebSocketServer({ port: options.port, host: options.host });

  wss.on("connection", (ws) => {
    clients.add(ws);
    console.log(`[server] Viewer connected (total: ${clients.size})`);

    // Send the latest frame immediately
    if (lastFrame) {
      ws.send(frameMessage(lastFrame));
    }

    ws.on("close", () => {
      clients.delete(ws);
      console.log(`[server] Viewer disconnected (total: ${clients.size})`);
    });

    ws.on("message", (data) => {
      let message: WsMessage | null;
      try {
        message = parseMessage(data);
      } catch (error) {
        console.warn("[server] Ignoring malformed message:", error);
        return;
      }

      if (!message) {
        console.warn("[server] Ignoring unrecognized message");
        return;
      }

      if (message.type === "ping") {
        const pong: WsMessage = { type: "pong", payload: {}, timestamp: Date.now() };
        ws.send(JSON.stringify(pong));
      } else if (message.type === "quit") {
        console.log("[server] Quit requested by viewer");
        options.onQuitRequest?.();
      }
    });

    ws.on("error", (error) => {
      console.error("[server] Viewer socket error:", error);
    });
  });

  const presenter: WebSocketPresenter = {
    get port() {
      const address = wss.address();
      return typeof address === "object" && address !== null ? address.port : options.port;
    },

    get clientCount() {
      return clients.size;
    },

    present(frame: Frame): void {
      lastFrame = frame;
      if (clients.size === 0) return;

      const message = frameMessage(frame);
      for (const client of clients) {
        if (client.readyState === WebSocket.OPEN) {
          client.send(message);
        }
      }
    },

    close(): Promise<void> {
      for (const client of clients) {
        client.terminate();
      }
      clients.clear();
      return new Promise((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };

  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      wss.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      wss.off("error", onError);
      wss.on("error", (error) => console.error("[server] WebSocket server error:", error));
      resolve(presenter);
    };
    wss.once("error", onError);
    wss.once("listening", onListening);
  });
}
