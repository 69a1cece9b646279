import { useState, useEffect, useRef, useCallback } from "react";
import type { Frame, FramePayload, WsMessage } from "@clockface/core";

export type ConnectionStatus = "connected" | "connecting" | "disconnected" | "stopped";

/** Backoff configuration */
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;
const BACKOFF_MULTIPLIER = 2;

/**
 * Calculate next backoff delay with exponential increase
 */
export function calculateBackoff(attempt: number): number {
  const delay = INITIAL_BACKOFF_MS * Math.pow(BACKOFF_MULTIPLIER, attempt);
  return Math.min(delay, MAX_BACKOFF_MS);
}

function decodeBase64(base64: string): Uint8Array {
  const binary = atob(base64);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isFramePayload(payload: unknown): payload is FramePayload {
  if (!isRecord(payload) || !isRecord(payload.frame)) return false;
  const { width, height, data } = payload.frame;
  return typeof width === "number" && typeof height === "number" && typeof data === "string";
}

function send(ws: WebSocket, type: WsMessage["type"]): void {
  const message: WsMessage = { type, payload: {}, timestamp: Date.now() };
  ws.send(JSON.stringify(message));
}

/**
 * WebSocket hook for viewing the clock server's frames.
 * Reconnects with exponential backoff until the viewer asks the clock to quit.
 */
export function useWebSocket(url: string | undefined) {
  const [status, setStatus] = useState<ConnectionStatus>("disconnected");
  const [frame, setFrame] = useState<Frame | null>(null);
  const wsRef = useRef<WebSocket | null>(null);
  const reconnectAttemptRef = useRef(0);
  const reconnectTimeoutRef = useRef<ReturnType<typeof setTimeout> | null>(null);
  const intentionalCloseRef = useRef(false);
  const quitRequestedRef = useRef(false);

  const connect = useCallback(() => {
    if (!url) {
      console.log("No WebSocket URL provided");
      return;
    }

    // Don't connect if already connected or connecting
    if (wsRef.current?.readyState === WebSocket.OPEN ||
        wsRef.current?.readyState === WebSocket.CONNECTING) {
      return;
    }

    setStatus("connecting");
    console.log(`Connecting to WebSocket: ${url} (attempt ${reconnectAttemptRef.current + 1})`);

    const ws = new WebSocket(url);
    wsRef.current = ws;

    ws.onopen = () => {
      console.log("WebSocket connected");
      setStatus("connected");
      reconnectAttemptRef.current = 0; // Reset backoff on successful connection
    };

    ws.onmessage = (event) => {
      try {
        const message: unknown = JSON.parse(String(event.data));
        if (!isRecord(message)) return;

        if (message.type === "frame" && isFramePayload(message.payload)) {
          const { width, height, data } = message.payload.frame;
          setFrame({ width, height, pixels: decodeBase64(data) });
        } else if (message.type === "ping") {
          send(ws, "pong");
        }
      } catch (error) {
        console.error("Error processing message:", error);
      }
    };

    ws.onclose = () => {
      // A socket replaced by a newer connection (e.g. StrictMode remount) must not touch state
      if (wsRef.current !== ws) return;

      console.log("WebSocket disconnected");
      wsRef.current = null;

      if (quitRequestedRef.current) {
        setStatus("stopped");
        return;
      }
      setStatus("disconnected");

      // Don't reconnect if close was intentional (component unmounting)
      if (intentionalCloseRef.current) {
        return;
      }

      // Schedule reconnection with exponential backoff
      const backoffMs = calculateBackoff(reconnectAttemptRef.current);
      console.log(`Reconnecting in ${backoffMs}ms...`);
      reconnectAttemptRef.current++;

      reconnectTimeoutRef.current = setTimeout(() => {
        connect();
      }, backoffMs);
    };

    ws.onerror = (error) => {
      console.error("WebSocket error:", error);
    };
  }, [url]);

  /**
   * Ask the clock server to shut down. Returns false when not connected.
   */
  const requestQuit = useCallback((): boolean => {
    const ws = wsRef.current;
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;

    quitRequestedRef.current = true;
    send(ws, "quit");
    return true;
  }, []);

  // Initial connection and cleanup
  useEffect(() => {
    intentionalCloseRef.current = false;
    connect();

    return () => {
      intentionalCloseRef.current = true;
      if (reconnectTimeoutRef.current) {
        clearTimeout(reconnectTimeoutRef.current);
      }
      if (wsRef.current) {
        wsRef.current.close();
      }
    };
  }, [connect]);

  // Reconnect on visibility change (tab focus)
  useEffect(() => {
    const handleVisibilityChange = () => {
      if (document.visibilityState === "visible" && status === "disconnected") {
        console.log("Tab visible, attempting reconnect");
        reconnectAttemptRef.current = 0; // Reset backoff when user returns
        connect();
      }
    };

    document.addEventListener("visibilitychange", handleVisibilityChange);
    return () => {
      document.removeEventListener("visibilitychange", handleVisibilityChange);
    };
  }, [connect, status]);

  const connected = status === "connected";

  return { connected, status, frame, requestQuit };
}
