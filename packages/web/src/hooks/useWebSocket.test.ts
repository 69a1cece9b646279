// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { StrictMode } from "react";
import { renderHook, act } from "@testing-library/react";
import "../test-setup";
import { calculateBackoff, useWebSocket } from "./useWebSocket";

// Store the mock class constructor calls
let mockWebSocketInstances: MockWebSocket[] = [];

// Mock WebSocket class
class MockWebSocket {
  static CONNECTING = 0;
  static OPEN = 1;
  static CLOSING = 2;
  static CLOSED = 3;

  url: string;
  readyState = MockWebSocket.CONNECTING;
  onopen: ((ev: Event) => void) | null = null;
  onclose: ((ev: CloseEvent) => void) | null = null;
  onmessage: ((ev: MessageEvent) => void) | null = null;
  onerror: ((ev: Event) => void) | null = null;

  send = vi.fn();
  // Like a real socket, the close event arrives later
  close = vi.fn(() => {
    this.readyState = MockWebSocket.CLOSING;
  });

  constructor(url: string) {
    this.url = url;
    mockWebSocketInstances.push(this);
  }

  simulateOpen() {
    this.readyState = MockWebSocket.OPEN;
    this.onopen?.(new Event("open"));
  }

  simulateClose() {
    this.readyState = MockWebSocket.CLOSED;
    this.onclose?.(new CloseEvent("close"));
  }

  simulateMessage(data: unknown) {
    this.simulateRaw(JSON.stringify(data));
  }

  simulateRaw(data: string) {
    this.onmessage?.(new MessageEvent("message", { data }));
  }
}

const WS_URL = "ws://localhost:8080";

describe("calculateBackoff", () => {
  it("doubles from one second up to thirty", () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(calculateBackoff)).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });
});

describe("useWebSocket", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
    mockWebSocketInstances = [];
    vi.stubGlobal("WebSocket", MockWebSocket);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  const getLastInstance = () => mockWebSocketInstances[mockWebSocketInstances.length - 1];

  it("starts disconnected when no URL provided", () => {
    const { result } = renderHook(() => useWebSocket(undefined));

    expect(result.current.status).toBe("disconnected");
    expect(result.current.connected).toBe(false);
    expect(result.current.frame).toBeNull();
    expect(mockWebSocketInstances.length).toBe(0);
  });

  it("connects to the given URL", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    expect(mockWebSocketInstances.length).toBe(1);
    expect(getLastInstance().url).toBe(WS_URL);
    expect(result.current.status).toBe("connecting");
  });

  it("sets status to connected when WebSocket opens", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
    });

    expect(result.current.status).toBe("connected");
    expect(result.current.connected).toBe(true);
    expect(getLastInstance().send).not.toHaveBeenCalled();
  });

  it("decodes frame messages with their dimensions", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
    });

    // 2 pixels: red, green
    const rgbData = new Uint8Array([255, 0, 0, 0, 255, 0]);
    const base64Data = btoa(String.fromCharCode(...rgbData));

    act(() => {
      getLastInstance().simulateMessage({
        type: "frame",
        payload: { frame: { width: 2, height: 1, data: base64Data } },
        timestamp: 0,
      });
    });

    expect(result.current.frame?.width).toBe(2);
    expect(result.current.frame?.height).toBe(1);
    expect(Array.from(result.current.frame?.pixels ?? [])).toEqual([255, 0, 0, 0, 255, 0]);
  });

  it("ignores frame messages with a malformed payload", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
      getLastInstance().simulateMessage({ type: "frame", payload: { frame: { width: 2 } } });
    });

    expect(result.current.frame).toBeNull();
  });

  it("responds with pong when receiving ping", () => {
    renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
      getLastInstance().simulateMessage({ type: "ping", payload: {}, timestamp: 0 });
    });

    expect(getLastInstance().send).toHaveBeenCalledWith(
      expect.stringContaining('"type":"pong"')
    );
  });

  it("reconnects with exponential backoff after disconnect", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
    });
    act(() => {
      getLastInstance().simulateClose();
    });

    expect(result.current.status).toBe("disconnected");
    expect(mockWebSocketInstances.length).toBe(1);

    act(() => {
      vi.advanceTimersByTime(999);
    });
    expect(mockWebSocketInstances.length).toBe(1);

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(mockWebSocketInstances.length).toBe(2);

    // Second failure without ever opening waits twice as long
    act(() => {
      getLastInstance().simulateClose();
    });
    act(() => {
      vi.advanceTimersByTime(1999);
    });
    expect(mockWebSocketInstances.length).toBe(2);
    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(mockWebSocketInstances.length).toBe(3);
  });

  it("sends quit and stops reconnecting once the server closes", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
    });

    let sent = false;
    act(() => {
      sent = result.current.requestQuit();
    });

    expect(sent).toBe(true);
    expect(getLastInstance().send).toHaveBeenCalledWith(
      expect.stringContaining('"type":"quit"')
    );

    act(() => {
      getLastInstance().simulateClose();
    });
    act(() => {
      vi.advanceTimersByTime(35000);
    });

    expect(result.current.status).toBe("stopped");
    expect(mockWebSocketInstances.length).toBe(1);
  });

  it("does not send quit while disconnected", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    expect(result.current.requestQuit()).toBe(false);
    expect(getLastInstance().send).not.toHaveBeenCalled();
  });

  it("ignores a late close from a socket that was already replaced", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL), { wrapper: StrictMode });

    // StrictMode mounts, cleans up and mounts again: the first socket is closing
    expect(mockWebSocketInstances.length).toBe(2);
    const [stale, current] = mockWebSocketInstances;
    expect(stale.close).toHaveBeenCalled();

    act(() => {
      current.simulateOpen();
    });
    act(() => {
      stale.simulateClose();
    });
    act(() => {
      vi.advanceTimersByTime(35000);
    });

    expect(result.current.status).toBe("connected");
    expect(mockWebSocketInstances.length).toBe(2);

    act(() => {
      result.current.requestQuit();
    });
    expect(current.send).toHaveBeenCalledWith(expect.stringContaining('"type":"quit"'));
  });

  it("closes the socket on unmount without reconnecting", () => {
    const { unmount } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
    });

    const ws = getLastInstance();
    unmount();

    act(() => {
      vi.advanceTimersByTime(35000);
    });

    expect(ws.close).toHaveBeenCalled();
    expect(mockWebSocketInstances.length).toBe(1);
  });

  it("logs invalid JSON and keeps the connection", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
      getLastInstance().simulateRaw("not valid json");
    });

    expect(consoleSpy).toHaveBeenCalledWith("Error processing message:", expect.any(Error));
    expect(result.current.status).toBe("connected");
  });

  it("ignores unknown message types", () => {
    const { result } = renderHook(() => useWebSocket(WS_URL));

    act(() => {
      getLastInstance().simulateOpen();
      getLastInstance().simulateMessage({ type: "unknown", payload: {}, timestamp: 0 });
    });

    expect(result.current.frame).toBeNull();
    expect(getLastInstance().send).not.toHaveBeenCalled();
  });
});
