import { PixelDisplay } from "./components/PixelDisplay";
import { useWebSocket, type ConnectionStatus } from "./hooks/useWebSocket";

const DEFAULT_WEBSOCKET_URL = "ws://localhost:8080";
const DEFAULT_FRAME_SIZE = 600;

const statusConfig: Record<ConnectionStatus, { text: string; color: string }> = {
  connected: { text: "Connected", color: "#4ade80" },
  connecting: { text: "Connecting...", color: "#facc15" },
  disconnected: { text: "Disconnected - Reconnecting...", color: "#f87171" },
  stopped: { text: "Clock stopped", color: "#a3a3a3" },
};

export function App() {
  const wsUrl = import.meta.env.VITE_WEBSOCKET_URL ?? DEFAULT_WEBSOCKET_URL;
  const { frame, status, connected, requestQuit } = useWebSocket(wsUrl);
  const { text, color } = statusConfig[status];

  return (
    <div style={{ textAlign: "center", color: "#fff" }}>
      <h1 style={{ marginBottom: "20px", fontSize: "24px", fontWeight: 300 }}>
        Clockface
      </h1>
      <PixelDisplay
        width={frame?.width ?? DEFAULT_FRAME_SIZE}
        height={frame?.height ?? DEFAULT_FRAME_SIZE}
        frame={frame?.pixels ?? null}
      />
      <p style={{ marginTop: "20px", fontSize: "14px", color, opacity: 0.9 }}>
        {text}
      </p>
      <button
        type="button"
        onClick={() => requestQuit()}
        disabled={!connected}
        style={{ marginTop: "8px", padding: "6px 16px", cursor: connected ? "pointer" : "default" }}
      >
        Quit
      </button>
    </div>
  );
}
