import { useEffect, useRef } from "react";

interface PixelDisplayProps {
  width: number;
  height: number;
  /** RGB bytes, 3 per pixel, row-major */
  frame: Uint8Array | null;
}

/**
 * Canvas display for RGB frame data.
 * Painted at native resolution; CSS shrinks it to fit the window with
 * pixelated (nearest neighbor) rendering.
 */
export function PixelDisplay({ width, height, frame }: PixelDisplayProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext("2d");
    if (!ctx) return;

    ctx.fillStyle = "#000";
    ctx.fillRect(0, 0, width, height);

    if (!frame || frame.length < width * height * 3) return;

    const imageData = ctx.createImageData(width, height);
    for (let src = 0, dst = 0; dst < imageData.data.length; src += 3, dst += 4) {
      imageData.data[dst] = frame[src];
      imageData.data[dst + 1] = frame[src + 1];
      imageData.data[dst + 2] = frame[src + 2];
      imageData.data[dst + 3] = 255;
    }
    ctx.putImageData(imageData, 0, 0);
  }, [width, height, frame]);

  return (
    <canvas
      ref={canvasRef}
      width={width}
      height={height}
      style={{
        border: "2px solid #333",
        borderRadius: "4px",
        boxShadow: "0 0 20px rgba(0, 0, 0, 0.5)",
        maxWidth: "calc(100vw - 32px)",
        maxHeight: "calc(100vh - 160px)",
        width: "auto",
        height: "auto",
        imageRendering: "pixelated",
      }}
    />
  );
}
