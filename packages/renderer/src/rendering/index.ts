/**
 * Clock rendering module
 * Used by the render loop in @clockface/server.
 */

export * from "./clock-renderer.js";
export * from "./clock-state.js";
export * from "./surface.js";
export * from "./text.js";
export * from "./themes.js";
