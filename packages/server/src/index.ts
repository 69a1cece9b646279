export * from "./config.js";
export * from "./frame-pacer.js";
export * from "./presenter.js";
export * from "./quit-signal.js";
export * from "./render-loop.js";
export * from "./server.js";
