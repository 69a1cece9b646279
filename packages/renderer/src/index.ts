export * from "./rendering/index.js";
export * from "./weather/index.js";
