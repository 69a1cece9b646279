export * from "./types";
export * from "./frame";
export * from "./raster";
