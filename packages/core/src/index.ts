export * from "./config/index.js";
export * from "./schemas/index.js";
export * from "./logger/index.js";
export * from "./errors/catalog.js";
export * from "./extractor/index.js";
export * from "./scanner/index.js";
export * from "./storage/index/index.js";
export * from "./query/index.js";
export * from "./navigation/index.js";
export * from "./explorer/index.js";
