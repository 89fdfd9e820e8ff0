export * from "./scheduler/index.js";
export * from "./errors.js";
export { loadEngineConfig } from "./config.js";
export type { EngineConfig } from "./config.js";
export { initEngineLogging, getEngineLogger, createComponentLogger } from "./logging.js";
export type { LoggingOptions } from "./logging.js";
