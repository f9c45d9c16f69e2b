/**
 * tram: CLI starter kit with layered configuration and hot reload
 */

export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./workspace/index.js";
export { Logger, configureLogging, createSilentLogger } from "./utils/logger.js";
export type { LoggerConfig, LogFormat } from "./utils/logger.js";
export { renderOutput } from "./utils/output.js";
export type { OutputRecord, OutputValue } from "./utils/output.js";
export { TramSession } from "./session.js";
export type { SessionOptions } from "./session.js";
export { runCli } from "./app.js";
export type { CliIo, RunCliOptions } from "./app.js";
