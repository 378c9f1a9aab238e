export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export type { JsonTransportOptions } from "./transports/json.js";
export { JsonTransport } from "./transports/json.js";
export { LOG_LEVELS, type LogEntry, type LoggerOptions, type LogLevel, type LogTransport } from "./types.js";
