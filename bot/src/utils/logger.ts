/**
 * Process-wide logger for core modules
 */

import { createLogger } from "../core/Logger.js";

const log = createLogger("guildwarden", {
  timestampFormat: "locale",
  showCallerInfo: process.env.LOG_CALLER_INFO === "true",
});

export default log;

export { createLogger, LogLevel } from "../core/Logger.js";
export type { LoggerConfig, LoggerFunction } from "../core/Logger.js";
