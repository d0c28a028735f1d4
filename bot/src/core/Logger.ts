/**
 * Core Logger
 * Colored console output with optional file logging
 * Format: [time] [packagename] [LEVEL] [location]: message
 */

import * as fs from "fs";
import * as path from "path";

/**
 * Log levels for filtering output
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** The package/module name shown in logs */
  packageName: string;
  /** Minimum log level to output */
  minLevel: LogLevel;
  /** Enable file logging */
  enableFileLogging: boolean;
  /** Path to log file */
  logFilePath?: string;
  timestampFormat: "locale" | "iso";
  /** Show caller file and line info */
  showCallerInfo: boolean;
  /** Number of path components to show in caller info */
  callerPathDepth: number;
  enableColors: boolean;
}

const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Resolve the process-wide minimum level.
 * LOG_LEVEL wins over DEBUG_LOG; vitest runs default to WARN to keep output readable.
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = env.LOG_LEVEL?.trim().toLowerCase();
  if (named && named in LEVEL_NAMES) {
    return LEVEL_NAMES[named] ?? LogLevel.INFO;
  }
  if (env.DEBUG_LOG === "true") return LogLevel.DEBUG;
  if (env.VITEST) return LogLevel.WARN;
  return LogLevel.INFO;
}

/** Settings read from the environment at log time unless configured explicitly */
type EnvBackedSettings = "minLevel" | "enableFileLogging";

type StoredConfig = Omit<LoggerConfig, EnvBackedSettings> & Partial<Pick<LoggerConfig, EnvBackedSettings>>;

const defaultConfig: Omit<StoredConfig, "packageName"> = {
  timestampFormat: "locale",
  showCallerInfo: false,
  callerPathDepth: 2,
  enableColors: process.stdout.isTTY ?? false,
};

class Logger {
  private config: StoredConfig;

  constructor(packageName: string, initialConfig?: Partial<LoggerConfig>) {
    this.config = {
      ...defaultConfig,
      ...initialConfig,
      packageName,
    };

    if (!this.config.logFilePath) {
      // One file per top-level package ("moderation:ledger" → logs/moderation.log)
      const fileStem = packageName.split(":")[0] ?? packageName;
      this.config.logFilePath = path.join(process.cwd(), `logs/${fileStem}.log`);
    }
  }

  private formatTime(): string {
    return this.config.timestampFormat === "locale" ? new Date().toLocaleTimeString() : new Date().toISOString();
  }

  private getCallerInfo(): string {
    if (!this.config.showCallerInfo) return "";

    const stack = new Error().stack?.split("\n");
    const callerLine = stack?.[4] || stack?.[3] || "";
    const callerMatch = callerLine.match(/at\s+(.*)\s+\((.*):(\d+):(\d+)\)/) || callerLine.match(/at\s+()(.*):(\d+):(\d+)/);
    if (!callerMatch) return "";

    const [, , filePath, line] = callerMatch;
    const parts = filePath?.split(/[/\\]/) ?? [];
    const depth = Math.min(this.config.callerPathDepth, parts.length);
    const displayPath = depth > 1 ? parts.slice(-depth).join("/") : (parts[parts.length - 1] ?? "");

    return `[${displayPath}:${line}]`;
  }

  private formatMessage(...args: unknown[]): string {
    return args
      .map((arg) => {
        if (arg instanceof Error) {
          return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ""}`;
        }
        if (typeof arg === "object" && arg !== null) {
          try {
            return JSON.stringify(arg, null, 2);
          } catch {
            return String(arg);
          }
        }
        return String(arg);
      })
      .join(" ");
  }

  private minLevel(): LogLevel {
    return this.config.minLevel ?? resolveMinLevel();
  }

  private fileLoggingEnabled(): boolean {
    return this.config.enableFileLogging ?? process.env.LOG_TO_FILE === "true";
  }

  private writeToFile(message: string): void {
    if (!this.fileLoggingEnabled() || !this.config.logFilePath) return;

    try {
      const logDir = path.dirname(this.config.logFilePath);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      const cleanMessage = message.replace(/\x1b\[\d+m/g, "");
      fs.appendFileSync(this.config.logFilePath, cleanMessage + "\n");
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(`Failed to write to log file: ${errorMessage}`);
    }
  }

  private log(level: LogLevel, levelName: string, color: string, ...args: unknown[]): void {
    if (this.minLevel() > level) return;

    const timestamp = this.formatTime();
    const callerInfo = this.getCallerInfo();
    const formattedMessage = this.formatMessage(...args);
    const location = callerInfo ? ` ${callerInfo}` : "";

    const message = this.config.enableColors
      ? `${colors.dim}[${timestamp}]${colors.reset} ${colors.blue}[${this.config.packageName}]${colors.reset} ${color}[${levelName}]${colors.reset}${colors.dim}${location}${colors.reset}: ${formattedMessage}`
      : `[${timestamp}] [${this.config.packageName}] [${levelName}]${location}: ${formattedMessage}`;

    const outputMethod = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : level === LogLevel.DEBUG ? console.debug : console.log;

    outputMethod(message);
    this.writeToFile(message);
  }

  info(...args: unknown[]): void {
    this.log(LogLevel.INFO, "INFO", colors.cyan, ...args);
  }

  warn(...args: unknown[]): void {
    this.log(LogLevel.WARN, "WARN", colors.yellow, ...args);
  }

  error(...args: unknown[]): void {
    this.log(LogLevel.ERROR, "ERROR", colors.red, ...args);
  }

  debug(...args: unknown[]): void {
    this.log(LogLevel.DEBUG, "DEBUG", colors.magenta, ...args);
  }

  configure(newConfig: Partial<LoggerConfig>): void {
    Object.assign(this.config, newConfig);
  }

  getConfig(): LoggerConfig {
    return { ...this.config, minLevel: this.minLevel(), enableFileLogging: this.fileLoggingEnabled() };
  }

  /** Explicit settings only, for children that keep reading the environment */
  inheritableConfig(): Partial<LoggerConfig> {
    return { ...this.config, logFilePath: undefined };
  }
}

/**
 * Callable logger: `log("x")` is `log.info("x")`
 */
export interface LoggerFunction {
  (...args: unknown[]): void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  configure: (newConfig: Partial<LoggerConfig>) => void;
  getConfig: () => LoggerConfig;
  child: (childPackageName: string) => LoggerFunction;
  LogLevel: typeof LogLevel;
}

/**
 * Create a new logger instance
 * @param packageName - Name shown in log output, e.g. "moderation:scheduler"
 */
export function createLogger(packageName: string, config?: Partial<LoggerConfig>): LoggerFunction {
  const logger = new Logger(packageName, config);

  return Object.assign((...args: unknown[]) => logger.info(...args), {
    info: (...args: unknown[]) => logger.info(...args),
    warn: (...args: unknown[]) => logger.warn(...args),
    error: (...args: unknown[]) => logger.error(...args),
    debug: (...args: unknown[]) => logger.debug(...args),
    configure: (newConfig: Partial<LoggerConfig>) => logger.configure(newConfig),
    getConfig: () => logger.getConfig(),
    child: (childPackageName: string) => createLogger(childPackageName, logger.inheritableConfig()),
    LogLevel,
  });
}

export { Logger };
