/**
 * Environment Loader
 * Loads and validates environment variables with strict validation
 */

import log from "./logger.js";
import type { GlobalEnv, StoreDriver } from "../types/Env.js";

// Validator returns a problem description, or null when the value is fine
type EnvValidator<T> = (value: T, key: string, env: GlobalEnv) => string | null;

type EnvValidators = { [K in keyof GlobalEnv]?: EnvValidator<GlobalEnv[K]> };

const STORE_DRIVERS: readonly StoreDriver[] = ["file", "mongo"];

function toInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw.trim());
}

function toStoreDriver(raw: string | undefined): StoreDriver | null {
  const value = (raw ?? "file").trim().toLowerCase();
  return STORE_DRIVERS.find((driver) => driver === value) ?? null;
}

class EnvLoader {
  private globalEnv: GlobalEnv | null = null;

  private readonly validatedKeys: (keyof GlobalEnv)[] = [
    "BOT_TOKEN",
    "MONGODB_URI",
    "DATA_DIR",
    "SCHEDULER_INTERVAL_MS",
    "RETENTION_SWEEP_INTERVAL_MS",
    "NANOID_LENGTH",
  ];

  private readonly validators: EnvValidators = {
    BOT_TOKEN: (value, key) => {
      if (!value) return `${key} is required`;
      // Discord bot tokens have 3 dot-separated parts
      if (value.split(".").length !== 3) {
        return `${key} appears to be invalid. Discord bot tokens have 3 parts separated by dots.`;
      }
      return null;
    },

    MONGODB_URI: (value, key, env) => {
      if (env.STORE_DRIVER !== "mongo") return null;
      if (!value) return `${key} is required when STORE_DRIVER is "mongo"`;
      try {
        const parsed = new URL(value);
        if (parsed.protocol !== "mongodb:" && parsed.protocol !== "mongodb+srv:") {
          return `${key} must use mongodb: or mongodb+srv: protocol. Got: ${parsed.protocol}`;
        }
      } catch {
        return `${key} is not a valid URL: ${value}`;
      }
      return null;
    },

    DATA_DIR: (value, key, env) => {
      if (env.STORE_DRIVER === "file" && !value.trim()) return `${key} must not be empty`;
      return null;
    },

    SCHEDULER_INTERVAL_MS: (value, key) => {
      if (!Number.isInteger(value) || value < 1000) return `${key} must be an integer of at least 1000. Got: ${value}`;
      return null;
    },

    RETENTION_SWEEP_INTERVAL_MS: (value, key) => {
      if (!Number.isInteger(value) || value < 60_000) return `${key} must be an integer of at least 60000. Got: ${value}`;
      return null;
    },

    NANOID_LENGTH: (value, key) => {
      if (!Number.isInteger(value) || value < 1 || value > 64) return `${key} must be a number between 1 and 64. Got: ${value}`;
      return null;
    },
  };

  /**
   * Build the typed environment and collect every validation problem.
   * Does not exit; `loadGlobalEnv` decides what to do with the problems.
   */
  parse(source: NodeJS.ProcessEnv): { env: GlobalEnv; problems: string[] } {
    const problems: string[] = [];
    const driver = toStoreDriver(source.STORE_DRIVER);
    if (!driver) {
      problems.push(`STORE_DRIVER must be one of ${STORE_DRIVERS.join(", ")}. Got: ${source.STORE_DRIVER}`);
    }

    const env: GlobalEnv = {
      BOT_TOKEN: source.BOT_TOKEN?.trim() || "",
      STORE_DRIVER: driver ?? "file",
      DATA_DIR: source.DATA_DIR ?? "data",
      MONGODB_URI: source.MONGODB_URI?.trim() || "",
      MONGODB_DATABASE: source.MONGODB_DATABASE?.trim() || "guildwarden",
      SCHEDULER_INTERVAL_MS: toInt(source.SCHEDULER_INTERVAL_MS, 60_000),
      RETENTION_SWEEP_INTERVAL_MS: toInt(source.RETENTION_SWEEP_INTERVAL_MS, 3_600_000),
      DEBUG_LOG: source.DEBUG_LOG === "true",
      SENTRY_DSN: source.SENTRY_DSN?.trim() || undefined,
      SENTRY_ENABLED: source.SENTRY_ENABLED !== "false",
      NANOID_LENGTH: toInt(source.NANOID_LENGTH, 12),
    };

    for (const key of this.validatedKeys) {
      const problem = this.runValidator(key, env);
      if (problem) problems.push(problem);
    }

    return { env, problems };
  }

  private runValidator<K extends keyof GlobalEnv>(key: K, env: GlobalEnv): string | null {
    const validator: EnvValidator<GlobalEnv[K]> | undefined = this.validators[key];
    if (!validator) return null;
    log.debug(`Validating ${key}...`);
    return validator(env[key], key, env);
  }

  /**
   * Load and validate global environment variables.
   * This must succeed or the bot won't start.
   */
  loadGlobalEnv(source: NodeJS.ProcessEnv = process.env): GlobalEnv {
    if (this.globalEnv) {
      return this.globalEnv;
    }

    log.info("Loading global environment variables...");
    const { env, problems } = this.parse(source);

    if (problems.length > 0) {
      for (const problem of problems) log.error(problem);
      log.error("These are required for the bot to start. Please check your .env file.");
      process.exit(1);
    }

    this.globalEnv = env;
    log.info(`Global environment loaded (store: ${env.STORE_DRIVER})`);
    return env;
  }

  /**
   * Get global environment (must be loaded first)
   */
  getGlobalEnv(): GlobalEnv {
    if (!this.globalEnv) {
      throw new Error("Global environment not loaded. Call loadGlobalEnv() first.");
    }
    return this.globalEnv;
  }
}

export { EnvLoader };
export const envLoader = new EnvLoader();
export default envLoader;
