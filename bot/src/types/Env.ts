/**
 * Environment Types
 */

export type StoreDriver = "file" | "mongo";

/**
 * Global environment variables required for the bot to function
 */
export interface GlobalEnv {
  BOT_TOKEN: string;
  /** Where moderation documents live */
  STORE_DRIVER: StoreDriver;
  /** Directory for JSON documents when STORE_DRIVER is "file" */
  DATA_DIR: string;
  MONGODB_URI: string;
  MONGODB_DATABASE: string;
  /** Temporary sanction expiry check period */
  SCHEDULER_INTERVAL_MS: number;
  /** Data retention sweep period */
  RETENTION_SWEEP_INTERVAL_MS: number;
  DEBUG_LOG: boolean;
  SENTRY_DSN?: string;
  SENTRY_ENABLED: boolean;
  NANOID_LENGTH: number;
}
