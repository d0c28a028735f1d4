/**
 * Sentry Error Tracking Initialization
 */

import * as Sentry from "@sentry/node";
import log from "./logger.js";

let isInitialized = false;

export interface SentryOptions {
  /** Sentry DSN (Data Source Name) */
  dsn?: string;
  /** Environment name (development, staging, production) */
  environment?: string;
  /** Fraction of transactions to sample (0.0 to 1.0) */
  tracesSampleRate?: number;
  /** Whether Sentry should be enabled (default: true) */
  enabled?: boolean;
}

/**
 * Initialize Sentry for error tracking
 * Should be called as early as possible in the application lifecycle
 */
export function initializeSentry(options: SentryOptions): void {
  if (isInitialized) {
    log.warn("Sentry already initialized, skipping...");
    return;
  }

  const { dsn, environment = process.env.NODE_ENV || "development", tracesSampleRate = 0.1, enabled = true } = options;

  if (!enabled) {
    log.info("Sentry is disabled");
    return;
  }

  if (!dsn) {
    log.warn("Sentry DSN not provided, error tracking will be disabled");
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      tracesSampleRate,
      release: process.env.SENTRY_RELEASE || undefined,

      beforeSend(event) {
        event.tags = {
          ...event.tags,
          bot: "guildwarden",
        };
        return event;
      },

      ignoreErrors: [
        // Discord.js rate limiting
        /DiscordAPIError/,
        /Request timed out/,
        // Common network errors
        /ECONNRESET/,
        /ETIMEDOUT/,
        /ENOTFOUND/,
        // Interaction expired errors
        /Unknown interaction/,
        /Interaction has already been acknowledged/,
      ],
    });

    isInitialized = true;
    log.info(`✅ Sentry initialized (environment: ${environment})`);
  } catch (error) {
    log.error("Failed to initialize Sentry:", error);
  }
}

/**
 * Capture an exception in Sentry
 * @param context - Additional context information
 */
export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!isInitialized) return;

  Sentry.captureException(error, {
    extra: context,
  });
}

/**
 * Flush pending Sentry events
 * Call this before shutdown to ensure all events are sent
 */
export async function flush(timeout: number = 2000): Promise<void> {
  if (!isInitialized) return;

  try {
    await Sentry.close(timeout);
    log.info("✅ Sentry flushed");
  } catch (error) {
    log.error("Failed to flush Sentry:", error);
  }
}
