/**
 * Error taxonomy shared by plugins.
 *
 * Platform failures are translated into these classes at the gateway boundary
 * so services can decide by type: background paths log and swallow, command
 * paths surface `userMessage` to the requester.
 */

export type ModerationErrorCode = "VALIDATION" | "CAPABILITY" | "PLATFORM_TRANSIENT" | "NOT_FOUND" | "PERSISTENCE_CORRUPTION";

export abstract class ModerationError extends Error {
  abstract readonly code: ModerationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Text safe to show to the member who issued a command */
  get userMessage(): string {
    return this.message;
  }
}

/** Bad config value, duration string, reason or other input */
export class ValidationError extends ModerationError {
  readonly code = "VALIDATION";
}

/** Acting identity lacks a permission, or role hierarchy forbids the action */
export class CapabilityError extends ModerationError {
  readonly code = "CAPABILITY";
}

/** Rate limit or transient platform fault */
export class PlatformTransientError extends ModerationError {
  readonly code = "PLATFORM_TRANSIENT";

  override get userMessage(): string {
    return "Discord did not accept the request right now. Try again in a moment.";
  }
}

/** Guild, member, role, ban or message no longer exists */
export class NotFoundError extends ModerationError {
  readonly code = "NOT_FOUND";
}

/** A stored document could not be parsed and was moved aside */
export class PersistenceCorruptionError extends ModerationError {
  readonly code = "PERSISTENCE_CORRUPTION";

  constructor(
    message: string,
    readonly documentName: string,
    readonly backupLocation: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isModerationError(error: unknown): error is ModerationError {
  return error instanceof ModerationError;
}

/**
 * Message for a `{ success: false, error }` result.
 */
export function describeError(error: unknown): string {
  if (isModerationError(error)) return error.userMessage;
  if (error instanceof Error) return error.message;
  return String(error);
}
