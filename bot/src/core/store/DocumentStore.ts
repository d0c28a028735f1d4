/**
 * DocumentStore - key→document persistence contract.
 *
 * Documents are whole JSON values addressed by name ("violations",
 * "temp_actions", ...). There are no partial updates: `put` replaces the
 * stored document atomically.
 */

import { nanoid } from "nanoid";

/** Result of reading a raw document */
export type RawDocument =
  | { status: "missing" }
  | { status: "ok"; value: unknown }
  /** Unparseable content; `raw` is kept for diagnostics */
  | { status: "corrupt"; raw: string; error: Error };

export interface DocumentStore {
  /** Short label for logs ("file", "memory", "mongo") */
  readonly driver: string;

  get(name: string): Promise<RawDocument>;

  /** Atomically replace the whole document */
  put(name: string, value: unknown): Promise<void>;

  /**
   * Move the stored document aside so a fresh default can take its place.
   * Returns where the old content went, or null when nothing was stored.
   */
  quarantine(name: string): Promise<string | null>;

  close?(): Promise<void>;
}

/**
 * Name for a quarantined copy: `<name>.bak.<unix seconds>.<suffix>`.
 * The suffix keeps two quarantines within the same second apart.
 */
export function quarantineName(name: string, now: number): string {
  return `${name}.bak.${Math.floor(now / 1000)}.${nanoid(6)}`;
}
