/**
 * DocumentSlot - the in-memory copy of one named document plus its persisted
 * mirror.
 *
 * The in-memory value is the source of truth while the process runs. Callers
 * mutate `value` while holding the matching resource lock and finish the
 * sequence with `save()`, which writes the whole document through the store.
 */

import type { z } from "zod";
import { createLogger } from "../Logger.js";
import { PersistenceCorruptionError } from "../errors.js";
import { captureException } from "../../utils/sentry.js";
import type { DocumentStore } from "./DocumentStore.js";

const log = createLogger("store");

export interface DocumentSlotOptions<T> {
  name: string;
  /** Validates (and may normalize) the stored value */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  empty: () => T;
}

export type LoadOutcome =
  | { status: "missing" }
  | { status: "loaded" }
  | { status: "quarantined"; backup: string | null; reason: string };

export class DocumentSlot<T> {
  private current: T;

  constructor(
    private readonly store: DocumentStore,
    private readonly options: DocumentSlotOptions<T>,
  ) {
    this.current = options.empty();
  }

  get name(): string {
    return this.options.name;
  }

  get value(): T {
    return this.current;
  }

  /**
   * Replace the in-memory value from the store. A document that cannot be
   * parsed or fails validation is quarantined and replaced by the empty
   * default; load never throws for bad content.
   */
  async load(): Promise<LoadOutcome> {
    const { name, schema, empty } = this.options;
    const raw = await this.store.get(name);

    if (raw.status === "missing") {
      this.current = empty();
      await this.save();
      return { status: "missing" };
    }

    let reason: string;
    if (raw.status === "ok") {
      const parsed = schema.safeParse(raw.value);
      if (parsed.success) {
        this.current = parsed.data;
        log.debug(`Loaded document ${name} (${this.store.driver})`);
        return { status: "loaded" };
      }
      reason = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    } else {
      reason = raw.error.message;
    }

    const backup = await this.store.quarantine(name);
    const error = new PersistenceCorruptionError(`Document ${name} is corrupted: ${reason}`, name, backup);
    log.error(`${error.message}; moved to ${backup ?? "nowhere"}, starting from an empty document`);
    captureException(error, { document: name, backup });
    this.current = empty();
    await this.save();
    return { status: "quarantined", backup, reason };
  }

  /** Write the current value through to the store */
  async save(): Promise<void> {
    await this.store.put(this.options.name, this.current);
  }

  /** Replace the whole in-memory value (caller saves) */
  replace(next: T): void {
    this.current = next;
  }
}
