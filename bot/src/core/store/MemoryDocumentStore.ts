/**
 * In-process store. Documents are kept as JSON text so a round trip through
 * this store serializes exactly like the file and Mongo backends.
 */

import { quarantineName, type DocumentStore, type RawDocument } from "./DocumentStore.js";

export class MemoryDocumentStore implements DocumentStore {
  readonly driver = "memory";
  private readonly documents = new Map<string, string>();
  /** Number of successful `put` calls, per document */
  readonly writeCounts = new Map<string, number>();

  constructor(private readonly clock: () => number = Date.now) {}

  async get(name: string): Promise<RawDocument> {
    const raw = this.documents.get(name);
    if (raw === undefined) return { status: "missing" };

    try {
      const value: unknown = JSON.parse(raw);
      return { status: "ok", value };
    } catch (error) {
      return { status: "corrupt", raw, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  async put(name: string, value: unknown): Promise<void> {
    this.documents.set(name, JSON.stringify(value));
    this.writeCounts.set(name, (this.writeCounts.get(name) ?? 0) + 1);
  }

  async quarantine(name: string): Promise<string | null> {
    const raw = this.documents.get(name);
    if (raw === undefined) return null;

    const backup = quarantineName(name, this.clock());
    this.documents.set(backup, raw);
    this.documents.delete(name);
    return backup;
  }

  /** Store raw text as-is, e.g. to simulate a damaged document */
  setRaw(name: string, raw: string): void {
    this.documents.set(name, raw);
  }

  getRaw(name: string): string | undefined {
    return this.documents.get(name);
  }

  names(): string[] {
    return [...this.documents.keys()].sort();
  }
}
