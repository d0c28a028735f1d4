/**
 * JsonFileDocumentStore - one pretty-printed JSON file per document under a
 * data directory.
 *
 * Writes go to a unique temp file that is renamed over the target, so a
 * reader only ever sees a complete document. Writes and quarantines for the
 * same document are serialized; a snapshot taken later is never overwritten by
 * an earlier one.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { nanoid } from "nanoid";
import { createLogger } from "../Logger.js";
import { ValidationError } from "../errors.js";
import { LockRegistry } from "../locks/LockRegistry.js";
import { documentKey } from "../locks/ResourceKey.js";
import { quarantineName, type DocumentStore, type RawDocument } from "./DocumentStore.js";

const log = createLogger("store:file");

const DOCUMENT_NAME = /^[a-z0-9][a-z0-9_-]*$/i;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export class JsonFileDocumentStore implements DocumentStore {
  readonly driver = "file";
  private readonly writes = new LockRegistry();

  constructor(
    private readonly dataDir: string,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Absolute path of the file backing `name` */
  pathFor(name: string): string {
    if (!DOCUMENT_NAME.test(name)) {
      throw new ValidationError(`Invalid document name: ${name}`);
    }
    return path.resolve(this.dataDir, `${name}.json`);
  }

  async get(name: string): Promise<RawDocument> {
    const file = this.pathFor(name);

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return { status: "missing" };
      }
      throw error;
    }

    try {
      const value: unknown = JSON.parse(raw);
      return { status: "ok", value };
    } catch (error) {
      return { status: "corrupt", raw, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  async put(name: string, value: unknown): Promise<void> {
    const file = this.pathFor(name);
    const body = JSON.stringify(value, null, 2);

    await this.writes.withLock(documentKey(name), async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      const tempFile = `${file}.${process.pid}.${nanoid(8)}.tmp`;

      try {
        await fs.writeFile(tempFile, body, "utf-8");
        await fs.rename(tempFile, file);
      } catch (error) {
        await fs.rm(tempFile, { force: true });
        throw error;
      }
    });
  }

  async quarantine(name: string): Promise<string | null> {
    const file = this.pathFor(name);

    return this.writes.withLock(documentKey(name), async () => {
      const backup = quarantineName(file, this.clock());
      try {
        await fs.rename(file, backup);
      } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") return null;
        throw error;
      }
      log.warn(`Moved corrupted document ${name} to ${backup}`);
      return backup;
    });
  }
}
