/**
 * MongoDocumentStore - documents as rows of the `storeddocuments` collection.
 * `put` is a single upsert, which Mongo applies atomically per row.
 */

import { createLogger } from "../Logger.js";
import StoredDocument from "./StoredDocument.js";
import { quarantineName, type DocumentStore, type RawDocument } from "./DocumentStore.js";

const log = createLogger("store:mongo");

export class MongoDocumentStore implements DocumentStore {
  readonly driver = "mongo";

  constructor(private readonly clock: () => number = Date.now) {}

  async get(name: string): Promise<RawDocument> {
    const doc = await StoredDocument.findOne({ name }).lean();
    if (!doc) return { status: "missing" };

    const value: unknown = doc.payload;
    return { status: "ok", value };
  }

  async put(name: string, value: unknown): Promise<void> {
    await StoredDocument.updateOne({ name }, { $set: { payload: value } }, { upsert: true });
  }

  async quarantine(name: string): Promise<string | null> {
    const doc = await StoredDocument.findOne({ name }).lean();
    if (!doc) return null;

    const backup = quarantineName(name, this.clock());
    await StoredDocument.create({ name: backup, payload: doc.payload });
    await StoredDocument.deleteOne({ name });

    log.warn(`Moved invalid document ${name} to ${backup}`);
    return backup;
  }
}
