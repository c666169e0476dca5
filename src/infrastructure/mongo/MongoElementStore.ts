import { randomUUID } from "crypto";
import type { Collection, MongoClient } from "mongodb";
import { UploadError } from "../../core/errors";
import type { DestinationStore, ElementRow } from "../../ports/DestinationStore";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type ElementDoc = {
  _id: string; // UUIDv4, assigned on first insert
  elementId: string;
  recordId: string;
  type: string;
  text: string;
  embeddings?: number[];
  metadata: Record<string, unknown>;
  updatedAt: Date;
};

export type MongoElementStoreOptions = {
  dbName?: string;
  collectionName?: string;
  now?: () => Date;
};

/**
 * Keeps the last row seen for each elementId inside one batch.
 */
export const dedupeRowsByElementId = (rows: ElementRow[]): ElementRow[] => {
  const byElementId = new Map<string, ElementRow>();
  for (const row of rows) {
    byElementId.set(row.elementId, row);
  }
  return Array.from(byElementId.values());
};

/**
 * Mongo destination using bulk upsert by `elementId`. Re-uploading the same rows
 * modifies documents in place and never creates duplicates.
 */
export class MongoElementStore implements DestinationStore {
  readonly id = "mongo";
  private client?: MongoClient;
  private collection?: Collection<ElementDoc>;
  private closed = false;
  private readonly dbName: string;
  private readonly collectionName: string;
  private readonly now: () => Date;

  constructor(
    private readonly mongoUri: string,
    options: MongoElementStoreOptions = {}
  ) {
    this.dbName = options.dbName ?? "docflow";
    this.collectionName = options.collectionName ?? "elements";
    this.now = options.now ?? (() => new Date());
  }

  private async getCollection(): Promise<Collection<ElementDoc>> {
    if (this.collection) return this.collection;

    this.client = await createMongoClient(this.mongoUri);
    const col = this.client.db(this.dbName).collection<ElementDoc>(this.collectionName);

    for (const idx of mongoIndexes.elementCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async upsertMany(rows: ElementRow[]): Promise<{ upserted: number; modified: number }> {
    if (this.closed) {
      throw new UploadError(`Mongo element store ${this.dbName}.${this.collectionName} is closed`, { stage: "uploader" });
    }
    if (rows.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const updatedAt = this.now();
    const ops = dedupeRowsByElementId(rows).map((row) => ({
      updateOne: {
        filter: { elementId: row.elementId },
        update: {
          $setOnInsert: {
            _id: randomUUID(),
            elementId: row.elementId
          },
          $set: {
            recordId: row.recordId,
            type: row.type,
            text: row.text,
            ...(row.embeddings ? { embeddings: row.embeddings } : {}),
            metadata: row.metadata,
            updatedAt
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }

  /** Final: a closed store never reconnects. */
  async close(): Promise<void> {
    this.closed = true;
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
