import { MongoClient } from "mongodb";
import { UploadError } from "../../src/core/errors";
import { dedupeRowsByElementId, MongoElementStore } from "../../src/infrastructure/mongo/MongoElementStore";
import type { ElementRow } from "../../src/ports/DestinationStore";

const mockConnect = jest.fn();
const mockClose = jest.fn();
const mockDb = jest.fn();
const mockCollection = jest.fn();
const mockCreateIndex = jest.fn();
const mockBulkWrite = jest.fn();

jest.mock("mongodb", () => ({
  MongoClient: jest.fn().mockImplementation(() => ({
    connect: mockConnect,
    close: mockClose,
    db: (dbName: string) => {
      mockDb(dbName);
      return {
        collection: (collectionName: string) => {
          mockCollection(collectionName);
          return { createIndex: mockCreateIndex, bulkWrite: mockBulkWrite };
        }
      };
    }
  }))
}));

const row = (elementId: string, text: string, extra: Partial<ElementRow> = {}): ElementRow => ({
  elementId,
  recordId: "docs/a.md",
  type: "CompositeElement",
  text,
  metadata: { sequence: 0 },
  ...extra
});

describe("MongoElementStore", () => {
  const uri = "mongodb://127.0.0.1:27017/docflow";
  const now = new Date("2026-01-02T03:04:05.000Z");

  beforeEach(() => {
    jest.clearAllMocks();
    mockBulkWrite.mockResolvedValue({ upsertedCount: 0, modifiedCount: 0 });
  });

  it("dedupe helper keeps the last occurrence per elementId", () => {
    const deduped = dedupeRowsByElementId([row("e1", "old"), row("e2", "only"), row("e1", "new")]);
    expect(deduped.map((r) => [r.elementId, r.text])).toEqual([
      ["e1", "new"],
      ["e2", "only"]
    ]);
  });

  it("returns early for empty batches without connecting", async () => {
    const store = new MongoElementStore(uri);

    await expect(store.upsertMany([])).resolves.toEqual({ upserted: 0, modified: 0 });
    expect(MongoClient).not.toHaveBeenCalled();
  });

  it("upserts deduplicated rows by elementId in one unordered bulk write", async () => {
    mockBulkWrite.mockResolvedValue({ upsertedCount: 2, modifiedCount: 0 });
    const store = new MongoElementStore(uri, { now: () => now });

    const result = await store.upsertMany([
      row("e1", "old"),
      row("e2", "embedded", { embeddings: [0.1, 0.2] }),
      row("e1", "new")
    ]);

    expect(result).toEqual({ upserted: 2, modified: 0 });
    expect(mockBulkWrite).toHaveBeenCalledTimes(1);
    const [ops, options] = mockBulkWrite.mock.calls[0];
    expect(options).toEqual({ ordered: false });
    expect(ops).toHaveLength(2);
    expect(ops[0].updateOne.filter).toEqual({ elementId: "e1" });
    expect(ops[0].updateOne.upsert).toBe(true);
    expect(ops[0].updateOne.update.$set).toEqual({
      recordId: "docs/a.md",
      type: "CompositeElement",
      text: "new",
      metadata: { sequence: 0 },
      updatedAt: now
    });
    expect(ops[0].updateOne.update.$setOnInsert.elementId).toBe("e1");
    expect(ops[0].updateOne.update.$setOnInsert._id).toMatch(/^[0-9a-f-]{36}$/);
    expect(ops[1].updateOne.update.$set.embeddings).toEqual([0.1, 0.2]);
  });

  it("connects once and creates the element indexes on first use", async () => {
    const store = new MongoElementStore(uri, { dbName: "kb", collectionName: "chunks" });

    await store.upsertMany([row("e1", "a")]);
    await store.upsertMany([row("e2", "b")]);

    expect(MongoClient).toHaveBeenCalledWith(uri, { serverSelectionTimeoutMS: 10_000 });
    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockDb).toHaveBeenCalledWith("kb");
    expect(mockCollection).toHaveBeenCalledWith("chunks");
    expect(mockCreateIndex.mock.calls).toEqual([
      [{ elementId: 1 }, { unique: true }],
      [{ recordId: 1 }, {}]
    ]);
  });

  it("falls back to zero counts when bulkWrite counters are undefined", async () => {
    mockBulkWrite.mockResolvedValue({});
    const store = new MongoElementStore(uri);

    await expect(store.upsertMany([row("e1", "a")])).resolves.toEqual({ upserted: 0, modified: 0 });
  });

  it("closes the client and refuses batches afterwards", async () => {
    const store = new MongoElementStore(uri);
    await store.upsertMany([row("e1", "a")]);

    await store.close();

    await expect(store.upsertMany([row("e2", "b")])).rejects.toThrow(
      new UploadError("Mongo element store docflow.elements is closed")
    );
    expect(mockClose).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockBulkWrite).toHaveBeenCalledTimes(1);
  });

  it("close is a no-op before the first connection", async () => {
    await new MongoElementStore(uri).close();
    expect(mockClose).not.toHaveBeenCalled();
  });
});
