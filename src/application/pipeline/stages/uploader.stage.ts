import { readJsonArtifact } from "../../../core/cache/cacheGuard";
import { UploadError } from "../../../core/errors";
import type { DestinationStore, ElementRow } from "../../../ports/DestinationStore";
import type { StageContext, UploadEntry, UploaderStage } from "../../../ports/Stage";

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const toElementRow = (value: unknown): ElementRow | undefined => {
  if (!isRecord(value)) return undefined;
  const { elementId, recordId, type, text, embeddings, metadata } = value;
  if (typeof elementId !== "string" || typeof recordId !== "string") return undefined;
  if (typeof type !== "string" || typeof text !== "string" || !isRecord(metadata)) return undefined;

  const row: ElementRow = { elementId, recordId, type, text, metadata };
  if (Array.isArray(embeddings) && embeddings.every((n): n is number => typeof n === "number")) {
    row.embeddings = embeddings;
  }
  return row;
};

export const parseStagedRows = (value: unknown, identity: string): ElementRow[] => {
  if (!Array.isArray(value)) {
    throw new UploadError(`Staged artifact for ${identity} is not an array`, { stage: "uploader", identity });
  }
  return value.map((entry, index) => {
    const row = toElementRow(entry);
    if (!row) {
      throw new UploadError(`Staged artifact for ${identity} has a malformed row at index ${index}`, {
        stage: "uploader",
        identity
      });
    }
    return row;
  });
};

/**
 * Batched uploader: every call flushes the staged rows of several records to the
 * destination in one write.
 */
export class DestinationUploaderStage implements UploaderStage {
  readonly name = "uploader";

  constructor(
    private readonly store: DestinationStore,
    readonly batchSize: number
  ) {}

  async uploadBatch(entries: UploadEntry[], ctx: StageContext): Promise<void> {
    const rows: ElementRow[] = [];
    for (const { record, inputPath } of entries) {
      rows.push(...parseStagedRows(await readJsonArtifact(inputPath), record.identity));
    }

    const result = await this.store.upsertMany(rows);
    ctx.logger.info("upload.batch_completed", {
      destination: this.store.id,
      records: entries.length,
      rows: rows.length,
      upserted: result.upserted,
      modified: result.modified
    });
  }
}
