import type { DocumentRecord } from "../core/document/DocumentRecord";
import type { DocumentElement } from "../core/processing/elements";

/**
 * Destination-neutral row produced by a stager and consumed by an uploader.
 */
export type ElementRow = {
  elementId: string;
  recordId: string;
  type: string;
  text: string;
  embeddings?: number[];
  metadata: Record<string, unknown>;
};

export interface UploadStager {
  stage(elements: DocumentElement[], record: DocumentRecord): ElementRow[];
}

export interface DestinationStore {
  readonly id: string;
  upsertMany(rows: ElementRow[]): Promise<{ upserted: number; modified: number }>;
  close(): Promise<void>;
}
