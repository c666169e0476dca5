import type { DocumentRecord } from "../core/document/DocumentRecord";
import type { DocumentElement } from "../core/processing/elements";

export type PartitionInput = {
  record: DocumentRecord;
  /** Local file holding the raw downloaded bytes. */
  filePath: string;
  signal: AbortSignal;
};

export interface DocumentPartitioner {
  partition(input: PartitionInput): Promise<DocumentElement[]>;
}

export interface DocumentChunker {
  chunk(elements: DocumentElement[], record: DocumentRecord): DocumentElement[];
}

export interface DocumentEmbedder {
  readonly model: string;
  embedDocuments(texts: string[], signal: AbortSignal): Promise<number[][]>;
}
