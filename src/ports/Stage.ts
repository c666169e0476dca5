import type { DocumentRecord } from "../core/document/DocumentRecord";
import type { CacheOutcome } from "../core/cache/cacheGuard";
import type { ProcessingStageName } from "../core/stages";
import type { ResourceScope } from "../shared/lifecycle/ResourceScope";
import type { Logger } from "../shared/logging/logger";

export type StageContext = {
  signal: AbortSignal;
  logger: Logger;
  scope: ResourceScope;
};

export type StageIO = {
  inputPath: string;
  outputPath: string;
};

/** Why an enumerated item never became a record. */
export type SkipCode = "unsupported_filetype" | "invalid_document" | "filtered_out" | "too_large" | "duplicate_identity";

export type RejectedItem = {
  identity: string;
  code: SkipCode;
  reason: string;
};

export type IndexResult = {
  records: DocumentRecord[];
  rejected: RejectedItem[];
};

export interface IndexerStage {
  readonly name: "indexer";
  index(ctx: StageContext): Promise<IndexResult>;
}

export interface DownloaderStage {
  readonly name: "downloader";
  /** Materializes raw bytes at `record.downloadPath`, skipping the source when already cached. */
  fetch(record: DocumentRecord, ctx: StageContext): Promise<CacheOutcome>;
}

/**
 * Reads the artifact at `io.inputPath` and writes its own at `io.outputPath`.
 * Cache checks happen around it, not inside.
 */
export interface ProcessingStage {
  readonly name: ProcessingStageName;
  run(record: DocumentRecord, io: StageIO, ctx: StageContext): Promise<void>;
}

export type UploadEntry = {
  record: DocumentRecord;
  inputPath: string;
};

export interface UploaderStage {
  readonly name: "uploader";
  readonly batchSize: number;
  uploadBatch(entries: UploadEntry[], ctx: StageContext): Promise<void>;
}

/**
 * Stage implementations wired by name. Optional stages are skipped; a destination
 * always brings its stager and uploader together.
 */
export type PipelineStages = {
  indexer: IndexerStage;
  downloader: DownloaderStage;
  partitioner: ProcessingStage;
  chunker?: ProcessingStage;
  embedder?: ProcessingStage;
  destination?: {
    stager: ProcessingStage;
    uploader: UploaderStage;
  };
};
