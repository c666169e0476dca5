import type { DocumentRecord } from "../../core/document/DocumentRecord";
import {
  FetchError,
  IngestError,
  ProcessingError,
  StageTimeoutError,
  UploadError,
  toErrorMessage
} from "../../core/errors";
import type { StageName } from "../../core/stages";
import type { RejectedItem, SkipCode } from "../../ports/Stage";

export type RecordFailure = {
  identity: string;
  stage: StageName;
  code: string;
  message: string;
};

export type PipelineRunSummary = {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
  cacheHits: Partial<Record<StageName, number>>;
  skippedByCode: Partial<Record<SkipCode, number>>;
  failures: RecordFailure[];
};

/**
 * Normalizes anything thrown inside a stage into the error class owned by that stage.
 * Typed ingest errors (timeouts included) pass through unchanged.
 */
export const classifyStageFailure = (
  reason: unknown,
  context: { stage: StageName; identity: string }
): IngestError => {
  if (reason instanceof IngestError) return reason;

  const message = `${context.stage} failed for ${context.identity}: ${toErrorMessage(reason)}`;
  if (reason instanceof Error && reason.name === "AbortError") {
    return new StageTimeoutError(message, context);
  }
  if (context.stage === "downloader" || context.stage === "indexer") {
    return new FetchError(message, context, reason);
  }
  if (context.stage === "uploader") {
    return new UploadError(message, context, reason);
  }
  return new ProcessingError(message, context, reason);
};

export const createPipelineRunSummaryTracker = () => {
  let listed = 0;
  let cancelled = 0;
  const skippedByCode: Partial<Record<SkipCode, number>> = {};
  const cacheHits: Partial<Record<StageName, number>> = {};

  return {
    addListed: (count: number) => {
      listed += count;
    },
    addRejected: (item: RejectedItem) => {
      skippedByCode[item.code] = (skippedByCode[item.code] ?? 0) + 1;
    },
    addCacheHit: (stage: StageName) => {
      cacheHits[stage] = (cacheHits[stage] ?? 0) + 1;
    },
    addCancelled: () => {
      cancelled += 1;
    },
    /**
     * `isComplete` decides which records reached the run's target state
     * (uploaded, processed or downloaded depending on configured stages).
     */
    summary: (records: DocumentRecord[], isComplete: (record: DocumentRecord) => boolean): PipelineRunSummary => {
      const failures: RecordFailure[] = [];
      let succeeded = 0;
      for (const record of records) {
        const state = record.state;
        if (state.status === "failed") {
          failures.push({ identity: record.identity, stage: state.stage, code: state.code, message: state.reason });
        } else if (isComplete(record)) {
          succeeded += 1;
        }
      }

      const skipped = Object.values(skippedByCode).reduce((sum, count) => sum + (count ?? 0), 0);
      return {
        total: listed,
        succeeded,
        skipped,
        failed: failures.length,
        cancelled,
        cacheHits: { ...cacheHits },
        skippedByCode: { ...skippedByCode },
        failures
      };
    }
  };
};
