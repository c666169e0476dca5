import { promises as fs } from "fs";
import type { DocumentRecord } from "../../core/document/DocumentRecord";
import { withCacheGuard, type CacheOutcome } from "../../core/cache/cacheGuard";
import { ConnectionError, IngestError, StageTimeoutError, toErrorMessage } from "../../core/errors";
import type { StageName } from "../../core/stages";
import type { SourceConnector } from "../../ports/SourceConnector";
import type { IndexResult, PipelineStages, ProcessingStage, StageContext } from "../../ports/Stage";
import { createLimiter, DispatchCancelledError } from "../../shared/concurrency/limiter";
import { withDeadline } from "../../shared/concurrency/deadline";
import { ResourceScope } from "../../shared/lifecycle/ResourceScope";
import type { Logger } from "../../shared/logging/logger";
import type { PipelineConfig } from "./pipeline.config";
import { validatePipelineConfig } from "./pipeline.config";
import {
  classifyStageFailure,
  createPipelineRunSummaryTracker,
  type PipelineRunSummary
} from "./pipeline.error-handler";

export type RunPipelineDeps = {
  connector: SourceConnector;
  stages: PipelineStages;
  config: PipelineConfig;
  logger: Logger;
  /** Cleanup registry. When omitted the run owns a scope and closes it before returning. */
  scope?: ResourceScope;
  /** Stops dispatch of records that have not started yet. */
  signal?: AbortSignal;
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
};

/**
 * Drives every discovered document through Indexer -> Downloader -> Partitioner ->
 * Chunker -> Embedder -> Stager -> Uploader.
 *
 * Only configuration and connection failures escape; everything that goes wrong for
 * a single record is recorded on that record and reported in the summary.
 */
export const runPipeline = async (deps: RunPipelineDeps): Promise<PipelineRunSummary> => {
  const { connector, stages, logger } = deps;
  const config = validatePipelineConfig(deps.config);
  const { context } = config;
  const ownsScope = deps.scope === undefined;
  const scope = deps.scope ?? new ResourceScope(logger);
  const tracker = createPipelineRunSummaryTracker();

  const runController = new AbortController();
  const runTimer =
    context.runTimeoutMs !== undefined
      ? setTimeout(() => {
          logger.warn("pipeline.run_timeout", { timeoutMs: context.runTimeoutMs });
          runController.abort();
        }, context.runTimeoutMs)
      : undefined;

  const processingChain = [stages.partitioner, stages.chunker, stages.embedder].filter(
    (stage): stage is ProcessingStage => stage !== undefined
  );

  const stageContext = (signal: AbortSignal): StageContext => ({ signal, logger, scope });

  const runStage = <T>(stage: StageName, identity: string, task: (signal: AbortSignal) => Promise<T>): Promise<T> =>
    withDeadline(task, {
      timeoutMs: context.stageTimeoutMs,
      parentSignal: runController.signal,
      onTimeout: (origin) =>
        origin === "call"
          ? new StageTimeoutError(`${stage} exceeded ${context.stageTimeoutMs}ms for ${identity}`, {
              stage,
              identity,
              timeoutMs: context.stageTimeoutMs
            })
          : new StageTimeoutError(`run deadline of ${context.runTimeoutMs}ms expired during ${stage} for ${identity}`, {
              stage,
              identity,
              timeoutMs: context.runTimeoutMs
            }),
      onLateFailure: (error) => logger.debug("stage.late_failure", { stage, identity, error })
    });

  const fail = (record: DocumentRecord, stage: StageName, reason: unknown) => {
    const error = classifyStageFailure(reason, { stage, identity: record.identity });
    record.markFailed(stage, error);
    logger.error("record.failed", {
      connector: connector.id,
      identity: record.identity,
      stage,
      code: error.code,
      message: error.message
    });
  };

  const guarded = async (
    stage: ProcessingStage,
    record: DocumentRecord,
    inputPath: string,
    outputPath: string
  ): Promise<void> => {
    const outcome: CacheOutcome = await runStage(stage.name, record.identity, (signal) =>
      withCacheGuard(outputPath, () => stage.run(record, { inputPath, outputPath }, stageContext(signal)), {
        bypass: context.reprocess,
        onHit: (hitPath) => logger.info("cache.hit", { stage: stage.name, identity: record.identity, path: hitPath })
      })
    );
    if (outcome === "cached") tracker.addCacheHit(stage.name);
  };

  const processRecord = async (record: DocumentRecord): Promise<void> => {
    let current: StageName = "downloader";
    try {
      const downloaded = await runStage(current, record.identity, (signal) =>
        stages.downloader.fetch(record, stageContext(signal))
      );
      if (downloaded === "cached") tracker.addCacheHit("downloader");
      if (!context.preserveDownloads) {
        scope.register(`download:${record.identity}`, () => fs.rm(record.downloadPath, { force: true }));
      }
      if (context.downloadOnly) return;

      let inputPath = record.downloadPath;
      for (const [index, stage] of processingChain.entries()) {
        current = stage.name;
        const isLast = index === processingChain.length - 1;
        const outputPath = isLast ? record.outputPath : record.artifactPath(stage.name);
        await guarded(stage, record, inputPath, outputPath);
        inputPath = outputPath;
      }
      record.markProcessed();

      if (stages.destination) {
        current = "stager";
        await guarded(stages.destination.stager, record, record.outputPath, record.artifactPath("stager"));
      }
    } catch (err) {
      fail(record, current, err);
    }
  };

  const isComplete = (record: DocumentRecord): boolean => {
    const status = record.state.status;
    if (context.downloadOnly) return status === "downloaded";
    return stages.destination ? status === "uploaded" : status === "processed";
  };

  const uploadProcessed = async (records: DocumentRecord[]): Promise<void> => {
    const destination = stages.destination;
    if (!destination || context.downloadOnly) return;

    const ready = records.filter((record) => record.state.status === "processed");
    for (const batch of chunk(ready, destination.uploader.batchSize)) {
      const batchLabel = batch.map((record) => record.identity).join(",");
      try {
        await runStage("uploader", batchLabel, (signal) =>
          destination.uploader.uploadBatch(
            batch.map((record) => ({ record, inputPath: record.artifactPath("stager") })),
            stageContext(signal)
          )
        );
        for (const record of batch) record.markUploaded();
      } catch (err) {
        for (const record of batch) fail(record, "uploader", err);
      }
    }
  };

  // Listing is one call for the whole source, so only the run deadline bounds it.
  const indexSource = async (): Promise<IndexResult> => {
    try {
      return await withDeadline((signal) => stages.indexer.index(stageContext(signal)), {
        parentSignal: runController.signal,
        onTimeout: () =>
          new StageTimeoutError(`run deadline of ${context.runTimeoutMs}ms expired while listing ${connector.id}`, {
            connector: connector.id,
            stage: "indexer",
            timeoutMs: context.runTimeoutMs
          }),
        onLateFailure: (error) => logger.debug("stage.late_failure", { stage: "indexer", error })
      });
    } catch (err) {
      if (err instanceof IngestError && !(err instanceof StageTimeoutError)) throw err;
      throw new ConnectionError(
        `Failed to enumerate documents from ${connector.id}: ${toErrorMessage(err)}`,
        { connector: connector.id, stage: "indexer" },
        err
      );
    }
  };

  scope.register(`connector:${connector.id}`, () => connector.cleanup());

  try {
    try {
      await connector.initialize();
    } catch (err) {
      if (err instanceof IngestError) throw err;
      throw new ConnectionError(
        `Failed to initialize connector ${connector.id}: ${toErrorMessage(err)}`,
        { connector: connector.id },
        err
      );
    }

    const { records, rejected } = await indexSource();
    tracker.addListed(records.length + rejected.length);
    for (const item of rejected) tracker.addRejected(item);

    const limit = createLimiter(context.concurrency);
    const stopDispatch = (reason: string) => {
      const dropped = limit.cancelPending(reason);
      if (dropped > 0) logger.warn("pipeline.dispatch_stopped", { reason, dropped });
    };
    const onCancel = () => stopDispatch("cancelled");
    const onRunTimeout = () => stopDispatch("run_timeout");
    deps.signal?.addEventListener("abort", onCancel, { once: true });
    runController.signal.addEventListener("abort", onRunTimeout, { once: true });
    if (deps.signal?.aborted) onCancel();

    let settled: PromiseSettledResult<void>[];
    try {
      settled = await Promise.allSettled(records.map((record) => limit(() => processRecord(record))));
    } finally {
      deps.signal?.removeEventListener("abort", onCancel);
      runController.signal.removeEventListener("abort", onRunTimeout);
    }

    for (const result of settled) {
      if (result.status === "fulfilled") continue;
      if (result.reason instanceof DispatchCancelledError) {
        tracker.addCancelled();
        continue;
      }
      throw result.reason;
    }

    await uploadProcessed(records);

    const summary = tracker.summary(records, isComplete);
    logger.info("pipeline.completed", { connector: connector.id, ...summary });
    return summary;
  } finally {
    if (runTimer) clearTimeout(runTimer);
    if (ownsScope) await scope.close();
  }
};
