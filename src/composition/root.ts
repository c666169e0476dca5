import { createHash } from "crypto";
import path from "path";
import {
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput
} from "../application/pipeline/pipeline.config";
import type { PipelineRunSummary } from "../application/pipeline/pipeline.error-handler";
import { runPipeline } from "../application/pipeline/runPipeline.usecase";
import { SourceDownloaderStage } from "../application/pipeline/stages/downloader.stage";
import { SourceIndexerStage } from "../application/pipeline/stages/indexer.stage";
import {
  ChunkerStage,
  EmbedderStage,
  PartitionerStage,
  StagerStage
} from "../application/pipeline/stages/processing.stages";
import { DestinationUploaderStage } from "../application/pipeline/stages/uploader.stage";
import { MongoElementStager } from "../infrastructure/mongo/MongoElementStager";
import { MongoElementStore } from "../infrastructure/mongo/MongoElementStore";
import { CharacterChunker } from "../infrastructure/processing/CharacterChunker";
import { HashingEmbedder } from "../infrastructure/processing/HashingEmbedder";
import { TextPartitioner } from "../infrastructure/processing/TextPartitioner";
import type { DestinationStore, UploadStager } from "../ports/DestinationStore";
import type { SourceConnector } from "../ports/SourceConnector";
import type { PipelineStages } from "../ports/Stage";
import { assertDependencies, type ModuleResolver } from "../shared/dependencies/hasDependency";
import { ResourceScope, type SignalSource } from "../shared/lifecycle/ResourceScope";
import { createLogger, type Logger } from "../shared/logging/logger";
import { createConnector } from "./connectors";

export type IngestOptions = {
  connector: string;
  remoteUrl?: string;
  recursive: boolean;
  token?: string;
  workDir: string;
  downloadDir?: string;
  outputDir?: string;
  concurrency?: number;
  include: string[];
  exclude: string[];
  maxFileSizeBytes?: number;
  reprocess: boolean;
  downloadOnly: boolean;
  preserveDownloads: boolean;
  stageTimeoutMs?: number;
  runTimeoutMs?: number;
  chunk: boolean;
  chunkMaxCharacters?: number;
  chunkOverlap?: number;
  embed: boolean;
  embeddingDimensions?: number;
  mongoUri?: string;
  mongoDatabase?: string;
  mongoCollection?: string;
  uploadBatchSize?: number;
  verbose: boolean;
};

export type RunIngestDeps = {
  logger?: Logger;
  /** Process-like source of SIGINT/SIGTERM. Defaults to `process`. */
  signals?: SignalSource;
  /** First interrupt: dispatch has stopped, in-flight records still finish. */
  onInterrupted?: () => void;
  /** Second interrupt: resources were released without waiting for the run. */
  onForceClose?: () => void;
  /** Overrides the Mongo destination built from `mongoUri`. */
  destination?: { store: DestinationStore; stager: UploadStager };
  resolve?: ModuleResolver;
};

/**
 * Per-source cache namespace so two remotes never share a download directory.
 */
export const defaultDownloadDir = (connector: string, remoteUrl: string | undefined): string =>
  path.join("download", connector, createHash("sha256").update(remoteUrl ?? "").digest("hex").slice(0, 10));

export const buildPipelineConfigInput = (options: IngestOptions): PipelineConfigInput => ({
  context: {
    workDir: options.workDir,
    concurrency: options.concurrency,
    stageTimeoutMs: options.stageTimeoutMs,
    runTimeoutMs: options.runTimeoutMs,
    reprocess: options.reprocess,
    downloadOnly: options.downloadOnly,
    preserveDownloads: options.preserveDownloads
  },
  indexer: {
    include: options.include,
    exclude: options.exclude,
    maxFileSizeBytes: options.maxFileSizeBytes
  },
  downloader: {
    downloadDir: options.downloadDir ?? defaultDownloadDir(options.connector, options.remoteUrl)
  },
  partitioner: { outputDir: options.outputDir },
  chunker: options.chunk
    ? { maxCharacters: options.chunkMaxCharacters, overlap: options.chunkOverlap }
    : undefined,
  embedder: options.embed ? { dimensions: options.embeddingDimensions } : undefined,
  uploader: { batchSize: options.uploadBatchSize }
});

export const buildStages = (
  connector: SourceConnector,
  config: PipelineConfig,
  destination?: { store: DestinationStore; stager: UploadStager }
): PipelineStages => {
  const layout = {
    downloadDir: config.downloader.downloadDir,
    outputDir: config.partitioner.outputDir,
    workDir: config.context.workDir
  };

  const stages: PipelineStages = {
    indexer: new SourceIndexerStage(connector, layout, config.indexer),
    downloader: new SourceDownloaderStage(connector, config.downloader),
    partitioner: new PartitionerStage(new TextPartitioner())
  };
  if (config.chunker) {
    stages.chunker = new ChunkerStage(new CharacterChunker(config.chunker));
  }
  if (config.embedder) {
    stages.embedder = new EmbedderStage(new HashingEmbedder(config.embedder.dimensions), config.embedder.batchSize);
  }
  if (destination && config.uploader) {
    stages.destination = {
      stager: new StagerStage(destination.stager),
      uploader: new DestinationUploaderStage(destination.store, config.uploader.batchSize)
    };
  }
  return stages;
};

export const runIngest = async (options: IngestOptions, deps: RunIngestDeps = {}): Promise<PipelineRunSummary> => {
  const logger = deps.logger ?? createLogger({ level: options.verbose ? "debug" : "info" });

  // Everything below validates before any I/O happens.
  const config = resolvePipelineConfig(buildPipelineConfigInput(options));
  const connector = createConnector(
    options.connector,
    { remoteUrl: options.remoteUrl, recursive: options.recursive, token: options.token },
    logger,
    deps.resolve
  );

  let destination = deps.destination;
  if (!destination && options.mongoUri) {
    assertDependencies(["mongodb"], {}, deps.resolve);
    destination = {
      store: new MongoElementStore(options.mongoUri, {
        dbName: options.mongoDatabase,
        collectionName: options.mongoCollection
      }),
      stager: new MongoElementStager()
    };
  }

  const stages = buildStages(connector, config, destination);
  const scope = new ResourceScope(logger);
  const cancel = new AbortController();

  const unbindSignals = scope.bindProcessSignals(deps.signals ?? process, {
    onInterrupt: () => {
      cancel.abort();
      deps.onInterrupted?.();
    },
    onForceClose: () => deps.onForceClose?.()
  });
  scope.register("process-signals", unbindSignals);
  if (destination) {
    const { store } = destination;
    scope.register(`destination:${store.id}`, () => store.close());
  }

  logger.info("pipeline.started", {
    connector: connector.id,
    workDir: config.context.workDir,
    downloadDir: config.downloader.downloadDir,
    outputDir: config.partitioner.outputDir,
    concurrency: config.context.concurrency,
    destination: destination?.store.id
  });

  return scope.use(() => runPipeline({ connector, stages, config, logger, scope, signal: cancel.signal }));
};
