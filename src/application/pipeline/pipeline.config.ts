import path from "path";
import { ConfigurationError } from "../../core/errors";

export type ProcessorContextConfig = {
  workDir: string;
  concurrency: number;
  stageTimeoutMs?: number;
  runTimeoutMs?: number;
  /** Re-run processing stages even when their artifacts exist. Downloads stay cached. */
  reprocess: boolean;
  downloadOnly: boolean;
  preserveDownloads: boolean;
};

export type IndexerConfig = {
  include: string[];
  exclude: string[];
  maxFileSizeBytes?: number;
};

export type DownloaderConfig = {
  downloadDir: string;
  largeObjectThresholdBytes: number;
  chunkSizeBytes: number;
};

export type PartitionerConfig = {
  outputDir: string;
};

export type ChunkerConfig = {
  maxCharacters: number;
  overlap: number;
};

export type EmbedderConfig = {
  dimensions: number;
  batchSize: number;
};

export type UploaderConfig = {
  batchSize: number;
};

/** Stage name -> stage configuration. */
export type PipelineConfig = {
  context: ProcessorContextConfig;
  indexer: IndexerConfig;
  downloader: DownloaderConfig;
  partitioner: PartitionerConfig;
  chunker?: ChunkerConfig;
  embedder?: EmbedderConfig;
  uploader?: UploaderConfig;
};

export type PipelineConfigInput = {
  context: Partial<ProcessorContextConfig> & { workDir: string };
  indexer?: Partial<IndexerConfig>;
  downloader?: Partial<DownloaderConfig>;
  partitioner?: Partial<PartitionerConfig>;
  chunker?: Partial<ChunkerConfig>;
  embedder?: Partial<EmbedderConfig>;
  uploader?: Partial<UploaderConfig>;
};

export const LARGE_OBJECT_THRESHOLD_BYTES = 512_000_000;

export const defaultStageConfig = {
  context: { concurrency: 4, reprocess: false, downloadOnly: false, preserveDownloads: true },
  downloader: { largeObjectThresholdBytes: LARGE_OBJECT_THRESHOLD_BYTES, chunkSizeBytes: 100 * 1024 * 1024 },
  chunker: { maxCharacters: 500, overlap: 0 },
  embedder: { dimensions: 256, batchSize: 64 },
  uploader: { batchSize: 100 }
} as const;

export const pipelineCaps = {
  concurrency: { min: 1, max: 64 },
  stageTimeoutMs: { min: 100, max: 86_400_000 },
  runTimeoutMs: { min: 1000, max: 604_800_000 },
  maxFileSizeBytes: { min: 1, max: Number.MAX_SAFE_INTEGER },
  largeObjectThresholdBytes: { min: 1, max: Number.MAX_SAFE_INTEGER },
  chunkSizeBytes: { min: 1024, max: 1024 * 1024 * 1024 },
  maxCharacters: { min: 50, max: 100_000 },
  dimensions: { min: 8, max: 4096 },
  batchSize: { min: 1, max: 10_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`, {
      field: name
    });
  }
};

const assertDirectory = (name: string, value: string) => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`${name} must be a non-empty path`, { field: name });
  }
};

const assertPatterns = (name: string, patterns: string[]) => {
  for (const pattern of patterns) {
    if (typeof pattern !== "string" || pattern.trim() === "") {
      throw new ConfigurationError(`${name} patterns must be non-empty strings`, { field: name });
    }
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  const { context, indexer, downloader, partitioner, chunker, embedder, uploader } = config;

  assertDirectory("context.workDir", context.workDir);
  assertDirectory("downloader.downloadDir", downloader.downloadDir);
  assertDirectory("partitioner.outputDir", partitioner.outputDir);
  assertIntegerInRange("context.concurrency", context.concurrency, pipelineCaps.concurrency);
  if (context.stageTimeoutMs !== undefined) {
    assertIntegerInRange("context.stageTimeoutMs", context.stageTimeoutMs, pipelineCaps.stageTimeoutMs);
  }
  if (context.runTimeoutMs !== undefined) {
    assertIntegerInRange("context.runTimeoutMs", context.runTimeoutMs, pipelineCaps.runTimeoutMs);
  }

  assertPatterns("indexer.include", indexer.include);
  assertPatterns("indexer.exclude", indexer.exclude);
  if (indexer.maxFileSizeBytes !== undefined) {
    assertIntegerInRange("indexer.maxFileSizeBytes", indexer.maxFileSizeBytes, pipelineCaps.maxFileSizeBytes);
  }

  assertIntegerInRange(
    "downloader.largeObjectThresholdBytes",
    downloader.largeObjectThresholdBytes,
    pipelineCaps.largeObjectThresholdBytes
  );
  assertIntegerInRange("downloader.chunkSizeBytes", downloader.chunkSizeBytes, pipelineCaps.chunkSizeBytes);

  if (chunker) {
    assertIntegerInRange("chunker.maxCharacters", chunker.maxCharacters, pipelineCaps.maxCharacters);
    assertIntegerInRange("chunker.overlap", chunker.overlap, { min: 0, max: chunker.maxCharacters - 1 });
  }
  if (embedder) {
    assertIntegerInRange("embedder.dimensions", embedder.dimensions, pipelineCaps.dimensions);
    assertIntegerInRange("embedder.batchSize", embedder.batchSize, pipelineCaps.batchSize);
  }
  if (uploader) {
    assertIntegerInRange("uploader.batchSize", uploader.batchSize, pipelineCaps.batchSize);
  }

  return config;
};

/**
 * Fills defaults and validates. Directories resolve to absolute paths; download and
 * output directories default to `download/` and `output/` under the work dir.
 */
export const resolvePipelineConfig = (input: PipelineConfigInput): PipelineConfig => {
  assertDirectory("context.workDir", input.context.workDir);
  const workDir = path.resolve(input.context.workDir);

  const { context, indexer, downloader, chunker, embedder, uploader } = input;
  const defaults = defaultStageConfig;

  const config: PipelineConfig = {
    context: {
      workDir,
      concurrency: context.concurrency ?? defaults.context.concurrency,
      stageTimeoutMs: context.stageTimeoutMs,
      runTimeoutMs: context.runTimeoutMs,
      reprocess: context.reprocess ?? defaults.context.reprocess,
      downloadOnly: context.downloadOnly ?? defaults.context.downloadOnly,
      preserveDownloads: context.preserveDownloads ?? defaults.context.preserveDownloads
    },
    indexer: {
      include: indexer?.include ?? [],
      exclude: indexer?.exclude ?? [],
      maxFileSizeBytes: indexer?.maxFileSizeBytes
    },
    downloader: {
      downloadDir: path.resolve(workDir, downloader?.downloadDir ?? "download"),
      largeObjectThresholdBytes:
        downloader?.largeObjectThresholdBytes ?? defaults.downloader.largeObjectThresholdBytes,
      chunkSizeBytes: downloader?.chunkSizeBytes ?? defaults.downloader.chunkSizeBytes
    },
    partitioner: {
      outputDir: path.resolve(workDir, input.partitioner?.outputDir ?? "output")
    }
  };

  if (chunker) {
    config.chunker = {
      maxCharacters: chunker.maxCharacters ?? defaults.chunker.maxCharacters,
      overlap: chunker.overlap ?? defaults.chunker.overlap
    };
  }
  if (embedder) {
    config.embedder = {
      dimensions: embedder.dimensions ?? defaults.embedder.dimensions,
      batchSize: embedder.batchSize ?? defaults.embedder.batchSize
    };
  }
  if (uploader) {
    config.uploader = { batchSize: uploader.batchSize ?? defaults.uploader.batchSize };
  }

  return validatePipelineConfig(config);
};
