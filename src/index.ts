export { DocumentRecord, InvalidTransitionError, type DocumentState } from "./core/document/DocumentRecord";
export { computeDocumentPaths, normalizeRelativePath, type PathLayout } from "./core/document/documentPaths";
export { isCached, withCacheGuard, type CacheOutcome } from "./core/cache/cacheGuard";
export * from "./core/errors";
export { resolveFiletype, supportedExtensions, type FiletypeCategory } from "./core/filetype/filetype";
export type { DocumentElement, ElementType } from "./core/processing/elements";
export { STAGE_ORDER, type StageName } from "./core/stages";

export type { SourceConnector, SourceItem, FetchRequest, FetchedContent } from "./ports/SourceConnector";
export type { DocumentChunker, DocumentEmbedder, DocumentPartitioner } from "./ports/DocumentProcessors";
export type { DestinationStore, ElementRow, UploadStager } from "./ports/DestinationStore";
export type { PipelineStages, StageContext } from "./ports/Stage";

export {
  resolvePipelineConfig,
  validatePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput
} from "./application/pipeline/pipeline.config";
export type { PipelineRunSummary } from "./application/pipeline/pipeline.error-handler";
export { runPipeline, type RunPipelineDeps } from "./application/pipeline/runPipeline.usecase";

export { createConnector, connectorRegistry } from "./composition/connectors";
export { buildStages, runIngest, type IngestOptions } from "./composition/root";
export { ResourceScope } from "./shared/lifecycle/ResourceScope";
export { createLogger, type Logger } from "./shared/logging/logger";
export { hasDependency } from "./shared/dependencies/hasDependency";
