/**
 * Fixed execution order of the pipeline. Stages are wired by these names.
 */
export const STAGE_ORDER = [
  "indexer",
  "downloader",
  "partitioner",
  "chunker",
  "embedder",
  "stager",
  "uploader"
] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export type ProcessingStageName = Extract<StageName, "partitioner" | "chunker" | "embedder" | "stager">;
