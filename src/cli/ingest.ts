#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigurationError } from "../core/errors";
import { CONNECTOR_IDS } from "../composition/connectors";
import { runIngest, type IngestOptions } from "../composition/root";
import { isDebugMode, loadEnv, validateMongoUri } from "../shared/config/env";

type ErrorContext = Partial<Record<(typeof allowedContextKeys)[number], string | number>>;

type CliErrorEnvelope = {
  event: "ingest.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const allowedContextKeys = ["connector", "stage", "identity", "field", "dependency", "timeoutMs"] as const;

const DEFAULT_WORK_DIR = ".ingest";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" || (typeof raw === "number" && Number.isFinite(raw))) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "ingest.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const buildParser = (argv: string[]) =>
  yargs(argv)
    .scriptName("docflow-ingest")
    .usage("$0 <connector> [flags]")
    .epilog(`Connectors: ${CONNECTOR_IDS.join(", ")}`)
    .option("remote-url", { type: "string", description: "Source root: a directory for local, a manifest URL for http" })
    .option("recursive", { type: "boolean", default: false, description: "Descend into sub-folders" })
    .option("token", { type: "string", description: "Bearer token for the http connector" })
    .option("work-dir", { type: "string", description: "Root for intermediate artifacts" })
    .option("download-dir", { type: "string", description: "Where raw downloads are mirrored" })
    .option("output-dir", { type: "string", description: "Where processed artifacts are written" })
    .option("num-processes", { type: "number", description: "Records processed in parallel" })
    .option("include", { type: "string", array: true, default: [], description: "Glob of paths to keep" })
    .option("exclude", { type: "string", array: true, default: [], description: "Glob of paths to drop" })
    .option("max-file-size", { type: "number", description: "Skip files larger than this many bytes" })
    .option("reprocess", { type: "boolean", default: false, description: "Ignore cached processing artifacts" })
    .option("download-only", { type: "boolean", default: false, description: "Stop after downloading" })
    .option("preserve-downloads", { type: "boolean", default: true, description: "Keep raw downloads after the run" })
    .option("stage-timeout-ms", { type: "number" })
    .option("run-timeout-ms", { type: "number" })
    .option("chunk", { type: "boolean", default: true, description: "Chunk partitioned elements (--no-chunk to skip)" })
    .option("chunk-max-characters", { type: "number" })
    .option("chunk-overlap", { type: "number" })
    .option("embed", { type: "boolean", default: true, description: "Embed chunks (--no-embed to skip)" })
    .option("embedding-dimensions", { type: "number" })
    .option("mongo-uri", { type: "string", description: "Upload elements to this MongoDB deployment" })
    .option("mongo-database", { type: "string" })
    .option("mongo-collection", { type: "string" })
    .option("upload-batch-size", { type: "number" })
    .option("verbose", { type: "boolean", default: false })
    .demandCommand(1, "A connector is required")
    .strict()
    .version(false)
    .help()
    .fail((message, error) => {
      throw error ?? new ConfigurationError(message, { field: "argv" });
    });

/**
 * Flags win over environment variables; both are validated before anything runs.
 */
export const parseIngestArgs = (argv: string[], env: NodeJS.ProcessEnv = process.env): IngestOptions => {
  const parsed = buildParser(argv).parseSync();
  const settings = loadEnv(env);

  const [connector, ...extra] = parsed._.map(String);
  if (connector === undefined || extra.length > 0) {
    throw new ConfigurationError(`Expected exactly one connector (${CONNECTOR_IDS.join(", ")})`, { field: "connector" });
  }

  const mongoUri = parsed["mongo-uri"] ?? settings.MONGO_URI;

  return {
    connector,
    remoteUrl: parsed["remote-url"],
    recursive: parsed.recursive,
    token: parsed.token ?? settings.INGEST_HTTP_TOKEN,
    workDir: parsed["work-dir"] ?? settings.INGEST_WORK_DIR ?? DEFAULT_WORK_DIR,
    downloadDir: parsed["download-dir"],
    outputDir: parsed["output-dir"],
    concurrency: parsed["num-processes"] ?? settings.INGEST_CONCURRENCY,
    include: parsed.include,
    exclude: parsed.exclude,
    maxFileSizeBytes: parsed["max-file-size"],
    reprocess: parsed.reprocess,
    downloadOnly: parsed["download-only"],
    preserveDownloads: parsed["preserve-downloads"],
    stageTimeoutMs: parsed["stage-timeout-ms"],
    runTimeoutMs: parsed["run-timeout-ms"],
    chunk: parsed.chunk,
    chunkMaxCharacters: parsed["chunk-max-characters"],
    chunkOverlap: parsed["chunk-overlap"],
    embed: parsed.embed,
    embeddingDimensions: parsed["embedding-dimensions"],
    mongoUri: mongoUri === undefined ? undefined : validateMongoUri("mongoUri", mongoUri),
    mongoDatabase: parsed["mongo-database"],
    mongoCollection: parsed["mongo-collection"],
    uploadBatchSize: parsed["upload-batch-size"],
    verbose: parsed.verbose || settings.DEBUG
  };
};

export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Exits 1 only when the batch could not run at all. Failed records are reported in
 * the summary and still exit 0. An interrupted run drains in-flight records, logs its
 * summary and exits 130; a second interrupt exits 130 right after releasing resources.
 */
export const executeIngestCli = async (argv: string[] = hideBin(process.argv)): Promise<void> => {
  let interrupted = false;
  try {
    const options = parseIngestArgs(argv);
    await runIngest(options, {
      onInterrupted: () => {
        interrupted = true;
      },
      onForceClose: () => process.exit(INTERRUPTED_EXIT_CODE)
    });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
  if (interrupted) process.exit(INTERRUPTED_EXIT_CODE);
};

if (require.main === module) {
  void executeIngestCli();
}
