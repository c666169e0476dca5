import path from "path";
import { resolvePipelineConfig, type PipelineConfigInput } from "../../src/application/pipeline/pipeline.config";
import { runPipeline } from "../../src/application/pipeline/runPipeline.usecase";
import { buildStages } from "../../src/composition/root";
import { ConnectionError } from "../../src/core/errors";
import { MongoElementStager } from "../../src/infrastructure/mongo/MongoElementStager";
import {
  createRecordingLogger,
  createTempDir,
  exists,
  FakeConnector,
  InMemoryElementStore,
  removeDir,
  type RecordingLogger
} from "../helpers/fixtures";

describe("runPipeline", () => {
  let dir: string;
  let logger: RecordingLogger;
  let store: InMemoryElementStore;

  beforeEach(async () => {
    dir = await createTempDir();
    logger = createRecordingLogger();
    store = new InMemoryElementStore();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const files = { "a.txt": "alpha", "b.md": "# B\n\nbravo" };

  const run = (
    connector: FakeConnector,
    context: Partial<PipelineConfigInput["context"]> = {},
    options: { destination?: boolean; uploadBatchSize?: number } = {}
  ) => {
    const config = resolvePipelineConfig({
      context: { workDir: dir, concurrency: 2, ...context },
      chunker: {},
      embedder: { dimensions: 8 },
      uploader: { batchSize: options.uploadBatchSize ?? 10 }
    });
    const destination = options.destination === false ? undefined : { store, stager: new MongoElementStager() };
    return runPipeline({ connector, stages: buildStages(connector, config, destination), config, logger });
  };

  it("runs every stage and uploads each record once", async () => {
    const connector = new FakeConnector(files);

    const summary = await run(connector);

    expect(summary).toEqual({
      total: 2,
      succeeded: 2,
      skipped: 0,
      failed: 0,
      cancelled: 0,
      cacheHits: {},
      skippedByCode: {},
      failures: []
    });
    expect(store.batches).toHaveLength(1);
    expect(Array.from(store.rows.values()).map((row) => [row.recordId, row.text]).sort()).toEqual([
      ["a.txt", "alpha"],
      ["b.md", "B\n\nbravo"]
    ]);
    expect(Array.from(store.rows.values()).every((row) => row.embeddings?.length === 8)).toBe(true);
    expect(connector.initializeCalls).toBe(1);
    expect(connector.cleanupCalls).toBe(1);
    expect(logger.events("pipeline.completed")).toHaveLength(1);
  });

  it("isolates a record that fails in a processing stage", async () => {
    const connector = new FakeConnector({ ...files, "c.pdf": "%PDF-1.4" });

    const summary = await run(connector);

    expect(summary.succeeded).toBe(2);
    expect(summary.failures).toEqual([
      {
        identity: "c.pdf",
        stage: "partitioner",
        code: "processing_failed",
        message: 'No partitioner available for filetype "pdf"'
      }
    ]);
    expect(new Set(Array.from(store.rows.values()).map((row) => row.recordId))).toEqual(new Set(["a.txt", "b.md"]));
    expect(logger.events("record.failed").map((entry) => entry.fields.identity)).toEqual(["c.pdf"]);
  });

  it("records download failures and still cleans the connector up once", async () => {
    const connector = new FakeConnector(files, { failFetch: ["a.txt"] });

    const summary = await run(connector);

    const downloadPath = path.join(dir, "download", "a.txt");
    expect(summary.failures).toEqual([
      {
        identity: "a.txt",
        stage: "downloader",
        code: "fetch_failed",
        message: `Error while downloading and saving file ${downloadPath}: connection reset while reading a.txt`
      }
    ]);
    expect(summary.succeeded).toBe(1);
    expect(connector.cleanupCalls).toBe(1);
    await expect(exists(`${downloadPath}.partial`)).resolves.toBe(false);
  });

  it("reports rejected items as skipped", async () => {
    const connector = new FakeConnector({ ...files, "photo.xyz": "?" });

    const summary = await run(connector);

    expect(summary).toMatchObject({ total: 3, succeeded: 2, skipped: 1, skippedByCode: { unsupported_filetype: 1 } });
  });

  it("serves a repeated run from cache without contacting the source", async () => {
    const connector = new FakeConnector(files);
    await run(connector);

    const summary = await run(connector);

    expect(connector.fetches.sort()).toEqual(["a.txt", "b.md"]);
    expect(summary.succeeded).toBe(2);
    expect(summary.cacheHits).toEqual({ downloader: 2, partitioner: 2, chunker: 2, embedder: 2, stager: 2 });
    expect(store.batches).toHaveLength(2);
  });

  it("reprocesses cached artifacts but keeps downloads", async () => {
    const connector = new FakeConnector(files);
    await run(connector);

    const summary = await run(connector, { reprocess: true });

    expect(connector.fetches).toHaveLength(2);
    expect(summary.cacheHits).toEqual({ downloader: 2 });
  });

  it("stops after downloading in download-only mode", async () => {
    const connector = new FakeConnector(files);

    const summary = await run(connector, { downloadOnly: true });

    expect(summary.succeeded).toBe(2);
    expect(store.batches).toEqual([]);
    await expect(exists(path.join(dir, "download", "b.md"))).resolves.toBe(true);
    await expect(exists(path.join(dir, "output"))).resolves.toBe(false);
  });

  it("removes downloads at the end when they are not preserved", async () => {
    const connector = new FakeConnector(files);

    const summary = await run(connector, { preserveDownloads: false }, { destination: false });

    expect(summary.succeeded).toBe(2);
    await expect(exists(path.join(dir, "download", "a.txt"))).resolves.toBe(false);
    await expect(exists(path.join(dir, "output", "a.txt.json"))).resolves.toBe(true);
  });

  it("fails only the records of a rejected upload batch", async () => {
    const connector = new FakeConnector(files);
    store.failNextBatches = 1;

    const summary = await run(connector, {}, { uploadBatchSize: 1 });

    expect(summary.succeeded).toBe(1);
    expect(summary.failures).toEqual([
      {
        identity: "a.txt",
        stage: "uploader",
        code: "upload_failed",
        message: "uploader failed for a.txt: destination unavailable"
      }
    ]);
    expect(Array.from(store.rows.values()).map((row) => row.recordId)).toEqual(["b.md"]);
  });

  it("raises a ConnectionError when the connector cannot initialize", async () => {
    class UnreachableConnector extends FakeConnector {
      async initialize(): Promise<void> {
        throw new Error("host unreachable");
      }
    }
    const connector = new UnreachableConnector(files);

    const result = run(connector);

    await expect(result).rejects.toBeInstanceOf(ConnectionError);
    await expect(result).rejects.toThrow("Failed to initialize connector fake: host unreachable");
    expect(connector.cleanupCalls).toBe(1);
    expect(connector.fetches).toEqual([]);
  });
});
