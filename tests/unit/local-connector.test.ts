import { promises as fs } from "fs";
import path from "path";
import type { Readable } from "stream";
import { DocumentRecord } from "../../src/core/document/DocumentRecord";
import { ConfigurationError, ConnectionError } from "../../src/core/errors";
import {
  createLocalConnectorConfig,
  LocalFilesystemConnector
} from "../../src/infrastructure/local/LocalFilesystemConnector";
import { createRecordingLogger, createTempDir, layoutUnder, removeDir, writeTree } from "../helpers/fixtures";

const readAll = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

describe("LocalFilesystemConnector", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
    await writeTree(root, {
      "a.txt": "alpha",
      "sub/b.txt": "bravo",
      "sub/deeper/c.md": "# charlie",
      ".hidden/secret.txt": "hidden",
      ".env": "TOKEN=test-secret"
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("lists only the immediate level when not recursive", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: root }),
      createRecordingLogger()
    );
    const items = await connector.listDocuments();
    expect(items.map((item) => item.identity)).toEqual(["a.txt"]);
  });

  it("reports hidden entries and symlinks it leaves out", async () => {
    await fs.symlink(path.join(root, "a.txt"), path.join(root, "link.txt"));
    const logger = createRecordingLogger();
    const connector = new LocalFilesystemConnector(createLocalConnectorConfig({ remoteUrl: root }), logger);

    const items = await connector.listDocuments();

    expect(items.map((item) => item.identity)).toEqual(["a.txt"]);
    expect(logger.events("list.entry_skipped").map((entry) => [entry.level, entry.fields])).toEqual([
      ["debug", { path: ".env", reason: "hidden" }],
      ["debug", { path: ".hidden", reason: "hidden" }],
      ["debug", { path: "link.txt", reason: "not_a_file" }]
    ]);
  });

  it("walks sub-folders in sorted order when recursive", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: root, recursive: true }),
      createRecordingLogger()
    );
    const items = await connector.listDocuments();

    expect(items.map((item) => item.relativePath)).toEqual(["a.txt", "sub/b.txt", "sub/deeper/c.md"]);
    expect(items[1]).toEqual({
      identity: "sub/b.txt",
      relativePath: "sub/b.txt",
      size: 5,
      metadata: { extension: ".txt", modifiedAt: expect.any(String) }
    });
  });

  it("treats a single file root as a one-item source", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: path.join(root, "sub", "b.txt") }),
      createRecordingLogger()
    );
    const items = await connector.listDocuments();
    expect(items.map((item) => item.identity)).toEqual(["b.txt"]);

    const record = new DocumentRecord({
      identity: "b.txt",
      relativePath: "b.txt",
      filetype: "text",
      layout: layoutUnder(root)
    });
    const content = await connector.fetchContent(record, {
      streaming: false,
      chunkSizeBytes: 1024,
      signal: new AbortController().signal
    });
    expect(content.kind === "buffer" && Buffer.from(content.data).toString("utf8")).toBe("bravo");
  });

  it("fails initialize with ConnectionError when the root does not exist", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: path.join(root, "missing") }),
      createRecordingLogger()
    );
    await expect(connector.initialize()).rejects.toBeInstanceOf(ConnectionError);
  });

  it("streams content when asked to", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: root, recursive: true }),
      createRecordingLogger()
    );
    await connector.initialize();
    const record = new DocumentRecord({
      identity: "sub/b.txt",
      relativePath: "sub/b.txt",
      filetype: "text",
      layout: layoutUnder(root)
    });

    const content = await connector.fetchContent(record, {
      streaming: true,
      chunkSizeBytes: 2,
      signal: new AbortController().signal
    });

    expect(content.kind).toBe("stream");
    if (content.kind === "stream") {
      await expect(readAll(content.stream)).resolves.toBe("bravo");
    }
  });

  it("cleans up repeatedly without failing", async () => {
    const connector = new LocalFilesystemConnector(
      createLocalConnectorConfig({ remoteUrl: root }),
      createRecordingLogger()
    );
    await connector.initialize();
    await expect(connector.cleanup()).resolves.toBeUndefined();
    await expect(connector.cleanup()).resolves.toBeUndefined();
  });

  it("requires a root", () => {
    expect(() => createLocalConnectorConfig({ remoteUrl: "  " })).toThrow(ConfigurationError);
  });
});
