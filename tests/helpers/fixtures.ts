import { promises as fs } from "fs";
import http from "http";
import os from "os";
import path from "path";
import { Readable } from "stream";
import type { DocumentRecord } from "../../src/core/document/DocumentRecord";
import type { PathLayout } from "../../src/core/document/documentPaths";
import type { DestinationStore, ElementRow } from "../../src/ports/DestinationStore";
import type { FetchedContent, FetchRequest, SourceConnector, SourceItem } from "../../src/ports/SourceConnector";
import type { LogFields, Logger, LogLevel } from "../../src/shared/logging/logger";

export type LogEntry = { level: LogLevel; event: string; fields: LogFields };

export type RecordingLogger = Logger & { entries: LogEntry[]; events: (event: string) => LogEntry[] };

export const createRecordingLogger = (
  entries: LogEntry[] = [],
  bindings: LogFields = {},
  onEntry?: (entry: LogEntry) => void
): RecordingLogger => {
  const write = (level: LogLevel) => (event: string, fields: LogFields = {}) => {
    const entry = { level, event, fields: { ...bindings, ...fields } };
    entries.push(entry);
    onEntry?.(entry);
  };
  return {
    entries,
    events: (event) => entries.filter((entry) => entry.event === event),
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (extra) => createRecordingLogger(entries, { ...bindings, ...extra }, onEntry)
  };
};

export const createTempDir = (prefix = "docflow-test-"): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });

export const layoutUnder = (root: string): PathLayout => ({
  downloadDir: path.join(root, "download"),
  outputDir: path.join(root, "output"),
  workDir: root
});

export const writeTree = async (root: string, files: Record<string, string>): Promise<void> => {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
};

export const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
};

export type FakeConnectorOptions = {
  /** Identities whose fetch throws. */
  failFetch?: string[];
  /** Milliseconds each fetch waits before answering; aborts early on the request signal. */
  fetchDelayMs?: number;
  /** Milliseconds listing takes. */
  listDelayMs?: number;
  contentTypes?: Record<string, string>;
};

/**
 * In-memory source: relative path -> file content. Counts every call so tests can
 * assert on network-equivalent traffic.
 */
export class FakeConnector implements SourceConnector {
  readonly id = "fake";
  initializeCalls = 0;
  cleanupCalls = 0;
  readonly fetches: string[] = [];
  readonly requests: FetchRequest[] = [];

  constructor(
    private readonly files: Record<string, string>,
    private readonly options: FakeConnectorOptions = {}
  ) {}

  async initialize(): Promise<void> {
    this.initializeCalls += 1;
  }

  async listDocuments(): Promise<SourceItem[]> {
    const { listDelayMs } = this.options;
    if (listDelayMs !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, listDelayMs));
    }
    return Object.entries(this.files).map(([relativePath, content]) => ({
      identity: relativePath,
      relativePath,
      size: Buffer.byteLength(content),
      contentType: this.options.contentTypes?.[relativePath],
      metadata: {}
    }));
  }

  async fetchContent(record: DocumentRecord, request: FetchRequest): Promise<FetchedContent> {
    this.fetches.push(record.identity);
    this.requests.push(request);
    const delayMs = this.options.fetchDelayMs;
    if (delayMs !== undefined) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, delayMs);
        request.signal.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            reject(request.signal.reason);
          },
          { once: true }
        );
      });
    }
    if (this.options.failFetch?.includes(record.identity)) {
      throw new Error(`connection reset while reading ${record.identity}`);
    }
    const content = this.files[record.identity] ?? "";
    if (request.streaming) {
      return { kind: "stream", stream: Readable.from([Buffer.from(content)]) };
    }
    return { kind: "buffer", data: Buffer.from(content) };
  }

  async cleanup(): Promise<void> {
    this.cleanupCalls += 1;
  }
}

export class InMemoryElementStore implements DestinationStore {
  readonly id = "memory";
  readonly rows = new Map<string, ElementRow>();
  readonly batches: ElementRow[][] = [];
  closeCalls = 0;
  upsertsAfterClose = 0;
  failNextBatches = 0;

  async upsertMany(rows: ElementRow[]): Promise<{ upserted: number; modified: number }> {
    if (this.closeCalls > 0) this.upsertsAfterClose += 1;
    if (this.failNextBatches > 0) {
      this.failNextBatches -= 1;
      throw new Error("destination unavailable");
    }
    this.batches.push(rows);
    let upserted = 0;
    let modified = 0;
    for (const row of rows) {
      if (this.rows.has(row.elementId)) modified += 1;
      else upserted += 1;
      this.rows.set(row.elementId, row);
    }
    return { upserted, modified };
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

export const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};
