import { createReadStream, promises as fs, type Stats } from "fs";
import path from "path";
import type { DocumentRecord } from "../../core/document/DocumentRecord";
import { ConfigurationError, ConnectionError, FetchError, toErrorMessage } from "../../core/errors";
import type { FetchedContent, FetchRequest, SourceConnector, SourceItem } from "../../ports/SourceConnector";
import type { Logger } from "../../shared/logging/logger";

export const LOCAL_CONNECTOR_ID = "local";

export type LocalConnectorConfig = {
  readonly root: string;
  readonly recursive: boolean;
};

export const createLocalConnectorConfig = (input: { remoteUrl?: string; recursive?: boolean }): LocalConnectorConfig => {
  const raw = input.remoteUrl?.trim();
  if (!raw) {
    throw new ConfigurationError("local connector requires --remote-url pointing at a directory or file", {
      connector: LOCAL_CONNECTOR_ID,
      field: "remoteUrl"
    });
  }
  const root = raw.startsWith("file://") ? new URL(raw).pathname : raw;
  return Object.freeze({ root: path.resolve(root), recursive: input.recursive ?? false });
};

const isHidden = (name: string) => name.startsWith(".");

const toPosix = (relative: string) => relative.split(path.sep).join("/");

/**
 * Mirrors a directory tree (or a single file). Identity is the POSIX path relative to
 * the root, so it stays stable across runs and machines. Dotfiles, dot-directories and
 * anything that is neither a regular file nor a directory (symlinks included) are left
 * out and reported at debug level as `list.entry_skipped`.
 */
export class LocalFilesystemConnector implements SourceConnector {
  readonly id = LOCAL_CONNECTOR_ID;
  private rootStats: Stats | undefined;

  constructor(
    private readonly config: LocalConnectorConfig,
    private readonly logger: Logger
  ) {}

  async initialize(): Promise<void> {
    if (this.rootStats) return;
    try {
      this.rootStats = await fs.stat(this.config.root);
    } catch (err) {
      throw new ConnectionError(
        `Local root ${this.config.root} is not accessible: ${toErrorMessage(err)}`,
        { connector: this.id },
        err
      );
    }
  }

  async listDocuments(): Promise<SourceItem[]> {
    await this.initialize();
    const { root } = this.config;

    if (this.rootStats?.isFile()) {
      const name = path.basename(root);
      return [this.toItem(name, this.rootStats)];
    }

    const items: SourceItem[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const absolute = path.join(dir, entry.name);
        const relativePath = toPosix(path.relative(root, absolute));
        if (isHidden(entry.name)) {
          this.logger.debug("list.entry_skipped", { path: relativePath, reason: "hidden" });
          continue;
        }
        if (entry.isDirectory()) {
          if (this.config.recursive) await walk(absolute);
          continue;
        }
        if (!entry.isFile()) {
          this.logger.debug("list.entry_skipped", { path: relativePath, reason: "not_a_file" });
          continue;
        }
        items.push(this.toItem(relativePath, await fs.stat(absolute)));
      }
    };
    await walk(root);
    return items;
  }

  async fetchContent(record: DocumentRecord, request: FetchRequest): Promise<FetchedContent> {
    const sourcePath = this.sourcePathOf(record);
    if (request.streaming) {
      return {
        kind: "stream",
        stream: createReadStream(sourcePath, { highWaterMark: request.chunkSizeBytes, signal: request.signal })
      };
    }
    try {
      return { kind: "buffer", data: await fs.readFile(sourcePath, { signal: request.signal }) };
    } catch (err) {
      throw new FetchError(
        `Failed to read ${sourcePath}: ${toErrorMessage(err)}`,
        { connector: this.id, stage: "downloader", identity: record.identity },
        err
      );
    }
  }

  async cleanup(): Promise<void> {
    this.rootStats = undefined;
  }

  private sourcePathOf(record: DocumentRecord): string {
    if (this.rootStats?.isFile()) return this.config.root;
    return path.join(this.config.root, ...record.relativePath.split("/"));
  }

  private toItem(relativePath: string, stats: Stats): SourceItem {
    return {
      identity: relativePath,
      relativePath,
      size: stats.size,
      metadata: {
        extension: path.extname(relativePath),
        modifiedAt: stats.mtime.toISOString()
      }
    };
  }
}
