import { createWriteStream, promises as fs } from "fs";
import { pipeline } from "stream/promises";
import type { DocumentRecord } from "../../../core/document/DocumentRecord";
import { ensureParentDir, isCached, type CacheOutcome } from "../../../core/cache/cacheGuard";
import { FetchError, IngestError, toErrorMessage } from "../../../core/errors";
import type { FetchedContent, SourceConnector } from "../../../ports/SourceConnector";
import type { DownloaderStage, StageContext } from "../../../ports/Stage";
import type { DownloaderConfig } from "../pipeline.config";

const readDeclaredSize = (record: DocumentRecord): number | undefined => {
  const size = record.metadata.size;
  return typeof size === "number" && Number.isFinite(size) && size >= 0 ? size : undefined;
};

/**
 * Cache-aware downloader. A non-empty file at `downloadPath` short-circuits the
 * source entirely; otherwise bytes land in `<downloadPath>.partial` and are renamed
 * into place once complete.
 */
export class SourceDownloaderStage implements DownloaderStage {
  readonly name = "downloader";

  constructor(
    private readonly connector: SourceConnector,
    private readonly config: DownloaderConfig
  ) {}

  async fetch(record: DocumentRecord, ctx: StageContext): Promise<CacheOutcome> {
    const { downloadPath } = record;
    if (await isCached(downloadPath)) {
      ctx.logger.info("cache.hit", { stage: this.name, identity: record.identity, path: downloadPath });
      record.markDownloaded();
      return "cached";
    }

    const size = readDeclaredSize(record);
    const streaming = size !== undefined && size > this.config.largeObjectThresholdBytes;
    if (streaming) {
      ctx.logger.info("download.chunked", { identity: record.identity, size, chunkSizeBytes: this.config.chunkSizeBytes });
    }

    await ensureParentDir(downloadPath);
    const partialPath = `${downloadPath}.partial`;
    try {
      const content = await this.connector.fetchContent(record, {
        streaming,
        chunkSizeBytes: this.config.chunkSizeBytes,
        signal: ctx.signal
      });
      await this.writeContent(content, partialPath, ctx.signal);
      await fs.rename(partialPath, downloadPath);
    } catch (err) {
      await fs.rm(partialPath, { force: true });
      if (err instanceof IngestError) throw err;
      throw new FetchError(
        `Error while downloading and saving file ${downloadPath}: ${toErrorMessage(err)}`,
        { connector: this.connector.id, stage: this.name, identity: record.identity },
        err
      );
    }

    ctx.logger.info("download.completed", { identity: record.identity, path: downloadPath });
    record.markDownloaded();
    return "executed";
  }

  private async writeContent(content: FetchedContent, targetPath: string, signal: AbortSignal): Promise<void> {
    if (content.kind === "stream") {
      await pipeline(content.stream, createWriteStream(targetPath, { highWaterMark: this.config.chunkSizeBytes }), {
        signal
      });
      return;
    }
    await fs.writeFile(targetPath, content.data, { signal });
  }
}
