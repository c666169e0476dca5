import { minimatch } from "minimatch";
import { DocumentRecord } from "../../../core/document/DocumentRecord";
import { normalizeRelativePath, type PathLayout } from "../../../core/document/documentPaths";
import { IngestError, toErrorMessage } from "../../../core/errors";
import { resolveFiletype } from "../../../core/filetype/filetype";
import type { SourceConnector, SourceItem } from "../../../ports/SourceConnector";
import type { IndexerStage, IndexResult, RejectedItem, StageContext } from "../../../ports/Stage";
import type { IndexerConfig } from "../pipeline.config";

const matchesAny = (relativePath: string, patterns: string[]): boolean =>
  patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: !pattern.includes("/") }));

/**
 * Enumerates the connector and turns listed items into document records.
 * Global filters and filetype resolution run here so rejected items never cost a fetch.
 */
export class SourceIndexerStage implements IndexerStage {
  readonly name = "indexer";

  constructor(
    private readonly connector: SourceConnector,
    private readonly layout: PathLayout,
    private readonly config: IndexerConfig
  ) {}

  async index(ctx: StageContext): Promise<IndexResult> {
    const items = await this.connector.listDocuments();
    const records: DocumentRecord[] = [];
    const rejected: RejectedItem[] = [];
    const seen = new Set<string>();

    for (const item of items) {
      const outcome = this.toRecord(item, seen);
      if (outcome instanceof DocumentRecord) {
        records.push(outcome);
        continue;
      }

      rejected.push(outcome);
      ctx.logger.info("record.skipped", {
        connector: this.connector.id,
        identity: outcome.identity,
        code: outcome.code,
        reason: outcome.reason
      });
    }

    ctx.logger.info("index.completed", {
      connector: this.connector.id,
      listed: items.length,
      accepted: records.length,
      rejected: rejected.length
    });
    return { records, rejected };
  }

  private toRecord(item: SourceItem, seen: Set<string>): DocumentRecord | RejectedItem {
    const { identity } = item;
    const context = { connector: this.connector.id, stage: "indexer" as const, identity };

    try {
      const relativePath = normalizeRelativePath(item.relativePath);

      if (seen.has(relativePath)) {
        return { identity, code: "duplicate_identity", reason: `Another item already maps to ${relativePath}` };
      }
      if (this.config.include.length > 0 && !matchesAny(relativePath, this.config.include)) {
        return { identity, code: "filtered_out", reason: "No include pattern matched" };
      }
      if (this.config.exclude.length > 0 && matchesAny(relativePath, this.config.exclude)) {
        return { identity, code: "filtered_out", reason: "Matched an exclude pattern" };
      }
      const { maxFileSizeBytes } = this.config;
      if (maxFileSizeBytes !== undefined && item.size !== undefined && item.size > maxFileSizeBytes) {
        return { identity, code: "too_large", reason: `Size ${item.size} exceeds limit ${maxFileSizeBytes}` };
      }

      const filetype = resolveFiletype(relativePath, item.contentType, context);
      seen.add(relativePath);
      const metadata: Record<string, unknown> = { ...item.metadata };
      if (item.size !== undefined) metadata.size = item.size;
      if (item.contentType !== undefined) metadata.contentType = item.contentType;
      return new DocumentRecord({ identity, relativePath, filetype, layout: this.layout, metadata });
    } catch (err) {
      if (err instanceof IngestError && (err.code === "unsupported_filetype" || err.code === "invalid_document")) {
        return { identity, code: err.code, reason: err.message };
      }
      throw new Error(`Unexpected failure while indexing ${identity}: ${toErrorMessage(err)}`, { cause: err });
    }
  }
}
