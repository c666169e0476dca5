import type { Readable } from "stream";
import type { DocumentRecord } from "../core/document/DocumentRecord";

/**
 * One item as enumerated by a connector, before filtering and filetype resolution.
 */
export type SourceItem = {
  /** Stable, source-defined key (path, URL, row id). Unique within the source. */
  identity: string;
  /** Source-relative path used to mirror the item on disk. */
  relativePath: string;
  size?: number;
  contentType?: string;
  metadata: Record<string, unknown>;
};

export type FetchRequest = {
  /** Ask for a stream instead of a buffered body (large objects). */
  streaming: boolean;
  chunkSizeBytes: number;
  signal: AbortSignal;
};

export type FetchedContent =
  | { kind: "buffer"; data: Uint8Array }
  | { kind: "stream"; stream: Readable };

export interface SourceConnector {
  readonly id: string;
  /** Establishes sessions. Calling it again must not open a second session. */
  initialize(): Promise<void>;
  /** Enumerates items under the configured root without fetching any content. */
  listDocuments(): Promise<SourceItem[]>;
  fetchContent(record: DocumentRecord, request: FetchRequest): Promise<FetchedContent>;
  /** Best-effort release; safe to call repeatedly and after partial failure. */
  cleanup(): Promise<void>;
}
