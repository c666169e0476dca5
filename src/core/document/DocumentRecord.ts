import type { IngestError, IngestErrorCode } from "../errors";
import type { FiletypeCategory } from "../filetype/filetype";
import type { StageName } from "../stages";
import { computeArtifactPath, computeDocumentPaths, type DocumentPaths, type PathLayout } from "./documentPaths";

export type DocumentStatus = "discovered" | "downloaded" | "processed" | "uploaded";

export type DocumentState =
  | { status: DocumentStatus }
  | {
      status: "failed";
      stage: StageName;
      code: IngestErrorCode;
      reason: string;
    };

export type FailedDocumentState = Extract<DocumentState, { status: "failed" }>;

const statusRank: Record<DocumentStatus, number> = {
  discovered: 0,
  downloaded: 1,
  processed: 2,
  uploaded: 3
};

export class InvalidTransitionError extends Error {
  constructor(identity: string, from: DocumentState["status"], to: DocumentState["status"]) {
    super(`Illegal state transition for "${identity}": ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type DocumentRecordInit = {
  identity: string;
  relativePath: string;
  filetype: FiletypeCategory;
  metadata?: Record<string, unknown>;
  layout: PathLayout;
};

/**
 * One discovered source item. Identity and paths are fixed at construction,
 * the lifecycle state only ever moves forward (or to `failed`, which is terminal).
 */
export class DocumentRecord {
  readonly identity: string;
  readonly relativePath: string;
  readonly filetype: FiletypeCategory;
  readonly metadata: Readonly<Record<string, unknown>>;
  private readonly layout: PathLayout;
  private readonly paths: DocumentPaths;
  private current: DocumentState = { status: "discovered" };

  constructor(init: DocumentRecordInit) {
    this.identity = init.identity;
    this.relativePath = init.relativePath;
    this.filetype = init.filetype;
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
    this.layout = init.layout;
    this.paths = computeDocumentPaths(init.layout, init.relativePath);
  }

  get state(): DocumentState {
    return this.current;
  }

  get downloadPath(): string {
    return this.paths.downloadPath;
  }

  get outputPath(): string {
    return this.paths.outputPath;
  }

  get filename(): string {
    const segments = this.relativePath.split("/");
    return segments[segments.length - 1] ?? this.relativePath;
  }

  artifactPath(stage: StageName): string {
    return computeArtifactPath(this.layout, this.relativePath, stage);
  }

  isFailed(): boolean {
    return this.current.status === "failed";
  }

  markDownloaded(): void {
    this.advance("downloaded");
  }

  markProcessed(): void {
    this.advance("processed");
  }

  markUploaded(): void {
    this.advance("uploaded");
  }

  markFailed(stage: StageName, error: IngestError): void {
    if (this.current.status === "failed") {
      throw new InvalidTransitionError(this.identity, "failed", "failed");
    }
    this.current = { status: "failed", stage, code: error.code, reason: error.message };
  }

  private advance(next: DocumentStatus): void {
    const from = this.current.status;
    if (from === "failed" || statusRank[next] < statusRank[from]) {
      throw new InvalidTransitionError(this.identity, from, next);
    }
    this.current = { status: next };
  }
}
