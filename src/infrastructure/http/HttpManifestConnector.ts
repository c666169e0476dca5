import { Readable } from "stream";
import type { DocumentRecord } from "../../core/document/DocumentRecord";
import { normalizeRelativePath } from "../../core/document/documentPaths";
import { ConfigurationError, ConnectionError, FetchError, IngestError, toErrorMessage } from "../../core/errors";
import type { FetchedContent, FetchRequest, SourceConnector, SourceItem } from "../../ports/SourceConnector";
import { validateHttpUrl } from "../../shared/config/env";
import type { Logger } from "../../shared/logging/logger";
import { retry, type RetryOptions } from "../../shared/retry/retry";

export const HTTP_CONNECTOR_ID = "http";

export type HttpConnectorConfig = {
  readonly manifestUrl: string;
  readonly token: string;
  readonly recursive: boolean;
  readonly timeoutMs: number;
  readonly retries: number;
};

export const httpConnectorCaps = {
  timeoutMs: { min: 100, max: 300_000 },
  retries: { min: 0, max: 10 }
} as const;

export const createHttpConnectorConfig = (input: {
  remoteUrl?: string;
  token?: string;
  recursive?: boolean;
  timeoutMs?: number;
  retries?: number;
}): HttpConnectorConfig => {
  const context = { connector: HTTP_CONNECTOR_ID };
  if (!input.remoteUrl?.trim()) {
    throw new ConfigurationError("http connector requires --remote-url pointing at a manifest", {
      ...context,
      field: "remoteUrl"
    });
  }
  const manifestUrl = validateHttpUrl("remoteUrl", input.remoteUrl.trim());
  const token = input.token?.trim();
  if (!token) {
    throw new ConfigurationError("http connector requires an access token (--token or INGEST_HTTP_TOKEN)", {
      ...context,
      field: "token"
    });
  }

  const timeoutMs = input.timeoutMs ?? 8000;
  const retries = input.retries ?? 5;
  for (const [field, value, range] of [
    ["timeoutMs", timeoutMs, httpConnectorCaps.timeoutMs],
    ["retries", retries, httpConnectorCaps.retries]
  ] as const) {
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
      throw new ConfigurationError(`${field}=${value} is out of allowed range [${range.min}..${range.max}]`, {
        ...context,
        field
      });
    }
  }

  return Object.freeze({ manifestUrl, token, recursive: input.recursive ?? false, timeoutMs, retries });
};

export class HttpRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(
    message: string,
    details: { requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }
  ) {
    super(message);
    this.name = "HttpRequestError";
    this.requestUrl = details.requestUrl;
    this.status = details.status;
    this.isTimeout = details.isTimeout ?? false;
    this.retryDelayMs = details.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const shouldRetryHttp: RetryOptions["shouldRetry"] = (err) => {
  if (!(err instanceof HttpRequestError)) return false;
  if (err.isTimeout) return true;

  const status = err.status;
  if (status === 429) {
    return { retry: true, delayMs: err.retryDelayMs };
  }
  if (typeof status === "number") return status >= 500;
  return true;
};

const safeUrl = (url: URL) => `${url.origin}${url.pathname}${url.search}`;

type ManifestEntry = { path?: unknown; size?: unknown; contentType?: unknown; url?: unknown };

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const resolveUrl = (raw: string, base: URL): string | undefined => {
  if (raw === "") return undefined;
  try {
    return new URL(raw, base).toString();
  } catch {
    return undefined;
  }
};

const readManifestEntries = (json: unknown): ManifestEntry[] | undefined => {
  const documents = isRecord(json) && !Array.isArray(json) ? json.documents : json;
  if (!Array.isArray(documents)) return undefined;
  return documents.map((entry): ManifestEntry => (isRecord(entry) ? entry : {}));
};

// Paths that fail to normalize are kept so the indexer can reject them.
const isTopLevel = (relativePath: string): boolean => {
  try {
    return !normalizeRelativePath(relativePath).includes("/");
  } catch {
    return true;
  }
};

/**
 * Reads a JSON manifest (`{ documents: [{ path, size?, contentType?, url? }] }` or a bare
 * array) and serves each entry's bytes over HTTP with bearer auth. Entry URLs are
 * resolved against the manifest URL; `path` doubles as identity.
 */
export class HttpManifestConnector implements SourceConnector {
  readonly id = HTTP_CONNECTOR_ID;
  private manifest: SourceItem[] | undefined;

  constructor(
    private readonly config: HttpConnectorConfig,
    private readonly logger: Logger
  ) {}

  async initialize(): Promise<void> {
    if (this.manifest) return;

    const manifestUrl = new URL(this.config.manifestUrl);
    let json: unknown;
    try {
      const response = await this.request(manifestUrl);
      json = await response.json();
    } catch (err) {
      const status = err instanceof HttpRequestError && err.status !== undefined ? ` (status ${err.status})` : "";
      throw new ConnectionError(
        `Failed to load manifest ${safeUrl(manifestUrl)}${status}: ${toErrorMessage(err)}`,
        { connector: this.id },
        err
      );
    }

    const entries = readManifestEntries(json);
    if (!entries) {
      throw new ConnectionError(`Manifest ${safeUrl(manifestUrl)} does not list documents`, { connector: this.id });
    }
    this.manifest = entries.map((entry, index) => this.toItem(entry, index, manifestUrl));
  }

  async listDocuments(): Promise<SourceItem[]> {
    await this.initialize();
    const items = this.manifest ?? [];
    if (this.config.recursive) return items;
    return items.filter((item) => isTopLevel(item.relativePath));
  }

  async fetchContent(record: DocumentRecord, request: FetchRequest): Promise<FetchedContent> {
    const url = this.contentUrlOf(record);
    try {
      const response = await this.request(url, request.signal);
      if (request.streaming && response.body) {
        return { kind: "stream", stream: Readable.fromWeb(response.body) };
      }
      return { kind: "buffer", data: new Uint8Array(await response.arrayBuffer()) };
    } catch (err) {
      if (err instanceof IngestError) throw err;
      throw new FetchError(
        `Failed to fetch ${safeUrl(url)}: ${toErrorMessage(err)}`,
        { connector: this.id, stage: "downloader", identity: record.identity },
        err
      );
    }
  }

  async cleanup(): Promise<void> {
    this.manifest = undefined;
  }

  private contentUrlOf(record: DocumentRecord): URL {
    const declared = record.metadata.url;
    if (typeof declared === "string") return new URL(declared);
    return new URL(record.relativePath, this.config.manifestUrl);
  }

  private toItem(entry: ManifestEntry, index: number, manifestUrl: URL): SourceItem {
    const relativePath = typeof entry.path === "string" ? entry.path : "";
    const metadata: Record<string, unknown> = { manifestIndex: index };
    const url = resolveUrl(typeof entry.url === "string" ? entry.url : relativePath, manifestUrl);
    if (url !== undefined) metadata.url = url;

    const item: SourceItem = { identity: relativePath || `manifest[${index}]`, relativePath, metadata };
    if (typeof entry.size === "number" && Number.isFinite(entry.size) && entry.size >= 0) item.size = entry.size;
    if (typeof entry.contentType === "string") item.contentType = entry.contentType;
    return item;
  }

  /** GET with bearer auth, a per-attempt timeout and retries on 429, 5xx and timeouts. */
  private request(url: URL, signal?: AbortSignal): Promise<Response> {
    const requestUrl = safeUrl(url);

    const attempt = async (): Promise<Response> => {
      const controller = new AbortController();
      const onAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", onAbort, { once: true });
      const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url, {
          headers: { Authorization: `Bearer ${this.config.token}` },
          signal: controller.signal
        });
      } catch (err) {
        if (signal?.aborted) throw err;
        if (controller.signal.aborted) {
          throw new HttpRequestError(`HTTP request timeout after ${this.config.timeoutMs}ms`, {
            requestUrl,
            isTimeout: true
          });
        }
        throw new HttpRequestError(`HTTP request failed: ${toErrorMessage(err)}`, { requestUrl });
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        const retryAfter = res.headers.get("retry-after");
        throw new HttpRequestError(`HTTP request failed: ${res.status}`, {
          requestUrl,
          status: res.status,
          retryDelayMs:
            res.status === 429 && retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined
        });
      }
      return res;
    };

    const logAttempt = (event: string, ctx: { attempt: number; maxAttempts: number; error: unknown }) => {
      this.logger.warn(event, {
        status: ctx.error instanceof HttpRequestError ? ctx.error.status ?? null : null,
        url: requestUrl,
        attempt: ctx.attempt,
        maxAttempts: ctx.maxAttempts
      });
    };

    return retry(attempt, {
      retries: this.config.retries,
      minDelayMs: 250,
      maxDelayMs: 5000,
      signal,
      onRetry: (ctx) => logAttempt("http.retry", ctx),
      onGiveUp: (ctx) => logAttempt("http.give_up", ctx),
      shouldRetry: shouldRetryHttp
    });
  }
}
