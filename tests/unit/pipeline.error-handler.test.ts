import {
  classifyStageFailure,
  createPipelineRunSummaryTracker
} from "../../src/application/pipeline/pipeline.error-handler";
import { DocumentRecord } from "../../src/core/document/DocumentRecord";
import { ConnectionError, FetchError, ProcessingError, StageTimeoutError, UploadError } from "../../src/core/errors";

const layout = { downloadDir: "/d", outputDir: "/o", workDir: "/w" };
const record = (identity: string) => new DocumentRecord({ identity, relativePath: identity, filetype: "text", layout });

describe("classifyStageFailure", () => {
  it("keeps typed ingest errors as they are", () => {
    const original = new ConnectionError("token rejected");
    expect(classifyStageFailure(original, { stage: "downloader", identity: "a.txt" })).toBe(original);
  });

  it.each([
    ["downloader", FetchError, "fetch_failed"],
    ["partitioner", ProcessingError, "processing_failed"],
    ["embedder", ProcessingError, "processing_failed"],
    ["uploader", UploadError, "upload_failed"]
  ] as const)("maps plain errors in %s to %p", (stage, ErrorClass, code) => {
    const error = classifyStageFailure(new Error("boom"), { stage, identity: "a.txt" });
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.code).toBe(code);
    expect(error.message).toBe(`${stage} failed for a.txt: boom`);
    expect(error.cause).toEqual(new Error("boom"));
  });

  it("maps abort errors to timeouts", () => {
    const abort = Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
    const error = classifyStageFailure(abort, { stage: "chunker", identity: "a.txt" });
    expect(error).toBeInstanceOf(StageTimeoutError);
    expect(error.code).toBe("stage_timeout");
  });

  it("stringifies non-error values", () => {
    expect(classifyStageFailure("disk full", { stage: "stager", identity: "b.md" }).message).toBe(
      "stager failed for b.md: disk full"
    );
  });
});

describe("createPipelineRunSummaryTracker", () => {
  it("summarizes successes, skips, failures and cache hits", () => {
    const tracker = createPipelineRunSummaryTracker();
    const done = record("a.txt");
    done.markDownloaded();
    done.markProcessed();
    const broken = record("b.txt");
    broken.markFailed("partitioner", new ProcessingError("bad bytes"));
    const pending = record("c.txt");

    tracker.addListed(5);
    tracker.addRejected({ identity: "x.xyz", code: "unsupported_filetype", reason: "nope" });
    tracker.addRejected({ identity: "y.xyz", code: "unsupported_filetype", reason: "nope" });
    tracker.addCacheHit("downloader");
    tracker.addCacheHit("downloader");
    tracker.addCancelled();

    expect(
      tracker.summary([done, broken, pending], (r) => r.state.status === "processed")
    ).toEqual({
      total: 5,
      succeeded: 1,
      skipped: 2,
      failed: 1,
      cancelled: 1,
      cacheHits: { downloader: 2 },
      skippedByCode: { unsupported_filetype: 2 },
      failures: [{ identity: "b.txt", stage: "partitioner", code: "processing_failed", message: "bad bytes" }]
    });
  });
});
