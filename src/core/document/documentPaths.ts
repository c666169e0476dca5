import path from "path";
import { InvalidDocumentError } from "../errors";
import type { StageName } from "../stages";

export type PathLayout = {
  downloadDir: string;
  outputDir: string;
  workDir: string;
};

export type DocumentPaths = {
  downloadPath: string;
  outputPath: string;
};

/**
 * Normalizes a source-relative path into the POSIX form used for on-disk mirroring.
 * Leading slashes, backslashes and `.` segments are folded away; anything that would
 * escape the mirror root is rejected.
 */
export const normalizeRelativePath = (raw: string): string => {
  const normalized = path.posix.normalize(raw.replace(/\\/g, "/")).replace(/^\/+/, "").replace(/\/+$/, "");

  if (normalized === "" || normalized === ".") {
    throw new InvalidDocumentError(`Document path is empty: "${raw}"`, { identity: raw });
  }
  if (normalized === ".." || normalized.startsWith("../")) {
    throw new InvalidDocumentError(`Document path escapes the source root: "${raw}"`, { identity: raw });
  }

  return normalized;
};

export const computeDocumentPaths = (layout: PathLayout, relativePath: string): DocumentPaths => ({
  downloadPath: path.resolve(layout.downloadDir, relativePath),
  outputPath: path.resolve(layout.outputDir, `${relativePath}.json`)
});

/** Location of an intermediate artifact written by `stage` for one document. */
export const computeArtifactPath = (layout: PathLayout, relativePath: string, stage: StageName): string =>
  path.resolve(layout.workDir, stage, `${relativePath}.json`);
