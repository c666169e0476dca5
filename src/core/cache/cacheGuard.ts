import { promises as fs } from "fs";
import path from "path";

export type CacheOutcome = "cached" | "executed";

export type CacheGuardOptions = {
  /** Run `produce` even when the target already exists. */
  bypass?: boolean;
  onHit?: (targetPath: string) => void;
};

const isNotFound = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");

/**
 * A target counts as cached when it is a regular, non-empty file.
 * Content is never hashed: presence is the only signal.
 */
export const isCached = async (targetPath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile() && stats.size > 0;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
};

export const ensureParentDir = async (targetPath: string): Promise<void> => {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
};

/**
 * Wraps a fetch/process step so it only runs when `targetPath` is not already materialized.
 * Parent directories are created on first need.
 */
export const withCacheGuard = async (
  targetPath: string,
  produce: () => Promise<void>,
  options: CacheGuardOptions = {}
): Promise<CacheOutcome> => {
  if (!options.bypass && (await isCached(targetPath))) {
    options.onHit?.(targetPath);
    return "cached";
  }

  await ensureParentDir(targetPath);
  await produce();
  return "executed";
};

/**
 * Writes through a `.partial` sibling and renames into place, so an interrupted write
 * never leaves a non-empty file that would later be mistaken for a cache entry.
 */
export const writeFileAtomic = async (targetPath: string, data: string | Uint8Array): Promise<void> => {
  const partialPath = `${targetPath}.partial`;
  await ensureParentDir(targetPath);
  try {
    await fs.writeFile(partialPath, data);
    await fs.rename(partialPath, targetPath);
  } catch (err) {
    await fs.rm(partialPath, { force: true });
    throw err;
  }
};

export const writeJsonArtifact = async (targetPath: string, value: unknown): Promise<void> => {
  await writeFileAtomic(targetPath, JSON.stringify(value));
};

export const readJsonArtifact = async (sourcePath: string): Promise<unknown> => {
  const raw = await fs.readFile(sourcePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
};
