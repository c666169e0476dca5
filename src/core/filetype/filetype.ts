import path from "path";
import { UnsupportedFiletypeError, type IngestErrorContext } from "../errors";
import filetypes from "./filetypes.json";

export const FILETYPE_CATEGORIES = [
  "text",
  "markdown",
  "rst",
  "org",
  "html",
  "xml",
  "json",
  "csv",
  "tsv",
  "pdf",
  "doc",
  "docx",
  "odt",
  "rtf",
  "ppt",
  "pptx",
  "xls",
  "xlsx",
  "epub",
  "email",
  "image"
] as const;

export type FiletypeCategory = (typeof FILETYPE_CATEGORIES)[number];

const TEXT_LIKE: ReadonlySet<FiletypeCategory> = new Set<FiletypeCategory>([
  "text",
  "markdown",
  "rst",
  "org",
  "html",
  "xml",
  "json",
  "csv",
  "tsv"
]);

const CATEGORY_NAMES: readonly string[] = FILETYPE_CATEGORIES;

const isFiletypeCategory = (value: string): value is FiletypeCategory => CATEGORY_NAMES.includes(value);

const buildLookup = (table: Record<string, string>, label: string): ReadonlyMap<string, FiletypeCategory> => {
  const lookup = new Map<string, FiletypeCategory>();
  for (const [key, category] of Object.entries(table)) {
    if (!isFiletypeCategory(category)) {
      throw new Error(`filetypes.json ${label} "${key}" maps to unknown category "${category}"`);
    }
    lookup.set(key.toLowerCase(), category);
  }
  return lookup;
};

const byExtension = buildLookup(filetypes.extensions, "extension");
const byContentType = buildLookup(filetypes.contentTypes, "content type");

export const supportedExtensions = (): string[] => Array.from(byExtension.keys()).sort();

export const isTextLike = (category: FiletypeCategory): boolean => TEXT_LIKE.has(category);

const normalizeContentType = (contentType: string): string => {
  const [mediaType = ""] = contentType.split(";");
  return mediaType.trim().toLowerCase();
};

/**
 * Resolves a filename (and optionally a declared content type) to a document category.
 * A recognized content type wins over the extension, so a page served as `text/html`
 * resolves even when its name carries no usable extension.
 */
export const resolveFiletype = (
  filename: string,
  declaredContentType?: string,
  context: IngestErrorContext = {}
): FiletypeCategory => {
  if (declaredContentType) {
    const fromContentType = byContentType.get(normalizeContentType(declaredContentType));
    if (fromContentType) return fromContentType;
  }

  const extension = path.posix.extname(filename.replace(/\\/g, "/")).toLowerCase();
  if (extension === "") {
    throw new UnsupportedFiletypeError(`Unsupported file without extension: ${filename}`, context);
  }

  const category = byExtension.get(extension);
  if (!category) {
    throw new UnsupportedFiletypeError(
      `Extension ${extension} is not supported (${filename}). Value must be one of ${supportedExtensions().join(", ")}`,
      context
    );
  }

  return category;
};
