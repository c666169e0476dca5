import { createHash } from "crypto";

export type ElementType = "Title" | "NarrativeText" | "ListItem" | "Table" | "CompositeElement";

const ELEMENT_TYPES: readonly string[] = ["Title", "NarrativeText", "ListItem", "Table", "CompositeElement"];

export type ElementMetadata = {
  sourceIdentity: string;
  filename: string;
  filetype: string;
  sequence: number;
  parentIds?: string[];
};

export type DocumentElement = {
  elementId: string;
  type: ElementType;
  text: string;
  metadata: ElementMetadata;
  embeddings?: number[];
};

export const computeElementId = (sourceIdentity: string, sequence: number, text: string): string =>
  createHash("sha256").update(`${sourceIdentity}\u0000${sequence}\u0000${text}`).digest("hex").slice(0, 32);

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isElementType = (value: unknown): value is ElementType =>
  typeof value === "string" && ELEMENT_TYPES.includes(value);

const parseMetadata = (value: unknown): ElementMetadata | undefined => {
  if (!isRecord(value)) return undefined;
  const { sourceIdentity, filename, filetype, sequence, parentIds } = value;
  if (typeof sourceIdentity !== "string" || typeof filename !== "string" || typeof filetype !== "string") {
    return undefined;
  }
  if (typeof sequence !== "number" || !Number.isInteger(sequence)) return undefined;

  const metadata: ElementMetadata = { sourceIdentity, filename, filetype, sequence };
  if (Array.isArray(parentIds) && parentIds.every((id): id is string => typeof id === "string")) {
    metadata.parentIds = parentIds;
  }
  return metadata;
};

const parseElement = (value: unknown): DocumentElement | undefined => {
  if (!isRecord(value)) return undefined;
  const { elementId, type, text, embeddings } = value;
  if (typeof elementId !== "string" || !isElementType(type) || typeof text !== "string") return undefined;

  const metadata = parseMetadata(value.metadata);
  if (!metadata) return undefined;

  const element: DocumentElement = { elementId, type, text, metadata };
  if (Array.isArray(embeddings)) {
    if (!embeddings.every((n): n is number => typeof n === "number" && Number.isFinite(n))) return undefined;
    element.embeddings = embeddings;
  }
  return element;
};

/**
 * Validates an element array read back from an artifact file.
 * Returns the index of the first malformed entry instead of throwing so callers can
 * attach their own stage context to the failure.
 */
export const parseElements = (
  value: unknown
): { ok: true; elements: DocumentElement[] } | { ok: false; reason: string } => {
  if (!Array.isArray(value)) {
    return { ok: false, reason: "artifact is not an array" };
  }

  const elements: DocumentElement[] = [];
  for (const [index, entry] of value.entries()) {
    const element = parseElement(entry);
    if (!element) {
      return { ok: false, reason: `malformed element at index ${index}` };
    }
    elements.push(element);
  }
  return { ok: true, elements };
};
