import { promises as fs } from "fs";
import { ProcessingError } from "../../core/errors";
import { isTextLike, type FiletypeCategory } from "../../core/filetype/filetype";
import { computeElementId, type DocumentElement, type ElementType } from "../../core/processing/elements";
import type { DocumentPartitioner, PartitionInput } from "../../ports/DocumentProcessors";

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&apos;": "'",
  "&nbsp;": " "
};

const BLOCK_TAGS = /<\/?(p|div|section|article|header|footer|li|ul|ol|h[1-6]|br|tr|table|blockquote|pre)\b[^>]*>/gi;

export const htmlToText = (html: string): string =>
  html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<h[1-6]\b[^>]*>/gi, "\n\n# ")
    .replace(BLOCK_TAGS, "\n\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity);

const classifyBlock = (block: string, filetype: FiletypeCategory): { type: ElementType; text: string } => {
  if (filetype === "csv" || filetype === "tsv") {
    return { type: "Table", text: block };
  }
  const heading = /^#{1,6}\s+(.*)$/.exec(block);
  if (heading && !block.includes("\n")) {
    return { type: "Title", text: (heading[1] ?? "").trim() };
  }
  if (/^([-*+]|\d+[.)])\s+/.test(block)) {
    return { type: "ListItem", text: block };
  }
  return { type: "NarrativeText", text: block };
};

const splitBlocks = (text: string, filetype: FiletypeCategory): string[] => {
  // Tabular files stay a single block so rows are not scattered across elements.
  if (filetype === "csv" || filetype === "tsv") {
    const trimmed = text.trim();
    return trimmed === "" ? [] : [trimmed];
  }
  return text
    .replace(/\r\n?/g, "\n")
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter((block) => block !== "");
};

/**
 * Paragraph partitioner for text-like files. Binary formats (pdf, office, images)
 * need a real partitioning backend and fail with a ProcessingError.
 */
export class TextPartitioner implements DocumentPartitioner {
  async partition({ record, filePath, signal }: PartitionInput): Promise<DocumentElement[]> {
    if (!isTextLike(record.filetype)) {
      throw new ProcessingError(`No partitioner available for filetype "${record.filetype}"`, {
        stage: "partitioner",
        identity: record.identity
      });
    }

    const raw = await fs.readFile(filePath, { encoding: "utf8", signal });
    const text = record.filetype === "html" ? htmlToText(raw) : raw;

    return splitBlocks(text, record.filetype).map((block, sequence) => {
      const { type, text: elementText } = classifyBlock(block, record.filetype);
      return {
        elementId: computeElementId(record.identity, sequence, elementText),
        type,
        text: elementText,
        metadata: {
          sourceIdentity: record.identity,
          filename: record.filename,
          filetype: record.filetype,
          sequence
        }
      };
    });
  }
}
