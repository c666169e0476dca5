import type { DocumentRecord } from "../../core/document/DocumentRecord";
import { computeElementId, type DocumentElement } from "../../core/processing/elements";
import type { DocumentChunker } from "../../ports/DocumentProcessors";

export type CharacterChunkerOptions = {
  maxCharacters: number;
  overlap: number;
};

const splitOversized = (text: string, maxCharacters: number, overlap: number): string[] => {
  const pieces: string[] = [];
  const step = maxCharacters - overlap;
  for (let start = 0; start < text.length; start += step) {
    pieces.push(text.slice(start, start + maxCharacters));
    if (start + maxCharacters >= text.length) break;
  }
  return pieces;
};

/**
 * Packs consecutive elements into CompositeElement chunks of at most `maxCharacters`.
 * A Title always opens a new chunk; a single element longer than the limit is split
 * into windows that share `overlap` characters.
 */
export class CharacterChunker implements DocumentChunker {
  constructor(private readonly options: CharacterChunkerOptions) {}

  chunk(elements: DocumentElement[], record: DocumentRecord): DocumentElement[] {
    const { maxCharacters, overlap } = this.options;
    const chunks: DocumentElement[] = [];
    let texts: string[] = [];
    let parents: string[] = [];

    const flush = () => {
      if (texts.length === 0) return;
      const text = texts.join("\n\n");
      const sequence = chunks.length;
      chunks.push({
        elementId: computeElementId(record.identity, sequence, text),
        type: "CompositeElement",
        text,
        metadata: {
          sourceIdentity: record.identity,
          filename: record.filename,
          filetype: record.filetype,
          sequence,
          parentIds: parents
        }
      });
      texts = [];
      parents = [];
    };

    for (const element of elements) {
      if (element.type === "Title") flush();

      if (element.text.length > maxCharacters) {
        flush();
        for (const piece of splitOversized(element.text, maxCharacters, overlap)) {
          texts = [piece];
          parents = [element.elementId];
          flush();
        }
        continue;
      }

      const pending = texts.reduce((total, text) => total + text.length + 2, 0);
      if (texts.length > 0 && pending + element.text.length > maxCharacters) flush();
      texts.push(element.text);
      parents.push(element.elementId);
    }
    flush();

    return chunks;
  }
}
