import type { DocumentEmbedder } from "../../ports/DocumentProcessors";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export const fnv1a = (token: string): number => {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
};

export const tokenize = (text: string): string[] => text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

/**
 * Deterministic feature-hashing embedder. Each token lands in one bucket with a sign
 * taken from the high bit; vectors are L2-normalized. Needs no model download.
 */
export class HashingEmbedder implements DocumentEmbedder {
  readonly model: string;

  constructor(private readonly dimensions: number) {
    this.model = `hashing-${dimensions}`;
  }

  embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + (hash & 0x80000000 ? -1 : 1);
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async embedDocuments(texts: string[], signal: AbortSignal): Promise<number[][]> {
    signal.throwIfAborted();
    return texts.map((text) => this.embed(text));
  }
}
