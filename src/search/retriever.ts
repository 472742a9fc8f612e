import { ScoredChunk } from "../types";
import { LexicalIndex } from "./lexicalIndex";

export const DEFAULT_TOP_K = 8;

export interface SearchOptions {
  topK?: number;
  /** When set, chunks of any other year (including unknown) are dropped. */
  year?: number | null;
  /** Applied only when positive; BM25 scores of common terms can be negative on small corpora. */
  minScore?: number;
}

function byScoreDescending(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score;
}

function chunkKey(chunk: ScoredChunk): string {
  return `${chunk.hash}:${chunk.pageNo}`;
}

/**
 * Merges result lists on `(hash, pageNo)`, keeping each chunk once at its
 * best score, then re-sorts and truncates.
 */
export function mergeByBestScore(resultLists: ScoredChunk[][], topK: number): ScoredChunk[] {
  const best = new Map<string, ScoredChunk>();
  for (const results of resultLists) {
    for (const result of results) {
      const key = chunkKey(result);
      const current = best.get(key);
      if (!current || result.score > current.score) {
        best.set(key, result);
      }
    }
  }
  return [...best.values()].sort(byScoreDescending).slice(0, Math.max(0, topK));
}

export class Retriever {
  constructor(private readonly index: LexicalIndex) {}

  search(query: string, options: SearchOptions = {}): ScoredChunk[] {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const year = options.year ?? null;
    const minScore = options.minScore ?? 0;

    return this.index
      .score(query)
      .filter(({ chunk }) => year === null || chunk.year === year)
      .filter(({ score }) => minScore <= 0 || score >= minScore)
      .map(({ chunk, score }) => ({ ...chunk, score }))
      .sort(byScoreDescending)
      .slice(0, Math.max(0, topK));
  }

  multiQuerySearch(queries: string[], options: SearchOptions = {}): ScoredChunk[] {
    const topK = options.topK ?? DEFAULT_TOP_K;
    return mergeByBestScore(
      queries.map((query) => this.search(query, options)),
      topK,
    );
  }
}
