import { ExtractionCandidate } from "../types";
import { normalizeItalianNumber, NUMBER_TOKEN_PATTERN } from "./numbers";

export const DEFAULT_CONTEXT_WINDOW = 300;
const SNIPPET_RADIUS = 120;
const MIN_MAGNITUDE = 0.01;
const MAX_MAGNITUDE = 1e12;

export type ExpectedRange = [number, number];

export interface RawCandidate {
  value: number;
  snippet: string;
  offset: number;
}

function distinctKeywords(keywords: string[]): string[] {
  return [...new Set(keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0))];
}

/**
 * Numbers found within `contextWindow` chars of any keyword occurrence.
 * One candidate per offset; the first keyword to reach it wins.
 */
export function findCandidates(text: string, keywords: string[], contextWindow = DEFAULT_CONTEXT_WINDOW): RawCandidate[] {
  const lowered = text.toLowerCase();
  const candidates: RawCandidate[] = [];
  const seenOffsets = new Set<number>();

  for (const keyword of distinctKeywords(keywords)) {
    for (let position = lowered.indexOf(keyword); position !== -1; position = lowered.indexOf(keyword, position + keyword.length)) {
      const start = Math.max(0, position - contextWindow);
      const end = Math.min(text.length, position + contextWindow);
      const window = text.slice(start, end);

      for (const match of window.matchAll(NUMBER_TOKEN_PATTERN)) {
        const offset = start + (match.index ?? 0);
        if (seenOffsets.has(offset)) {
          continue;
        }
        const value = normalizeItalianNumber(match[0]);
        if (value === null) {
          continue;
        }
        seenOffsets.add(offset);
        const snippet = text.slice(Math.max(0, offset - SNIPPET_RADIUS), Math.min(text.length, offset + SNIPPET_RADIUS)).trim();
        candidates.push({ value, snippet, offset });
      }
    }
  }

  return candidates;
}

export interface ScoreOptions {
  year?: number;
  expectedRange?: ExpectedRange;
}

export function scoreCandidate(value: number, snippet: string, keywords: string[], options: ScoreOptions = {}): number {
  const loweredSnippet = snippet.toLowerCase();
  let score = 0;

  const present = distinctKeywords(keywords).filter((keyword) => loweredSnippet.includes(keyword)).length;
  score += 1.5 * present;
  if (present > 1) {
    score += 1.0;
  }

  if (options.year !== undefined && snippet.includes(String(options.year))) {
    score += 0.5;
  }

  if (options.expectedRange) {
    const [min, max] = options.expectedRange;
    score += value >= min && value <= max ? 2.0 : -1.0;
  }

  const magnitude = Math.abs(value);
  if (magnitude < MIN_MAGNITUDE || magnitude > MAX_MAGNITUDE) {
    score -= 1.5;
  }

  return score;
}

export interface ExtractOptions extends ScoreOptions {
  contextWindow?: number;
  topK?: number;
}

/** Scored candidates, best first; equal scores keep discovery order. */
export function extractCandidates(text: string, keywords: string[], options: ExtractOptions = {}): ExtractionCandidate[] {
  return findCandidates(text, keywords, options.contextWindow)
    .map((candidate) => ({ ...candidate, score: scoreCandidate(candidate.value, candidate.snippet, keywords, options) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, options.topK ?? 3));
}
