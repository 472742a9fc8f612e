import fs from "node:fs";
import { runEngineChain, TextEngine } from "../extract/engines";
import { errorMessage, Logger } from "../observability";

export const MIN_YEAR = 1990;
export const MAX_YEAR = 2030;

const CONTENT_SCAN_CHARS = 5000;
const CONTENT_SCAN_PAGES = 2;

/** Four-digit 19xx/20xx tokens not adjacent to other digits, within range, in order of appearance. */
export function findYears(text: string): number[] {
  const years: number[] = [];
  for (const match of text.matchAll(/(?<!\d)(19\d\d|20\d\d)(?!\d)/g)) {
    const year = Number.parseInt(match[1], 10);
    if (year >= MIN_YEAR && year <= MAX_YEAR) {
      years.push(year);
    }
  }
  return years;
}

export function latestYear(text: string): number | null {
  const years = findYears(text);
  return years.length > 0 ? Math.max(...years) : null;
}

/** Most frequent in-range year; ties go to the most recent. */
export function mostFrequentYear(text: string): number | null {
  const counts = new Map<number, number>();
  for (const year of findYears(text)) {
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  let best: number | null = null;
  let bestCount = 0;
  for (const [year, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && year > best)) {
      best = year;
      bestCount = count;
    }
  }
  return best;
}

export interface YearInput {
  url: string;
  filename: string;
  /** File whose first pages are read by the content strategy. */
  pdfPath: string;
}

export interface YearStrategy {
  readonly name: string;
  resolve(input: YearInput): Promise<number | null>;
}

export const urlYearStrategy: YearStrategy = {
  name: "url",
  resolve: async (input) => latestYear(input.url),
};

export const filenameYearStrategy: YearStrategy = {
  name: "filename",
  resolve: async (input) => latestYear(input.filename),
};

export class ContentYearStrategy implements YearStrategy {
  readonly name = "content";

  constructor(
    private readonly engines: TextEngine[],
    private readonly readFile: (filePath: string) => Promise<Buffer> = fs.promises.readFile,
  ) {}

  async resolve(input: YearInput): Promise<number | null> {
    const data = await this.readFile(input.pdfPath);
    const result = await runEngineChain(this.engines, data, {
      mode: "pages",
      label: input.pdfPath,
      maxPages: CONTENT_SCAN_PAGES,
    });
    return mostFrequentYear(result.pages.join("\n").slice(0, CONTENT_SCAN_CHARS));
  }
}

export interface YearResolution {
  year: number | null;
  strategy?: string;
}

/** Ordered strategies, first non-null answer wins; a strategy that throws falls through. */
export class YearResolver {
  constructor(
    private readonly strategies: YearStrategy[],
    private readonly logger?: Logger,
  ) {}

  async resolve(input: YearInput): Promise<YearResolution> {
    for (const strategy of this.strategies) {
      try {
        const year = await strategy.resolve(input);
        if (year !== null) {
          return { year, strategy: strategy.name };
        }
      } catch (error) {
        this.logger?.debug("year_strategy_failed", { url: input.url, strategy: strategy.name, error: errorMessage(error) });
      }
    }
    return { year: null };
  }
}

export function createYearResolver(engines: TextEngine[], logger?: Logger): YearResolver {
  return new YearResolver([urlYearStrategy, filenameYearStrategy, new ContentYearStrategy(engines)], logger);
}
