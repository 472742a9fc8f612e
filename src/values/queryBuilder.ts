import { tokenize } from "../search/tokenize";
import { QueryRecord } from "../types";
import stopwords from "./stopwords-it.json";

export type IndicatorCategory = "financial" | "demographic" | "environmental" | "infrastructure" | "general";

const CATEGORY_MARKERS: Array<[Exclude<IndicatorCategory, "general">, string[]]> = [
  ["financial", ["spesa", "entrata", "costo", "budget", "bilancio", "debito"]],
  ["demographic", ["popolazione", "abitanti", "residenti", "demografic"]],
  ["environmental", ["rifiuti", "raccolta", "ambiente", "emissioni", "acqua"]],
  ["infrastructure", ["strada", "illuminazione", "edifici", "scuole"]],
];

const CATEGORY_CONTEXT: Partial<Record<IndicatorCategory, string>> = {
  financial: "bilancio",
  environmental: "ambiente",
};

// First matching synonym is appended to the variant query.
const SYNONYMS: Array<[string, string]> = [
  ["spesa", "costo"],
  ["abitanti", "popolazione"],
  ["rifiuti", "raccolta differenziata"],
  ["entrata", "introito"],
];

const STOPWORDS = new Set<string>(stopwords);

function isCategory(value: string): value is IndicatorCategory {
  return ["financial", "demographic", "environmental", "infrastructure", "general"].includes(value);
}

/** Marker words in the indicator decide; otherwise the declared category, else "general". */
export function categorizeIndicator(indicator: string, declared?: string): IndicatorCategory {
  const lowered = indicator.toLowerCase();
  for (const [category, markers] of CATEGORY_MARKERS) {
    if (markers.some((marker) => lowered.includes(marker))) {
      return category;
    }
  }
  return declared && isCategory(declared) ? declared : "general";
}

export function buildCanonicalQuery(indicator: string, category: IndicatorCategory, year?: number): string {
  const parts = [indicator];
  if (year !== undefined) {
    parts.push(String(year));
  }
  const context = CATEGORY_CONTEXT[category];
  if (context) {
    parts.push(context);
  }
  return parts.join(" ");
}

export function buildVariantQuery(indicator: string, year?: number): string {
  const lowered = indicator.toLowerCase();
  let variant = indicator;
  const synonym = SYNONYMS.find(([key, value]) => lowered.includes(key) && !lowered.includes(value));
  if (synonym) {
    variant = `${variant} ${synonym[1]}`;
  }
  return year !== undefined ? `${variant} ${year}` : variant;
}

/** Canonical query plus the synonym variant when it differs. */
export function generateQueries(indicator: string, category: IndicatorCategory, year?: number): string[] {
  const canonical = buildCanonicalQuery(indicator, category, year);
  const variant = buildVariantQuery(indicator, year);
  return variant === canonical ? [canonical] : [canonical, variant];
}

export function buildQueryRecord(indicator: string, category: IndicatorCategory, year: number): QueryRecord {
  const [query1, query2] = generateQueries(indicator, category, year);
  return {
    indicator,
    category,
    year,
    query_1: query1,
    query_2: query2 ?? "",
  };
}

/** Indicator tokens minus Italian function words, for keyword-anchored extraction. */
export function defaultKeywords(indicator: string): string[] {
  return [...new Set(tokenize(indicator).filter((token) => !STOPWORDS.has(token)))];
}
