import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { Retriever, SearchOptions } from "../search/retriever";
import { QueryRecord, ScoredChunk, SourceRecord } from "../types";
import { ExpectedRange, extractCandidates } from "./candidates";
import { buildQueryRecord, categorizeIndicator, defaultKeywords } from "./queryBuilder";
import { ValueModel } from "./valueModel";

export const NOT_FOUND_METHOD = "NOT_FOUND";

export interface IndicatorSpec {
  indicator: string;
  category?: string;
  keywords?: string[];
  expectedRange?: ExpectedRange;
}

/** Optional statistical-agency lookup, consulted after the corpus. */
export interface ExternalSource {
  readonly name: string;
  query(municipality: string, indicator: string, year: number): Promise<{ value: number; url?: string } | null>;
}

export interface ResolverOptions {
  municipality: string;
  topK: number;
  minScore: number;
  contextWindow: number;
  /** Chunks the heuristic reads, best first. */
  heuristicTopK: number;
  /** Chunks offered to the value model, best first. */
  modelMaxDocs: number;
  modelConfidenceThreshold: number;
}

interface ResolverDeps {
  retriever: Retriever;
  logger: Logger;
  metrics: MetricsRegistry;
  options: ResolverOptions;
  valueModel?: ValueModel;
  externalSources?: ExternalSource[];
}

export interface Resolution {
  query: QueryRecord;
  source: SourceRecord;
}

const HEURISTIC_CONFIDENCE_SCALE = 5;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function fromChunk(spec: IndicatorSpec, year: number, chunk: ScoredChunk): Omit<SourceRecord, "value" | "snippet" | "confidence" | "method"> {
  return {
    indicator: spec.indicator,
    year,
    url: chunk.url,
    filename: chunk.filename,
    page_no: chunk.pageNo > 0 ? chunk.pageNo : null,
    doc_id: chunk.hash,
  };
}

/**
 * Fills one indicator/year: retrieval over generated queries, then the value
 * model (when present), then the keyword heuristic, then external sources.
 * Always yields a source row; `method` is NOT_FOUND when nothing answered.
 */
export class IndicatorResolver {
  constructor(private readonly deps: ResolverDeps) {}

  async resolve(spec: IndicatorSpec, year: number): Promise<Resolution> {
    const { retriever, logger, metrics, options } = this.deps;
    const category = categorizeIndicator(spec.indicator, spec.category);
    const query = buildQueryRecord(spec.indicator, category, year);
    const queries = [query.query_1, query.query_2].filter((text) => text.length > 0);

    const searchOptions: SearchOptions = { topK: options.topK, year, minScore: options.minScore };
    const chunks = retriever.multiQuerySearch(queries, searchOptions);
    logger.debug("indicator_retrieved", { indicator: spec.indicator, year, chunks: chunks.length });

    const source =
      (await this.fromValueModel(spec, year, chunks)) ??
      this.fromHeuristic(spec, year, chunks) ??
      (await this.fromExternalSources(spec, year));

    if (source) {
      metrics.incrementCounter("values_found", 1);
      logger.info("indicator_resolved", {
        indicator: spec.indicator,
        year,
        method: source.method,
        value: source.value,
        confidence: source.confidence,
      });
      return { query, source };
    }

    metrics.incrementCounter("values_not_found", 1);
    logger.info("indicator_not_found", { indicator: spec.indicator, year });
    return {
      query,
      source: {
        indicator: spec.indicator,
        year,
        value: null,
        url: "",
        filename: "",
        page_no: null,
        snippet: "",
        confidence: 0,
        method: NOT_FOUND_METHOD,
        doc_id: "",
      },
    };
  }

  private async fromValueModel(spec: IndicatorSpec, year: number, chunks: ScoredChunk[]): Promise<SourceRecord | undefined> {
    const { valueModel, logger, options } = this.deps;
    if (!valueModel) {
      return undefined;
    }

    for (const chunk of chunks.slice(0, options.modelMaxDocs)) {
      try {
        const result = await valueModel.extract(chunk.text, spec.indicator, year);
        if (result.value === null || result.confidence < options.modelConfidenceThreshold) {
          continue;
        }
        if (result.year !== null && result.year !== year) {
          continue;
        }
        return {
          ...fromChunk(spec, year, chunk),
          value: result.value,
          snippet: result.snippet,
          confidence: result.confidence,
          method: `model:${valueModel.modelName}`,
        };
      } catch (error) {
        logger.warn("value_model_failed", { indicator: spec.indicator, year, hash: chunk.hash, error: errorMessage(error) });
      }
    }
    return undefined;
  }

  private fromHeuristic(spec: IndicatorSpec, year: number, chunks: ScoredChunk[]): SourceRecord | undefined {
    const { options } = this.deps;
    const keywords = spec.keywords && spec.keywords.length > 0 ? spec.keywords : defaultKeywords(spec.indicator);
    if (keywords.length === 0) {
      return undefined;
    }

    let best: { chunk: ScoredChunk; value: number; snippet: string; score: number } | undefined;
    for (const chunk of chunks.slice(0, options.heuristicTopK)) {
      const [candidate] = extractCandidates(chunk.text, keywords, {
        contextWindow: options.contextWindow,
        year,
        expectedRange: spec.expectedRange,
        topK: 1,
      });
      if (candidate && candidate.score > 0 && (!best || candidate.score > best.score)) {
        best = { chunk, value: candidate.value, snippet: candidate.snippet, score: candidate.score };
      }
    }

    if (!best) {
      return undefined;
    }
    return {
      ...fromChunk(spec, year, best.chunk),
      value: best.value,
      snippet: best.snippet,
      confidence: clamp01(best.score / HEURISTIC_CONFIDENCE_SCALE),
      method: "heuristic",
    };
  }

  private async fromExternalSources(spec: IndicatorSpec, year: number): Promise<SourceRecord | undefined> {
    const { externalSources = [], logger, options } = this.deps;
    for (const external of externalSources) {
      try {
        const answer = await external.query(options.municipality, spec.indicator, year);
        if (!answer) {
          continue;
        }
        return {
          indicator: spec.indicator,
          year,
          value: answer.value,
          url: answer.url ?? "",
          filename: "",
          page_no: null,
          snippet: "",
          confidence: 1,
          method: `external:${external.name}`,
          doc_id: "",
        };
      } catch (error) {
        logger.warn("external_source_failed", { indicator: spec.indicator, year, source: external.name, error: errorMessage(error) });
      }
    }
    return undefined;
  }
}
