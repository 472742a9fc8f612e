import { AppConfig } from "../config";
import { TextExtractor } from "../extract/textExtractor";
import { Logger, MetricsRegistry } from "../observability";
import { CatalogStore } from "../store";
import { buildChunks } from "./chunks";
import { LexicalIndex } from "./lexicalIndex";

interface IndexerDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  catalog: CatalogStore;
  textExtractor: TextExtractor;
  index: LexicalIndex;
}

export interface IndexSummary {
  chunks: number;
  documents: number;
  rebuilt: boolean;
}

/** Rebuilds the index from the text cache and persists it before returning. */
export async function runIndexer(deps: IndexerDeps): Promise<IndexSummary> {
  const { config, logger, metrics, catalog, textExtractor, index } = deps;
  const stopTimer = metrics.startTimer("index_build_ms");

  const chunks = await buildChunks({ catalog, textExtractor, years: config.years });
  index.build(chunks);
  await index.persist();

  const documents = new Set(chunks.map((chunk) => chunk.hash)).size;
  metrics.incrementCounter("chunks_indexed", chunks.length);
  logger.info("index_built", { chunks: chunks.length, documents, durationMs: stopTimer() });
  return { chunks: chunks.length, documents, rebuilt: true };
}

/** Loads the persisted index, building it first when absent, unreadable, or `force` is set. */
export async function openIndex(deps: IndexerDeps, force: boolean): Promise<IndexSummary> {
  if (!force && (await deps.index.load())) {
    const documents = new Set(deps.index.getChunks().map((chunk) => chunk.hash)).size;
    deps.logger.info("index_loaded", { chunks: deps.index.size, documents });
    return { chunks: deps.index.size, documents, rebuilt: false };
  }
  return runIndexer(deps);
}
