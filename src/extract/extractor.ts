import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { CatalogStore } from "../store";
import { ExtractResult, StageSummary } from "../types";
import { TextExtractor } from "./textExtractor";

interface ExtractorDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  catalog: CatalogStore;
  textExtractor: TextExtractor;
  sink: Sink;
}

/** Extracts every catalogued document on the worker pool. Failures are counted, never thrown. */
export async function runExtractor(deps: ExtractorDeps): Promise<StageSummary> {
  const { config, logger, metrics, catalog, textExtractor, sink } = deps;
  const documents = await catalog.listDocuments();
  const summary: StageSummary = { attempted: 0, succeeded: 0, cached: 0, failed: 0 };

  logger.info("extract_start", { documents: documents.length, concurrency: config.extractConcurrency });

  await processWithConcurrency(documents, config.extractConcurrency, async (doc) => {
    const stopTimer = metrics.startTimer("extract_ms");
    summary.attempted += 1;
    let result: ExtractResult;

    try {
      const ensured = await textExtractor.ensure(doc);
      const durationMs = stopTimer();
      result = {
        hash: doc.hash,
        outcome: ensured.cached ? "cached" : "extracted",
        engine: ensured.record.engine,
        pages: ensured.record.pages,
      };
      if (ensured.cached) {
        summary.cached += 1;
        metrics.incrementCounter("extracts_cached", 1);
      } else {
        summary.succeeded += 1;
        metrics.incrementCounter("extracts_ok", 1);
        logger.info("extract_item_ok", {
          hash: doc.hash,
          durationMs,
          engine: ensured.record.engine,
          pageCount: ensured.record.pages,
        });
      }
    } catch (error) {
      const durationMs = stopTimer();
      const message = errorMessage(error);
      summary.failed += 1;
      metrics.incrementCounter("extracts_failed", 1);
      logger.warn("extract_item_error", { hash: doc.hash, durationMs, error: message });
      result = { hash: doc.hash, outcome: "failed", error: message };
    }

    await sink.publishExtractResults([result]);
  });

  logger.info("extract_finished", { ...summary });
  return summary;
}
