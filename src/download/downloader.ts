import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { CatalogStore } from "../store";
import { StageSummary, StoreResult } from "../types";
import { ContentStore } from "./contentStore";

interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  catalog: CatalogStore;
  contentStore: ContentStore;
  sink: Sink;
  /** Defaults to every PDF URL the crawl recorded. */
  urls?: string[];
}

export interface DownloadSummary extends StageSummary {
  deduplicated: number;
}

export async function runDownloader(deps: DownloaderDeps): Promise<DownloadSummary> {
  const { config, logger, metrics, catalog, contentStore, sink } = deps;
  const urls = deps.urls ?? (await catalog.listDiscovered("pdf"));
  const summary: DownloadSummary = { attempted: 0, succeeded: 0, cached: 0, deduplicated: 0, failed: 0 };

  logger.info("download_start", { urls: urls.length, concurrency: config.downloadConcurrency });

  await processWithConcurrency(urls, config.downloadConcurrency, async (url) => {
    const stopTimer = metrics.startTimer("download_ms");
    const result: StoreResult = await contentStore.store(url);
    const durationMs = stopTimer();
    summary.attempted += 1;

    switch (result.outcome) {
      case "downloaded":
        summary.succeeded += 1;
        metrics.incrementCounter("downloads_ok", 1);
        break;
      case "cached":
        summary.cached += 1;
        metrics.incrementCounter("downloads_cached", 1);
        break;
      case "deduplicated":
        summary.deduplicated += 1;
        metrics.incrementCounter("downloads_deduplicated", 1);
        break;
      case "failed":
        summary.failed += 1;
        metrics.incrementCounter("downloads_failed", 1);
        break;
    }

    logger.debug("download_item_complete", { url, outcome: result.outcome, durationMs });
    await sink.publishDownloadResults([result]);
  });

  logger.info("download_finished", { ...summary });
  return summary;
}
