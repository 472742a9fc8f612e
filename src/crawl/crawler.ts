import { AppConfig } from "../config";
import { HttpClient } from "../core/http";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { CatalogStore } from "../store";
import { extractLinksFromHtml, hasSkippedExtension, isPdfUrl, isSameDomain, normalizeUrl } from "./htmlParser";
import { Pacer, PacerClock } from "./pacer";
import { RobotsPolicy } from "./robots";
import { parseSitemap } from "./sitemap";

export type CrawlState = "seeding" | "crawling" | "done";

export interface CrawlResult {
  pdfUrls: string[];
  htmlUrls: string[];
  pagesVisited: number;
}

interface CrawlSessionDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
  robots: RobotsPolicy;
  clock?: PacerClock;
}

type FetchedPage = { kind: "pdf" } | { kind: "html"; html: string } | { kind: "unreachable"; status: number } | { kind: "other" };

/**
 * One discovery run. Sitemaps seed the visited set first; a breadth-first
 * walk from the base URL follows only if neither cap was reached.
 * Page fetches are sequential and paced by the robots crawl delay.
 */
export class CrawlSession {
  private stateValue: CrawlState = "seeding";
  private readonly visited = new Set<string>();
  private readonly enqueued = new Set<string>();
  private readonly visitedSitemaps = new Set<string>();
  private readonly pdfUrls: string[] = [];
  private readonly pdfSet = new Set<string>();
  private readonly htmlUrls: string[] = [];
  private readonly pacer: Pacer;

  constructor(private readonly deps: CrawlSessionDeps) {
    this.pacer = new Pacer(deps.robots.crawlDelay() * 1000, deps.clock);
  }

  get state(): CrawlState {
    return this.stateValue;
  }

  async run(): Promise<CrawlResult> {
    const { config, logger, robots } = this.deps;

    for (const sitemapUrl of robots.sitemapUrls()) {
      await this.seedFromSitemap(sitemapUrl);
    }
    logger.info("crawl_seeding_complete", { visited: this.visited.size, pdfs: this.pdfUrls.length });

    if (this.visited.size < config.maxPages && this.pdfUrls.length < config.maxPdfs) {
      this.stateValue = "crawling";
      await this.breadthFirst();
    }

    this.stateValue = "done";
    if (this.visited.size >= config.maxPages) {
      logger.warn("crawl_max_pages_reached", { maxPages: config.maxPages });
    }
    if (this.pdfUrls.length >= config.maxPdfs) {
      logger.warn("crawl_max_pdfs_reached", { maxPdfs: config.maxPdfs });
    }

    return {
      pdfUrls: this.pdfUrls.slice(0, config.maxPdfs),
      htmlUrls: [...this.htmlUrls],
      pagesVisited: this.visited.size,
    };
  }

  private async seedFromSitemap(sitemapUrl: string): Promise<void> {
    const { config, http, logger } = this.deps;
    if (this.visitedSitemaps.has(sitemapUrl)) {
      return;
    }
    this.visitedSitemaps.add(sitemapUrl);

    let xml: string;
    try {
      xml = await http.getText(sitemapUrl, { timeoutMs: config.requestTimeoutMs, accept: "application/xml,text/xml,*/*" });
    } catch (error) {
      logger.warn("crawl_sitemap_unreachable", { url: sitemapUrl, error: errorMessage(error) });
      return;
    }

    const parsed = parseSitemap(xml);
    for (const pageUrl of parsed.pageUrls) {
      this.recordSitemapEntry(pageUrl);
    }
    for (const nested of parsed.sitemapUrls) {
      await this.seedFromSitemap(nested);
    }
  }

  private recordSitemapEntry(rawUrl: string): void {
    const url = normalizeUrl(rawUrl, this.deps.config.baseUrl);
    if (!url || this.visited.has(url) || this.pdfUrls.length >= this.deps.config.maxPdfs) {
      return;
    }
    this.visited.add(url);
    if (isPdfUrl(url)) {
      if (this.deps.robots.canFetch(url)) {
        this.addPdf(url);
      }
      return;
    }
    this.htmlUrls.push(url);
  }

  private async breadthFirst(): Promise<void> {
    const { config, logger, metrics, robots } = this.deps;
    const start = normalizeUrl(config.baseUrl, config.baseUrl) ?? config.baseUrl;
    const queue: string[] = [start];
    this.enqueued.add(start);

    while (queue.length > 0 && this.visited.size < config.maxPages && this.pdfUrls.length < config.maxPdfs) {
      const url = queue.shift();
      if (url === undefined) {
        break;
      }
      if (this.visited.has(url) || !isSameDomain(url, config.baseUrl)) {
        continue;
      }
      if (!robots.canFetch(url)) {
        logger.debug("crawl_url_disallowed", { url });
        continue;
      }

      this.visited.add(url);
      if (isPdfUrl(url)) {
        this.addPdf(url);
        continue;
      }

      await this.pacer.wait();
      const stopTimer = metrics.startTimer("page_fetch_ms");
      let page: FetchedPage;
      try {
        page = await this.fetchPage(url);
      } catch (error) {
        logger.debug("crawl_page_unreachable", { url, durationMs: stopTimer(), error: errorMessage(error) });
        continue;
      }
      metrics.incrementCounter("pages_crawled", 1);
      const durationMs = stopTimer();

      if (page.kind === "unreachable") {
        logger.debug("crawl_page_unreachable", { url, durationMs, status: page.status });
        continue;
      }
      if (page.kind === "pdf") {
        this.addPdf(url);
        continue;
      }
      if (page.kind === "other") {
        continue;
      }

      this.htmlUrls.push(url);
      let enqueuedOnPage = 0;
      for (const link of extractLinksFromHtml(page.html, url)) {
        if (this.visited.has(link) || this.enqueued.has(link)) {
          continue;
        }
        if (!isSameDomain(link, config.baseUrl) || hasSkippedExtension(link)) {
          continue;
        }
        this.enqueued.add(link);
        queue.push(link);
        enqueuedOnPage += 1;
      }
      logger.debug("crawl_page_complete", { pageUrl: url, durationMs, enqueuedOnPage });
    }
  }

  private fetchPage(url: string): Promise<FetchedPage> {
    const { config, http } = this.deps;
    return http.request(
      url,
      { timeoutMs: config.requestTimeoutMs, accept: "text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8" },
      async (response): Promise<FetchedPage> => {
        if (response.status !== 200) {
          await response.body?.cancel().catch(() => undefined);
          return { kind: "unreachable", status: response.status };
        }
        const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
        if (contentType.includes("pdf")) {
          await response.body?.cancel().catch(() => undefined);
          return { kind: "pdf" };
        }
        if (!contentType.includes("html")) {
          await response.body?.cancel().catch(() => undefined);
          return { kind: "other" };
        }
        return { kind: "html", html: await response.text() };
      },
    );
  }

  private addPdf(url: string): void {
    if (this.pdfSet.has(url)) {
      return;
    }
    this.pdfSet.add(url);
    this.pdfUrls.push(url);
    this.deps.metrics.incrementCounter("pdfs_discovered", 1);
  }
}

interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store: CatalogStore;
  http: HttpClient;
  runId: string;
  clock?: PacerClock;
}

/** Loads robots.txt, runs a fresh session and records its output in the catalog. */
export async function runCrawler(deps: CrawlDependencies): Promise<CrawlResult> {
  const { config, logger, metrics, store, http, runId } = deps;
  const robots = config.respectRobots
    ? await RobotsPolicy.load(config.baseUrl, {
        http,
        minDelaySeconds: config.crawlDelaySeconds,
        timeoutMs: config.requestTimeoutMs,
        logger,
      })
    : RobotsPolicy.unloaded(http.userAgent, config.crawlDelaySeconds);

  logger.info("crawl_start", {
    url: config.baseUrl,
    maxPages: config.maxPages,
    maxPdfs: config.maxPdfs,
    crawlDelaySeconds: robots.crawlDelay(),
  });

  const session = new CrawlSession({ config, logger, metrics, http, robots, clock: deps.clock });
  const result = await session.run();

  const seenAt = new Date().toISOString();
  for (const url of result.pdfUrls) {
    await store.upsertDiscovered(url, "pdf", runId, seenAt);
  }
  for (const url of result.htmlUrls) {
    await store.upsertDiscovered(url, "html", runId, seenAt);
  }

  logger.info("crawl_finished", {
    pagesVisited: result.pagesVisited,
    pdfs: result.pdfUrls.length,
    htmlPages: result.htmlUrls.length,
  });
  return result;
}
