import { AppConfig } from "../config";
import { runCrawler } from "../crawl";
import { ContentStore } from "../download/contentStore";
import { runDownloader } from "../download/downloader";
import { createDefaultEngines, TextEngine } from "../extract/engines";
import { runExtractor } from "../extract/extractor";
import { TextExtractor } from "../extract/textExtractor";
import { Logger, MetricsRegistry } from "../observability";
import { LexicalIndex, openIndex, Retriever, runIndexer } from "../search";
import { Sink } from "../sink";
import { CatalogStore } from "../store";
import { ExternalSource, IndicatorResolver, loadIndicators, runFill } from "../values";
import { createValueModel } from "../values/valueModel";
import { createYearResolver } from "../year/yearResolver";
import { HttpClient } from "./http";
import { StorageLayout } from "./paths";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  layout: StorageLayout;
  catalog: CatalogStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  http: HttpClient;
  engines?: TextEngine[];
  externalSources?: ExternalSource[];
}

export interface SearchCommandOptions {
  queries: string[];
  year?: number;
  topK?: number;
  force: boolean;
}

function engines(ctx: CommandContext): TextEngine[] {
  return ctx.engines ?? createDefaultEngines();
}

function createTextExtractor(ctx: CommandContext): TextExtractor {
  return new TextExtractor({ catalog: ctx.catalog, layout: ctx.layout, engines: engines(ctx) });
}

function indexerDeps(ctx: CommandContext) {
  return {
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    catalog: ctx.catalog,
    textExtractor: createTextExtractor(ctx),
    index: new LexicalIndex(ctx.layout.indexDir),
  };
}

export async function runCrawl(ctx: CommandContext): Promise<void> {
  const result = await runCrawler({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    store: ctx.catalog,
    http: ctx.http,
    runId: ctx.runId,
  });
  ctx.logger.info("crawl_complete", { pdfs: result.pdfUrls.length, htmlPages: result.htmlUrls.length });
}

export async function runDownload(ctx: CommandContext): Promise<void> {
  const contentStore = new ContentStore({
    catalog: ctx.catalog,
    layout: ctx.layout,
    http: ctx.http,
    yearResolver: createYearResolver(engines(ctx), ctx.logger),
    logger: ctx.logger,
    downloadTimeoutMs: ctx.config.downloadTimeoutMs,
  });
  const summary = await runDownloader({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    catalog: ctx.catalog,
    contentStore,
    sink: ctx.sink,
  });
  ctx.logger.info("download_complete", { ...summary });
}

export async function runExtract(ctx: CommandContext): Promise<void> {
  const summary = await runExtractor({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    catalog: ctx.catalog,
    textExtractor: createTextExtractor(ctx),
    sink: ctx.sink,
  });
  ctx.logger.info("extract_complete", { ...summary });
}

export async function runIndex(ctx: CommandContext): Promise<void> {
  const summary = await runIndexer(indexerDeps(ctx));
  ctx.logger.info("index_complete", { ...summary });
}

export async function runSearch(ctx: CommandContext, options: SearchCommandOptions): Promise<void> {
  const deps = indexerDeps(ctx);
  await openIndex(deps, options.force);
  const retriever = new Retriever(deps.index);
  const results = retriever.multiQuerySearch(options.queries, {
    topK: options.topK ?? ctx.config.topK,
    year: options.year,
    minScore: ctx.config.minScore,
  });

  for (const [rank, result] of results.entries()) {
    console.log(
      JSON.stringify({
        rank: rank + 1,
        score: Number(result.score.toFixed(4)),
        hash: result.hash,
        pageNo: result.pageNo,
        year: result.year,
        filename: result.filename,
        url: result.url,
        preview: result.text.replace(/\s+/g, " ").trim().slice(0, 200),
      }),
    );
  }
  ctx.logger.info("search_complete", { queries: options.queries, results: results.length });
}

export async function runFillCommand(ctx: CommandContext, force: boolean): Promise<void> {
  const { config } = ctx;
  if (!config.indicatorsPath) {
    throw new Error("fill requires indicatorsPath (config file or INDICATORS_PATH)");
  }
  if (config.years.length === 0) {
    throw new Error("fill requires at least one year (config file or YEARS)");
  }
  const indicators = loadIndicators(config.indicatorsPath);

  const deps = indexerDeps(ctx);
  await openIndex(deps, force);

  const resolver = new IndicatorResolver({
    retriever: new Retriever(deps.index),
    logger: ctx.logger,
    metrics: ctx.metrics,
    valueModel: createValueModel(config.valueModel, { catalog: ctx.catalog, layout: ctx.layout, logger: ctx.logger }),
    externalSources: config.allowExternal ? ctx.externalSources : undefined,
    options: {
      municipality: config.municipality,
      topK: config.topK,
      minScore: config.minScore,
      contextWindow: config.contextWindow,
      heuristicTopK: config.heuristicTopK,
      modelMaxDocs: config.valueModel.maxDocs,
      modelConfidenceThreshold: config.valueModel.confidenceThreshold,
    },
  });

  const summary = await runFill({ resolver, sink: ctx.sink, logger: ctx.logger, indicators, years: config.years });
  ctx.logger.info("fill_complete", { ...summary });
}

export async function runPipeline(ctx: CommandContext): Promise<void> {
  const startedAt = new Date().toISOString();
  await ctx.catalog.startRun(ctx.runId, startedAt);
  ctx.logger.info("pipeline_start");

  try {
    await runCrawl({ ...ctx, logger: ctx.logger.child("crawl") });
    await runDownload({ ...ctx, logger: ctx.logger.child("download") });
    await runExtract({ ...ctx, logger: ctx.logger.child("extract") });
    await runIndex({ ...ctx, logger: ctx.logger.child("index") });
    if (ctx.config.indicatorsPath) {
      await runFillCommand({ ...ctx, logger: ctx.logger.child("fill") }, false);
    }
    await ctx.catalog.finishRun(ctx.runId, "completed", new Date().toISOString());
    ctx.logger.info("pipeline_complete");
  } catch (error) {
    await ctx.catalog.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  const stats = await ctx.catalog.getStats();
  ctx.logger.info("status_complete", { stats });
}
