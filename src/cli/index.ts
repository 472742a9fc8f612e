import { assertRunnable, loadConfig } from "../config";
import {
  CommandContext,
  runCrawl,
  runDownload,
  runExtract,
  runFillCommand,
  runIndex,
  runPipeline,
  runSearch,
  runStatus,
} from "../core/commands";
import { HttpClient } from "../core/http";
import { StorageLayout } from "../core/paths";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "crawl" | "download" | "extract" | "index" | "search" | "fill" | "run" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  force: boolean;
  ignoreHttpsErrors: boolean;
  queries: string[];
  year?: number;
  topK?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  corpus-extractor <command> [options]

Commands:
  crawl      Discover PDF and HTML URLs (sitemaps, then breadth-first)
  download   Fetch discovered PDFs into the content-addressed store
  extract    Extract and cache text for every stored PDF
  index      Rebuild and persist the lexical index
  search     Query the index (--query, repeatable)
  fill       Resolve indicator values for the configured years
  run        crawl, download, extract, index, then fill when indicators are configured
  status     Print catalog statistics

Options:
  --config <path>        Optional path to JSON config file
  --force                Rebuild the index before search/fill
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --query <text>         Search query; repeat for multi-query search
  --year <yyyy>          Restrict search results to one year
  --top-k <n>            Number of search results
  -h, --help             Show this help
`;

const COMMANDS: readonly CommandName[] = ["crawl", "download", "extract", "index", "search", "fill", "run", "status"];

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function parseIntOption(argv: string[], flag: string): number | undefined {
  const index = argv.indexOf(flag);
  const raw = index >= 0 ? argv[index + 1] : undefined;
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  const queries: string[] = [];
  argv.forEach((arg, index) => {
    const value = argv[index + 1];
    if (arg === "--query" && value) {
      queries.push(value);
    }
  });

  return {
    command,
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    queries,
    year: parseIntOption(argv, "--year"),
    topK: parseIntOption(argv, "--top-k"),
    configPath,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if (parsed.command === "search" && parsed.queries.length === 0) {
    console.error("search requires at least one --query");
    return 1;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.command === "crawl" || parsed.command === "run") {
    assertRunnable(config);
  } else if (!config.municipality) {
    throw new Error("municipality is required (config file or MUNICIPALITY)");
  }

  const runId = createRunId(config.municipality);
  const layout = new StorageLayout(config.dataDir, config.municipality);
  const catalog = createStore(layout);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(process.env.LOG_LEVEL) });
  const http = new HttpClient({
    userAgent: config.userAgent,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    maxAttempts: config.maxHttpAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
  });
  const context: CommandContext = { runId, config, layout, catalog, sink, logger, metrics, http };

  logger.info("command_start", {
    command: parsed.command,
    force: parsed.force,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    municipality: config.municipality,
    years: config.years,
  });

  try {
    switch (parsed.command) {
      case "crawl":
        await runCrawl({ ...context, logger: logger.child("crawl") });
        break;
      case "download":
        await runDownload({ ...context, logger: logger.child("download") });
        break;
      case "extract":
        await runExtract({ ...context, logger: logger.child("extract") });
        break;
      case "index":
        await runIndex({ ...context, logger: logger.child("index") });
        break;
      case "search":
        await runSearch(
          { ...context, logger: logger.child("search") },
          { queries: parsed.queries, year: parsed.year, topK: parsed.topK, force: parsed.force },
        );
        break;
      case "fill":
        await runFillCommand({ ...context, logger: logger.child("fill") }, parsed.force);
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await catalog.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
