import { Logger } from "../observability";
import { Sink } from "../sink";
import { QueryRecord, SourceRecord } from "../types";
import { IndicatorResolver, IndicatorSpec, NOT_FOUND_METHOD } from "./resolver";

interface FillDeps {
  resolver: IndicatorResolver;
  sink: Sink;
  logger: Logger;
  indicators: IndicatorSpec[];
  years: number[];
}

export interface FillSummary {
  cells: number;
  found: number;
  notFound: number;
  byMethod: Record<string, number>;
}

/** Resolves every indicator × year and publishes the query and source rows. */
export async function runFill(deps: FillDeps): Promise<FillSummary> {
  const { resolver, sink, logger, indicators, years } = deps;
  const queries: QueryRecord[] = [];
  const sources: SourceRecord[] = [];
  const byMethod: Record<string, number> = {};

  logger.info("fill_start", { indicators: indicators.length, years });

  for (const spec of indicators) {
    for (const year of years) {
      const resolution = await resolver.resolve(spec, year);
      queries.push(resolution.query);
      sources.push(resolution.source);
      byMethod[resolution.source.method] = (byMethod[resolution.source.method] ?? 0) + 1;
    }
  }

  await sink.publishQueries(queries);
  await sink.publishSources(sources);

  const notFound = sources.filter((source) => source.method === NOT_FOUND_METHOD).length;
  const summary: FillSummary = { cells: sources.length, found: sources.length - notFound, notFound, byMethod };
  logger.info("fill_finished", { ...summary });
  return summary;
}
