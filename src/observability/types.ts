export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  hash?: string;
  url?: string;
  pageUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "pdfs_discovered"
  | "downloads_ok"
  | "downloads_cached"
  | "downloads_deduplicated"
  | "downloads_failed"
  | "extracts_ok"
  | "extracts_cached"
  | "extracts_failed"
  | "chunks_indexed"
  | "values_found"
  | "values_not_found";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "extract_ms" | "index_build_ms";
