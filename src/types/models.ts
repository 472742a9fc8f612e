export interface DocumentRecord {
  hash: string;
  /** Canonical (first) source URL. */
  url: string;
  /** Every URL known to serve these bytes, canonical first. */
  urls: string[];
  originalName: string;
  localPath: string;
  detectedYear: number | null;
  contentType: string;
  sizeBytes: number;
  downloadedAt: string;
}

export type TextEngineName = "pdf-parse" | "pdfjs";

export interface TextRecord {
  hash: string;
  textPath: string;
  engine: TextEngineName;
  pages: number;
  textLength: number;
  extractedAt: string;
}

export interface Chunk {
  hash: string;
  /** 0 for a whole-document chunk, otherwise the 1-based page number. */
  pageNo: number;
  year: number | null;
  url: string;
  filename: string;
  text: string;
}

export interface ScoredChunk extends Chunk {
  score: number;
}

export interface ExtractionCandidate {
  value: number;
  snippet: string;
  offset: number;
  score: number;
}

export interface ValueCacheEntry {
  key: string;
  resultPath: string;
  createdAt: string;
  model: string;
}

export type StoreOutcome = "downloaded" | "cached" | "deduplicated" | "failed";

export interface StoreResult {
  url: string;
  outcome: StoreOutcome;
  hash?: string;
  localPath?: string;
  detectedYear?: number | null;
  error?: string;
}

export type DiscoveredKind = "pdf" | "html";

/** Row of the "sources" table handed to reporting. */
export interface SourceRecord {
  indicator: string;
  year: number;
  value: number | null;
  url: string;
  filename: string;
  page_no: number | null;
  snippet: string;
  confidence: number;
  method: string;
  doc_id: string;
}

/** Row of the "queries" table handed to reporting. */
export interface QueryRecord {
  indicator: string;
  category: string;
  year: number;
  query_1: string;
  query_2: string;
}

export interface StageSummary {
  attempted: number;
  succeeded: number;
  cached: number;
  failed: number;
}

export type ExtractOutcome = "extracted" | "cached" | "failed";

export interface ExtractResult {
  hash: string;
  outcome: ExtractOutcome;
  engine?: TextEngineName;
  pages?: number;
  error?: string;
}
