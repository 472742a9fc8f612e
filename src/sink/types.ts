import { ExtractResult, QueryRecord, SourceRecord, StoreResult } from "../types";

export interface Sink {
  publishDownloadResults(results: StoreResult[]): Promise<void>;
  publishExtractResults(results: ExtractResult[]): Promise<void>;
  publishQueries(records: QueryRecord[]): Promise<void>;
  publishSources(records: SourceRecord[]): Promise<void>;
}
