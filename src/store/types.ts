import { DiscoveredKind, DocumentRecord, TextRecord, ValueCacheEntry } from "../types";

export interface CatalogStats {
  documents: number;
  urls: number;
  texts: number;
  valueCache: number;
  discoveredPdfs: number;
  discoveredHtml: number;
  /** Document count per partition, `unknown` for unresolved years. */
  byYear: Record<string, number>;
}

export type NewDocument = Omit<DocumentRecord, "urls">;

export interface InsertOutcome {
  /** False when another writer already holds this hash; `record` is then theirs. */
  inserted: boolean;
  record: DocumentRecord;
}

export interface CatalogStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void>;
  upsertDiscovered(url: string, kind: DiscoveredKind, runId: string, seenAt: string): Promise<void>;
  listDiscovered(kind: DiscoveredKind): Promise<string[]>;
  findByUrl(url: string): Promise<DocumentRecord | undefined>;
  findByHash(hash: string): Promise<DocumentRecord | undefined>;
  /** Insert-or-recognize in one transaction; also records `record.url` as an alias. */
  insertDocument(record: NewDocument): Promise<InsertOutcome>;
  addUrlAlias(hash: string, url: string, originalName: string, contentType: string): Promise<void>;
  /** Files a document of unknown year under `year`; false when its year was already set. */
  assignDocumentYear(hash: string, year: number, localPath: string): Promise<boolean>;
  listDocuments(): Promise<DocumentRecord[]>;
  listDocumentsByYear(year: number | null): Promise<DocumentRecord[]>;
  getText(hash: string): Promise<TextRecord | undefined>;
  putText(record: TextRecord): Promise<void>;
  getValueCache(key: string): Promise<ValueCacheEntry | undefined>;
  putValueCache(entry: ValueCacheEntry): Promise<void>;
  getStats(): Promise<CatalogStats>;
  close(): Promise<void>;
}
