import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DiscoveredKind, DocumentRecord, TextEngineName, TextRecord, ValueCacheEntry } from "../types";
import { CatalogStats, CatalogStore, InsertOutcome, NewDocument } from "./types";

type DocumentRow = {
  hash: string;
  url: string;
  original_name: string;
  local_path: string;
  detected_year: number | null;
  downloaded_at: string;
  content_type: string;
  size_bytes: number;
};

type TextRow = {
  hash: string;
  text_path: string;
  extracted_at: string;
  extractor: string;
  pages: number;
  text_len: number;
};

type ValueCacheRow = {
  key: string;
  result_path: string;
  created_at: string;
  model: string;
};

const DOCUMENT_COLUMNS = "hash, url, original_name, local_path, detected_year, downloaded_at, content_type, size_bytes";

function toEngineName(value: string): TextEngineName {
  if (value === "pdf-parse" || value === "pdfjs") {
    return value;
  }
  throw new Error(`Unknown text engine in catalog: ${value}`);
}

export class SqliteStore implements CatalogStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({ runId, status, finishedAt });
  }

  async upsertDiscovered(url: string, kind: DiscoveredKind, runId: string, seenAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO discovered (url, kind, first_seen_at, last_seen_at, run_id)
        VALUES (@url, @kind, @seenAt, @seenAt, @runId)
        ON CONFLICT(url) DO UPDATE SET
          kind = excluded.kind,
          last_seen_at = excluded.last_seen_at,
          run_id = excluded.run_id
      `,
      )
      .run({ url, kind, seenAt, runId });
  }

  async listDiscovered(kind: DiscoveredKind): Promise<string[]> {
    const rows = this.db
      .prepare("SELECT url FROM discovered WHERE kind = ? ORDER BY first_seen_at ASC, rowid ASC")
      .all(kind) as Array<{ url: string }>;
    return rows.map((row) => row.url);
  }

  async findByUrl(url: string): Promise<DocumentRecord | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT p.hash, p.url, p.original_name, p.local_path, p.detected_year,
               p.downloaded_at, p.content_type, p.size_bytes
        FROM pdf_urls u
        JOIN pdfs p ON p.hash = u.hash
        WHERE u.url = ?
      `,
      )
      .get(url) as DocumentRow | undefined;
    return row ? this.toDocument(row) : undefined;
  }

  async findByHash(hash: string): Promise<DocumentRecord | undefined> {
    return this.selectByHash(hash);
  }

  async insertDocument(record: NewDocument): Promise<InsertOutcome> {
    const insert = this.db.prepare(`
      INSERT INTO pdfs (${DOCUMENT_COLUMNS})
      VALUES (@hash, @url, @originalName, @localPath, @detectedYear, @downloadedAt, @contentType, @sizeBytes)
      ON CONFLICT(hash) DO NOTHING
    `);

    const tx = this.db.transaction((doc: NewDocument): boolean => {
      const result = insert.run({
        hash: doc.hash,
        url: doc.url,
        originalName: doc.originalName,
        localPath: doc.localPath,
        detectedYear: doc.detectedYear,
        downloadedAt: doc.downloadedAt,
        contentType: doc.contentType,
        sizeBytes: doc.sizeBytes,
      });
      this.upsertAlias(doc.hash, doc.url, doc.originalName, doc.contentType, doc.downloadedAt);
      return result.changes > 0;
    });

    const inserted = tx(record);
    const stored = this.selectByHash(record.hash);
    if (!stored) {
      throw new Error(`Catalog lost document ${record.hash} right after inserting it`);
    }
    return { inserted, record: stored };
  }

  async addUrlAlias(hash: string, url: string, originalName: string, contentType: string): Promise<void> {
    this.upsertAlias(hash, url, originalName, contentType, new Date().toISOString());
  }

  async assignDocumentYear(hash: string, year: number, localPath: string): Promise<boolean> {
    const result = this.db
      .prepare("UPDATE pdfs SET detected_year = ?, local_path = ? WHERE hash = ? AND detected_year IS NULL")
      .run(year, localPath, hash);
    return result.changes === 1;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    const rows = this.db
      .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM pdfs ORDER BY downloaded_at ASC, rowid ASC`)
      .all() as DocumentRow[];
    return rows.map((row) => this.toDocument(row));
  }

  async listDocumentsByYear(year: number | null): Promise<DocumentRecord[]> {
    const rows = (
      year === null
        ? this.db
            .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM pdfs WHERE detected_year IS NULL ORDER BY downloaded_at ASC, rowid ASC`)
            .all()
        : this.db
            .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM pdfs WHERE detected_year = ? ORDER BY downloaded_at ASC, rowid ASC`)
            .all(year)
    ) as DocumentRow[];
    return rows.map((row) => this.toDocument(row));
  }

  async getText(hash: string): Promise<TextRecord | undefined> {
    const row = this.db
      .prepare("SELECT hash, text_path, extracted_at, extractor, pages, text_len FROM texts WHERE hash = ?")
      .get(hash) as TextRow | undefined;
    if (!row) {
      return undefined;
    }
    return {
      hash: row.hash,
      textPath: row.text_path,
      engine: toEngineName(row.extractor),
      pages: row.pages,
      textLength: row.text_len,
      extractedAt: row.extracted_at,
    };
  }

  async putText(record: TextRecord): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO texts (hash, text_path, extracted_at, extractor, pages, text_len)
        VALUES (@hash, @textPath, @extractedAt, @engine, @pages, @textLength)
        ON CONFLICT(hash) DO NOTHING
      `,
      )
      .run({
        hash: record.hash,
        textPath: record.textPath,
        extractedAt: record.extractedAt,
        engine: record.engine,
        pages: record.pages,
        textLength: record.textLength,
      });
  }

  async getValueCache(key: string): Promise<ValueCacheEntry | undefined> {
    const row = this.db
      .prepare("SELECT key, result_path, created_at, model FROM value_cache WHERE key = ?")
      .get(key) as ValueCacheRow | undefined;
    if (!row) {
      return undefined;
    }
    return { key: row.key, resultPath: row.result_path, createdAt: row.created_at, model: row.model };
  }

  async putValueCache(entry: ValueCacheEntry): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO value_cache (key, result_path, created_at, model)
        VALUES (@key, @resultPath, @createdAt, @model)
        ON CONFLICT(key) DO UPDATE SET
          result_path = excluded.result_path,
          created_at = excluded.created_at,
          model = excluded.model
      `,
      )
      .run({ key: entry.key, resultPath: entry.resultPath, createdAt: entry.createdAt, model: entry.model });
  }

  async getStats(): Promise<CatalogStats> {
    const byYearRows = this.db
      .prepare("SELECT detected_year AS year, COUNT(*) AS count FROM pdfs GROUP BY detected_year ORDER BY detected_year")
      .all() as Array<{ year: number | null; count: number }>;
    const byYear: Record<string, number> = {};
    for (const row of byYearRows) {
      byYear[row.year === null ? "unknown" : String(row.year)] = row.count;
    }

    return {
      documents: this.count("pdfs"),
      urls: this.count("pdf_urls"),
      texts: this.count("texts"),
      valueCache: this.count("value_cache"),
      discoveredPdfs: this.count("discovered", "kind = 'pdf'"),
      discoveredHtml: this.count("discovered", "kind = 'html'"),
      byYear,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private selectByHash(hash: string): DocumentRecord | undefined {
    const row = this.db.prepare(`SELECT ${DOCUMENT_COLUMNS} FROM pdfs WHERE hash = ?`).get(hash) as DocumentRow | undefined;
    return row ? this.toDocument(row) : undefined;
  }

  private upsertAlias(hash: string, url: string, originalName: string, contentType: string, addedAt: string): void {
    this.db
      .prepare(
        `
        INSERT INTO pdf_urls (url, hash, original_name, content_type, added_at)
        VALUES (@url, @hash, @originalName, @contentType, @addedAt)
        ON CONFLICT(url) DO UPDATE SET
          hash = excluded.hash,
          original_name = excluded.original_name,
          content_type = excluded.content_type
      `,
      )
      .run({ url, hash, originalName, contentType, addedAt });
  }

  private toDocument(row: DocumentRow): DocumentRecord {
    const aliases = this.db
      .prepare("SELECT url FROM pdf_urls WHERE hash = ? ORDER BY added_at ASC, rowid ASC")
      .all(row.hash) as Array<{ url: string }>;
    const urls = [row.url, ...aliases.map((alias) => alias.url).filter((url) => url !== row.url)];

    return {
      hash: row.hash,
      url: row.url,
      urls,
      originalName: row.original_name,
      localPath: row.local_path,
      detectedYear: row.detected_year,
      contentType: row.content_type,
      sizeBytes: row.size_bytes,
      downloadedAt: row.downloaded_at,
    };
  }

  private count(table: string, whereClause = "1 = 1"): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM ${table} WHERE ${whereClause}`).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pdfs (
        hash TEXT PRIMARY KEY,
        url TEXT NOT NULL,
        original_name TEXT NOT NULL,
        local_path TEXT NOT NULL,
        detected_year INTEGER NULL,
        downloaded_at TEXT NOT NULL,
        content_type TEXT NOT NULL,
        size_bytes INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS pdf_urls (
        url TEXT PRIMARY KEY,
        hash TEXT NOT NULL REFERENCES pdfs(hash),
        original_name TEXT NOT NULL,
        content_type TEXT NOT NULL,
        added_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS texts (
        hash TEXT PRIMARY KEY REFERENCES pdfs(hash),
        text_path TEXT NOT NULL,
        extracted_at TEXT NOT NULL,
        extractor TEXT NOT NULL,
        pages INTEGER NOT NULL,
        text_len INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS value_cache (
        key TEXT PRIMARY KEY,
        result_path TEXT NOT NULL,
        created_at TEXT NOT NULL,
        model TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS discovered (
        url TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        first_seen_at TEXT NOT NULL,
        last_seen_at TEXT NOT NULL,
        run_id TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pdfs_url ON pdfs(url);
      CREATE INDEX IF NOT EXISTS idx_pdfs_year ON pdfs(detected_year);
      CREATE INDEX IF NOT EXISTS idx_pdf_urls_hash ON pdf_urls(hash);
      CREATE INDEX IF NOT EXISTS idx_discovered_kind ON discovered(kind);
    `);
  }
}
