import fs from "node:fs";
import path from "node:path";
import { StorageLayout } from "../core/paths";
import { CatalogStore } from "../store";
import { DocumentRecord, TextEngineName, TextRecord } from "../types";
import { ExtractionMode, runEngineChain, TextEngine } from "./engines";

export interface WholeText {
  text: string;
  pageCount: number;
  engine: TextEngineName;
}

export interface PagedText {
  pages: string[];
  pageCount: number;
  engine: TextEngineName;
}

export interface EnsureResult {
  cached: boolean;
  record: TextRecord;
}

interface TextExtractorDeps {
  catalog: CatalogStore;
  layout: StorageLayout;
  engines: TextEngine[];
  readFile?: (filePath: string) => Promise<Buffer>;
}

const PAGE_SEPARATOR = "\n\n";

/**
 * Text for catalogued documents, cached on disk by content hash:
 * `{hash}.txt` for the whole document and `{hash}_page_{n}.txt` per page.
 * The `texts` row is the pointer; a missing file is a cache miss.
 */
export class TextExtractor {
  private readonly catalog: CatalogStore;
  private readonly layout: StorageLayout;
  private readonly engines: TextEngine[];
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps: TextExtractorDeps) {
    this.catalog = deps.catalog;
    this.layout = deps.layout;
    this.engines = deps.engines;
    this.readFile = deps.readFile ?? fs.promises.readFile;
  }

  textPath(doc: DocumentRecord): string {
    return path.join(this.layout.textDir(doc.detectedYear), `${doc.hash}.txt`);
  }

  pagePath(doc: DocumentRecord, pageNo: number): string {
    return path.join(this.layout.textDir(doc.detectedYear), `${doc.hash}_page_${pageNo}.txt`);
  }

  async extract(doc: DocumentRecord): Promise<WholeText> {
    const record = await this.catalog.getText(doc.hash);
    if (record && fs.existsSync(record.textPath)) {
      const text = await fs.promises.readFile(record.textPath, "utf-8");
      return { text, pageCount: record.pages, engine: record.engine };
    }
    const fresh = await this.extractAndCache(doc, "text");
    return { text: fresh.pages.join(PAGE_SEPARATOR), pageCount: fresh.pageCount, engine: fresh.engine };
  }

  async extractPerPage(doc: DocumentRecord): Promise<PagedText> {
    const cached = await this.readCachedPages(doc);
    if (cached) {
      return cached;
    }
    return this.extractAndCache(doc, "pages");
  }

  /** Per-page text from cache only; undefined when any expected page file is absent. */
  async readCachedPages(doc: DocumentRecord): Promise<PagedText | undefined> {
    const record = await this.catalog.getText(doc.hash);
    if (!record) {
      return undefined;
    }
    const pages: string[] = [];
    for (let pageNo = 1; pageNo <= record.pages; pageNo += 1) {
      const pagePath = this.pagePath(doc, pageNo);
      if (!fs.existsSync(pagePath)) {
        return undefined;
      }
      pages.push(await fs.promises.readFile(pagePath, "utf-8"));
    }
    return { pages, pageCount: record.pages, engine: record.engine };
  }

  /** Extracts unless both caches are intact. */
  async ensure(doc: DocumentRecord): Promise<EnsureResult> {
    const record = await this.catalog.getText(doc.hash);
    if (record && fs.existsSync(record.textPath) && (await this.readCachedPages(doc))) {
      return { cached: true, record };
    }
    await this.extractAndCache(doc, "pages");
    const stored = await this.catalog.getText(doc.hash);
    if (!stored) {
      throw new Error(`Text record for ${doc.hash} missing after extraction`);
    }
    return { cached: false, record: stored };
  }

  private async extractAndCache(doc: DocumentRecord, mode: ExtractionMode): Promise<PagedText> {
    const data = await this.readFile(doc.localPath);
    const result = await runEngineChain(this.engines, data, { mode, label: doc.localPath });
    const text = result.pages.join(PAGE_SEPARATOR);

    const textPath = this.textPath(doc);
    await fs.promises.mkdir(path.dirname(textPath), { recursive: true });
    await fs.promises.writeFile(textPath, text, "utf-8");
    for (const [index, pageText] of result.pages.entries()) {
      await fs.promises.writeFile(this.pagePath(doc, index + 1), pageText, "utf-8");
    }

    await this.catalog.putText({
      hash: doc.hash,
      textPath,
      engine: result.engine,
      pages: result.pages.length,
      textLength: text.length,
      extractedAt: new Date().toISOString(),
    });

    return { pages: result.pages, pageCount: result.pages.length, engine: result.engine };
  }
}
