import fs from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageLayout } from "../../../src/core/paths";
import { TextEngine } from "../../../src/extract/engines";
import { TextExtractor } from "../../../src/extract/textExtractor";
import { MetricsRegistry } from "../../../src/observability";
import { buildChunks, LexicalIndex, openIndex, runIndexer } from "../../../src/search";
import { NewDocument, SqliteStore } from "../../../src/store";
import { makeTempDir, testConfig, testLogger } from "../helpers";

const PAGES: Record<string, string[]> = {
  "/pdf/h1.pdf": ["Spesa corrente 2022", "", "Allegato tecnico"],
  "/pdf/h2.pdf": ["Bilancio 2020"],
  "/pdf/h3.pdf": ["Documento senza data"],
};

const engine: TextEngine = {
  name: "pdf-parse",
  extractPages: async (data) => {
    const pages = PAGES[data.toString()] ?? [];
    return { pages, pageCount: pages.length };
  },
};

function makeDocument(hash: string, detectedYear: number | null, downloadedAt: string): NewDocument {
  return {
    hash,
    url: `https://comune.example.it/docs/${hash}.pdf`,
    originalName: `${hash}.pdf`,
    localPath: `/pdf/${hash}.pdf`,
    detectedYear,
    contentType: "application/pdf",
    sizeBytes: 10,
    downloadedAt,
  };
}

describe("indexing", () => {
  let catalog: SqliteStore;
  let layout: StorageLayout;
  let textExtractor: TextExtractor;

  beforeEach(async () => {
    catalog = new SqliteStore(":memory:");
    layout = new StorageLayout(makeTempDir(), "Testville");
    textExtractor = new TextExtractor({
      catalog,
      layout,
      engines: [engine],
      readFile: async (filePath) => Buffer.from(filePath),
    });
    const documents = [
      makeDocument("h1", 2022, "2024-01-01T00:00:00.000Z"),
      makeDocument("h2", 2020, "2024-01-02T00:00:00.000Z"),
      makeDocument("h3", null, "2024-01-03T00:00:00.000Z"),
    ];
    for (const doc of documents) {
      const { record } = await catalog.insertDocument(doc);
      await textExtractor.ensure(record);
    }
  });

  afterEach(async () => {
    await catalog.close();
  });

  function deps(years: number[]) {
    return {
      config: testConfig({ years }),
      logger: testLogger(),
      metrics: new MetricsRegistry(),
      catalog,
      textExtractor,
      index: new LexicalIndex(layout.indexDir),
    };
  }

  it("chunks non-empty pages of the configured years plus unknown-year documents", async () => {
    const chunks = await buildChunks({ catalog, textExtractor, years: [2022] });
    expect(chunks.map((chunk) => [chunk.hash, chunk.pageNo, chunk.year])).toEqual([
      ["h1", 1, 2022],
      ["h1", 3, 2022],
      ["h3", 1, null],
    ]);
  });

  it("chunks every document when no years are configured", async () => {
    const chunks = await buildChunks({ catalog, textExtractor, years: [] });
    expect(chunks.map((chunk) => chunk.hash)).toEqual(["h1", "h1", "h2", "h3"]);
  });

  it("falls back to a whole-document chunk when page files are gone", async () => {
    const [h2] = await catalog.listDocumentsByYear(2020);
    fs.rmSync(textExtractor.pagePath(h2, 1));

    const chunks = await buildChunks({ catalog, textExtractor, years: [2020] });
    expect(chunks.find((chunk) => chunk.hash === "h2")).toMatchObject({ pageNo: 0, text: "Bilancio 2020" });
  });

  it("persists on build and loads on open unless forced", async () => {
    const built = deps([]);
    expect(await runIndexer(built)).toEqual({ chunks: 4, documents: 3, rebuilt: true });
    expect(built.metrics.getCounter("chunks_indexed")).toBe(4);

    expect(await openIndex(deps([]), false)).toEqual({ chunks: 4, documents: 3, rebuilt: false });
    expect(await openIndex(deps([2022]), true)).toEqual({ chunks: 3, documents: 2, rebuilt: true });
  });

  it("builds on open when nothing was persisted", async () => {
    const opened = deps([]);
    expect(await openIndex(opened, false)).toEqual({ chunks: 4, documents: 3, rebuilt: true });
    expect(opened.index.score("spesa").map(({ chunk }) => chunk.hash)).toEqual(["h1"]);
  });
});
