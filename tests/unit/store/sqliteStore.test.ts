import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NewDocument, SqliteStore } from "../../../src/store";
import { TextRecord } from "../../../src/types";

function makeDocument(overrides: Partial<NewDocument> = {}): NewDocument {
  return {
    hash: "a".repeat(40),
    url: "https://comune.example.it/docs/bilancio-2022.pdf",
    originalName: "bilancio-2022.pdf",
    localPath: "/data/testville/2022/pdf/aaaaaaaa_bilancio-2022.pdf",
    detectedYear: 2022,
    contentType: "application/pdf",
    sizeBytes: 1024,
    downloadedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  it("inserts a document with its URL as the canonical alias", async () => {
    const outcome = await store.insertDocument(makeDocument());

    expect(outcome.inserted).toBe(true);
    expect(outcome.record).toEqual({ ...makeDocument(), urls: ["https://comune.example.it/docs/bilancio-2022.pdf"] });
    expect((await store.findByUrl("https://comune.example.it/docs/bilancio-2022.pdf"))?.hash).toBe("a".repeat(40));
  });

  it("keeps the first record when the same bytes arrive from another URL", async () => {
    await store.insertDocument(makeDocument());
    const second = await store.insertDocument(
      makeDocument({
        url: "https://comune.example.it/mirror/copia.pdf",
        originalName: "copia.pdf",
        localPath: "/data/testville/2022/pdf/aaaaaaaa_copia.pdf",
        downloadedAt: "2024-01-02T00:00:00.000Z",
      }),
    );

    expect(second.inserted).toBe(false);
    expect(second.record.localPath).toBe("/data/testville/2022/pdf/aaaaaaaa_bilancio-2022.pdf");
    expect(second.record.urls).toEqual([
      "https://comune.example.it/docs/bilancio-2022.pdf",
      "https://comune.example.it/mirror/copia.pdf",
    ]);
    expect((await store.findByUrl("https://comune.example.it/mirror/copia.pdf"))?.hash).toBe("a".repeat(40));
    expect(await store.listDocuments()).toHaveLength(1);
  });

  it("adds aliases and updates years", async () => {
    await store.insertDocument(makeDocument({ detectedYear: null }));
    await store.addUrlAlias("a".repeat(40), "https://comune.example.it/alias.pdf", "alias.pdf", "application/pdf");

    expect(await store.listDocumentsByYear(null)).toHaveLength(1);
    expect(await store.assignDocumentYear("a".repeat(40), 2021, "/data/testville/2021/pdf/aaaaaaaa_bilancio-2022.pdf")).toBe(true);
    expect(await store.listDocumentsByYear(null)).toHaveLength(0);

    const [doc] = await store.listDocumentsByYear(2021);
    expect(doc.urls).toEqual(["https://comune.example.it/docs/bilancio-2022.pdf", "https://comune.example.it/alias.pdf"]);
    expect(doc.localPath).toBe("/data/testville/2021/pdf/aaaaaaaa_bilancio-2022.pdf");
  });

  it("assigns a year only once", async () => {
    await store.insertDocument(makeDocument({ detectedYear: null }));
    await store.assignDocumentYear("a".repeat(40), 2021, "/data/testville/2021/pdf/a.pdf");

    expect(await store.assignDocumentYear("a".repeat(40), 2019, "/data/testville/2019/pdf/a.pdf")).toBe(false);
    expect((await store.findByHash("a".repeat(40)))?.detectedYear).toBe(2021);
    expect(await store.assignDocumentYear("a".repeat(40).replace("a", "b"), 2021, "/x.pdf")).toBe(false);
  });

  it("keeps the first text record for a hash", async () => {
    await store.insertDocument(makeDocument());
    const record: TextRecord = {
      hash: "a".repeat(40),
      textPath: "/data/testville/2022/text/a.txt",
      engine: "pdf-parse",
      pages: 3,
      textLength: 120,
      extractedAt: "2024-01-01T00:00:00.000Z",
    };
    await store.putText(record);
    await store.putText({ ...record, engine: "pdfjs", pages: 4 });

    expect(await store.getText("a".repeat(40))).toEqual(record);
    expect(await store.getText("b".repeat(40))).toBeUndefined();
  });

  it("stores value cache pointers", async () => {
    const entry = { key: "k1", resultPath: "/tmp/k1.json", createdAt: "2024-01-01T00:00:00.000Z", model: "test-model" };
    await store.putValueCache(entry);
    expect(await store.getValueCache("k1")).toEqual(entry);
    expect(await store.getValueCache("k2")).toBeUndefined();
  });

  it("tracks discovered URLs by kind in first-seen order", async () => {
    await store.upsertDiscovered("https://comune.example.it/b.pdf", "pdf", "run_1", "2024-01-01T00:00:00.000Z");
    await store.upsertDiscovered("https://comune.example.it/a.pdf", "pdf", "run_1", "2024-01-01T00:00:01.000Z");
    await store.upsertDiscovered("https://comune.example.it/", "html", "run_1", "2024-01-01T00:00:01.000Z");
    await store.upsertDiscovered("https://comune.example.it/b.pdf", "pdf", "run_2", "2024-01-02T00:00:00.000Z");

    expect(await store.listDiscovered("pdf")).toEqual(["https://comune.example.it/b.pdf", "https://comune.example.it/a.pdf"]);
    expect(await store.listDiscovered("html")).toEqual(["https://comune.example.it/"]);
  });

  it("summarizes the catalog", async () => {
    await store.insertDocument(makeDocument());
    await store.insertDocument(makeDocument({ hash: "b".repeat(40), url: "https://comune.example.it/x.pdf", detectedYear: null }));
    await store.upsertDiscovered("https://comune.example.it/x.pdf", "pdf", "run_1", "2024-01-01T00:00:00.000Z");
    await store.startRun("run_1", "2024-01-01T00:00:00.000Z");
    await store.finishRun("run_1", "completed", "2024-01-01T00:10:00.000Z");

    expect(await store.getStats()).toEqual({
      documents: 2,
      urls: 2,
      texts: 0,
      valueCache: 0,
      discoveredPdfs: 1,
      discoveredHtml: 0,
      byYear: { "2022": 1, unknown: 1 },
    });
  });
});
