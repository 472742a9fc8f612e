import fs from "node:fs";
import { TextExtractor } from "../extract/textExtractor";
import { CatalogStore } from "../store";
import { Chunk, DocumentRecord } from "../types";

interface ChunkSourceDeps {
  catalog: CatalogStore;
  textExtractor: TextExtractor;
  /** Partitions to include; unknown-year documents are always included. Empty means every document. */
  years: number[];
}

async function chunksForDocument(doc: DocumentRecord, deps: ChunkSourceDeps): Promise<Chunk[]> {
  const base = { hash: doc.hash, year: doc.detectedYear, url: doc.url, filename: doc.originalName };

  const paged = await deps.textExtractor.readCachedPages(doc);
  if (paged && paged.pages.some((page) => page.trim().length > 0)) {
    return paged.pages.flatMap((text, index) => (text.trim() ? [{ ...base, pageNo: index + 1, text }] : []));
  }

  const record = await deps.catalog.getText(doc.hash);
  if (!record || !fs.existsSync(record.textPath)) {
    return [];
  }
  const text = await fs.promises.readFile(record.textPath, "utf-8");
  return text.trim() ? [{ ...base, pageNo: 0, text }] : [];
}

/** Page chunks from the text cache; documents with no per-page text fall back to one whole-document chunk. */
export async function buildChunks(deps: ChunkSourceDeps): Promise<Chunk[]> {
  const documents =
    deps.years.length === 0
      ? await deps.catalog.listDocuments()
      : (
          await Promise.all([...deps.years, null].map((year) => deps.catalog.listDocumentsByYear(year)))
        ).flat();

  const chunks: Chunk[] = [];
  for (const doc of documents) {
    chunks.push(...(await chunksForDocument(doc, deps)));
  }
  return chunks;
}
