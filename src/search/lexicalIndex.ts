import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { Chunk } from "../types";
import { Bm25Model, DEFAULT_BM25_PARAMETERS } from "./bm25";
import { tokenize } from "./tokenize";

export const INDEX_SCHEMA_VERSION = 2;

export const MODEL_FILE = "model.json";
export const CHUNKS_FILE = "chunks.json";
export const CORPUS_FILE = "corpus.json";

const chunkV2Schema = z.object({
  hash: z.string().min(1),
  pageNo: z.number().int().min(0),
  year: z.number().int().nullable(),
  url: z.string(),
  filename: z.string(),
  text: z.string(),
});

const chunkV1Schema = chunkV2Schema.omit({ pageNo: true });

const chunksFileSchema = z.union([
  z.object({ schemaVersion: z.literal(2), chunks: z.array(chunkV2Schema) }),
  // v1 wrote a bare list with no page numbers.
  z.array(chunkV1Schema),
]);

const corpusFileSchema = z.array(z.array(z.string()));

const modelFileSchema = z.object({
  k1: z.number(),
  b: z.number(),
  epsilon: z.number(),
  avgdl: z.number(),
  docLengths: z.array(z.number().int().min(0)),
  docFreqs: z.array(z.array(z.tuple([z.string(), z.number()]))),
  idf: z.array(z.tuple([z.string(), z.number()])),
});

type ChunksFile = z.infer<typeof chunksFileSchema>;

/** v1 chunks become whole-document chunks (`pageNo` 0). */
export function migrateChunks(file: ChunksFile): Chunk[] {
  if (Array.isArray(file)) {
    return file.map((chunk) => ({ ...chunk, pageNo: 0 }));
  }
  return file.chunks;
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, JSON.stringify(value), "utf-8");
  await fs.promises.rename(tempPath, filePath);
}

/**
 * BM25 index over chunks. `chunks[i]` and `corpus[i]` always describe the
 * same chunk; scores are looked up by position.
 *
 * There is no incremental update: `add` re-tokenizes the accumulated chunk
 * list and rebuilds the model, so its cost grows with the whole index.
 */
export class LexicalIndex {
  private chunks: Chunk[] = [];
  private corpus: string[][] = [];
  private model: Bm25Model = Bm25Model.build([]);

  constructor(private readonly indexDir: string) {}

  get size(): number {
    return this.chunks.length;
  }

  getChunks(): readonly Chunk[] {
    return this.chunks;
  }

  build(chunks: Chunk[]): void {
    const nextChunks = [...chunks];
    const nextCorpus = nextChunks.map((chunk) => tokenize(chunk.text));
    this.model = Bm25Model.build(nextCorpus, DEFAULT_BM25_PARAMETERS);
    this.chunks = nextChunks;
    this.corpus = nextCorpus;
  }

  add(chunks: Chunk[]): void {
    this.build([...this.chunks, ...chunks]);
  }

  /** Every chunk that shares at least one token with the query, with its score, in index order. */
  score(query: string): Array<{ chunk: Chunk; score: number }> {
    const tokens = tokenize(query);
    if (tokens.length === 0 || this.chunks.length === 0) {
      return [];
    }
    const scores = this.model.scores(tokens);
    const matched: Array<{ chunk: Chunk; score: number }> = [];
    for (const [index, chunk] of this.chunks.entries()) {
      if (this.model.matches(index, tokens)) {
        matched.push({ chunk, score: scores[index] });
      }
    }
    return matched;
  }

  async persist(): Promise<void> {
    await fs.promises.mkdir(this.indexDir, { recursive: true });
    await writeJsonAtomic(path.join(this.indexDir, MODEL_FILE), this.model.toState());
    await writeJsonAtomic(path.join(this.indexDir, CHUNKS_FILE), {
      schemaVersion: INDEX_SCHEMA_VERSION,
      chunks: this.chunks,
    });
    await writeJsonAtomic(path.join(this.indexDir, CORPUS_FILE), this.corpus);
  }

  /**
   * Loads all three artifacts or nothing. Returns false when any is missing,
   * unreadable, invalid or misaligned; the in-memory index is then untouched.
   */
  async load(): Promise<boolean> {
    let rawModel: unknown;
    let rawChunks: unknown;
    let rawCorpus: unknown;
    try {
      rawModel = await readJson(path.join(this.indexDir, MODEL_FILE));
      rawChunks = await readJson(path.join(this.indexDir, CHUNKS_FILE));
      rawCorpus = await readJson(path.join(this.indexDir, CORPUS_FILE));
    } catch {
      return false;
    }

    const model = modelFileSchema.safeParse(rawModel);
    const chunksFile = chunksFileSchema.safeParse(rawChunks);
    const corpus = corpusFileSchema.safeParse(rawCorpus);
    if (!model.success || !chunksFile.success || !corpus.success) {
      return false;
    }

    const chunks = migrateChunks(chunksFile.data);
    if (
      chunks.length !== corpus.data.length ||
      model.data.docLengths.length !== chunks.length ||
      model.data.docFreqs.length !== chunks.length
    ) {
      return false;
    }

    this.model = Bm25Model.fromState(model.data);
    this.chunks = chunks;
    this.corpus = corpus.data;
    return true;
  }
}
