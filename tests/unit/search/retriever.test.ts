import { describe, expect, it } from "vitest";
import { LexicalIndex } from "../../../src/search/lexicalIndex";
import { mergeByBestScore, Retriever } from "../../../src/search/retriever";
import { ScoredChunk } from "../../../src/types";
import { makeTempDir } from "../helpers";
import { chunk, CORPUS } from "./fixtures";

function retriever(): Retriever {
  const index = new LexicalIndex(makeTempDir());
  index.build(CORPUS);
  return new Retriever(index);
}

function scored(hash: string, pageNo: number, score: number): ScoredChunk {
  return { ...chunk(hash, pageNo, 2022, "testo"), score };
}

describe("mergeByBestScore", () => {
  it("keeps each chunk once at its best score", () => {
    const merged = mergeByBestScore([[scored("c", 1, 0.4), scored("a", 1, 0.5)], [scored("c", 1, 0.9), scored("c", 2, 0.1)]], 8);
    expect(merged.map((result) => [result.hash, result.pageNo, result.score])).toEqual([
      ["c", 1, 0.9],
      ["a", 1, 0.5],
      ["c", 2, 0.1],
    ]);
  });

  it("truncates to topK", () => {
    expect(mergeByBestScore([[scored("a", 1, 0.5), scored("b", 1, 0.4)]], 1)).toHaveLength(1);
  });
});

describe("Retriever", () => {
  it("ranks matching chunks best first", () => {
    const results = retriever().search("spesa");
    expect(results.map((result) => result.hash)).toEqual(["h2", "h1"]);
    expect(results[0].score).toBeGreaterThan(results[1].score);
  });

  it("filters by year, dropping unknown-year chunks", () => {
    expect(retriever().search("spesa", { year: 2022 }).map((result) => result.hash)).toEqual(["h1"]);
    expect(retriever().search("rifiuti", { year: 2022 })).toEqual([]);
    expect(retriever().search("rifiuti").map((result) => result.hash)).toEqual(["h3"]);
  });

  it("applies topK and minScore", () => {
    expect(retriever().search("spesa", { topK: 1 })).toHaveLength(1);
    expect(retriever().search("spesa", { minScore: 100 })).toEqual([]);
  });

  it("returns matching chunks of a one-chunk index although their score is negative", () => {
    const index = new LexicalIndex(makeTempDir());
    index.build([chunk("h1", 1, 2022, "spesa corrente bilancio 2022")]);
    const results = new Retriever(index).search("spesa", { minScore: 0 });

    expect(results.map((result) => result.hash)).toEqual(["h1"]);
    expect(results[0].score).toBeLessThan(0);
  });

  it("keeps chunks that all share the query term", () => {
    const index = new LexicalIndex(makeTempDir());
    index.build([chunk("h1", 1, 2022, "spesa corrente"), chunk("h2", 1, 2022, "spesa personale")]);
    const search = new Retriever(index);

    expect(search.search("spesa").map((result) => result.hash)).toEqual(["h1", "h2"]);
    expect(search.multiQuerySearch(["spesa", "spesa corrente"], { year: 2022 }).map((result) => result.hash)).toEqual([
      "h1",
      "h2",
    ]);
  });

  it("merges several queries without duplicates", () => {
    const search = retriever();
    const merged = search.multiQuerySearch(["spesa", "spesa corrente"]);
    const h1 = merged.filter((result) => result.hash === "h1");

    expect(h1).toHaveLength(1);
    expect(h1[0].score).toBe(search.search("spesa corrente")[0].score);
    expect(merged.map((result) => result.hash).sort()).toEqual(["h1", "h2"]);
  });
});
