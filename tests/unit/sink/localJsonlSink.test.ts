import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { LocalJsonlSink } from "../../../src/sink";
import { makeTempDir } from "../helpers";

function readLines(filePath: string): unknown[] {
  return fs
    .readFileSync(filePath, "utf-8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("LocalJsonlSink", () => {
  it("appends stage results with the run id and table rows as-is", async () => {
    const outputDir = path.join(makeTempDir(), "output");
    const sink = new LocalJsonlSink(outputDir, "run_test");

    await sink.publishDownloadResults([{ url: "https://comune.example.it/a.pdf", outcome: "failed", error: "HTTP 404" }]);
    await sink.publishExtractResults([{ hash: "h1", outcome: "extracted", engine: "pdfjs", pages: 2 }]);
    await sink.publishQueries([
      { indicator: "Spesa corrente", category: "financial", year: 2022, query_1: "Spesa corrente 2022 bilancio", query_2: "" },
    ]);
    await sink.publishSources([]);
    await sink.publishDownloadResults([{ url: "https://comune.example.it/b.pdf", outcome: "cached", hash: "h2" }]);

    expect(readLines(path.join(outputDir, "downloads.jsonl"))).toEqual([
      { runId: "run_test", url: "https://comune.example.it/a.pdf", outcome: "failed", error: "HTTP 404" },
      { runId: "run_test", url: "https://comune.example.it/b.pdf", outcome: "cached", hash: "h2" },
    ]);
    expect(readLines(path.join(outputDir, "extracts.jsonl"))).toEqual([
      { runId: "run_test", hash: "h1", outcome: "extracted", engine: "pdfjs", pages: 2 },
    ]);
    expect(readLines(path.join(outputDir, "queries.jsonl"))).toEqual([
      { indicator: "Spesa corrente", category: "financial", year: 2022, query_1: "Spesa corrente 2022 bilancio", query_2: "" },
    ]);
    expect(fs.existsSync(path.join(outputDir, "sources.jsonl"))).toBe(false);
  });
});
