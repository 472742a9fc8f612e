import fs from "node:fs";
import path from "node:path";
import { ExtractResult, QueryRecord, SourceRecord, StoreResult } from "../types";
import { Sink } from "./types";

/**
 * Appends one JSON object per line under `outputDir`. Stage manifests carry
 * the run id; `sources`/`queries` rows keep the reporting column set as-is.
 */
export class LocalJsonlSink implements Sink {
  private readonly sourcesPath: string;
  private readonly queriesPath: string;
  private readonly downloadsPath: string;
  private readonly extractsPath: string;
  private readonly runId: string;

  constructor(outputDir: string, runId: string) {
    const resolved = path.resolve(outputDir);
    fs.mkdirSync(resolved, { recursive: true });
    this.sourcesPath = path.join(resolved, "sources.jsonl");
    this.queriesPath = path.join(resolved, "queries.jsonl");
    this.downloadsPath = path.join(resolved, "downloads.jsonl");
    this.extractsPath = path.join(resolved, "extracts.jsonl");
    this.runId = runId;
  }

  async publishDownloadResults(results: StoreResult[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  async publishExtractResults(results: ExtractResult[]): Promise<void> {
    await this.appendLines(
      this.extractsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  async publishQueries(records: QueryRecord[]): Promise<void> {
    await this.appendLines(this.queriesPath, records);
  }

  async publishSources(records: SourceRecord[]): Promise<void> {
    await this.appendLines(this.sourcesPath, records);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
