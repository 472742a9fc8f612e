import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../../src/config";
import { FetchFn, HttpClient } from "../../src/core/http";
import { Logger } from "../../src/observability";
import { Sink } from "../../src/sink";
import { ExtractResult, QueryRecord, SourceRecord, StoreResult } from "../../src/types";

export const BASE_URL = "https://comune.example.it/";

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", minLevel: "error" });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "corpus-test-"));
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: BASE_URL,
    municipality: "Testville",
    crawlDelaySeconds: 0,
    retryBaseDelayMs: 0,
    ...overrides,
  };
}

export type Route = (init?: RequestInit) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

/** In-process fetch: every request is recorded; unknown URLs answer 404. */
export function fakeFetch(routes: Record<string, Route>): { fetchFn: FetchFn; calls: string[] } {
  const calls: string[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const url = requestUrl(input);
    calls.push(url);
    const route = routes[url];
    return route ? route(init) : new Response("not found", { status: 404 });
  };
  return { fetchFn, calls };
}

export function html(body: string): Response {
  return new Response(`<!doctype html><html><body>${body}</body></html>`, {
    status: 200,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

export function xml(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "application/xml" } });
}

export function text(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "text/plain" } });
}

export function pdf(bytes: Buffer): Response {
  return new Response(bytes, { status: 200, headers: { "content-type": "application/pdf" } });
}

/** Never answers; rejects once the request is aborted. */
export function stalled(init?: RequestInit): Promise<Response> {
  return new Promise((_, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
  });
}

/** Sends headers, then stalls in the body until the request is aborted. */
export function stalledBody(init?: RequestInit, contentType = "application/pdf"): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      init?.signal?.addEventListener("abort", () => controller.error(new Error("body aborted")), { once: true });
    },
  });
  return new Response(body, { status: 200, headers: { "content-type": contentType } });
}

export function testHttpClient(fetchFn: FetchFn, maxAttempts = 1): HttpClient {
  return new HttpClient({
    userAgent: "test-agent",
    ignoreHttpsErrors: false,
    maxAttempts,
    retryBaseDelayMs: 0,
    fetchFn,
    sleepFn: async () => undefined,
  });
}

export class RecordingSink implements Sink {
  readonly downloads: StoreResult[] = [];
  readonly extracts: ExtractResult[] = [];
  readonly queries: QueryRecord[] = [];
  readonly sources: SourceRecord[] = [];

  async publishDownloadResults(results: StoreResult[]): Promise<void> {
    this.downloads.push(...results);
  }

  async publishExtractResults(results: ExtractResult[]): Promise<void> {
    this.extracts.push(...results);
  }

  async publishQueries(records: QueryRecord[]): Promise<void> {
    this.queries.push(...records);
  }

  async publishSources(records: SourceRecord[]): Promise<void> {
    this.sources.push(...records);
  }
}
