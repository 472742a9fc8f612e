import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ContentMismatchError, HttpStatusError } from "../core/errors";
import { HttpClient } from "../core/http";
import { originalNameFromUrl, StorageLayout, storedPdfName } from "../core/paths";
import { isPdfUrl } from "../crawl/htmlParser";
import { errorMessage, Logger } from "../observability";
import { CatalogStore } from "../store";
import { DocumentRecord, StoreResult } from "../types";
import { YearResolver } from "../year/yearResolver";

interface ContentStoreDeps {
  catalog: CatalogStore;
  layout: StorageLayout;
  http: HttpClient;
  yearResolver: YearResolver;
  logger: Logger;
  downloadTimeoutMs: number;
}

interface FetchedBody {
  tempPath: string;
  hash: string;
  sizeBytes: number;
  contentType: string;
}

async function removeIfPresent(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Content-addressed PDF storage. Identity is the SHA-1 of the full body;
 * a URL serving bytes already on file becomes an alias of that record.
 */
export class ContentStore {
  constructor(private readonly deps: ContentStoreDeps) {}

  async store(url: string): Promise<StoreResult> {
    const { catalog, logger } = this.deps;

    const known = await catalog.findByUrl(url);
    if (known && fs.existsSync(known.localPath)) {
      return { url, outcome: "cached", hash: known.hash, localPath: known.localPath, detectedYear: known.detectedYear };
    }

    let fetched: FetchedBody | undefined;
    try {
      fetched = await this.fetchToTemp(url);
      return await this.commit(url, fetched);
    } catch (error) {
      logger.warn("download_item_failed", { url, error: errorMessage(error) });
      return { url, outcome: "failed", error: errorMessage(error) };
    } finally {
      if (fetched) {
        await removeIfPresent(fetched.tempPath);
      }
    }
  }

  private async commit(url: string, fetched: FetchedBody): Promise<StoreResult> {
    const { catalog, layout, yearResolver, logger } = this.deps;
    const originalName = originalNameFromUrl(url);

    const found = await catalog.findByHash(fetched.hash);
    if (found) {
      const existing = found.detectedYear === null ? await this.assignYear(found, url, originalName, fetched.tempPath) : found;
      if (!fs.existsSync(existing.localPath)) {
        await fs.promises.mkdir(path.dirname(existing.localPath), { recursive: true });
        await fs.promises.rename(fetched.tempPath, existing.localPath);
        logger.info("download_item_restored", { url, hash: existing.hash });
      }
      await catalog.addUrlAlias(existing.hash, url, originalName, fetched.contentType);
      return {
        url,
        outcome: "deduplicated",
        hash: existing.hash,
        localPath: existing.localPath,
        detectedYear: existing.detectedYear,
      };
    }

    const resolution = await yearResolver.resolve({ url, filename: originalName, pdfPath: fetched.tempPath });
    const finalPath = path.join(layout.pdfDir(resolution.year), storedPdfName(fetched.hash, originalName));
    await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
    await fs.promises.rename(fetched.tempPath, finalPath);

    const outcome = await catalog.insertDocument({
      hash: fetched.hash,
      url,
      originalName,
      localPath: finalPath,
      detectedYear: resolution.year,
      contentType: fetched.contentType,
      sizeBytes: fetched.sizeBytes,
      downloadedAt: new Date().toISOString(),
    });

    if (!outcome.inserted) {
      if (outcome.record.localPath !== finalPath) {
        await removeIfPresent(finalPath);
      }
      logger.info("download_item_race_deduplicated", { url, hash: fetched.hash });
      return {
        url,
        outcome: "deduplicated",
        hash: outcome.record.hash,
        localPath: outcome.record.localPath,
        detectedYear: outcome.record.detectedYear,
      };
    }

    logger.info("download_item_ok", {
      url,
      hash: fetched.hash,
      year: resolution.year,
      yearStrategy: resolution.strategy,
      sizeBytes: fetched.sizeBytes,
    });
    return { url, outcome: "downloaded", hash: fetched.hash, localPath: finalPath, detectedYear: resolution.year };
  }

  /** An alias whose URL or name carries a year moves an unknown-year document into that partition, once. */
  private async assignYear(record: DocumentRecord, url: string, originalName: string, pdfPath: string): Promise<DocumentRecord> {
    const { catalog, layout, yearResolver, logger } = this.deps;
    const resolution = await yearResolver.resolve({ url, filename: originalName, pdfPath });
    if (resolution.year === null) {
      return record;
    }

    const localPath = path.join(layout.pdfDir(resolution.year), path.basename(record.localPath));
    if (!(await catalog.assignDocumentYear(record.hash, resolution.year, localPath))) {
      return (await catalog.findByHash(record.hash)) ?? record;
    }
    if (fs.existsSync(record.localPath)) {
      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      await fs.promises.rename(record.localPath, localPath);
    }
    logger.info("download_item_year_assigned", { url, hash: record.hash, year: resolution.year, yearStrategy: resolution.strategy });
    return { ...record, detectedYear: resolution.year, localPath };
  }

  private fetchToTemp(url: string): Promise<FetchedBody> {
    const { http, layout, downloadTimeoutMs } = this.deps;
    return http.request(url, { timeoutMs: downloadTimeoutMs, accept: "application/pdf,*/*" }, async (response) => {
      if (response.status !== 200) {
        await response.body?.cancel().catch(() => undefined);
        throw new HttpStatusError(url, response.status);
      }
      const contentType = response.headers.get("content-type") ?? "";
      if (!contentType.toLowerCase().includes("pdf") && !isPdfUrl(url)) {
        await response.body?.cancel().catch(() => undefined);
        throw new ContentMismatchError(url, contentType);
      }
      if (!response.body) {
        throw new Error(`Empty response body for ${url}`);
      }

      await fs.promises.mkdir(layout.tempDir, { recursive: true });
      const tempPath = path.join(layout.tempDir, `${crypto.randomUUID()}.part`);
      const hash = crypto.createHash("sha1");
      let sizeBytes = 0;

      const readable = Readable.fromWeb(response.body);
      readable.on("data", (chunk: Buffer) => {
        hash.update(chunk);
        sizeBytes += chunk.length;
      });

      try {
        await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
      } catch (error) {
        await removeIfPresent(tempPath);
        throw error;
      }

      return { tempPath, hash: hash.digest("hex"), sizeBytes, contentType: contentType || "application/pdf" };
    });
  }
}
