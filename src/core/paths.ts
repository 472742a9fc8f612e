import path from "node:path";

export const UNKNOWN_PARTITION = "unknown";

const MAX_FILENAME_LENGTH = 200;

export function municipalitySlug(municipality: string): string {
  return municipality.trim().toLowerCase().replace(/[^\p{L}\p{N}_-]+/gu, "_");
}

/** Keeps letters, digits and `.-_`; caps length while preserving the extension. */
export function sanitizeFilename(filename: string, maxLength = MAX_FILENAME_LENGTH): string {
  const safe = Array.from(filename)
    .map((char) => (/[\p{L}\p{N}._-]/u.test(char) ? char : "_"))
    .join("");
  if (safe.length <= maxLength) {
    return safe;
  }

  const dot = safe.lastIndexOf(".");
  if (dot <= 0) {
    return safe.slice(0, maxLength);
  }
  const ext = safe.slice(dot + 1);
  return `${safe.slice(0, maxLength - ext.length - 1)}.${ext}`;
}

/** Last path segment of a URL, query dropped, always ending in `.pdf`. */
export function originalNameFromUrl(url: string): string {
  let name: string;
  try {
    const pathname = new URL(url).pathname;
    name = decodeURIComponent(pathname.split("/").pop() ?? "");
  } catch {
    name = url.split("/").pop()?.split("?")[0] ?? "";
  }
  if (!name) {
    name = "document";
  }
  return name.toLowerCase().endsWith(".pdf") ? name : `${name}.pdf`;
}

export function storedPdfName(hash: string, originalName: string): string {
  return `${hash.slice(0, 8)}_${sanitizeFilename(originalName)}`;
}

/**
 * `{dataDir}/{municipality}/{year|unknown}/{pdf,text,value-cache}` plus the
 * municipality-wide `index/`, `tmp/` and `catalog.sqlite`.
 */
export class StorageLayout {
  readonly root: string;

  constructor(dataDir: string, municipality: string) {
    this.root = path.resolve(dataDir, municipalitySlug(municipality));
  }

  partition(year: number | null): string {
    return path.join(this.root, year === null ? UNKNOWN_PARTITION : String(year));
  }

  pdfDir(year: number | null): string {
    return path.join(this.partition(year), "pdf");
  }

  textDir(year: number | null): string {
    return path.join(this.partition(year), "text");
  }

  valueCacheDir(year: number | null): string {
    return path.join(this.partition(year), "value-cache");
  }

  get indexDir(): string {
    return path.join(this.root, "index");
  }

  get tempDir(): string {
    return path.join(this.root, "tmp");
  }

  get catalogPath(): string {
    return path.join(this.root, "catalog.sqlite");
  }
}
