import { load } from "cheerio";

const SKIPPED_EXTENSIONS = new Set([
  "jpg",
  "jpeg",
  "png",
  "gif",
  "svg",
  "webp",
  "ico",
  "bmp",
  "tif",
  "tiff",
  "css",
  "js",
  "mjs",
  "map",
  "woff",
  "woff2",
  "ttf",
  "eot",
  "zip",
  "rar",
  "7z",
  "gz",
  "tar",
  "mp3",
  "mp4",
  "avi",
  "mov",
  "wav",
  "webm",
  "doc",
  "docx",
  "xls",
  "xlsx",
  "ppt",
  "pptx",
  "odt",
  "ods",
  "xml",
  "json",
]);

const DROPPED_SCHEMES = /^(mailto|tel|javascript|data):/i;

function hostKey(host: string): string {
  return host.toLowerCase().replace(/^www\./, "");
}

export function isSameDomain(url: string, baseUrl: string): boolean {
  try {
    return hostKey(new URL(url).hostname) === hostKey(new URL(baseUrl).hostname);
  } catch {
    return false;
  }
}

export function isPdfUrl(url: string): boolean {
  try {
    return new URL(url).pathname.toLowerCase().endsWith(".pdf");
  } catch {
    return url.toLowerCase().split(/[?#]/)[0].endsWith(".pdf");
  }
}

export function hasSkippedExtension(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  const lastSegment = pathname.split("/").pop() ?? "";
  const dot = lastSegment.lastIndexOf(".");
  return dot >= 0 && SKIPPED_EXTENSIONS.has(lastSegment.slice(dot + 1));
}

/** Resolves `href` against `pageUrl`, drops the fragment; undefined for non-http(s) targets. */
export function normalizeUrl(href: string, pageUrl: string): string | undefined {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#") || DROPPED_SCHEMES.test(trimmed)) {
    return undefined;
  }
  let resolved: URL;
  try {
    resolved = new URL(trimmed, pageUrl);
  } catch {
    return undefined;
  }
  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return undefined;
  }
  resolved.hash = "";
  return resolved.toString();
}

/** Every distinct `<a href>` target on the page, in document order. */
export function extractLinksFromHtml(html: string, pageUrl: string): string[] {
  const $ = load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href) {
      return;
    }
    const normalized = normalizeUrl(href, pageUrl);
    if (!normalized || seen.has(normalized)) {
      return;
    }
    seen.add(normalized);
    links.push(normalized);
  });

  return links;
}
