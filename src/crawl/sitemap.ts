import { load } from "cheerio";

export interface ParsedSitemap {
  /** `<url><loc>` entries. */
  pageUrls: string[];
  /** `<sitemap><loc>` entries of a sitemap index. */
  sitemapUrls: string[];
}

export function parseSitemap(xml: string): ParsedSitemap {
  const $ = load(xml, { xml: true });
  const collect = (selector: string): string[] =>
    $(selector)
      .map((_, element) => $(element).text().trim())
      .get()
      .filter((value) => value.length > 0);

  return {
    pageUrls: collect("url > loc"),
    sitemapUrls: collect("sitemap > loc"),
  };
}
