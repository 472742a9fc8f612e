import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { PDFParse } from "pdf-parse";
import { ExtractionFailedError } from "../core/errors";
import { errorMessage } from "../observability";
import { TextEngineName } from "../types";

export interface EngineOutput {
  /** Text of each page, in page order. */
  pages: string[];
  pageCount: number;
}

export interface TextEngine {
  readonly name: TextEngineName;
  /** `maxPages` limits how many leading pages are read; `pageCount` is still the document total. */
  extractPages(data: Buffer, maxPages?: number): Promise<EngineOutput>;
}

interface ParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  destroy(): Promise<void>;
}

export class PdfParseEngine implements TextEngine {
  readonly name = "pdf-parse" as const;
  private readonly parserFactory: (data: Buffer) => ParserLike;

  constructor(parserFactory?: (data: Buffer) => ParserLike) {
    this.parserFactory =
      parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
  }

  async extractPages(data: Buffer, maxPages?: number): Promise<EngineOutput> {
    const parser = this.parserFactory(data);
    let parsed: Awaited<ReturnType<ParserLike["getText"]>>;
    try {
      parsed = await parser.getText();
    } finally {
      await parser.destroy().catch(() => undefined);
    }

    const ordered = [...parsed.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
    return {
      pages: maxPages === undefined ? ordered : ordered.slice(0, maxPages),
      pageCount: parsed.total,
    };
  }
}

let workerConfigured = false;

async function loadPdfjs() {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  if (!workerConfigured) {
    const require = createRequire(import.meta.url);
    const workerPath = path.join(path.dirname(require.resolve("pdfjs-dist/package.json")), "legacy/build/pdf.worker.mjs");
    pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
    workerConfigured = true;
  }
  return pdfjs;
}

/** Joins text items per page, breaking lines where pdf.js marks an end of line. */
export class PdfjsEngine implements TextEngine {
  readonly name = "pdfjs" as const;

  async extractPages(data: Buffer, maxPages?: number): Promise<EngineOutput> {
    const pdfjs = await loadPdfjs();
    const document = await pdfjs.getDocument({ data: new Uint8Array(data), useSystemFonts: true }).promise;
    try {
      const limit = maxPages === undefined ? document.numPages : Math.min(maxPages, document.numPages);
      const pages: string[] = [];
      for (let pageNo = 1; pageNo <= limit; pageNo += 1) {
        const page = await document.getPage(pageNo);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          if (!("str" in item)) {
            continue;
          }
          text += item.str;
          text += item.hasEOL ? "\n" : " ";
        }
        pages.push(text.trim());
        page.cleanup();
      }
      return { pages, pageCount: document.numPages };
    } finally {
      await document.destroy();
    }
  }
}

export function createDefaultEngines(): TextEngine[] {
  return [new PdfParseEngine(), new PdfjsEngine()];
}

export type ExtractionMode = "text" | "pages";

export interface EngineChainResult extends EngineOutput {
  engine: TextEngineName;
}

function hasText(output: EngineOutput, mode: ExtractionMode): boolean {
  if (mode === "text") {
    return output.pages.join("\n").trim().length > 0;
  }
  return output.pages.some((page) => page.trim().length > 0);
}

/**
 * Tries engines in order. A non-final engine is accepted only when its output
 * has text; the final engine's output is always accepted. If every engine
 * throws, raises `ExtractionFailedError`.
 */
export async function runEngineChain(
  engines: TextEngine[],
  data: Buffer,
  options: { mode: ExtractionMode; label: string; maxPages?: number },
): Promise<EngineChainResult> {
  const causes: string[] = [];

  for (const [index, engine] of engines.entries()) {
    const isFinal = index === engines.length - 1;
    try {
      const output = await engine.extractPages(data, options.maxPages);
      const result = { ...output, engine: engine.name };
      if (isFinal || hasText(output, options.mode)) {
        return result;
      }
      causes.push(`${engine.name}: no text`);
    } catch (error) {
      causes.push(`${engine.name}: ${errorMessage(error)}`);
    }
  }

  throw new ExtractionFailedError(options.label, causes);
}
