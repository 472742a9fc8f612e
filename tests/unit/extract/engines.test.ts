import { describe, expect, it, vi } from "vitest";
import { ExtractionFailedError } from "../../../src/core/errors";
import { EngineOutput, PdfParseEngine, runEngineChain, TextEngine } from "../../../src/extract/engines";
import { TextEngineName } from "../../../src/types";

const DATA = Buffer.from("%PDF-1.4");

function engine(name: TextEngineName, output: EngineOutput | Error): TextEngine {
  return {
    name,
    extractPages: async () => {
      if (output instanceof Error) {
        throw output;
      }
      return output;
    },
  };
}

describe("runEngineChain", () => {
  it("uses the first engine that returns text", async () => {
    const result = await runEngineChain(
      [engine("pdf-parse", { pages: ["uno", "due"], pageCount: 2 }), engine("pdfjs", { pages: ["altro"], pageCount: 1 })],
      DATA,
      { mode: "text", label: "/tmp/doc.pdf" },
    );
    expect(result).toEqual({ pages: ["uno", "due"], pageCount: 2, engine: "pdf-parse" });
  });

  it("falls through empty output and accepts whatever the last engine returns", async () => {
    const result = await runEngineChain(
      [engine("pdf-parse", { pages: ["  ", ""], pageCount: 2 }), engine("pdfjs", { pages: [""], pageCount: 1 })],
      DATA,
      { mode: "pages", label: "/tmp/doc.pdf" },
    );
    expect(result).toEqual({ pages: [""], pageCount: 1, engine: "pdfjs" });
  });

  it("falls through an engine that throws", async () => {
    const result = await runEngineChain(
      [engine("pdf-parse", new Error("boom")), engine("pdfjs", { pages: ["testo"], pageCount: 1 })],
      DATA,
      { mode: "text", label: "/tmp/doc.pdf" },
    );
    expect(result.engine).toBe("pdfjs");
  });

  it("raises with every cause when no engine produces output", async () => {
    const failure = runEngineChain(
      [engine("pdf-parse", new Error("boom")), engine("pdfjs", new Error("bang"))],
      DATA,
      { mode: "text", label: "/tmp/doc.pdf" },
    );
    await expect(failure).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(failure).rejects.toThrow("Failed to extract text from /tmp/doc.pdf: pdf-parse: boom; pdfjs: bang");
  });
});

describe("PdfParseEngine", () => {
  it("orders pages, honours maxPages and always releases the parser", async () => {
    const destroy = vi.fn(async () => undefined);
    const pdfParse = new PdfParseEngine(() => ({
      getText: async () => ({
        total: 3,
        pages: [
          { num: 2, text: "due" },
          { num: 1, text: "uno" },
          { num: 3, text: "tre" },
        ],
      }),
      destroy,
    }));

    expect(await pdfParse.extractPages(DATA)).toEqual({ pages: ["uno", "due", "tre"], pageCount: 3 });
    expect(await pdfParse.extractPages(DATA, 1)).toEqual({ pages: ["uno"], pageCount: 3 });
    expect(destroy).toHaveBeenCalledTimes(2);
  });

  it("releases the parser when parsing fails", async () => {
    const destroy = vi.fn(async () => undefined);
    const pdfParse = new PdfParseEngine(() => ({
      getText: async () => {
        throw new Error("Invalid PDF structure");
      },
      destroy,
    }));

    await expect(pdfParse.extractPages(DATA)).rejects.toThrow("Invalid PDF structure");
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
