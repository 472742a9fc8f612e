import { describe, expect, it, vi } from "vitest";
import { getHelpText, parseCliArgs, runCli } from "../../../src/cli";

describe("parseCliArgs", () => {
  it("parses search options with repeated queries", () => {
    expect(
      parseCliArgs(["search", "--query", "spesa corrente", "--query", "bilancio", "--year", "2022", "--top-k", "5", "--force"]),
    ).toEqual({
      command: "search",
      force: true,
      ignoreHttpsErrors: false,
      queries: ["spesa corrente", "bilancio"],
      year: 2022,
      topK: 5,
      configPath: undefined,
    });
  });

  it("reads the config path and TLS flag", () => {
    expect(parseCliArgs(["crawl", "--config", "cfg.json", "--ignore-https-errors"])).toEqual({
      command: "crawl",
      force: false,
      ignoreHttpsErrors: true,
      queries: [],
      year: undefined,
      topK: undefined,
      configPath: "cfg.json",
    });
  });

  it("falls back to help for unknown commands and help flags", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["bogus"])).toBe("help");
    expect(parseCliArgs(["run", "-h"])).toBe("help");
  });

  it("ignores non-numeric numeric options", () => {
    const parsed = parseCliArgs(["search", "--query", "spesa", "--year", "latest"]);
    expect(parsed === "help" ? undefined : parsed.year).toBeUndefined();
  });
});

describe("runCli", () => {
  it("rejects search without a query before touching any storage", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(await runCli(["search"])).toBe(1);
    expect(error).toHaveBeenCalledWith("search requires at least one --query");
  });

  it("prints help", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(await runCli(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledWith(getHelpText());
    expect(getHelpText()).toContain("corpus-extractor <command> [options]");
  });
});
