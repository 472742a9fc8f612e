import { describe, expect, it } from "vitest";
import { extractCandidates, findCandidates, ScoreOptions, scoreCandidate } from "../../../src/values/candidates";

const TEXT = "Spesa corrente 2022: € 1.234,56 per servizi.";

describe("findCandidates", () => {
  it("collects each number near a keyword once", () => {
    const candidates = findCandidates(TEXT, ["spesa", "corrente"]);
    expect(candidates.map((candidate) => [candidate.value, candidate.offset])).toEqual([
      [2022, 15],
      [1234.56, 21],
    ]);
  });

  it("deduplicates overlapping keyword windows by offset", () => {
    expect(findCandidates("spesa spesa 100", ["spesa", "SPESA"])).toEqual([
      { value: 100, snippet: "spesa spesa 100", offset: 12 },
    ]);
  });

  it("drops tokens that do not normalize", () => {
    expect(findCandidates("spesa (2021", ["spesa"])).toEqual([]);
  });

  it("ignores numbers outside the context window", () => {
    const text = `spesa ${"x".repeat(50)} 42`;
    expect(findCandidates(text, ["spesa"], 20)).toEqual([]);
  });
});

describe("scoreCandidate", () => {
  it("rewards every keyword present in the snippet", () => {
    const both = scoreCandidate(1000, "spesa corrente 1000", ["spesa", "corrente"]);
    const one = scoreCandidate(1000, "spesa 1000", ["spesa", "corrente"]);
    expect(both).toBe(4);
    expect(one).toBe(1.5);
  });

  it("adds a bonus when the snippet mentions the target year", () => {
    expect(scoreCandidate(1000, "spesa 2022 1000", ["spesa"], { year: 2022 })).toBe(2);
  });

  it("penalizes values outside the expected range and implausible magnitudes", () => {
    const options: ScoreOptions = { expectedRange: [0, 1e12] };
    expect(scoreCandidate(1000, "spesa", ["spesa"], options)).toBe(3.5);
    expect(scoreCandidate(1e13, "spesa", ["spesa"], options)).toBe(-1);
  });
});

describe("extractCandidates", () => {
  it("ranks in-range values first", () => {
    expect(extractCandidates(TEXT, ["spesa", "corrente"], { year: 2022, expectedRange: [1000, 1500] })).toEqual([
      { value: 1234.56, snippet: TEXT, offset: 21, score: 6.5 },
      { value: 2022, snippet: TEXT, offset: 15, score: 3.5 },
    ]);
  });

  it("keeps discovery order on ties and honours topK", () => {
    const ranked = extractCandidates(TEXT, ["spesa", "corrente"], { year: 2022, topK: 1 });
    expect(ranked).toEqual([{ value: 2022, snippet: TEXT, offset: 15, score: 4.5 }]);
  });
});
