export interface Bm25Parameters {
  k1: number;
  b: number;
  /** Fraction of the average IDF that replaces a negative IDF. */
  epsilon: number;
}

export const DEFAULT_BM25_PARAMETERS: Bm25Parameters = { k1: 1.5, b: 0.75, epsilon: 0.25 };

/** Serializable model state; maps are stored as entry lists. */
export interface Bm25State extends Bm25Parameters {
  avgdl: number;
  docLengths: number[];
  docFreqs: Array<Array<[string, number]>>;
  idf: Array<[string, number]>;
}

/** Okapi BM25 over a pre-tokenized corpus. */
export class Bm25Model {
  private constructor(
    private readonly params: Bm25Parameters,
    private readonly avgdl: number,
    private readonly docLengths: number[],
    private readonly docFreqs: Array<Map<string, number>>,
    private readonly idf: Map<string, number>,
  ) {}

  static build(corpus: string[][], params: Bm25Parameters = DEFAULT_BM25_PARAMETERS): Bm25Model {
    const docLengths: number[] = [];
    const docFreqs: Array<Map<string, number>> = [];
    const documentFrequency = new Map<string, number>();
    let totalLength = 0;

    for (const tokens of corpus) {
      const frequencies = new Map<string, number>();
      for (const token of tokens) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      for (const token of frequencies.keys()) {
        documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
      }
      docFreqs.push(frequencies);
      docLengths.push(tokens.length);
      totalLength += tokens.length;
    }

    const corpusSize = corpus.length;
    const idf = new Map<string, number>();
    const negative: string[] = [];
    let idfSum = 0;
    for (const [token, count] of documentFrequency) {
      const value = Math.log(corpusSize - count + 0.5) - Math.log(count + 0.5);
      idf.set(token, value);
      idfSum += value;
      if (value < 0) {
        negative.push(token);
      }
    }
    const averageIdf = idf.size > 0 ? idfSum / idf.size : 0;
    for (const token of negative) {
      idf.set(token, params.epsilon * averageIdf);
    }

    return new Bm25Model(params, corpusSize > 0 ? totalLength / corpusSize : 0, docLengths, docFreqs, idf);
  }

  static fromState(state: Bm25State): Bm25Model {
    return new Bm25Model(
      { k1: state.k1, b: state.b, epsilon: state.epsilon },
      state.avgdl,
      state.docLengths,
      state.docFreqs.map((entries) => new Map(entries)),
      new Map(state.idf),
    );
  }

  get size(): number {
    return this.docLengths.length;
  }

  toState(): Bm25State {
    return {
      ...this.params,
      avgdl: this.avgdl,
      docLengths: [...this.docLengths],
      docFreqs: this.docFreqs.map((frequencies) => [...frequencies.entries()]),
      idf: [...this.idf.entries()],
    };
  }

  /** Score of every document for the query, by corpus position. */
  scores(queryTokens: string[]): number[] {
    const { k1, b } = this.params;
    return this.docFreqs.map((frequencies, index) => {
      const lengthRatio = this.avgdl > 0 ? this.docLengths[index] / this.avgdl : 0;
      let score = 0;
      for (const token of queryTokens) {
        const tf = frequencies.get(token) ?? 0;
        if (tf === 0) {
          continue;
        }
        score += ((this.idf.get(token) ?? 0) * (tf * (k1 + 1))) / (tf + k1 * (1 - b + b * lengthRatio));
      }
      return score;
    });
  }

  /** True when at least one query token occurs in the document. */
  matches(index: number, queryTokens: string[]): boolean {
    const frequencies = this.docFreqs[index];
    return frequencies !== undefined && queryTokens.some((token) => frequencies.has(token));
  }
}
