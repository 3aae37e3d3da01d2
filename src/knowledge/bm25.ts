/**
 * Okapi BM25 over a fixed corpus. Instances are immutable: a rebuild creates
 * a new index and the owner swaps the reference.
 *
 *   idf(t)   = ln(1 + (N - df + 0.5) / (df + 0.5))
 *   score(d) = Σ idf(t) · tf·(k1 + 1) / (tf + k1·(1 - b + b·|d| / avgdl))
 */

import { tokenize } from './tokenize.js';

export interface Bm25Params {
  k1: number;
  b: number;
}

export const DEFAULT_BM25_PARAMS: Bm25Params = { k1: 1.5, b: 0.75 };

export class Bm25Index {
  readonly size: number;
  readonly avgDocLength: number;
  private readonly termFreqs: ReadonlyArray<ReadonlyMap<string, number>>;
  private readonly docLengths: readonly number[];
  private readonly idf: ReadonlyMap<string, number>;

  private constructor(
    docs: readonly string[][],
    readonly params: Bm25Params,
  ) {
    const termFreqs: Map<string, number>[] = [];
    const docFreq = new Map<string, number>();
    let totalLength = 0;

    for (const tokens of docs) {
      const tf = new Map<string, number>();
      for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
      for (const t of tf.keys()) docFreq.set(t, (docFreq.get(t) ?? 0) + 1);
      termFreqs.push(tf);
      totalLength += tokens.length;
    }

    const n = docs.length;
    const idf = new Map<string, number>();
    for (const [term, df] of docFreq) {
      idf.set(term, Math.log(1 + (n - df + 0.5) / (df + 0.5)));
    }

    this.size = n;
    this.avgDocLength = n > 0 ? totalLength / n : 0;
    this.termFreqs = termFreqs;
    this.docLengths = docs.map((d) => d.length);
    this.idf = idf;
  }

  static fromTexts(texts: readonly string[], params: Bm25Params = DEFAULT_BM25_PARAMS): Bm25Index {
    return new Bm25Index(texts.map(tokenize), params);
  }

  static fromTokens(docs: readonly string[][], params: Bm25Params = DEFAULT_BM25_PARAMS): Bm25Index {
    return new Bm25Index(docs, params);
  }

  idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  /** One score per document, in corpus order. Repeated query tokens count again. */
  scores(queryTokens: readonly string[]): number[] {
    const { k1, b } = this.params;
    const out = new Array<number>(this.size).fill(0);
    if (this.size === 0 || this.avgDocLength === 0) return out;

    for (const term of queryTokens) {
      const idf = this.idf.get(term);
      if (idf === undefined) continue;

      for (let i = 0; i < this.size; i++) {
        const tf = this.termFreqs[i]?.get(term) ?? 0;
        if (tf === 0) continue;
        const len = this.docLengths[i] ?? 0;
        const norm = tf + k1 * (1 - b + (b * len) / this.avgDocLength);
        out[i] = (out[i] ?? 0) + (idf * (tf * (k1 + 1))) / norm;
      }
    }
    return out;
  }
}
