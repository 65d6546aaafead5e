import { dot, l2Normalize } from "./embedder.js";

export type SearchHit = { idx: number; score: number };

export type IndexBackend = "flat" | "brute";

/** Inner-product search over unit vectors (equivalent to cosine similarity). */
export interface SimilaritySearch {
  readonly backend: IndexBackend;
  readonly size: number;
  readonly dimension: number;
  search(query: ArrayLike<number>, k: number): SearchHit[];
}

/** Scores are ranked on a grid of this step; differences below it count as ties. */
export const SCORE_RESOLUTION = 1e-6;

const rankKey = (score: number) => Math.round(score / SCORE_RESOLUTION);

/** Shared ordering for both backends: higher score first, ties in chunk order. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  return rankKey(b.score) - rankKey(a.score) || a.idx - b.idx;
}

function ranksBefore(a: SearchHit, b: SearchHit): boolean {
  return compareHits(a, b) < 0;
}

function checkDimensions(vectors: ArrayLike<number>[]): number {
  const dimension = vectors[0]?.length ?? 0;
  vectors.forEach((v, i) => {
    if (v.length !== dimension) {
      throw new Error(`Embedding ${i} has dimension ${v.length}, expected ${dimension}`);
    }
  });
  return dimension;
}

function checkQuery(query: ArrayLike<number>, dimension: number) {
  if (query.length !== dimension) {
    throw new Error(`Query has dimension ${query.length}, index has ${dimension}`);
  }
}

/**
 * Dedicated flat index: every normalized row packed into one Float64Array and
 * scanned with a bounded top-k insertion buffer. Scores match
 * {@link BruteForceSearch} bit for bit.
 */
export class FlatInnerProductIndex implements SimilaritySearch {
  readonly backend = "flat" as const;
  readonly size: number;
  readonly dimension: number;
  private data: Float64Array;

  constructor(vectors: ArrayLike<number>[]) {
    this.dimension = checkDimensions(vectors);
    this.size = vectors.length;
    this.data = new Float64Array(this.size * this.dimension);
    vectors.forEach((v, row) => this.data.set(l2Normalize(v), row * this.dimension));
  }

  search(query: ArrayLike<number>, k: number): SearchHit[] {
    checkQuery(query, this.dimension);
    const limit = Math.min(Math.max(0, Math.floor(k)), this.size);
    if (limit === 0) return [];

    const q = l2Normalize(query);
    const top: SearchHit[] = [];
    for (let row = 0; row < this.size; row++) {
      const offset = row * this.dimension;
      let score = 0;
      for (let j = 0; j < this.dimension; j++) score += this.data[offset + j] * q[j];
      const hit = { idx: row, score };

      if (top.length === limit && !ranksBefore(hit, top[limit - 1])) continue;
      let pos = top.length;
      while (pos > 0 && ranksBefore(hit, top[pos - 1])) pos--;
      top.splice(pos, 0, hit);
      if (top.length > limit) top.pop();
    }
    return top;
  }
}

/** Normalized matrix kept as plain rows; every query is a full dot-product scan and sort. */
export class BruteForceSearch implements SimilaritySearch {
  readonly backend = "brute" as const;
  readonly size: number;
  readonly dimension: number;
  private rows: number[][];

  constructor(vectors: ArrayLike<number>[]) {
    this.dimension = checkDimensions(vectors);
    this.rows = vectors.map((v) => l2Normalize(v));
    this.size = this.rows.length;
  }

  search(query: ArrayLike<number>, k: number): SearchHit[] {
    checkQuery(query, this.dimension);
    const limit = Math.min(Math.max(0, Math.floor(k)), this.size);
    if (limit === 0) return [];

    const q = l2Normalize(query);
    const hits = this.rows.map((row, idx) => ({ idx, score: dot(row, q) }));
    hits.sort(compareHits);
    return hits.slice(0, limit);
  }
}

export function createSimilaritySearch(vectors: ArrayLike<number>[], backend: IndexBackend = "flat"): SimilaritySearch {
  return backend === "brute" ? new BruteForceSearch(vectors) : new FlatInnerProductIndex(vectors);
}
