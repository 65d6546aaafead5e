import OpenAI from "openai";

import { ProviderError } from "./errors.js";

export interface EmbeddingProvider {
  readonly name: string;
  embedText(text: string): Promise<number[]>;
  embedTexts(texts: string[]): Promise<number[][]>;
}

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

export function l2Normalize(vec: ArrayLike<number>): number[] {
  const norm = Math.sqrt(dot(vec, vec)) + 1e-10;
  return Array.from(vec, (v) => v / norm);
}

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.normalize("NFKC").toLowerCase().match(TOKEN_RE) ?? [];
}

/**
 * Offline feature-hashing embedder: every token adds +1/-1 to a hashed bucket.
 * Texts sharing most of their words land close together, which is all retrieval
 * needs when no embedding API is configured.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashing";
  readonly dimension: number;

  constructor(dimension = 256) {
    if (!Number.isInteger(dimension) || dimension < 1) throw new Error(`Invalid embedding dimension: ${dimension}`);
    this.dimension = dimension;
  }

  async embedText(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedSync(t));
  }

  private embedSync(text: string): number[] {
    const vec = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const h = fnv1a32(token);
      const sign = (h & 0x80000000) === 0 ? 1 : -1;
      vec[h % this.dimension] += sign;
    }
    return vec;
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  private client: OpenAI;
  private model: string;
  private batchSize: number;

  constructor(options: { apiKey: string; model: string; baseUrl?: string; batchSize?: number }) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    this.model = options.model;
    this.batchSize = options.batchSize ?? 64;
  }

  async embedText(text: string): Promise<number[]> {
    const [vec] = await this.embedTexts([text]);
    if (!vec) throw new ProviderError("Embedding provider returned no vector");
    return vec;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await this.client.embeddings.create({ model: this.model, input: batch }).catch((err: unknown) => {
        const status = err instanceof OpenAI.APIError ? (err.status ?? 0) : 0;
        const detail = err instanceof Error ? err.message : String(err);
        throw new ProviderError("Embedding request failed", { providerStatus: status, detail, cause: err });
      });
      // The API may return rows out of order; `index` is authoritative.
      const rows = [...response.data].sort((a, b) => a.index - b.index);
      if (rows.length !== batch.length) {
        throw new ProviderError("Embedding provider returned a different number of vectors than inputs", {
          detail: `expected ${batch.length}, got ${rows.length}`
        });
      }
      for (const row of rows) out.push(row.embedding);
    }
    return out;
  }
}
