import type { Chunk } from "./chunker.js";
import type { EmbeddingProvider } from "./embedder.js";
import { createSimilaritySearch, type IndexBackend, type SimilaritySearch } from "./similarity.js";

export type RetrievedChunk = { idx: number; score: number; chunk: Chunk };

/**
 * Request-scoped view of one document: its chunks, their embeddings and the
 * search structure built over them. Nothing here is shared between requests.
 */
export class DocumentIndex {
  readonly chunks: readonly Chunk[];
  private embedder: EmbeddingProvider;
  private search: SimilaritySearch;

  private constructor(chunks: readonly Chunk[], embedder: EmbeddingProvider, search: SimilaritySearch) {
    this.chunks = chunks;
    this.embedder = embedder;
    this.search = search;
  }

  static async build(params: {
    chunks: readonly Chunk[];
    embedder: EmbeddingProvider;
    backend?: IndexBackend;
  }): Promise<DocumentIndex> {
    const vectors = await params.embedder.embedTexts(params.chunks.map((c) => c.text));
    if (vectors.length !== params.chunks.length) {
      throw new Error(`Embedder returned ${vectors.length} vectors for ${params.chunks.length} chunks`);
    }
    const search = createSimilaritySearch(vectors, params.backend);
    return new DocumentIndex(params.chunks, params.embedder, search);
  }

  get backend(): IndexBackend {
    return this.search.backend;
  }

  async retrieve(query: string, topK: number): Promise<RetrievedChunk[]> {
    const k = Math.min(Math.floor(topK), this.chunks.length);
    if (k <= 0) return [];
    const vector = await this.embedder.embedText(query);
    return this.search.search(vector, k).map((hit) => ({ ...hit, chunk: this.chunks[hit.idx] }));
  }
}

export function formatContext(hits: RetrievedChunk[]): string {
  return hits.map((h) => `[page ${h.chunk.page}] ${h.chunk.text}`).join("\n\n");
}
