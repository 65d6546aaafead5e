import type { AppConfig } from "../config/env.js";
import { chunkPages } from "./chunker.js";
import type { EmbeddingProvider } from "./embedder.js";
import { EmptyDocumentError, isAbortError } from "./errors.js";
import { UsageTally, type ChatClient } from "./llmClient.js";
import { generateMcqs, type GenerationMode } from "./mcqGenerator.js";
import { normalizeMcq, type Difficulty, type NormalizedMcq } from "./mcqSchema.js";
import { validateMcqs, type ValidationEntry } from "./mcqValidator.js";
import { createRandom, type Random } from "./random.js";
import { DocumentIndex } from "./retriever.js";
import { quickSummary, ValidationScorer } from "./validationScorer.js";

export type PipelineSettings = Pick<AppConfig, "indexBackend" | "chunkMaxChars" | "language" | "validation">;

export type GenerationRequest = {
  mode: GenerationMode;
  questionsPerPage: number;
  topK: number;
  temperature: number;
  validate: boolean;
  seed?: number;
  signal?: AbortSignal;
};

export type DifficultyCounts = Record<Difficulty, number>;

export type GenerationResult = {
  mcqs: Record<string, NormalizedMcq>;
  validation: Record<string, ValidationEntry> | null;
  validationError?: string;
  quality?: ReturnType<typeof quickSummary>;
  stats: {
    chunks: number;
    pages: number;
    backend: string;
    attempts: number;
    failedParses: number;
    usage: ReturnType<UsageTally["toJSON"]>;
  };
};

export class McqPipeline {
  private embedder: EmbeddingProvider;
  private chat: ChatClient;
  private settings: PipelineSettings;
  private scorer = new ValidationScorer();

  constructor(deps: { embedder: EmbeddingProvider; chat: ChatClient; settings: PipelineSettings }) {
    this.embedder = deps.embedder;
    this.chat = deps.chat;
    this.settings = deps.settings;
  }

  async indexPages(pages: string[]): Promise<DocumentIndex> {
    const chunks = chunkPages(pages, this.settings.chunkMaxChars);
    if (chunks.length === 0) throw new EmptyDocumentError();
    return DocumentIndex.build({ chunks, embedder: this.embedder, backend: this.settings.indexBackend });
  }

  generate(pages: string[], request: GenerationRequest & { nQuestions: number }): Promise<GenerationResult> {
    return this.run(pages, request, [{ count: request.nQuestions }]);
  }

  /**
   * Generates each difficulty band in turn over one shared index. Numbering
   * continues across bands, and a question accepted in one band is not repeated in another.
   */
  generateWithDifficulty(pages: string[], request: GenerationRequest & { counts: DifficultyCounts }): Promise<GenerationResult> {
    const bands = (["easy", "medium", "hard"] as const).map((difficulty) => ({
      count: request.counts[difficulty],
      difficulty
    }));
    return this.run(pages, request, bands);
  }

  private async run(
    pages: string[],
    request: GenerationRequest,
    bands: Array<{ count: number; difficulty?: Difficulty }>
  ): Promise<GenerationResult> {
    const index = await this.indexPages(pages);
    const usage = new UsageTally();
    const random: Random = createRandom(request.seed);
    const deps = { index, chat: this.chat, language: this.settings.language, usage };

    const mcqs: Record<string, NormalizedMcq> = {};
    const seen = new Set<string>();
    let counter = 0;
    let attempts = 0;
    let failedParses = 0;
    for (const band of bands) {
      if (band.count <= 0) continue;
      const outcome = await generateMcqs(deps, {
        nQuestions: band.count,
        mode: request.mode,
        questionsPerPage: request.questionsPerPage,
        topK: request.topK,
        temperature: request.temperature,
        difficulty: band.difficulty,
        random,
        seen,
        signal: request.signal
      });
      attempts += outcome.attempts;
      failedParses += outcome.failedParses;
      for (const record of outcome.records) {
        counter += 1;
        mcqs[String(counter)] = normalizeMcq(record, band.difficulty);
      }
      const label = band.difficulty ? `${band.difficulty} ` : "";
      if (outcome.records.length < band.count) {
        console.warn(`[pipeline] ${label}generated ${outcome.records.length}/${band.count} questions after ${outcome.attempts} attempts`);
      }
    }

    const result: GenerationResult = {
      mcqs,
      validation: null,
      stats: {
        chunks: index.chunks.length,
        pages: pages.length,
        backend: index.backend,
        attempts,
        failedParses,
        usage: usage.toJSON()
      }
    };

    if (request.validate && counter > 0) {
      try {
        const validation = await validateMcqs(deps, mcqs, {
          topK: request.topK,
          similarityThreshold: this.settings.validation.similarityThreshold,
          evidenceCutoff: this.settings.validation.evidenceCutoff,
          useModelVerification: this.settings.validation.useModelVerification,
          signal: request.signal
        });
        result.validation = validation;
        result.quality = quickSummary(this.scorer.processBatch(mcqs, validation));
      } catch (err) {
        if (isAbortError(err)) throw err;
        // Questions are still worth returning without the report.
        console.error("[pipeline] validation failed", err);
        result.validationError = "Validation could not be completed";
      }
      result.stats.usage = usage.toJSON();
    }

    return result;
  }
}
