import { splitSentences } from "./chunker.js";
import { RequestAbortedError } from "./errors.js";
import type { ChatClient, UsageTally } from "./llmClient.js";
import { buildMcqMessages } from "./mcqPrompt.js";
import { normalizeAnswerText, parseMcqBlock, type Difficulty, type RawMcq } from "./mcqSchema.js";
import { pick, type Random } from "./random.js";
import { formatContext, type DocumentIndex } from "./retriever.js";

export type GenerationMode = "rag" | "per_page";

/** Safety bound for the rag loop: at most this many attempts per requested question. */
export const RAG_ATTEMPTS_PER_QUESTION = 4;

export type GenerateOptions = {
  nQuestions: number;
  mode: GenerationMode;
  questionsPerPage: number;
  topK: number;
  temperature: number;
  random: Random;
  difficulty?: Difficulty;
  signal?: AbortSignal;
  /** Normalized question texts already accepted; shared when several runs build one set. */
  seen?: Set<string>;
};

export type GeneratorDeps = {
  index: DocumentIndex;
  chat: ChatClient;
  language: string;
  usage?: UsageTally;
};

export type GenerationOutcome = {
  records: RawMcq[];
  attempts: number;
  calls: number;
  failedParses: number;
};

export function seedSentence(chunkText: string, random: Random): string {
  const candidates = splitSentences(chunkText).filter((s) => s.trim().length > 20);
  if (candidates.length > 0) return pick(random, candidates);
  const stripped = chunkText.trim();
  return stripped ? stripped.slice(0, 200) : "[no text available]";
}

export async function generateMcqs(deps: GeneratorDeps, options: GenerateOptions): Promise<GenerationOutcome> {
  const state: GenerationOutcome = { records: [], attempts: 0, calls: 0, failedParses: 0 };
  const seen = options.seen ?? new Set<string>();

  const remaining = () => options.nQuestions - state.records.length;

  const accept = (batch: RawMcq[]) => {
    for (const record of batch) {
      if (remaining() <= 0) return;
      const key = normalizeAnswerText(record.question);
      if (seen.has(key)) continue;
      seen.add(key);
      state.records.push(record);
    }
  };

  const requestBatch = async (context: string, count: number, label: string): Promise<RawMcq[]> => {
    const messages = buildMcqMessages({ context, count, language: deps.language, difficulty: options.difficulty });
    state.calls += 1;
    const completion = await deps.chat.complete(messages, { temperature: options.temperature, signal: options.signal });
    deps.usage?.add(completion.usage);

    const parsed = parseMcqBlock(completion.text);
    if (!parsed.ok) {
      state.failedParses += 1;
      console.warn(`[generator] ${label}: unparseable model output (${parsed.reason}), skipping`);
      return [];
    }
    if (parsed.dropped > 0) console.warn(`[generator] ${label}: dropped ${parsed.dropped} malformed item(s)`);
    return parsed.records.slice(0, count);
  };

  const chunks = deps.index.chunks;
  if (options.nQuestions <= 0 || chunks.length === 0) return state;

  if (options.mode === "per_page") {
    for (const chunk of chunks) {
      if (remaining() <= 0) break;
      throwIfAborted(options.signal);
      if (!chunk.text.trim()) continue;
      state.attempts += 1;
      const count = Math.min(options.questionsPerPage, remaining());
      accept(await requestBatch(chunk.text, count, `page ${chunk.page} chunk ${chunk.chunkId}`));
    }
    return state;
  }

  const maxAttempts = options.nQuestions * RAG_ATTEMPTS_PER_QUESTION;
  while (remaining() > 0 && state.attempts < maxAttempts) {
    throwIfAborted(options.signal);
    state.attempts += 1;

    const seed = pick(options.random, chunks);
    const query = `Create questions about: ${seedSentence(seed.text, options.random)}`;
    const hits = await deps.index.retrieve(query, options.topK);
    // One question per retrieved context keeps the final set topically spread out.
    accept(await requestBatch(formatContext(hits), 1, `rag attempt ${state.attempts}`));
  }
  return state;
}

function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new RequestAbortedError();
}
