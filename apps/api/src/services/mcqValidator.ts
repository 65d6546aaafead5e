import type { ChatClient, UsageTally } from "./llmClient.js";
import { extractJsonObject } from "./jsonExtract.js";
import { buildVerificationMessages } from "./mcqPrompt.js";
import { VerdictSchema, type ModelVerdict, type NormalizedMcq } from "./mcqSchema.js";
import { formatContext, type DocumentIndex } from "./retriever.js";

export type EvidenceItem = { idx: number; page: number; score: number; text: string };

/**
 * - `done`: the model returned a verdict
 * - `failed`: the model was asked but its reply had no parseable verdict
 * - `skipped`: embeddings already support the statement, so the model was not asked
 * - `disabled`: unsupported by embeddings, and model verification is turned off
 */
export type VerificationStatus = "done" | "failed" | "skipped" | "disabled";

export type ValidationEntry = {
  supported_by_embeddings: boolean;
  max_similarity: number;
  evidence: EvidenceItem[];
  /** null unless `verification` is `done`. */
  model_verdict: ModelVerdict | null;
  verification: VerificationStatus;
};

export type ValidateOptions = {
  topK?: number;
  similarityThreshold?: number;
  evidenceCutoff?: number;
  useModelVerification?: boolean;
  temperature?: number;
  signal?: AbortSignal;
};

export type ValidatorDeps = {
  index: DocumentIndex;
  chat: ChatClient;
  language: string;
  usage?: UsageTally;
};

const EVIDENCE_TEXT_LIMIT = 1000;

export function parseVerdict(raw: string): ModelVerdict | null {
  const extracted = extractJsonObject(raw);
  if (!extracted.ok) return null;
  const verdict = VerdictSchema.safeParse(extracted.value);
  return verdict.success ? verdict.data : null;
}

function truncate(text: string): string {
  return text.length > EVIDENCE_TEXT_LIMIT ? text.slice(0, EVIDENCE_TEXT_LIMIT) + "..." : text;
}

export async function validateMcq(deps: ValidatorDeps, mcq: NormalizedMcq, options: ValidateOptions = {}): Promise<ValidationEntry> {
  const threshold = options.similarityThreshold ?? 0.5;
  const cutoff = options.evidenceCutoff ?? 0.5;

  const statement = `${mcq.mcq} Answer: ${mcq.correct}`;
  const hits = await deps.index.retrieve(statement, options.topK ?? 4);

  const maxSimilarity = hits.reduce((max, h) => Math.max(max, h.score), 0);
  const evidence = hits
    .filter((h) => h.score >= cutoff)
    .map((h) => ({ idx: h.idx, page: h.chunk.page, score: h.score, text: truncate(h.chunk.text) }));
  const supported = maxSimilarity >= threshold;

  let verdict: ModelVerdict | null = null;
  let verification: VerificationStatus = supported ? "skipped" : "disabled";
  if (!supported && (options.useModelVerification ?? true)) {
    const messages = buildVerificationMessages({
      question: mcq.mcq,
      options: mcq.options,
      answer: mcq.correct,
      context: formatContext(hits),
      language: deps.language
    });
    const completion = await deps.chat.complete(messages, { temperature: options.temperature ?? 0, signal: options.signal });
    deps.usage?.add(completion.usage);
    verdict = parseVerdict(completion.text);
    verification = verdict ? "done" : "failed";
    if (!verdict) console.warn("[validator] verification reply had no parseable verdict");
  }

  return {
    supported_by_embeddings: supported,
    max_similarity: maxSimilarity,
    evidence,
    model_verdict: verdict,
    verification
  };
}

export async function validateMcqs(
  deps: ValidatorDeps,
  mcqs: Record<string, NormalizedMcq>,
  options: ValidateOptions = {}
): Promise<Record<string, ValidationEntry>> {
  const report: Record<string, ValidationEntry> = {};
  for (const [qid, mcq] of Object.entries(mcqs)) {
    report[qid] = await validateMcq(deps, mcq, options);
  }
  return report;
}
