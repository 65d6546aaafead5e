import { z } from "zod";

import { extractJsonObject } from "./jsonExtract.js";

export const OPTION_KEYS = ["a", "b", "c", "d"] as const;
export type OptionKey = (typeof OPTION_KEYS)[number];

export const DifficultySchema = z.enum(["easy", "medium", "hard"]);
export type Difficulty = z.infer<typeof DifficultySchema>;

const OptionText = z.coerce.string().trim().min(1);

export const RawMcqSchema = z.object({
  question: z.string().trim().min(1),
  options: z.object({ a: OptionText, b: OptionText, c: OptionText, d: OptionText }),
  answer: z.coerce.string().trim().min(1)
});

export type RawMcq = z.infer<typeof RawMcqSchema>;

export type NormalizedMcq = {
  mcq: string;
  options: Record<OptionKey, string>;
  correct: string;
  difficulty?: Difficulty;
};

export const VerdictSchema = z.object({
  supported: z.boolean(),
  confidence: z.coerce.number().min(0).max(1),
  evidence: z.string().default(""),
  reason: z.string().default("")
});

export type ModelVerdict = z.infer<typeof VerdictSchema>;

export type McqParseResult = { ok: true; records: RawMcq[]; dropped: number } | { ok: false; reason: string };

/** NFKC, collapsed whitespace, lower case, no surrounding quotes or trailing punctuation. */
export function normalizeAnswerText(s: string): string {
  return s
    .normalize("NFKC")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^["'“‘]+|["'”’]+$/g, "")
    .replace(/[\s.,;:!?。]+$/u, "")
    .toLowerCase();
}

const KEY_ANSWER = /^\(?([a-dA-D])[).:]?$/;

/**
 * Maps the model's answer onto the exact text of one option. Accepts a verbatim
 * match, a match after normalization, or a bare option key ("b", "(B)", "c.").
 * Returns null when nothing matches.
 */
export function resolveAnswer(options: Record<OptionKey, string>, answer: string): string | null {
  for (const key of OPTION_KEYS) if (options[key] === answer) return options[key];

  const wanted = normalizeAnswerText(answer);
  for (const key of OPTION_KEYS) if (normalizeAnswerText(options[key]) === wanted) return options[key];

  const keyMatch = KEY_ANSWER.exec(answer.trim());
  const key = keyMatch ? OPTION_KEYS.find((k) => k === keyMatch[1].toLowerCase()) : undefined;
  return key ? options[key] : null;
}

/**
 * Parses a `{"1": {...}, "2": {...}}` block from raw model text. Items are taken
 * in numeric key order; malformed items and items whose answer is not one of
 * the options are dropped rather than failing the whole block.
 */
export function parseMcqBlock(raw: string): McqParseResult {
  const extracted = extractJsonObject(raw);
  if (!extracted.ok) return extracted;

  const keys = Object.keys(extracted.value)
    .filter((k) => /^\d+$/.test(k.trim()))
    .sort((a, b) => Number(a) - Number(b));
  if (keys.length === 0) return { ok: false, reason: "JSON object has no numbered questions" };

  const records: RawMcq[] = [];
  for (const key of keys) {
    const item = RawMcqSchema.safeParse(extracted.value[key]);
    if (!item.success) continue;
    const answer = resolveAnswer(item.data.options, item.data.answer);
    if (answer === null) continue;
    records.push({ ...item.data, answer });
  }
  return { ok: true, records, dropped: keys.length - records.length };
}

export function normalizeMcq(raw: RawMcq, difficulty?: Difficulty): NormalizedMcq {
  return {
    mcq: raw.question,
    options: { ...raw.options },
    correct: raw.answer,
    ...(difficulty ? { difficulty } : {})
  };
}
