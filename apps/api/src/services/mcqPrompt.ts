import type { ChatMessage } from "./llmClient.js";
import type { Difficulty, OptionKey } from "./mcqSchema.js";

const DIFFICULTY_HINTS: Record<Difficulty, string> = {
  easy: "Questions must be easy: recall of a fact stated directly in the content.",
  medium: "Questions must be of medium difficulty: require understanding or connecting two statements in the content.",
  hard: "Questions must be hard: require reasoning, application or comparison across the content; distractors must be close."
};

export function buildMcqMessages(params: {
  context: string;
  count: number;
  language: string;
  difficulty?: Difficulty;
}): ChatMessage[] {
  const { count, language } = params;

  const rules = [
    `- Create exactly ${count} item${count === 1 ? "" : "s"}, numbered from 1 to ${count}.`,
    '- "options" must have exactly the keys a, b, c, d.',
    '- "answer" must be the full text of the correct option (not its letter) and must match one of the option values exactly.',
    "- No explanations or extra fields.",
    "- Distractors must be plausible and must not repeat."
  ];
  if (params.difficulty) rules.push(`- ${DIFFICULTY_HINTS[params.difficulty]}`);

  const system = [
    "You are a helpful assistant that writes multiple-choice questions.",
    `Always write in ${language}.`,
    "Return ONLY one JSON object with exactly this shape and no other text:",
    "",
    "{",
    '  "1": { "question": "...", "options": { "a": "...", "b": "...", "c": "...", "d": "..." }, "answer": "..." },',
    '  "2": { ... }',
    "}",
    "",
    "Rules:",
    ...rules
  ].join("\n");

  const user = [
    `Write ${count} multiple-choice question${count === 1 ? "" : "s"} from the content below.`,
    "Use this content as the only source for questions and answers; do not use outside knowledge.",
    "",
    "Content:",
    "",
    params.context
  ].join("\n");

  return [
    { role: "system", content: system },
    { role: "user", content: user }
  ];
}

export function buildVerificationMessages(params: {
  question: string;
  options: Record<OptionKey, string>;
  answer: string;
  context: string;
  language: string;
}): ChatMessage[] {
  const system = [
    "You check whether the answer to a multiple-choice question is supported by the provided passage.",
    `Always write in ${params.language}.`,
    "Reply ONLY with valid JSON (no other text) of this shape:",
    "",
    "{",
    '  "supported": true or false,',
    '  "confidence": a number between 0.0 and 1.0,',
    '  "evidence": "a short quote from the context",',
    '  "reason": "briefly, why it is or is not supported"',
    "}",
    "",
    'Base the verdict only on the "Context" below. If the context holds no evidence, return "supported": false.'
  ].join("\n");

  const user = [
    "Question:",
    params.question,
    "",
    "Options:",
    ...Object.entries(params.options).map(([k, v]) => `${k}: ${v}`),
    "",
    "Answer:",
    params.answer,
    "",
    "Context:",
    params.context,
    "",
    "Reply as instructed."
  ].join("\n");

  return [
    { role: "system", content: system },
    { role: "user", content: user }
  ];
}
