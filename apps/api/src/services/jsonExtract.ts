export type ParseResult<T = unknown> = { ok: true; value: T } | { ok: false; reason: string };

const CODE_FENCE = /```(?:json)?\n?/gi;
const TRAILING_COMMA = /,\s*([}\]])/g;

/**
 * Index range of the first balanced `{...}` in `text`, skipping braces that
 * appear inside JSON string literals. Returns null when no object closes.
 */
export function findBalancedObject(text: string): { start: number; end: number } | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return { start, end: i + 1 };
    }
  }
  return null;
}

function tryParse(s: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(s) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Best-effort extraction of a JSON object from LLM output that may carry prose
 * or code fences around it. One repair pass drops trailing commas.
 */
export function extractJsonObject(raw: string): ParseResult<Record<string, unknown>> {
  const text = raw.replace(CODE_FENCE, "");
  const range = findBalancedObject(text);
  if (!range) return { ok: false, reason: "No complete JSON object found in model output" };

  const candidate = text.slice(range.start, range.end);
  let parsed = tryParse(candidate);
  if (!parsed.ok) parsed = tryParse(candidate.replace(TRAILING_COMMA, "$1"));
  if (!parsed.ok) return parsed;

  const value = parsed.value;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, reason: "Model output JSON is not an object" };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(value)) };
}
