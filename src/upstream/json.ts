import { LlmVerdictSchema, type LlmVerdict } from "../types/schemas";

/**
 * Extract the first top-level JSON object from a string.
 * Tolerant to extra text before/after; handles braces inside strings.
 */
export function extractFirstJsonObject(source: string): string | null {
  let i = source.indexOf("{");
  if (i < 0) return null;

  let depth = 0;
  let inStr = false;
  let esc = false;

  for (let idx = i; idx < source.length; idx++) {
    const ch = source[idx];

    if (inStr) {
      if (esc) {
        esc = false;
      } else if (ch === "\\") {
        esc = true;
      } else if (ch === '"') {
        inStr = false;
      }
      continue;
    }

    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return source.slice(i, idx + 1);
      }
    }
  }
  return null;
}

/** Parse and validate the model's JSON verdict, throwing on anything off-contract. */
export function parseLlmVerdict(input: string): LlmVerdict {
  return LlmVerdictSchema.parse(JSON.parse(input));
}

/** Raw model text -> validated verdict, or null when no usable JSON is present. */
export function tryParseModelText(text: string): LlmVerdict | null {
  const jsonStr = extractFirstJsonObject(text);
  if (!jsonStr) return null;
  try {
    return parseLlmVerdict(jsonStr);
  } catch {
    return null;
  }
}
