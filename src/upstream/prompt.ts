/**
 * Strict-JSON prompt for the LLM-backed forbidden-word check.
 * The model is told to return ONLY JSON (no prose, no code fences).
 */
export function buildClassificationPrompt(text: string): string {
  const SCHEMA = '{"status":"ok","forbidden_words":[]}';

  return [
    "SYSTEM: You screen group-chat messages for forbidden words. Output ONLY one minified JSON object matching the schema below.",
    `SCHEMA:${SCHEMA}`,
    'RULES: 1) No markdown, no code fences, no extra text. 2) status is "forbidden" when the message contains profanity, slurs, sexual solicitation, scam or gambling promotion, otherwise "ok". 3) forbidden_words lists the exact offending substrings as they appear in the text, at most 20, empty when status is "ok".',
    "EDGE CASES: Words split by spaces, symbols or homoglyphs to evade filters count as the word. Quoting a word to ask what it means is \"ok\".",
    "TEXT:",
    JSON.stringify(text),
  ].join("\n");
}
