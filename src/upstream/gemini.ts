import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type GenerateContentRequest,
  type SingleRequestOptions,
} from "@google/generative-ai";

import type { Verdict } from "../types/common";
import { abortError, UpstreamError } from "../util/errors";
import { tryParseModelText } from "./json";
import { buildClassificationPrompt } from "./prompt";
import { uniqueTerms, type UpstreamClassifier } from "./types";

/** The slice of the SDK's GenerativeModel this classifier calls. */
export interface ContentGenerator {
  generateContent(
    request: GenerateContentRequest,
    requestOptions?: SingleRequestOptions,
  ): Promise<{ response: { text(): string } }>;
}

export interface GeminiOptions {
  apiKey?: string; // defaults to process.env.GEMINI_API_KEY
  model?: string; // defaults to process.env.GEMINI_MODEL || "gemini-2.0-flash"
  timeoutMs?: number;
  /** Pre-built model (tests); apiKey and model are then unused. */
  generator?: ContentGenerator;
}

/**
 * LLM-backed forbidden-word check. Non-JSON output is a failed attempt,
 * so the retry policy gets another go instead of the text passing as clean.
 */
export class GeminiClassifier implements UpstreamClassifier {
  private readonly model: ContentGenerator;
  private readonly timeoutMs: number;

  constructor(opts: GeminiOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    if (opts.generator) {
      this.model = opts.generator;
      return;
    }

    const key = opts.apiKey ?? process.env.GEMINI_API_KEY;
    if (!key) throw new Error("GEMINI_API_KEY is required");

    const modelName = opts.model ?? process.env.GEMINI_MODEL ?? "gemini-2.0-flash";
    this.model = new GoogleGenerativeAI(key).getGenerativeModel({
      model: modelName,
      generationConfig: {
        // Strongly hint JSON-only
        responseMimeType: "application/json",
        maxOutputTokens: 256,
        temperature: 0,
      },
    });
  }

  async classify(text: string, signal?: AbortSignal): Promise<Verdict> {
    let textOut: string;
    try {
      const result = await this.model.generateContent(
        { contents: [{ role: "user", parts: [{ text: buildClassificationPrompt(text) }] }] },
        { signal, timeout: this.timeoutMs },
      );
      textOut = result.response.text();
    } catch (err) {
      if (signal?.aborted) throw abortError();
      if (err instanceof GoogleGenerativeAIFetchError) {
        throw new UpstreamError(`gemini error: ${err.message.slice(0, 120)}`, err.status ?? null);
      }
      throw new UpstreamError(`gemini error: ${err instanceof Error ? err.message.slice(0, 120) : String(err)}`);
    }

    const parsed = tryParseModelText(textOut);
    if (!parsed) throw new UpstreamError("gemini returned non-JSON output");

    const isViolation = parsed.status === "forbidden";
    return {
      isViolation,
      matchedTerms: isViolation ? uniqueTerms(parsed.forbidden_words) : [],
    };
  }
}
