import axios, { type AxiosInstance } from "axios";

import type { Verdict } from "../types/common";
import { ProfanityResponseSchema } from "../types/schemas";
import { abortError, UpstreamError } from "../util/errors";
import { uniqueTerms, type UpstreamClassifier } from "./types";

export interface HttpClassifierOptions {
  endpoint: string;
  timeoutMs?: number;
  /** Injected for tests. */
  http?: AxiosInstance;
}

/**
 * Profanity-check service: POST {"text": ...}; a 200 body with
 * `status: "forbidden"` is a violation, any other status string is clean.
 */
export class HttpProfanityClassifier implements UpstreamClassifier {
  private readonly endpoint: string;
  private readonly http: AxiosInstance;

  constructor(opts: HttpClassifierOptions) {
    this.endpoint = opts.endpoint;
    this.http =
      opts.http ??
      axios.create({
        timeout: opts.timeoutMs ?? 10_000,
        headers: { "Content-Type": "application/json" },
      });
  }

  async classify(text: string, signal?: AbortSignal): Promise<Verdict> {
    let status: number;
    let body: unknown;
    try {
      const res = await this.http.post<unknown>(
        this.endpoint,
        { text },
        { signal, validateStatus: () => true },
      );
      status = res.status;
      body = res.data;
    } catch (err) {
      if (axios.isCancel(err) || signal?.aborted) throw abortError();
      throw new UpstreamError(`request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (status < 200 || status >= 300) {
      throw new UpstreamError(`upstream responded ${status}`, status);
    }

    const parsed = ProfanityResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError("unreadable upstream response", status);
    }

    const isViolation = parsed.data.status === "forbidden";
    return {
      isViolation,
      matchedTerms: isViolation ? uniqueTerms(parsed.data.forbidden_words ?? []) : [],
    };
  }
}
