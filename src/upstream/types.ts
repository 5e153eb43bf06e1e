import type { Verdict } from "../types/common";

/**
 * The external classification predicate. Implementations throw on any failure
 * (transport, non-2xx, unreadable body); they never turn a failure into a clean verdict.
 */
export interface UpstreamClassifier {
  classify(text: string, signal?: AbortSignal): Promise<Verdict>;
}

/** Unique terms in first-seen order. */
export function uniqueTerms(terms: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const term of terms) {
    const t = term.trim();
    if (t) seen.add(t);
  }
  return [...seen];
}
