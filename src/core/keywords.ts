export interface KeywordMatch {
  hit: boolean;
  words: string[];
}

function keyOf(word: string): string {
  return word.toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive literal matcher for locally configured forbidden words.
 * Immutable: `withWord`/`withoutWord` return a new matcher.
 */
export class KeywordMatcher {
  private readonly words: readonly string[];
  private readonly pattern: RegExp | null;

  constructor(words: Iterable<string>) {
    // first spelling of each word wins; comparisons ignore case like matching does
    const byKey = new Map<string, string>();
    for (const raw of words) {
      const word = raw.trim();
      if (word && !byKey.has(keyOf(word))) byKey.set(keyOf(word), word);
    }
    const unique = [...byKey.values()];
    this.words = unique;
    // longest first so "badword" wins over "bad" at the same position
    const alternation = [...unique]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join("|");
    this.pattern = alternation ? new RegExp(alternation, "giu") : null;
  }

  /** Matched fragments as written in the text, unique, in order of first appearance. */
  match(text: string): KeywordMatch {
    if (!this.pattern || !text) return { hit: false, words: [] };
    const found = new Set<string>();
    for (const m of text.matchAll(this.pattern)) found.add(m[0]);
    return { hit: found.size > 0, words: [...found] };
  }

  list(): string[] {
    return [...this.words].sort();
  }

  has(word: string): boolean {
    const key = keyOf(word.trim());
    return this.words.some((w) => keyOf(w) === key);
  }

  withWord(word: string): KeywordMatcher {
    return new KeywordMatcher([...this.words, word]);
  }

  withoutWord(word: string): KeywordMatcher {
    const key = keyOf(word.trim());
    return new KeywordMatcher(this.words.filter((w) => keyOf(w) !== key));
  }

  get size(): number {
    return this.words.length;
  }
}
