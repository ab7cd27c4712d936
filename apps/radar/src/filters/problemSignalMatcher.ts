import { KeywordCategory, MatchResult } from "@/types";

interface CompiledKeyword {
  keyword: string;
  category: string;
  order: number;
  pattern: RegExp;
}

interface KeywordHit {
  keyword: string;
  firstIndex: number;
  order: number;
}

// Letters, digits and underscore count as word characters on either side of a keyword.
const WORD_CHAR = "[\\p{L}\\p{N}_]";

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

/**
 * Lower-cases the text and folds typographic apostrophes so that
 * "doesn’t work" and "doesn't work" hit the same keyword.
 */
export const normalizeText = (text: string): string =>
  text.toLowerCase().replace(/[’‘]/g, "'");

export const compileKeyword = (keyword: string): RegExp => {
  const body = keyword
    .split(/\s+/)
    .filter(Boolean)
    .map(escapeRegExp)
    .join("\\s+");
  return new RegExp(`(?<!${WORD_CHAR})${body}(?!${WORD_CHAR})`, "gu");
};

/**
 * Matches text against the problem-indicator taxonomy.
 *
 * A keyword only matches as a whole word or phrase: "hate" hits "I hate this"
 * but not "hateful" or "whatever". Every occurrence is counted towards its
 * category, while the keyword list holds each keyword once, ordered by where
 * it first appears in the text.
 */
export class ProblemSignalMatcher {
  private readonly compiled: readonly CompiledKeyword[];
  private readonly categoryNames: readonly string[];

  constructor(taxonomy: readonly KeywordCategory[]) {
    this.categoryNames = taxonomy.map((category) => category.name);

    let order = 0;
    this.compiled = taxonomy.flatMap((category) =>
      category.keywords.map((keyword) => ({
        keyword,
        category: category.name,
        order: order++,
        pattern: compileKeyword(keyword),
      }))
    );
  }

  get categories(): readonly string[] {
    return this.categoryNames;
  }

  match(text: string): MatchResult {
    const categoryCounts = this.emptyCounts();
    if (!text) {
      return { categoryCounts, keywords: [], total: 0 };
    }

    const normalized = normalizeText(text);
    const hits: KeywordHit[] = [];
    let total = 0;

    for (const entry of this.compiled) {
      let occurrences = 0;
      let firstIndex = -1;
      for (const found of normalized.matchAll(entry.pattern)) {
        if (firstIndex < 0) firstIndex = found.index ?? 0;
        occurrences++;
      }
      if (occurrences === 0) continue;

      categoryCounts[entry.category] =
        (categoryCounts[entry.category] ?? 0) + occurrences;
      total += occurrences;
      hits.push({ keyword: entry.keyword, firstIndex, order: entry.order });
    }

    hits.sort((a, b) => a.firstIndex - b.firstIndex || a.order - b.order);

    return {
      categoryCounts,
      keywords: hits.map((hit) => hit.keyword),
      total,
    };
  }

  private emptyCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const name of this.categoryNames) counts[name] = 0;
    return counts;
  }
}
