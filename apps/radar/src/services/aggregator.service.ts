import { ProblemSignalMatcher } from "@/filters/problemSignalMatcher";
import {
  AggregateResult,
  EngagementFilter,
  KeywordFrequency,
  RawItem,
  ScoredItem,
  TextExtractor,
} from "@/types";
import { PostScorer } from "./scorer.service";

export const defaultTextOf: TextExtractor = (item) =>
  item.title ? `${item.title} ${item.body}` : item.body;

/**
 * Keeps items meeting both engagement floors. Applying it to input that was
 * already filtered upstream returns the same items.
 */
export const applyEngagementFilter = (
  items: readonly RawItem[],
  filter: EngagementFilter
): RawItem[] =>
  items.filter(
    (item) =>
      item.score >= filter.minScore &&
      (item.numComments ?? 0) >= filter.minComments
  );

/** problemScore desc, then engagement desc, then fetch order. */
export const compareScoredItems = (a: ScoredItem, b: ScoredItem): number =>
  b.problemScore - a.problemScore ||
  b.engagement - a.engagement ||
  a.position - b.position;

/**
 * Counts how many items mention each keyword. Every item contributes each of
 * its distinct keywords once.
 */
export const rankKeywords = (
  items: readonly ScoredItem[]
): KeywordFrequency[] => {
  const counts = new Map<string, number>();
  for (const scored of items) {
    for (const keyword of scored.match.keywords) {
      counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([keyword, count]) => ({ keyword, count }))
    .sort(
      (a, b) =>
        b.count - a.count ||
        (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0)
    );
};

const average = (values: readonly number[]): number =>
  values.length
    ? values.reduce((sum, value) => sum + value, 0) / values.length
    : 0;

export class CollectionAggregator {
  constructor(
    private readonly matcher: ProblemSignalMatcher,
    private readonly scorer: PostScorer
  ) {}

  /**
   * Scores every item independently. The result keeps fetch order; each
   * ScoredItem carries its position for the final tie-break.
   */
  scoreAll(
    items: readonly RawItem[],
    textOf: TextExtractor = defaultTextOf
  ): ScoredItem[] {
    return items.map((item, position) =>
      this.scorer.score(item, this.matcher.match(textOf(item)), position)
    );
  }

  aggregate(
    items: readonly RawItem[],
    textOf: TextExtractor = defaultTextOf
  ): AggregateResult {
    return this.reduce(this.scoreAll(items, textOf));
  }

  reduce(scored: readonly ScoredItem[]): AggregateResult {
    const ranked = [...scored].sort(compareScoredItems);
    const problems = ranked.filter((entry) => entry.isProblem);
    const byPosition = [...scored].sort((a, b) => a.position - b.position);

    return {
      items: ranked,
      problems,
      keywordRanking: rankKeywords(byPosition),
      flaggedCount: problems.length,
      totalCount: scored.length,
      averageScore: average(byPosition.map((entry) => entry.item.score)),
      averageComments: average(
        byPosition.flatMap((entry) =>
          entry.item.numComments === null ? [] : [entry.item.numComments]
        )
      ),
    };
  }
}
