import { EngineConfig, MatchResult, RawItem, ScoredItem } from "@/types";

/** log(1 + x) with x floored at zero. */
export const logScaled = (value: number): number =>
  Math.log1p(Math.max(0, value));

/**
 * Net upvotes (floored at zero) plus comment count. Used for tie-breaks and
 * for weighting cross-query patterns.
 */
export const engagementOf = (item: RawItem): number =>
  Math.max(0, item.score) + Math.max(0, item.numComments ?? 0);

export class PostScorer {
  constructor(private readonly engine: EngineConfig) {}

  /**
   * problemScore = matches * keyword weight
   *              + log1p(score) * score weight
   *              + log1p(comments) * comment weight   (posts only)
   *
   * An item is a problem when it clears the threshold and has at least one
   * keyword match; engagement alone never qualifies.
   */
  score(item: RawItem, match: MatchResult, position = 0): ScoredItem {
    const { weights, problemThreshold } = this.engine;

    const keywordTerm = match.total * weights.keyword;
    const scoreTerm = logScaled(item.score) * weights.score;
    const commentTerm =
      item.kind === "post" && item.numComments !== null
        ? logScaled(item.numComments) * weights.comments
        : 0;

    const problemScore = keywordTerm + scoreTerm + commentTerm;

    return {
      item,
      match,
      problemScore,
      isProblem: match.total >= 1 && problemScore >= problemThreshold,
      engagement: engagementOf(item),
      position,
    };
  }
}
