import { KeywordFrequency, ScoredItem } from "@/types";
import {
  KeywordFrequencyView,
  ProblemItemView,
} from "@problem-radar/types/global";

export const POST_PREVIEW_LENGTH = 500;
export const COMMENT_PREVIEW_LENGTH = 300;

export const round2 = (value: number): number =>
  Math.round(value * 100) / 100;

export const truncate = (text: string, maxLength: number): string =>
  text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;

export const toItemView = (scored: ScoredItem): ProblemItemView => {
  const { item, match } = scored;
  const previewLength =
    item.kind === "post" ? POST_PREVIEW_LENGTH : COMMENT_PREVIEW_LENGTH;

  return {
    id: item.id,
    kind: item.kind,
    title: item.title,
    text: truncate(item.body, previewLength),
    url: `https://reddit.com${item.permalink}`,
    subreddit: item.subreddit,
    score: item.score,
    comments: item.numComments,
    created: new Date(item.createdUtc * 1000).toISOString(),
    author: item.author,
    problemKeywords: [...match.keywords],
    categoryCounts: { ...match.categoryCounts },
    problemScore: round2(scored.problemScore),
    isProblem: scored.isProblem,
  };
};

export const toItemViews = (
  items: readonly ScoredItem[],
  limit = items.length
): ProblemItemView[] => items.slice(0, limit).map(toItemView);

export const toKeywordViews = (
  ranking: readonly KeywordFrequency[],
  limit: number
): KeywordFrequencyView[] =>
  ranking
    .slice(0, limit)
    .map(({ keyword, count }) => ({ keyword, frequency: count }));
