import { RadarItemKind } from "@problem-radar/types/global";
import type { FetchFailureError } from "@/utils/errors";

export type { RadarItemKind };

export type RedditSort = "relevance" | "hot" | "top" | "new" | "comments";
export type SubredditSort = "hot" | "top" | "new" | "rising";
export type TimeFilter = "hour" | "day" | "week" | "month" | "year" | "all";

/**
 * A post or comment exactly as fetched, before any scoring.
 */
export interface RawItem {
  readonly id: string;
  readonly kind: RadarItemKind;
  readonly title: string | null;
  readonly body: string;
  readonly author: string;
  readonly subreddit: string;
  readonly score: number;
  readonly numComments: number | null;
  readonly createdUtc: number;
  readonly permalink: string;
}

export interface KeywordCategory {
  readonly name: string;
  readonly description?: string;
  readonly keywords: readonly string[];
}

export interface ScoringWeights {
  readonly keyword: number;
  readonly score: number;
  readonly comments: number;
}

export interface EngineConfig {
  readonly taxonomy: readonly KeywordCategory[];
  readonly weights: ScoringWeights;
  readonly problemThreshold: number;
}

export interface MatchResult {
  categoryCounts: Record<string, number>;
  keywords: string[];
  total: number;
}

export interface ScoredItem {
  item: RawItem;
  match: MatchResult;
  problemScore: number;
  isProblem: boolean;
  engagement: number;
  /** Index of the item in its fetched batch. */
  position: number;
}

export interface KeywordFrequency {
  keyword: string;
  count: number;
}

export interface AggregateResult {
  items: ScoredItem[];
  problems: ScoredItem[];
  keywordRanking: KeywordFrequency[];
  flaggedCount: number;
  totalCount: number;
  averageScore: number;
  averageComments: number;
}

export interface PatternEntry {
  pattern: string;
  supportCount: number;
  engagement: number;
  occurrences: number;
  batches: number[];
}

export interface PatternResult {
  patterns: PatternEntry[];
  batchCount: number;
  itemCount: number;
}

export type TextExtractor = (item: RawItem) => string;

export interface EngagementFilter {
  minScore: number;
  minComments: number;
}

export interface QueryFetchRequest {
  query: string;
  subreddit?: string;
  limit: number;
  sort: RedditSort;
  timeFilter: TimeFilter;
}

export interface SubredditFetchRequest {
  subreddit: string;
  limit: number;
  sort: SubredditSort;
  timeFilter: TimeFilter;
}

export interface TrendingFetchRequest {
  subreddits: string[];
  limit: number;
  minScore: number;
  minComments: number;
}

export interface PostFetchRequest {
  postId: string;
  includeComments: boolean;
  commentLimit: number;
}

export interface PostWithComments {
  post: RawItem;
  comments: RawItem[];
}

/**
 * Items gathered from several listings, with the listings that failed.
 * At least one listing succeeded.
 */
export interface FetchBatch {
  items: RawItem[];
  failures: FetchFailureError[];
}

/**
 * Supplies raw posts and comments. Implementations own rate limiting and
 * retries; every failure surfaces as a FetchFailureError.
 */
export interface FetchCollaborator {
  fetchByQuery(request: QueryFetchRequest): Promise<RawItem[]>;
  fetchBySubreddit(request: SubredditFetchRequest): Promise<RawItem[]>;
  fetchTrending(request: TrendingFetchRequest): Promise<FetchBatch>;
  fetchPostWithComments(request: PostFetchRequest): Promise<PostWithComments>;
}
