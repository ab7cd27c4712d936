export type RadarItemKind = "post" | "comment";

/**
 * A scored Reddit post or comment as returned to tool callers.
 */
export interface ProblemItemView {
  /**
   * Reddit id of the post or comment.
   */
  id: string;
  kind: RadarItemKind;
  /**
   * Title of the post, null for comments.
   */
  title: string | null;
  /**
   * Body text, truncated for display.
   */
  text: string;
  url: string;
  subreddit: string;
  /**
   * Score of the item (upvotes - downvotes).
   */
  score: number;
  /**
   * Comment count, null for comments.
   */
  comments: number | null;
  /**
   * ISO-8601 creation time.
   */
  created: string;
  author: string;
  problemKeywords: string[];
  categoryCounts: Record<string, number>;
  /**
   * Problem score rounded to two decimals.
   */
  problemScore: number;
  isProblem: boolean;
}

export interface KeywordFrequencyView {
  keyword: string;
  frequency: number;
}

export interface FetchErrorView {
  target: string;
  query?: string;
  reason: string;
  message: string;
}

export interface SearchProblemsResult {
  query: string;
  subreddit: string;
  resultsCount: number;
  flaggedCount: number;
  topKeywords: KeywordFrequencyView[];
  posts: ProblemItemView[];
}

export interface SubredditAnalysisResult {
  subreddit: string;
  analysisSummary: {
    postsAnalyzed: number;
    problemPostsFound: number;
    averageScore: number;
    averageComments: number;
    topProblemKeywords: KeywordFrequencyView[];
    topProblemPosts: ProblemItemView[];
  };
  allPosts: ProblemItemView[];
}

export interface TrendingProblemsResult {
  scope: string[] | "all";
  filters: {
    minScore: number;
    minComments: number;
  };
  resultsCount: number;
  flaggedCount: number;
  trendingProblems: ProblemItemView[];
  fetchErrors: FetchErrorView[];
}

export interface PostIdeasResult {
  post: ProblemItemView;
  potentialProblems: string[];
  topComments?: ProblemItemView[];
  aggregatedProblems?: { problemIndicator: string; mentions: number }[];
  startupOpportunities: string[];
}

export type PatternImpact = "high" | "medium" | "low";

export interface RecurringPatternView {
  pattern: string;
  /**
   * Number of distinct queries whose results contain the pattern.
   */
  supportingQueries: number;
  engagement: number;
  /**
   * Number of posts containing the pattern, across all queries.
   */
  frequency: number;
  percentage: number;
}

export interface ProblemPatternsResult {
  queriesAnalyzed: string[];
  postsAnalyzed: number;
  recurringProblemPatterns: RecurringPatternView[];
  querySummaries: {
    query: string;
    postsAnalyzed: number;
    flaggedCount: number;
    topKeywords: KeywordFrequencyView[];
  }[];
  problemsBySubreddit: Record<
    string,
    { count: number; topProblems: ProblemItemView[] }
  >;
  potentialStartupIdeas: {
    problem: string;
    frequency: number;
    supportingQueries: number;
    potentialImpact: PatternImpact;
  }[];
  fetchErrors: FetchErrorView[];
}
