import { logger } from "@/lib/logger";
import {
  AggregateResult,
  FetchCollaborator,
  RawItem,
  RedditSort,
  ScoredItem,
  SubredditSort,
  TimeFilter,
} from "@/types";
import { deduplicateById } from "@/utils/deduplication";
import { FetchFailureError, toFetchFailure } from "@/utils/errors";
import {
  round2,
  toItemView,
  toItemViews,
  toKeywordViews,
} from "@/utils/presenters";
import { extractPostId } from "@/utils/redditUrl";
import {
  FetchErrorView,
  PatternImpact,
  PostIdeasResult,
  ProblemItemView,
  ProblemPatternsResult,
  SearchProblemsResult,
  SubredditAnalysisResult,
  TrendingProblemsResult,
} from "@problem-radar/types/global";
import { applyEngagementFilter } from "./aggregator.service";
import { ProblemEngine } from "./engine.service";

export interface SearchProblemsArgs {
  query: string;
  subreddit?: string;
  limit: number;
  sort: RedditSort;
  timeFilter: TimeFilter;
}

export interface AnalyzeSubredditArgs {
  subreddit: string;
  limit: number;
  sort: SubredditSort;
  timeFilter: TimeFilter;
}

export interface TrendingProblemsArgs {
  subreddits: string[];
  limit: number;
  minScore: number;
  minComments: number;
}

export interface PostIdeasArgs {
  postUrl: string;
  includeComments: boolean;
  commentLimit: number;
}

export interface DiscoverPatternsArgs {
  queries: string[];
  subreddits: string[];
  postsPerQuery: number;
}

// How much of each ranking is shown; rankings are always computed in full.
const TOP_KEYWORDS = 10;
const TOP_PROBLEM_POSTS = 10;
const TOP_PATTERNS = 15;
const TOP_IDEAS = 5;
const TOP_POST_PROBLEMS = 5;
const TOP_PROBLEMS_PER_SUBREDDIT = 5;

const REMOVED_BODIES = new Set(["[deleted]", "[removed]"]);

interface QueryBatch {
  query: string;
  items: RawItem[];
  failures: FetchFailureError[];
}

const toFetchErrorView = (
  failure: FetchFailureError,
  query?: string
): FetchErrorView => ({
  target: failure.target,
  ...(query !== undefined ? { query } : {}),
  reason: failure.reason,
  message: failure.message,
});

/** Trimmed queries, keeping the first of any that differ only in case. */
const distinctQueries = (queries: readonly string[]): string[] => {
  const seen = new Set<string>();
  const distinct: string[] = [];
  for (const raw of queries) {
    const query = raw.trim();
    const key = query.toLowerCase();
    if (!query || seen.has(key)) continue;
    seen.add(key);
    distinct.push(query);
  }
  return distinct;
};

export const impactOf = (frequency: number, total: number): PatternImpact => {
  if (frequency >= total * 0.1) return "high";
  if (frequency >= total * 0.05) return "medium";
  return "low";
};

/**
 * The five analysis modes. Each fetches through the collaborator, then scores
 * and ranks in memory. Fetch failures surface as FetchFailureError; an empty
 * fetch gives an empty, successful result.
 */
export class AnalysisService {
  private readonly log = logger.child("analysis");

  constructor(
    private readonly fetcher: FetchCollaborator,
    private readonly engine: ProblemEngine
  ) {}

  async searchProblems(args: SearchProblemsArgs): Promise<SearchProblemsResult> {
    const items = await this.fetchStep(
      `r/${args.subreddit || "all"} search "${args.query}"`,
      () => this.fetcher.fetchByQuery(args)
    );
    const result = this.engine.aggregator.aggregate(items);

    this.log.info("Search analysed", {
      query: args.query,
      subreddit: args.subreddit,
      fetched: result.totalCount,
      flagged: result.flaggedCount,
    });

    return {
      query: args.query,
      subreddit: args.subreddit || "all",
      resultsCount: result.totalCount,
      flaggedCount: result.flaggedCount,
      topKeywords: toKeywordViews(result.keywordRanking, TOP_KEYWORDS),
      posts: toItemViews(result.items, args.limit),
    };
  }

  async analyzeSubreddit(
    args: AnalyzeSubredditArgs
  ): Promise<SubredditAnalysisResult> {
    const items = await this.fetchStep(`r/${args.subreddit} ${args.sort}`, () =>
      this.fetcher.fetchBySubreddit(args)
    );
    const result = this.engine.aggregator.aggregate(items);

    this.log.info("Subreddit analysed", {
      subreddit: args.subreddit,
      fetched: result.totalCount,
      flagged: result.flaggedCount,
    });

    return {
      subreddit: args.subreddit,
      analysisSummary: {
        postsAnalyzed: result.totalCount,
        problemPostsFound: result.flaggedCount,
        averageScore: round2(result.averageScore),
        averageComments: round2(result.averageComments),
        topProblemKeywords: toKeywordViews(result.keywordRanking, TOP_KEYWORDS),
        topProblemPosts: toItemViews(result.problems, TOP_PROBLEM_POSTS),
      },
      allPosts: toItemViews(result.items),
    };
  }

  async getTrendingProblems(
    args: TrendingProblemsArgs
  ): Promise<TrendingProblemsResult> {
    const { subreddits, limit, minScore, minComments } = args;
    const batch = await this.fetchStep("trending", () =>
      this.fetcher.fetchTrending(args)
    );
    const eligible = applyEngagementFilter(batch.items, {
      minScore,
      minComments,
    });
    const result = this.engine.aggregator.aggregate(eligible);

    this.log.info("Trending sweep analysed", {
      subreddits: subreddits.length ? subreddits : "all",
      fetched: batch.items.length,
      eligible: eligible.length,
      flagged: result.flaggedCount,
      failedSubreddits: batch.failures.length,
    });

    return {
      scope: subreddits.length ? subreddits : "all",
      filters: { minScore, minComments },
      resultsCount: result.totalCount,
      flaggedCount: result.flaggedCount,
      trendingProblems: toItemViews(result.items, limit),
      fetchErrors: batch.failures.map((failure) => toFetchErrorView(failure)),
    };
  }

  async getStartupIdeasFromPost(args: PostIdeasArgs): Promise<PostIdeasResult> {
    const postId = extractPostId(args.postUrl);
    const { post, comments } = await this.fetchStep(`post ${postId}`, () =>
      this.fetcher.fetchPostWithComments({
        postId,
        includeComments: args.includeComments,
        commentLimit: args.commentLimit,
      })
    );

    const scoredPost = this.engine.scoreItem(post);
    const postView = toItemView(scoredPost);

    if (!args.includeComments) {
      return {
        post: postView,
        potentialProblems: postView.problemKeywords,
        startupOpportunities: [],
      };
    }

    const readable = comments.filter(
      (comment) => comment.body && !REMOVED_BODIES.has(comment.body)
    );
    const combined = this.engine.aggregator.aggregate([post, ...readable]);
    const commentInsights = combined.items.filter(
      (scored) => scored.item.kind === "comment" && scored.match.total > 0
    );
    const aggregatedProblems = combined.keywordRanking
      .slice(0, TOP_POST_PROBLEMS)
      .map(({ keyword, count }) => ({
        problemIndicator: keyword,
        mentions: count,
      }));

    this.log.info("Post analysed", {
      postId,
      comments: readable.length,
      commentsWithSignals: commentInsights.length,
    });

    return {
      post: postView,
      potentialProblems: postView.problemKeywords,
      topComments: toItemViews(commentInsights),
      aggregatedProblems,
      startupOpportunities: aggregatedProblems.flatMap(
        ({ problemIndicator, mentions }) => [
          `Problem: ${problemIndicator} (mentioned ${mentions} times)`,
          `Opportunity: Build a solution addressing '${problemIndicator}' mentioned in r/${post.subreddit}`,
        ]
      ),
    };
  }

  async discoverProblemPatterns(
    args: DiscoverPatternsArgs
  ): Promise<ProblemPatternsResult> {
    const { postsPerQuery } = args;
    const queries = distinctQueries(args.queries);
    const scope = args.subreddits.length ? args.subreddits : ["all"];

    // Every batch must be complete before correlation starts.
    const fetched = await Promise.all(
      queries.map((query) => this.fetchQueryBatch(query, scope, postsPerQuery))
    );

    const failures = fetched.flatMap((batch) => batch.failures);
    const [firstFailure] = failures;
    if (firstFailure && failures.length === queries.length * scope.length) {
      throw firstFailure;
    }

    const batches = fetched.map((batch) =>
      this.engine.aggregator.aggregate(batch.items)
    );
    const correlation = this.engine.correlator.correlate(batches);
    const postsAnalyzed = correlation.itemCount;
    const topPatterns = correlation.patterns.slice(0, TOP_PATTERNS);

    this.log.info("Pattern discovery analysed", {
      queries: queries.length,
      fetched: postsAnalyzed,
      patterns: correlation.patterns.length,
      failedFetches: failures.length,
    });

    return {
      queriesAnalyzed: [...queries],
      postsAnalyzed,
      recurringProblemPatterns: topPatterns.map((entry) => ({
        pattern: entry.pattern,
        supportingQueries: entry.supportCount,
        engagement: entry.engagement,
        frequency: entry.occurrences,
        percentage: round2((entry.occurrences / postsAnalyzed) * 100),
      })),
      querySummaries: fetched.map((batch, index) => {
        const result = batches[index];
        return {
          query: batch.query,
          postsAnalyzed: result?.totalCount ?? 0,
          flaggedCount: result?.flaggedCount ?? 0,
          topKeywords: toKeywordViews(result?.keywordRanking ?? [], TOP_KEYWORDS),
        };
      }),
      problemsBySubreddit: this.groupBySubreddit(batches),
      potentialStartupIdeas: topPatterns.slice(0, TOP_IDEAS).map((entry) => ({
        problem: entry.pattern,
        frequency: entry.occurrences,
        supportingQueries: entry.supportCount,
        potentialImpact: impactOf(entry.occurrences, postsAnalyzed),
      })),
      fetchErrors: fetched.flatMap((batch) =>
        batch.failures.map((failure) => toFetchErrorView(failure, batch.query))
      ),
    };
  }

  /** Runs one collaborator call; any failure becomes a FetchFailureError. */
  private async fetchStep<T>(target: string, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      throw toFetchFailure(err, target);
    }
  }

  private async fetchQueryBatch(
    query: string,
    scope: string[],
    postsPerQuery: number
  ): Promise<QueryBatch> {
    const settled = await Promise.allSettled(
      scope.map((subreddit) =>
        this.fetcher.fetchByQuery({
          query,
          subreddit,
          limit: postsPerQuery,
          sort: "relevance",
          timeFilter: "all",
        })
      )
    );

    const items: RawItem[] = [];
    const failures: FetchFailureError[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        items.push(...result.value);
        return;
      }
      const failure = toFetchFailure(
        result.reason,
        `r/${scope[index] ?? "all"} search "${query}"`
      );
      this.log.warn("Search failed during pattern discovery", {
        query,
        subreddit: scope[index],
        reason: failure.reason,
        error: failure,
      });
      failures.push(failure);
    });

    return { query, items: deduplicateById(items), failures };
  }

  /**
   * Groups posts from every batch by subreddit, in order of first appearance.
   * A post found by several queries is counted once.
   */
  private groupBySubreddit(
    batches: readonly AggregateResult[]
  ): ProblemPatternsResult["problemsBySubreddit"] {
    const seen = new Set<string>();
    const groups = new Map<string, ScoredItem[]>();

    for (const batch of batches) {
      const inFetchOrder = [...batch.items].sort(
        (a, b) => a.position - b.position
      );
      for (const scored of inFetchOrder) {
        if (seen.has(scored.item.id)) continue;
        seen.add(scored.item.id);
        const group = groups.get(scored.item.subreddit) ?? [];
        group.push(scored);
        groups.set(scored.item.subreddit, group);
      }
    }

    const grouped: Record<string, { count: number; topProblems: ProblemItemView[] }> = {};
    for (const [subreddit, group] of groups) {
      // Array#sort is stable: equal scores keep batch then fetch order.
      const ranked = [...group].sort(
        (a, b) => b.problemScore - a.problemScore || b.engagement - a.engagement
      );
      grouped[subreddit] = {
        count: group.length,
        topProblems: toItemViews(ranked, TOP_PROBLEMS_PER_SUBREDDIT),
      };
    }
    return grouped;
  }
}
