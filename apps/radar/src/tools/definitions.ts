import type { ToolLimits } from "@/config/env";
import { AnalysisService } from "@/services/analysis.service";
import { RedditSort, SubredditSort, TimeFilter } from "@/types";
import { InvalidInputError } from "@/utils/errors";
import {
  PostIdeasResult,
  ProblemPatternsResult,
  SearchProblemsResult,
  SubredditAnalysisResult,
  TrendingProblemsResult,
} from "@problem-radar/types/global";
import * as Joi from "joi";

export type ToolName =
  | "search_reddit_problems"
  | "analyze_subreddit_problems"
  | "get_trending_problems"
  | "get_startup_ideas_from_post"
  | "discover_problem_patterns";

export type ToolResult =
  | SearchProblemsResult
  | SubredditAnalysisResult
  | TrendingProblemsResult
  | PostIdeasResult
  | ProblemPatternsResult;

export interface RegisteredTool {
  name: ToolName;
  description: string;
  schema: Joi.ObjectSchema;
  invoke(service: AnalysisService, rawArgs: unknown): Promise<ToolResult>;
}

interface ToolDefinition<TInput, TResult extends ToolResult> {
  name: ToolName;
  description: string;
  schema: Joi.ObjectSchema<TInput>;
  run(service: AnalysisService, input: TInput): Promise<TResult>;
}

interface SearchInput {
  query: string;
  subreddit?: string;
  limit: number;
  sort: RedditSort;
  time_filter: TimeFilter;
}

interface SubredditInput {
  subreddit: string;
  limit: number;
  sort: SubredditSort;
  time_filter: TimeFilter;
}

interface TrendingInput {
  subreddits: string[];
  limit: number;
  min_score: number;
  min_comments: number;
}

interface PostIdeasInput {
  post_url: string;
  include_comments: boolean;
  comment_limit: number;
}

interface PatternsInput {
  queries: string[];
  subreddits: string[];
  posts_per_query: number;
}

const REDDIT_SORTS: RedditSort[] = ["relevance", "hot", "top", "new", "comments"];
const SUBREDDIT_SORTS: SubredditSort[] = ["hot", "top", "new", "rising"];
const TIME_FILTERS: TimeFilter[] = ["hour", "day", "week", "month", "year", "all"];

const subredditName = () =>
  Joi.string()
    .trim()
    .replace(/^\/?r\//i, "")
    .pattern(/^[A-Za-z0-9_]{2,21}$/)
    .messages({
      "string.pattern.base": "{{#label}} must be a subreddit name without r/",
    });

const limitOf = (fallback: number, max: number) =>
  Joi.number().integer().min(1).max(max).default(fallback);

const timeFilter = () =>
  Joi.string()
    .valid(...TIME_FILTERS)
    .default("week");

/**
 * Validates raw arguments before the operation runs. Unknown keys, missing
 * arguments and out-of-range limits are all InvalidInput.
 */
function register<TInput, TResult extends ToolResult>(
  definition: ToolDefinition<TInput, TResult>
): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    async invoke(service, rawArgs) {
      const validation = definition.schema
        .prefs({ errors: { label: "key" } })
        .validate(rawArgs ?? {}, { abortEarly: false, convert: true });
      if (validation.error) {
        throw new InvalidInputError(
          `Invalid arguments for ${definition.name}`,
          validation.error.details.map((detail) => detail.message)
        );
      }
      return definition.run(service, validation.value);
    },
  };
}

export function createToolDefinitions(limits: ToolLimits): RegisteredTool[] {
  const max = limits.max;

  return [
    register<SearchInput, SearchProblemsResult>({
      name: "search_reddit_problems",
      description:
        "Search Reddit for posts that likely indicate problems or unmet needs, ranked by problem score.",
      schema: Joi.object<SearchInput>({
        query: Joi.string().trim().min(1).required(),
        subreddit: subredditName(),
        limit: limitOf(limits.search, max),
        sort: Joi.string()
          .valid(...REDDIT_SORTS)
          .default("relevance"),
        time_filter: timeFilter(),
      }),
      run: (service, input) =>
        service.searchProblems({
          query: input.query,
          subreddit: input.subreddit,
          limit: input.limit,
          sort: input.sort,
          timeFilter: input.time_filter,
        }),
    }),

    register<SubredditInput, SubredditAnalysisResult>({
      name: "analyze_subreddit_problems",
      description:
        "Analyze a subreddit to identify common problems, pain points and unmet needs. Returns aggregated insights.",
      schema: Joi.object<SubredditInput>({
        subreddit: subredditName().required(),
        limit: limitOf(limits.subreddit, max),
        sort: Joi.string()
          .valid(...SUBREDDIT_SORTS)
          .default("top"),
        time_filter: timeFilter(),
      }),
      run: (service, input) =>
        service.analyzeSubreddit({
          subreddit: input.subreddit,
          limit: input.limit,
          sort: input.sort,
          timeFilter: input.time_filter,
        }),
    }),

    register<TrendingInput, TrendingProblemsResult>({
      name: "get_trending_problems",
      description:
        "Get high-engagement discussions that indicate problems or pain points, across chosen subreddits or all of Reddit.",
      schema: Joi.object<TrendingInput>({
        subreddits: Joi.array().items(subredditName()).max(25).default([]),
        limit: limitOf(limits.trending, max),
        min_score: Joi.number().integer().default(limits.trendingMinScore),
        min_comments: Joi.number()
          .integer()
          .min(0)
          .default(limits.trendingMinComments),
      }),
      run: (service, input) =>
        service.getTrendingProblems({
          subreddits: input.subreddits,
          limit: input.limit,
          minScore: input.min_score,
          minComments: input.min_comments,
        }),
    }),

    register<PostIdeasInput, PostIdeasResult>({
      name: "get_startup_ideas_from_post",
      description:
        "Analyze a Reddit post (by URL or permalink) and its top comments to extract problem-solution opportunities.",
      schema: Joi.object<PostIdeasInput>({
        post_url: Joi.string().trim().min(1).required(),
        include_comments: Joi.boolean().default(true),
        comment_limit: limitOf(limits.commentLimit, max),
      }),
      run: (service, input) =>
        service.getStartupIdeasFromPost({
          postUrl: input.post_url,
          includeComments: input.include_comments,
          commentLimit: input.comment_limit,
        }),
    }),

    register<PatternsInput, ProblemPatternsResult>({
      name: "discover_problem_patterns",
      description:
        "Discover problem patterns recurring across several search queries, optionally limited to some subreddits.",
      schema: Joi.object<PatternsInput>({
        queries: Joi.array()
          .items(Joi.string().trim().min(1))
          .min(1)
          .max(10)
          .unique((a: string, b: string) => a.toLowerCase() === b.toLowerCase())
          .required(),
        subreddits: Joi.array().items(subredditName()).max(10).default([]),
        posts_per_query: limitOf(limits.postsPerQuery, max),
      }),
      run: (service, input) =>
        service.discoverProblemPatterns({
          queries: input.queries,
          subreddits: input.subreddits,
          postsPerQuery: input.posts_per_query,
        }),
    }),
  ];
}
