import { logger } from "@/lib/logger";
import {
  FetchBatch,
  FetchCollaborator,
  PostFetchRequest,
  PostWithComments,
  QueryFetchRequest,
  RawItem,
  SubredditFetchRequest,
  TrendingFetchRequest,
} from "@/types";
import { deduplicateById } from "@/utils/deduplication";
import { FetchFailureError, toFetchFailure } from "@/utils/errors";
import {
  flattenComments,
  mapCommentToRawItem,
  mapSubmissionToRawItem,
} from "@/utils/mappers";
import Bottleneck from "bottleneck";
import Snoowrap, { Listing, Submission } from "snoowrap";

export interface RedditServiceOptions {
  maxConcurrent: number;
  minTime: number;
  /** Reservoir size refilled every minute; omit to disable the reservoir. */
  requestsPerMinute?: number;
}

const ALL = "all";

export class RedditService implements FetchCollaborator {
  private readonly apiLimiter: Bottleneck;
  private readonly log = logger.child("reddit");

  constructor(
    private readonly client: Snoowrap,
    options: RedditServiceOptions
  ) {
    const { maxConcurrent, minTime, requestsPerMinute } = options;
    this.apiLimiter = new Bottleneck({
      maxConcurrent,
      minTime,
      ...(requestsPerMinute
        ? {
            reservoir: requestsPerMinute,
            reservoirRefreshAmount: requestsPerMinute,
            reservoirRefreshInterval: 60 * 1000,
          }
        : {}),
    });
  }

  /**
   * Searches posts matching a query, within one subreddit or across r/all
   * @returns Promise resolving to raw posts in Reddit's order
   */
  async fetchByQuery(request: QueryFetchRequest): Promise<RawItem[]> {
    const { query, limit, sort, timeFilter } = request;
    const subreddit = request.subreddit || ALL;
    const options = { query, sort, time: timeFilter, limit };

    const submissions = await this.schedule(
      `r/${subreddit} search "${query}"`,
      () => this.client.getSubreddit(subreddit).search(options)
    );
    return submissions.map(mapSubmissionToRawItem);
  }

  /**
   * Fetches a subreddit listing (hot, top, new or rising)
   * @returns Promise resolving to raw posts in listing order
   */
  async fetchBySubreddit(request: SubredditFetchRequest): Promise<RawItem[]> {
    const { subreddit, limit, sort, timeFilter } = request;

    const submissions = await this.schedule(
      `r/${subreddit} ${sort}`,
      (): Promise<Listing<Submission>> => {
        const listing = this.client.getSubreddit(subreddit);
        switch (sort) {
          case "top":
            return listing.getTop({ time: timeFilter, limit });
          case "new":
            return listing.getNew({ limit });
          case "rising":
            return listing.getRising({ limit });
          case "hot":
          default:
            return listing.getHot({ limit });
        }
      }
    );
    return submissions.map(mapSubmissionToRawItem);
  }

  /**
   * Fetches hot posts from each subreddit (or r/all when none are given).
   * Engagement floors are left to the caller. Subreddits that fail are
   * reported; the call only fails when every subreddit failed.
   */
  async fetchTrending(request: TrendingFetchRequest): Promise<FetchBatch> {
    const { subreddits, limit } = request;

    if (subreddits.length === 0) {
      const items = await this.fetchBySubreddit({
        subreddit: ALL,
        limit: limit * 2,
        sort: "hot",
        timeFilter: "day",
      });
      return { items, failures: [] };
    }

    const perSubreddit = Math.floor(limit / subreddits.length) + 5;
    const settled = await Promise.allSettled(
      subreddits.map((subreddit) =>
        this.fetchBySubreddit({
          subreddit,
          limit: perSubreddit,
          sort: "hot",
          timeFilter: "day",
        })
      )
    );

    const items: RawItem[] = [];
    const failures: FetchFailureError[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        items.push(...result.value);
      } else {
        const failure = toFetchFailure(
          result.reason,
          `r/${subreddits[index] ?? "unknown"} hot`
        );
        this.log.warn("Skipping subreddit in trending sweep", {
          subreddit: subreddits[index],
          reason: failure.reason,
          error: failure,
        });
        failures.push(failure);
      }
    });

    const [firstFailure] = failures;
    if (firstFailure && failures.length === subreddits.length) {
      throw firstFailure;
    }
    return { items: deduplicateById(items), failures };
  }

  /**
   * Fetches a submission and, optionally, its already-loaded comment tree
   * flattened breadth first
   */
  async fetchPostWithComments(
    request: PostFetchRequest
  ): Promise<PostWithComments> {
    const { postId, includeComments, commentLimit } = request;

    return this.schedule(`post ${postId}`, () =>
      this.client
        .getSubmission(postId)
        .fetch()
        .then((submission) => ({
          post: mapSubmissionToRawItem(submission),
          comments: includeComments
            ? flattenComments(submission.comments, commentLimit).map(
                mapCommentToRawItem
              )
            : [],
        }))
    );
  }

  private async schedule<T>(
    target: string,
    task: () => PromiseLike<T>
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await this.apiLimiter.schedule(task);
      this.log.debug(`Fetched ${target}`, { durationMs: Date.now() - start });
      return result;
    } catch (err) {
      throw toFetchFailure(err, target);
    }
  }
}
