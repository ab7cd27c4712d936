import type { ToolLimits } from "../../config/env";
import { AnalysisService } from "../../services/analysis.service";
import { ToolRouter } from "../../tools/router";
import { FetchFailureError } from "../../utils/errors";
import { FakeFetcher } from "../helpers/fakeFetcher";
import { makePost, testEngine } from "../helpers/factories";

const limits: ToolLimits = {
  max: 100,
  search: 20,
  subreddit: 50,
  trending: 30,
  trendingMinScore: 10,
  trendingMinComments: 5,
  commentLimit: 20,
  postsPerQuery: 10,
};

describe("ToolRouter", () => {
  let fetcher: FakeFetcher;
  let router: ToolRouter;

  beforeEach(() => {
    fetcher = new FakeFetcher();
    router = new ToolRouter(new AnalysisService(fetcher, testEngine()), limits);
  });
  afterAll(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  it("lists the five tools with their parameters", () => {
    const tools = router.list();

    expect(tools.map((tool) => tool.name)).toEqual([
      "search_reddit_problems",
      "analyze_subreddit_problems",
      "get_trending_problems",
      "get_startup_ideas_from_post",
      "discover_problem_patterns",
    ]);
    expect(tools[0]?.parameters.type).toBe("object");
    expect(router.has("get_trending_problems")).toBe(true);
    expect(router.has("nope")).toBe(false);
  });

  it("rejects unknown tools as invalid input", async () => {
    await expect(router.run("nope", {})).resolves.toEqual({
      ok: false,
      tool: "nope",
      error: { type: "InvalidInput", message: "Unknown tool: nope" },
    });
  });

  it("reports every invalid argument without fetching", async () => {
    const outcome = await router.run("search_reddit_problems", {
      limit: 500,
      sort: "best",
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.type).toBe("InvalidInput");
    expect(outcome.error.message).toBe(
      "Invalid arguments for search_reddit_problems"
    );
    expect(outcome.error.details).toEqual(
      expect.arrayContaining([
        '"query" is required',
        '"limit" must be less than or equal to 100',
      ])
    );
    expect(fetcher.fetchByQuery).not.toHaveBeenCalled();
  });

  it("rejects unknown argument keys", async () => {
    const outcome = await router.run("search_reddit_problems", {
      query: "crm",
      colour: "blue",
    });

    expect(outcome).toMatchObject({
      ok: false,
      error: { type: "InvalidInput", details: ['"colour" is not allowed'] },
    });
  });

  it("applies defaults before calling the service", async () => {
    fetcher.fetchByQuery.mockResolvedValue([]);

    const outcome = await router.run("search_reddit_problems", {
      query: "  crm  ",
    });

    expect(outcome.ok).toBe(true);
    expect(fetcher.fetchByQuery).toHaveBeenCalledWith({
      query: "crm",
      subreddit: undefined,
      limit: 20,
      sort: "relevance",
      timeFilter: "week",
    });
  });

  it("accepts subreddit names written with an r/ prefix", async () => {
    fetcher.fetchBySubreddit.mockResolvedValue([makePost("a", "stuck")]);

    const outcome = await router.run("analyze_subreddit_problems", {
      subreddit: "r/SaaS",
      limit: "5",
    });

    expect(outcome.ok).toBe(true);
    expect(fetcher.fetchBySubreddit).toHaveBeenCalledWith({
      subreddit: "SaaS",
      limit: 5,
      sort: "top",
      timeFilter: "week",
    });
  });

  it("fills trending defaults from the configured limits", async () => {
    fetcher.fetchTrending.mockResolvedValue({ items: [], failures: [] });

    await router.run("get_trending_problems", undefined);

    expect(fetcher.fetchTrending).toHaveBeenCalledWith({
      subreddits: [],
      limit: 30,
      minScore: 10,
      minComments: 5,
    });
  });

  it("rejects a malformed post URL without fetching", async () => {
    const outcome = await router.run("get_startup_ideas_from_post", {
      post_url: "https://reddit.com/r/startups/",
    });

    expect(outcome).toMatchObject({
      ok: false,
      tool: "get_startup_ideas_from_post",
      error: { type: "InvalidInput", message: "Invalid Reddit post URL" },
    });
    expect(fetcher.fetchPostWithComments).not.toHaveBeenCalled();
  });

  it("requires at least one pattern query", async () => {
    const outcome = await router.run("discover_problem_patterns", {
      queries: [],
    });

    expect(outcome).toMatchObject({
      ok: false,
      error: {
        type: "InvalidInput",
        details: ['"queries" must contain at least 1 items'],
      },
    });
  });

  it("rejects pattern queries that repeat, ignoring case and spacing", async () => {
    const outcome = await router.run("discover_problem_patterns", {
      queries: ["crm", " CRM "],
    });

    expect(outcome).toMatchObject({
      ok: false,
      tool: "discover_problem_patterns",
      error: { type: "InvalidInput" },
    });
    expect(fetcher.fetchByQuery).not.toHaveBeenCalled();
  });

  it("returns fetch failures as structured outcomes", async () => {
    fetcher.fetchBySubreddit.mockRejectedValue(
      new FetchFailureError(
        "Failed to fetch r/startups top: rate limited",
        "rate_limited",
        "r/startups top",
        429
      )
    );

    const outcome = await router.run("analyze_subreddit_problems", {
      subreddit: "startups",
    });

    expect(outcome).toEqual({
      ok: false,
      tool: "analyze_subreddit_problems",
      error: {
        type: "FetchFailure",
        message: "Failed to fetch r/startups top: rate limited",
        reason: "rate_limited",
        target: "r/startups top",
        statusCode: 429,
      },
    });
  });

  it("returns results from successful runs", async () => {
    fetcher.fetchByQuery.mockResolvedValue([
      makePost("a", "nothing works", { score: 3 }),
    ]);

    const outcome = await router.run("search_reddit_problems", { query: "crm" });

    expect(outcome).toMatchObject({
      ok: true,
      tool: "search_reddit_problems",
      result: { query: "crm", resultsCount: 1, flaggedCount: 1 },
    });
  });
});
