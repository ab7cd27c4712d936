import { Server } from "http";
import type { ToolLimits } from "../config/env";
import { createApp } from "../server";
import { AnalysisService } from "../services/analysis.service";
import { ToolRouter } from "../tools/router";
import { FetchFailureError } from "../utils/errors";
import { FakeFetcher } from "./helpers/fakeFetcher";
import { makePost, testEngine } from "./helpers/factories";

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

describe("HTTP API", () => {
  const fetcher = new FakeFetcher();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const router = new ToolRouter(
      new AnalysisService(fetcher, testEngine()),
      limits
    );
    server = createApp(router).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "ok", environment: "test" });
  });

  it("runs a tool and returns its outcome", async () => {
    fetcher.fetchByQuery.mockResolvedValue([makePost("a", "stuck", { score: 4 })]);

    const res = await post("/api/tools/search_reddit_problems", { query: "crm" });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      ok: true,
      tool: "search_reddit_problems",
      result: { resultsCount: 1, flaggedCount: 1 },
    });
  });

  it("maps invalid input to 400", async () => {
    const res = await post("/api/tools/search_reddit_problems", {});

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      ok: false,
      error: { type: "InvalidInput", details: ['"query" is required'] },
    });
  });

  it("maps a malformed JSON body to 400", async () => {
    const res = await fetch(`${baseUrl}/api/tools/search_reddit_problems`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: '{"query": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      ok: false,
      error: { type: "InvalidInput", message: "Malformed request body" },
    });
    expect(fetcher.fetchByQuery).not.toHaveBeenCalled();
  });

  it("allows cross-origin calls without credentials", async () => {
    const res = await fetch(`${baseUrl}/health`, {
      headers: { origin: "https://agent.example" },
    });

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("access-control-allow-credentials")).toBeNull();
  });

  it("maps fetch failures to 502", async () => {
    fetcher.fetchByQuery.mockRejectedValue(
      new FetchFailureError(
        "Failed to fetch r/all search: timed out",
        "timeout",
        "r/all search"
      )
    );

    const res = await post("/api/tools/search_reddit_problems", { query: "crm" });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({
      ok: false,
      error: { type: "FetchFailure", reason: "timeout" },
    });
  });

  it("returns 404 for unknown tools", async () => {
    const res = await post("/api/tools/nope", {});

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      tool: "nope",
      error: { type: "InvalidInput", message: "Unknown tool: nope" },
    });
  });
});
