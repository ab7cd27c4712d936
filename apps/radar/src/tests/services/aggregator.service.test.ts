import {
  applyEngagementFilter,
  defaultTextOf,
} from "../../services/aggregator.service";
import { makeComment, makePost, testEngine } from "../helpers/factories";

describe("CollectionAggregator", () => {
  const { aggregator } = testEngine();

  const scenario = [
    makePost("a", "I wish there was a tool for X", { score: 100 }),
    makePost("b", "this is frustrating, nothing works", { score: 5 }),
    makePost("c", "great day today", { score: 500 }),
  ];

  it("returns an empty result for an empty collection", () => {
    expect(aggregator.aggregate([])).toEqual({
      items: [],
      problems: [],
      keywordRanking: [],
      flaggedCount: 0,
      totalCount: 0,
      averageScore: 0,
      averageComments: 0,
    });
  });

  it("ranks, flags and counts a mixed collection", () => {
    const result = aggregator.aggregate(scenario);

    expect(result.items.map((scored) => scored.item.id)).toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(result.items[0]?.problemScore).toBeCloseTo(
      4 + Math.log1p(100) * 0.5,
      10
    );
    expect(result.items[1]?.problemScore).toBeCloseTo(
      4 + Math.log1p(5) * 0.5,
      10
    );
    expect(result.items[2]?.problemScore).toBeCloseTo(
      Math.log1p(500) * 0.5,
      10
    );
    expect(result.items[2]?.isProblem).toBe(false);
    expect(result.problems.map((scored) => scored.item.id)).toEqual(["a", "b"]);
    expect(result.flaggedCount).toBe(2);
    expect(result.totalCount).toBe(3);
    expect(result.keywordRanking).toEqual([
      { keyword: "frustrating", count: 1 },
      { keyword: "nothing works", count: 1 },
      { keyword: "wish", count: 1 },
      { keyword: "wish there was", count: 1 },
    ]);
    expect(result.averageScore).toBeCloseTo(605 / 3, 10);
    expect(result.averageComments).toBe(0);
  });

  it("breaks score ties by engagement, then by fetch order", () => {
    const { aggregator: keywordsOnly } = testEngine({
      weights: { keyword: 1, score: 0, comments: 0 },
    });
    const result = keywordsOnly.aggregate([
      makePost("x", "stuck", { score: 1 }),
      makePost("y", "stuck", { score: 50 }),
      makePost("z", "stuck", { score: 50 }),
    ]);

    expect(result.items.map((scored) => scored.item.id)).toEqual([
      "y",
      "z",
      "x",
    ]);
  });

  it("counts a keyword once per item in the keyword ranking", () => {
    const result = aggregator.aggregate([
      makePost("a", "bug after bug after bug"),
      makePost("b", "I wish it had a bug tracker"),
    ]);

    expect(result.keywordRanking).toEqual([
      { keyword: "bug", count: 2 },
      { keyword: "wish", count: 1 },
    ]);
  });

  it("is idempotent", () => {
    const first = aggregator.aggregate(scenario);
    const second = aggregator.aggregate(scenario);

    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("does not depend on the order items were scored in", () => {
    const scored = aggregator.scoreAll(scenario);

    expect(aggregator.reduce([...scored].reverse())).toEqual(
      aggregator.aggregate(scenario)
    );
  });

  it("scores with a custom text extractor", () => {
    const post = makePost("a", "problem", { body: "all fine" });

    expect(aggregator.aggregate([post]).flaggedCount).toBe(1);
    expect(
      aggregator.aggregate([post], (item) => item.body).flaggedCount
    ).toBe(0);
  });

  it("averages comment counts over posts only", () => {
    const result = aggregator.aggregate([
      makePost("a", "post", { score: 10, numComments: 3 }),
      makePost("b", "post", { score: 20, numComments: 4 }),
      makeComment("c", "reply", { score: 30 }),
    ]);

    expect(result.averageScore).toBe(20);
    expect(result.averageComments).toBe(3.5);
  });
});

describe("defaultTextOf", () => {
  it("joins title and body for posts and uses the body for comments", () => {
    expect(defaultTextOf(makePost("a", "Title", { body: "body" }))).toBe(
      "Title body"
    );
    expect(defaultTextOf(makeComment("c", "only body"))).toBe("only body");
  });
});

describe("applyEngagementFilter", () => {
  const items = [
    makePost("a", "t", { score: 50, numComments: 10 }),
    makePost("b", "t", { score: 5, numComments: 10 }),
    makePost("c", "t", { score: 50, numComments: 1 }),
    makePost("d", "t", { score: 10, numComments: 5 }),
  ];
  const filter = { minScore: 10, minComments: 5 };

  it("keeps items meeting both floors", () => {
    expect(applyEngagementFilter(items, filter).map((item) => item.id)).toEqual(
      ["a", "d"]
    );
  });

  it("returns the same items when applied twice", () => {
    const once = applyEngagementFilter(items, filter);

    expect(applyEngagementFilter(once, filter)).toEqual(once);
  });
});
