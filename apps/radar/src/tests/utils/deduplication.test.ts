import { deduplicateById } from "../../utils/deduplication";

describe("deduplicateById", () => {
  it("keeps the first occurrence in order", () => {
    const items = [
      { id: "a", n: 1 },
      { id: "b", n: 2 },
      { id: "a", n: 3 },
    ];

    expect(deduplicateById(items)).toEqual([
      { id: "a", n: 1 },
      { id: "b", n: 2 },
    ]);
  });
});
