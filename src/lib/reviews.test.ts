import { describe, expect, it } from "vitest";
import { reviewsForWork, truncateText } from "./reviews.js";
import { fixtureDataset } from "./testFixtures.js";

const dataset = fixtureDataset();

describe("reviewsForWork", () => {
  it("hides spoiler-flagged reviews on request", () => {
    const selection = reviewsForWork(dataset, "1", { hideSpoilers: true });
    expect(selection.available).toBe(1);
    expect(selection.reviews.map((review) => review.text)).toEqual(["Loved the lighthouse imagery."]);
  });

  it("samples up to two reviews by default", () => {
    expect(reviewsForWork(dataset, "1").reviews).toHaveLength(2);
    expect(reviewsForWork(dataset, "1", { limit: 1 }).reviews).toHaveLength(1);
  });

  it("returns nothing for a work without reviews", () => {
    expect(reviewsForWork(dataset, "4")).toEqual({ reviews: [], available: 0 });
    expect(reviewsForWork(dataset, "missing")).toEqual({ reviews: [], available: 0 });
  });
});

describe("truncateText", () => {
  it("flattens newlines and cuts long text", () => {
    expect(truncateText("first\nsecond")).toBe("first second");
    expect(truncateText("x".repeat(400))).toBe("x".repeat(400));
    expect(truncateText("x".repeat(401))).toBe(`${"x".repeat(400)}...`);
    expect(truncateText("abcdef", 3)).toBe("abc...");
  });
});
