import { describe, expect, it } from "vitest";
import {
  DEFAULT_FILTER_STATE,
  DEFAULT_REVIEW_SETTINGS,
  fieldHint,
  toFilterParams,
} from "./filterState.js";
import type { Range } from "./types.js";

const bounds: { years: Range; pages: Range } = { years: [1600, 2021], pages: [120, 610] };

describe("toFilterParams", () => {
  it("keeps only the default rating threshold", () => {
    expect(toFilterParams(DEFAULT_FILTER_STATE, bounds)).toEqual({ minRating: 3.5 });
  });

  it("sends nothing when every widget is at its widest", () => {
    expect(
      toFilterParams(
        { ...DEFAULT_FILTER_STATE, minRating: 1, yearRange: [1600, 2021], pageRange: [120, 610] },
        bounds
      )
    ).toEqual({});
  });

  it("resolves presets against the dataset bounds", () => {
    const params = toFilterParams(
      { ...DEFAULT_FILTER_STATE, era: "modern", length: "short", yearRange: [1700, 1800] },
      bounds
    );
    expect(params.yearRange).toEqual([1500, 2021]);
    expect(params.pageRange).toEqual([120, 250]);
  });

  it("passes trimmed text and list filters through", () => {
    const params = toFilterParams(
      {
        ...DEFAULT_FILTER_STATE,
        genres: ["history"],
        authors: ["Dev Patel"],
        keyword: " war ",
        excludeKeyword: "",
        titleSearch: "ledger",
        minRatingsCount: 100,
        onlyWithReviews: true,
        pageRange: [200, 600],
      },
      bounds
    );
    expect(params).toEqual({
      genres: ["history"],
      authors: ["Dev Patel"],
      minRating: 3.5,
      pageRange: [200, 600],
      minRatingsCount: 100,
      titleSearch: "ledger",
      keyword: "war",
      onlyWithReviews: true,
    });
  });
});

describe("review settings", () => {
  it("live outside the state the book query is built from", () => {
    expect(DEFAULT_REVIEW_SETTINGS).toEqual({ hideSpoilers: true });
    expect(Object.keys(DEFAULT_FILTER_STATE)).not.toContain("hideSpoilers");
  });
});

describe("fieldHint", () => {
  const dictionary = {
    avg_rating: "Mean reader rating from 1 to 5",
    num_pages: "",
  };

  it("describes a widget by the column it filters", () => {
    expect(fieldHint(dictionary, "minRating")).toBe("Mean reader rating from 1 to 5");
  });

  it("has no hint for blank entries, unmapped widgets or a missing dictionary", () => {
    expect(fieldHint(dictionary, "pageRange")).toBeUndefined();
    expect(fieldHint(dictionary, "keyword")).toBeUndefined();
    expect(fieldHint(undefined, "minRating")).toBeUndefined();
  });
});
