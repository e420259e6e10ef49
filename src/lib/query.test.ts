import { describe, expect, it } from "vitest";
import { QueryError } from "./errors.js";
import { cacheKeyFor, parseBooksQuery, toBooksSearchParams } from "./query.js";

describe("parseBooksQuery", () => {
  it("returns no filters for an empty query", () => {
    expect(parseBooksQuery({})).toEqual({
      params: {},
      limit: undefined,
      surprise: false,
      format: "json",
    });
  });

  it("maps query parameters to filters", () => {
    const query = parseBooksQuery({
      genre: ["fantasy", "history"],
      author: "Ada Marsh",
      minRating: "4",
      minYear: "1900",
      title: " orbit ",
      withReviews: "true",
      limit: "3",
      surprise: "1",
    });

    expect(query).toEqual({
      params: {
        genres: ["fantasy", "history"],
        authors: ["Ada Marsh"],
        minRating: 4,
        yearRange: [1900, Infinity],
        titleSearch: "orbit",
        onlyWithReviews: true,
      },
      limit: 3,
      surprise: true,
      format: "json",
    });
  });

  it("rejects malformed values", () => {
    expect(() => parseBooksQuery({ minRating: "abc" })).toThrow(QueryError);
    expect(() => parseBooksQuery({ minRating: "abc" })).toThrow('Invalid number for "minRating": abc');
    expect(() => parseBooksQuery({ minYear: "2000", maxYear: "1900" })).toThrow(
      '"minYear" must not exceed "maxYear"'
    );
    expect(() => parseBooksQuery({ format: "xml" })).toThrow("Unsupported format: xml");
  });

  it("accepts csv output", () => {
    expect(parseBooksQuery({ format: "CSV" }).format).toBe("csv");
  });
});

describe("toBooksSearchParams", () => {
  it("writes only the parameters that are set", () => {
    const search = toBooksSearchParams({
      params: { genres: ["a", "b"], yearRange: [1900, Infinity] },
      limit: 5,
    });
    expect(search.toString()).toBe("genre=a&genre=b&minYear=1900&limit=5");
  });

  it("is read back by parseBooksQuery", () => {
    const search = toBooksSearchParams({
      params: { authors: ["Cleo Varga"], pageRange: [100, 300], keyword: "clocks" },
      surprise: true,
    });
    const query = parseBooksQuery(Object.fromEntries(search.entries()));
    expect(query.params).toEqual({ authors: ["Cleo Varga"], pageRange: [100, 300], keyword: "clocks" });
    expect(query.surprise).toBe(true);
  });
});

describe("cacheKeyFor", () => {
  it("ignores the order of repeated parameters", () => {
    const base = { surprise: false, format: "json" as const };
    expect(cacheKeyFor({ ...base, params: { genres: ["b", "a"] } })).toBe(
      cacheKeyFor({ ...base, params: { genres: ["a", "b"] } })
    );
    expect(cacheKeyFor({ ...base, params: { genres: ["b", "a"] } })).toBe("genre=a&genre=b");
  });
});
