import { QueryError } from "./errors.js";
import type { FilterParams, Range } from "./types.js";

export type QueryValue = string | string[] | undefined;
export type QueryRecord = Record<string, QueryValue>;

export type BooksQuery = {
  params: FilterParams;
  limit?: number;
  surprise: boolean;
  format: "json" | "csv";
};

const values = (value: QueryValue): string[] =>
  (Array.isArray(value) ? value : value != null ? [value] : [])
    .map((item) => item.trim())
    .filter(Boolean);

const single = (value: QueryValue): string | undefined => values(value)[0];

const numberParam = (query: QueryRecord, name: string): number | undefined => {
  const raw = single(query[name]);
  if (raw == null) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new QueryError(name, `Invalid number for "${name}": ${raw}`);
  }
  return parsed;
};

const flagParam = (query: QueryRecord, name: string): boolean => {
  const raw = single(query[name])?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
};

// Open-ended ranges use the other end's infinity
const rangeParam = (query: QueryRecord, minName: string, maxName: string): Range | undefined => {
  const min = numberParam(query, minName);
  const max = numberParam(query, maxName);
  if (min == null && max == null) return undefined;
  const range: Range = [min ?? -Infinity, max ?? Infinity];
  if (range[0] > range[1]) {
    throw new QueryError(minName, `"${minName}" must not exceed "${maxName}"`);
  }
  return range;
};

/** Parse the /api/books query string into filter parameters. */
export function parseBooksQuery(query: QueryRecord): BooksQuery {
  const params: FilterParams = {};

  const genres = values(query.genre);
  if (genres.length) params.genres = genres;
  const authors = values(query.author);
  if (authors.length) params.authors = authors;

  const minRating = numberParam(query, "minRating");
  if (minRating != null) params.minRating = minRating;
  const yearRange = rangeParam(query, "minYear", "maxYear");
  if (yearRange) params.yearRange = yearRange;
  const pageRange = rangeParam(query, "minPages", "maxPages");
  if (pageRange) params.pageRange = pageRange;
  const minRatingsCount = numberParam(query, "minRatings");
  if (minRatingsCount != null) params.minRatingsCount = minRatingsCount;

  const keyword = single(query.keyword);
  if (keyword) params.keyword = keyword;
  const titleSearch = single(query.title);
  if (titleSearch) params.titleSearch = titleSearch;
  const excludeKeyword = single(query.exclude);
  if (excludeKeyword) params.excludeKeyword = excludeKeyword;
  if (flagParam(query, "withReviews")) params.onlyWithReviews = true;

  const format = single(query.format)?.toLowerCase();
  if (format != null && format !== "json" && format !== "csv") {
    throw new QueryError("format", `Unsupported format: ${format}`);
  }

  return {
    params,
    limit: numberParam(query, "limit"),
    surprise: flagParam(query, "surprise"),
    format: format === "csv" ? "csv" : "json",
  };
}

/** Inverse of parseBooksQuery, used by the client. */
export function toBooksSearchParams(query: Partial<BooksQuery>): URLSearchParams {
  const search = new URLSearchParams();
  const params = query.params ?? {};
  params.genres?.forEach((genre) => search.append("genre", genre));
  params.authors?.forEach((author) => search.append("author", author));
  if (params.minRating != null) search.set("minRating", String(params.minRating));
  const setRange = ([min, max]: Range, minName: string, maxName: string) => {
    if (Number.isFinite(min)) search.set(minName, String(min));
    if (Number.isFinite(max)) search.set(maxName, String(max));
  };
  if (params.yearRange) setRange(params.yearRange, "minYear", "maxYear");
  if (params.pageRange) setRange(params.pageRange, "minPages", "maxPages");
  if (params.minRatingsCount != null) search.set("minRatings", String(params.minRatingsCount));
  if (params.keyword) search.set("keyword", params.keyword);
  if (params.titleSearch) search.set("title", params.titleSearch);
  if (params.excludeKeyword) search.set("exclude", params.excludeKeyword);
  if (params.onlyWithReviews) search.set("withReviews", "1");
  if (query.limit != null) search.set("limit", String(query.limit));
  if (query.surprise) search.set("surprise", "1");
  if (query.format === "csv") search.set("format", "csv");
  return search;
}

/** Stable cache key: same filters give the same key regardless of parameter order. */
export const cacheKeyFor = (query: BooksQuery): string => {
  const search = toBooksSearchParams({
    ...query,
    params: {
      ...query.params,
      genres: query.params.genres?.slice().sort(),
      authors: query.params.authors?.slice().sort(),
    },
  });
  search.sort();
  return search.toString();
};
