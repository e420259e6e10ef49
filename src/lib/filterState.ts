import { ERA_PRESETS, LENGTH_PRESETS, findPreset } from "./filters.js";
import type { FilterParams, Range } from "./types.js";

// Sidebar widget state. Presets win over the custom ranges.
export type FilterState = {
  genres: string[];
  authors: string[];
  minRating: number;
  limit: number;
  titleSearch: string;
  era: string | null;
  yearRange: Range | null;
  length: string | null;
  pageRange: Range | null;
  minRatingsCount: number;
  keyword: string;
  excludeKeyword: string;
  onlyWithReviews: boolean;
};

export const DEFAULT_FILTER_STATE: FilterState = {
  genres: [],
  authors: [],
  minRating: 3.5,
  limit: 5,
  titleSearch: "",
  era: null,
  yearRange: null,
  length: null,
  pageRange: null,
  minRatingsCount: 0,
  keyword: "",
  excludeKeyword: "",
  onlyWithReviews: false,
};

// Settings that only change how a book card shows its reviews. Kept apart
// from FilterState so toggling them never refetches the book list.
export type ReviewSettings = {
  hideSpoilers: boolean;
};

export const DEFAULT_REVIEW_SETTINGS: ReviewSettings = { hideSpoilers: true };

// Dataset column behind each sidebar widget, for data dictionary hints
const FIELD_COLUMNS: Partial<Record<keyof FilterState, string>> = {
  genres: "genres",
  authors: "author",
  minRating: "avg_rating",
  titleSearch: "original_title",
  yearRange: "original_publication_year",
  pageRange: "num_pages",
  minRatingsCount: "ratings_count",
  onlyWithReviews: "text_reviews_count",
};

export const fieldHint = (
  dictionary: Record<string, string> | undefined,
  field: keyof FilterState
): string | undefined => {
  const column = FIELD_COLUMNS[field];
  if (!column || !dictionary) return undefined;
  return dictionary[column] || undefined;
};

const sameRange = (a: Range, b: Range) => a[0] === b[0] && a[1] === b[1];

const resolveRange = (
  presetKey: string | null,
  presets: typeof ERA_PRESETS,
  custom: Range | null,
  bounds: Range
): Range | undefined => {
  const preset = presetKey ? findPreset(presets, presetKey) : undefined;
  if (preset) return preset.range(bounds);
  // A custom range equal to the full bounds is no filter at all
  if (custom && !sameRange(custom, bounds)) return custom;
  return undefined;
};

export function toFilterParams(
  state: FilterState,
  bounds: { years: Range; pages: Range }
): FilterParams {
  const params: FilterParams = {};
  if (state.genres.length) params.genres = state.genres;
  if (state.authors.length) params.authors = state.authors;
  if (state.minRating > 1) params.minRating = state.minRating;

  const yearRange = resolveRange(state.era, ERA_PRESETS, state.yearRange, bounds.years);
  if (yearRange) params.yearRange = yearRange;
  const pageRange = resolveRange(state.length, LENGTH_PRESETS, state.pageRange, bounds.pages);
  if (pageRange) params.pageRange = pageRange;

  if (state.minRatingsCount > 0) params.minRatingsCount = state.minRatingsCount;
  if (state.titleSearch.trim()) params.titleSearch = state.titleSearch.trim();
  if (state.keyword.trim()) params.keyword = state.keyword.trim();
  if (state.excludeKeyword.trim()) params.excludeKeyword = state.excludeKeyword.trim();
  if (state.onlyWithReviews) params.onlyWithReviews = true;
  return params;
}
