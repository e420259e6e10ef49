import { filterWorks } from "./filters.js";
import { sample } from "./random.js";
import type { Dataset, FilterParams, Rng, Work } from "./types.js";

export const DEFAULT_LIMIT = 5;
export const MAX_LIMIT = 20;
export const MAX_SIMILAR = 5;

// Descending, unknown values last
const byNullableDesc = (a: number | null, b: number | null) => {
  if (a === b) return 0;
  if (a == null) return 1;
  if (b == null) return -1;
  return b - a;
};

/** Highest average rating first, ties broken by ratings count. Returns a new array. */
export const rankWorks = (works: readonly Work[]): Work[] =>
  works
    .slice()
    .sort(
      (a, b) =>
        byNullableDesc(a.averageRating, b.averageRating) ||
        byNullableDesc(a.ratingsCount, b.ratingsCount)
    );

// "Surprise Me": k random works from the current selection
export const surpriseMe = (works: readonly Work[], k = 1, rng: Rng = Math.random): Work[] =>
  sample(works, k, rng);

export const clampLimit = (limit: number | undefined): number => {
  if (limit == null || !Number.isFinite(limit)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.floor(limit)));
};

export type Recommendation = {
  total: number; // size of the filtered set
  items: Work[];
  matches: Work[]; // full filtered set, ranked
};

export function recommend(
  dataset: Dataset,
  params: FilterParams,
  options: { limit?: number; surprise?: boolean; rng?: Rng } = {}
): Recommendation {
  const limit = clampLimit(options.limit);
  const matches = rankWorks(filterWorks(dataset, params));
  const items = options.surprise
    ? surpriseMe(matches, limit, options.rng)
    : matches.slice(0, limit);
  return { total: matches.length, items, matches };
}

/** Works listed in `similar_books` that exist in the dataset, in listed order. */
export const similarWorks = (dataset: Dataset, work: Work, max = MAX_SIMILAR): Work[] => {
  if (work.similarIds.length === 0) return [];
  const byId = new Map(dataset.works.map((candidate) => [candidate.id, candidate]));
  const similar: Work[] = [];
  for (const id of work.similarIds) {
    const match = byId.get(id);
    if (match && match.id !== work.id) similar.push(match);
    if (similar.length >= max) break;
  }
  return similar;
};
