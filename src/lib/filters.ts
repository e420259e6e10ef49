import type { Dataset, FilterParams, Range, Review, Work } from "./types.js";

const contains = (haystack: string, needle: string) =>
  haystack.toLowerCase().includes(needle.toLowerCase());

// Unknown values (null) pass a range filter
const inRange = (value: number | null, range: Range) =>
  value == null || (value >= range[0] && value <= range[1]);

const hasText = (value: string | undefined): value is string =>
  value != null && value.trim() !== "";

export const isEmptyFilter = (params: FilterParams): boolean =>
  !params.genres?.length &&
  !params.authors?.length &&
  params.minRating == null &&
  params.yearRange == null &&
  params.pageRange == null &&
  !hasText(params.keyword) &&
  !hasText(params.titleSearch) &&
  !hasText(params.excludeKeyword) &&
  params.minRatingsCount == null &&
  !params.onlyWithReviews;

/**
 * Build one predicate per supplied parameter. The work passes when every
 * predicate does.
 */
export const buildPredicates = (
  params: FilterParams,
  reviewsFor: (work: Work) => Review[] = () => []
): Array<(work: Work) => boolean> => {
  const predicates: Array<(work: Work) => boolean> = [];

  if (params.genres?.length) {
    const wanted = new Set(params.genres.map((genre) => genre.trim()));
    predicates.push((work) => work.genres.some((genre) => wanted.has(genre)));
  }

  if (params.authors?.length) {
    const wanted = new Set(params.authors);
    predicates.push((work) => wanted.has(work.author));
  }

  const { minRating, yearRange, pageRange, minRatingsCount } = params;
  if (minRating != null) {
    predicates.push((work) => work.averageRating != null && work.averageRating >= minRating);
  }
  if (yearRange) {
    predicates.push((work) => inRange(work.publicationYear, yearRange));
  }
  if (pageRange) {
    predicates.push((work) => inRange(work.pageCount, pageRange));
  }
  if (minRatingsCount != null) {
    predicates.push((work) => work.ratingsCount != null && work.ratingsCount >= minRatingsCount);
  }

  const titleSearch = params.titleSearch?.trim();
  if (titleSearch) {
    predicates.push((work) => contains(work.title, titleSearch));
  }

  const keyword = params.keyword?.trim();
  if (keyword) {
    predicates.push(
      (work) =>
        contains(work.title, keyword) ||
        contains(work.description, keyword) ||
        reviewsFor(work).some((review) => contains(review.text, keyword))
    );
  }

  const excluded = params.excludeKeyword?.trim();
  if (excluded) {
    predicates.push(
      (work) => !contains(work.title, excluded) && !contains(work.description, excluded)
    );
  }

  if (params.onlyWithReviews) {
    predicates.push((work) => (work.textReviewsCount ?? 0) > 0);
  }

  return predicates;
};

/** Works matching every supplied filter, in dataset order. */
export function filterWorks(dataset: Dataset, params: FilterParams = {}): Work[] {
  if (isEmptyFilter(params)) return dataset.works.slice();
  const predicates = buildPredicates(
    params,
    (work) => dataset.reviewsByWork.get(work.id) ?? []
  );
  return dataset.works.filter((work) => predicates.every((predicate) => predicate(work)));
}

export const extractGenres = (works: Work[]): string[] => {
  const genres = new Set<string>();
  for (const work of works) {
    for (const genre of work.genres) genres.add(genre);
  }
  return Array.from(genres).sort((a, b) => a.localeCompare(b));
};

export const extractAuthors = (works: Work[]): string[] =>
  Array.from(new Set(works.map((work) => work.author).filter(Boolean))).sort((a, b) =>
    a.localeCompare(b)
  );

/** Integer min/max of a numeric field, or the defaults when no work has one. */
export const numericBounds = (
  works: Work[],
  pick: (work: Work) => number | null,
  defaults: Range
): Range => {
  let min = Infinity;
  let max = -Infinity;
  for (const work of works) {
    const value = pick(work);
    if (value == null) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (min === Infinity) return defaults;
  return [Math.trunc(min), Math.trunc(max)];
};

export type Preset = { key: string; label: string; range: (bounds: Range) => Range };

export const ERA_PRESETS: Preset[] = [
  { key: "ancient", label: "Ancient (pre-500)", range: ([min]) => [min, 500] },
  { key: "classical", label: "Classical (500-1500)", range: () => [500, 1500] },
  { key: "modern", label: "Modern (1500+)", range: ([, max]) => [1500, max] },
  { key: "19th", label: "19th Century", range: () => [1800, 1899] },
  { key: "20th", label: "20th Century", range: () => [1900, 1999] },
  { key: "21st", label: "21st Century", range: ([, max]) => [2000, max] },
];

export const LENGTH_PRESETS: Preset[] = [
  { key: "short", label: "Short (<250 pages)", range: ([min]) => [min, 250] },
  { key: "long", label: "Long (400+ pages)", range: ([, max]) => [400, max] },
];

export const findPreset = (presets: Preset[], key: string): Preset | undefined =>
  presets.find((preset) => preset.key === key);
