import type { Dataset, Work } from "./types.js";

export type DatasetStats = {
  totalBooks: number;
  totalReviews: number;
  averageRating: number | null;
  uniqueAuthors: number;
};

export const datasetStats = (dataset: Dataset): DatasetStats => {
  let ratingSum = 0;
  let ratedCount = 0;
  const authors = new Set<string>();
  for (const work of dataset.works) {
    if (work.averageRating != null) {
      ratingSum += work.averageRating;
      ratedCount += 1;
    }
    if (work.author) authors.add(work.author);
  }
  return {
    totalBooks: dataset.works.length,
    totalReviews: dataset.reviewCount,
    averageRating: ratedCount > 0 ? ratingSum / ratedCount : null,
    uniqueAuthors: authors.size,
  };
};

export type RatingBucket = { label: string; from: number; count: number };

// Half-star buckets from 1.0 to 5.0; the last bucket includes 5.0
export const ratingHistogram = (works: Work[]): RatingBucket[] => {
  const buckets: RatingBucket[] = [];
  for (let from = 1; from < 5; from += 0.5) {
    buckets.push({ label: from.toFixed(1), from, count: 0 });
  }
  for (const work of works) {
    const rating = work.averageRating;
    if (rating == null || rating < 1 || rating > 5) continue;
    const index = Math.min(buckets.length - 1, Math.floor((rating - 1) * 2));
    buckets[index].count += 1;
  }
  return buckets;
};
