import { sample } from "./random.js";
import type { Dataset, Review, Rng } from "./types.js";

export const REVIEWS_PER_BOOK = 2;
export const REVIEW_PREVIEW_LENGTH = 400;

export type ReviewSelection = {
  reviews: Review[];
  available: number; // after spoiler filtering
};

/**
 * Up to `limit` random reviews for a work. Spoiler-flagged reviews are left
 * out when `hideSpoilers` is set.
 */
export const reviewsForWork = (
  dataset: Dataset,
  workId: string,
  options: { hideSpoilers?: boolean; limit?: number; rng?: Rng } = {}
): ReviewSelection => {
  const all = dataset.reviewsByWork.get(workId) ?? [];
  const visible = options.hideSpoilers ? all.filter((review) => !review.spoiler) : all;
  return {
    reviews: sample(visible, options.limit ?? REVIEWS_PER_BOOK, options.rng),
    available: visible.length,
  };
};

export const truncateText = (text: string, maxLength = REVIEW_PREVIEW_LENGTH): string => {
  const flat = text.replace(/\n/g, " ");
  return flat.length > maxLength ? `${flat.slice(0, maxLength)}...` : flat;
};
