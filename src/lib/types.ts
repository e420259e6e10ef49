// Shape of one row in goodreads_works.csv
export type WorkRow = {
  work_id: string;
  original_title: string;
  author: string;
  genres: string;
  avg_rating: string;
  ratings_count: string;
  text_reviews_count: string;
  original_publication_year: string;
  num_pages: string;
  description: string;
  image_url: string;
  similar_books: string;
  [column: string]: string;
};

// Shape of one row in goodreads_reviews.csv (and the sample file).
// n_votes and spoiler_flag are optional columns, read through the index.
export type ReviewRow = {
  work_id: string;
  rating: string;
  review_text: string;
  [column: string]: string;
};

export type DictionaryRow = {
  column: string;
  description: string;
  [column: string]: string;
};

export type Work = {
  id: string;
  title: string;
  author: string;
  genres: string[];
  averageRating: number | null;
  ratingsCount: number | null;
  textReviewsCount: number | null;
  publicationYear: number | null;
  pageCount: number | null;
  description: string;
  imageUrl: string;
  similarIds: string[];
  raw: WorkRow; // original cells, keyed by header
};

export type Review = {
  workId: string;
  text: string;
  rating: number | null;
  votes: number | null;
  spoiler: boolean;
  raw: ReviewRow;
};

export type ReviewsSource = "primary" | "sample";

export type Dataset = {
  works: Work[];
  workColumns: string[];
  reviewsByWork: Map<string, Review[]>;
  reviewCount: number;
  orphanReviewCount: number;
  reviewsSource: ReviewsSource;
  dictionary: Record<string, string>;
};

export type Range = [number, number];

export type FilterParams = {
  genres?: string[];
  authors?: string[];
  minRating?: number;
  yearRange?: Range;
  pageRange?: Range;
  keyword?: string;
  titleSearch?: string;
  excludeKeyword?: string;
  minRatingsCount?: number;
  onlyWithReviews?: boolean;
};

/** Random source returning a float in [0, 1), same contract as Math.random. */
export type Rng = () => number;
