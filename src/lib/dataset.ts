import { parseCsv, parseFlag, parseNumber, splitList, type CsvRow, type CsvTable } from "./csv.js";
import { DatasetError } from "./errors.js";
import { logDebug } from "./log.js";
import type {
  Dataset,
  DictionaryRow,
  Review,
  ReviewRow,
  ReviewsSource,
  Work,
  WorkRow,
} from "./types.js";

export const REQUIRED_WORK_COLUMNS = ["work_id", "original_title", "author"] as const;
export const REQUIRED_REVIEW_COLUMNS = ["work_id", "rating", "review_text"] as const;

/**
 * Where the CSV text comes from. `readText` resolves to null when the file
 * does not exist; any other failure should reject.
 */
export interface DatasetSource {
  readText(path: string): Promise<string | null>;
}

export type DatasetPaths = {
  works: string;
  reviews: string;
  reviewsSample: string;
  dictionary?: string;
};

export const DEFAULT_PATHS: DatasetPaths = {
  works: "goodreads_works.csv",
  reviews: "goodreads_reviews.csv",
  reviewsSample: "goodreads_reviews_sample.csv",
  dictionary: "goodreads_data_dictionary.csv",
};

/**
 * Check the header line and narrow the table to its row shape. Every row of
 * a parsed table carries every header column, so the named columns exist.
 */
function assertColumns<Row extends CsvRow>(
  fileLabel: string,
  table: CsvTable,
  required: readonly (keyof Row & string)[],
  options: { fatal?: boolean } = {}
): asserts table is CsvTable<Row> {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new DatasetError(
      `${fileLabel} file is missing required columns: ${missing.join(", ")}`,
      options
    );
  }
}

export const toWork = (row: WorkRow): Work | null => {
  const id = row.work_id.trim();
  if (!id) return null;
  return {
    id,
    title: row.original_title.trim(),
    author: row.author.trim(),
    genres: splitList(row.genres),
    averageRating: parseNumber(row.avg_rating),
    ratingsCount: parseNumber(row.ratings_count),
    textReviewsCount: parseNumber(row.text_reviews_count),
    publicationYear: parseNumber(row.original_publication_year),
    pageCount: parseNumber(row.num_pages),
    description: row.description,
    imageUrl: row.image_url.trim(),
    // Only numeric ids point at other works
    similarIds: splitList(row.similar_books).filter((value) => /^\d+$/.test(value)),
    raw: row,
  };
};

// Optional works columns read as "" when the file leaves them out
const OPTIONAL_WORK_COLUMNS = [
  "genres",
  "avg_rating",
  "ratings_count",
  "text_reviews_count",
  "original_publication_year",
  "num_pages",
  "description",
  "image_url",
  "similar_books",
] as const;

export const parseWorks = (text: string): { works: Work[]; columns: string[] } => {
  const table = parseCsv(text);
  assertColumns<WorkRow>("Works", table, REQUIRED_WORK_COLUMNS);
  const works: Work[] = [];
  for (const row of table.rows) {
    for (const column of OPTIONAL_WORK_COLUMNS) {
      if (!table.columns.includes(column)) row[column] = "";
    }
    const work = toWork(row);
    if (work) works.push(work);
  }
  if (works.length < table.rows.length) {
    logDebug(`Skipped ${table.rows.length - works.length} works rows without work_id`);
  }
  return { works, columns: table.columns };
};

export const parseReviews = (text: string): { reviews: Review[]; columns: string[] } => {
  const table = parseCsv(text);
  assertColumns<ReviewRow>("Reviews", table, REQUIRED_REVIEW_COLUMNS);
  const reviews: Review[] = [];
  for (const row of table.rows) {
    const workId = row.work_id.trim();
    if (!workId) continue;
    reviews.push({
      workId,
      text: row.review_text,
      rating: parseNumber(row.rating),
      votes: parseNumber(row.n_votes),
      spoiler: parseFlag(row.spoiler_flag),
      raw: row,
    });
  }
  return { reviews, columns: table.columns };
};

/** The dictionary is optional, so a malformed one is a non-fatal error. */
export const parseDataDictionary = (text: string): Record<string, string> => {
  const table = parseCsv(text);
  assertColumns<DictionaryRow>("Data dictionary", table, ["column", "description"], {
    fatal: false,
  });
  const dictionary: Record<string, string> = {};
  for (const row of table.rows) {
    const column = row.column.trim();
    if (column) dictionary[column] = row.description.trim();
  }
  return dictionary;
};

/**
 * Group reviews under their work. Reviews pointing at an unknown work id
 * are dropped and counted in `orphanReviewCount`.
 */
export const joinDataset = (
  parsedWorks: { works: Work[]; columns: string[] },
  parsedReviews: { reviews: Review[]; columns: string[] },
  options: { reviewsSource?: ReviewsSource; dictionary?: Record<string, string> } = {}
): Dataset => {
  const reviewsByWork = new Map<string, Review[]>();
  for (const work of parsedWorks.works) {
    reviewsByWork.set(work.id, []);
  }

  let reviewCount = 0;
  let orphanReviewCount = 0;
  for (const review of parsedReviews.reviews) {
    const bucket = reviewsByWork.get(review.workId);
    if (!bucket) {
      orphanReviewCount += 1;
      continue;
    }
    bucket.push(review);
    reviewCount += 1;
  }

  return {
    works: parsedWorks.works,
    workColumns: parsedWorks.columns,
    reviewsByWork,
    reviewCount,
    orphanReviewCount,
    reviewsSource: options.reviewsSource ?? "primary",
    dictionary: options.dictionary ?? {},
  };
};

/**
 * Read works, reviews (falling back to the sample file when the full
 * reviews file is absent) and the optional data dictionary.
 */
export async function loadDataset(
  source: DatasetSource,
  paths: DatasetPaths = DEFAULT_PATHS
): Promise<Dataset> {
  const worksText = await source.readText(paths.works);
  if (worksText == null) {
    throw new DatasetError(`Works file not found: ${paths.works}`);
  }
  const parsedWorks = parseWorks(worksText);

  let reviewsSource: ReviewsSource = "primary";
  let reviewsText = await source.readText(paths.reviews);
  if (reviewsText == null) {
    console.warn(`Reviews file not found at ${paths.reviews}, using sample ${paths.reviewsSample}`);
    reviewsSource = "sample";
    reviewsText = await source.readText(paths.reviewsSample);
  }
  if (reviewsText == null) {
    throw new DatasetError(
      `Reviews file not found: ${paths.reviews} (and no sample at ${paths.reviewsSample})`
    );
  }
  const parsedReviews = parseReviews(reviewsText);

  let dictionary: Record<string, string> = {};
  if (paths.dictionary) {
    const dictionaryText = await source.readText(paths.dictionary);
    if (dictionaryText != null) {
      try {
        dictionary = parseDataDictionary(dictionaryText);
      } catch (err) {
        if (!(err instanceof DatasetError) || err.fatal) throw err;
        console.warn(`Ignoring data dictionary ${paths.dictionary}: ${err.message}`);
      }
    }
  }

  const dataset = joinDataset(parsedWorks, parsedReviews, { reviewsSource, dictionary });
  logDebug(
    `Loaded ${dataset.works.length} works, ${dataset.reviewCount} reviews`,
    `(${dataset.orphanReviewCount} orphans dropped, source: ${reviewsSource})`
  );
  return dataset;
}
