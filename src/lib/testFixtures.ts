import { readFileSync } from "fs";
import type { CsvRow } from "./csv.js";
import { joinDataset, parseReviews, parseWorks } from "./dataset.js";
import type { Dataset, WorkRow } from "./types.js";

// Fixture CSVs shared by the unit and handler tests
export const FIXTURES_DIR = new URL("../../test/fixtures/", import.meta.url);

export const readFixture = (name: string): string =>
  readFileSync(new URL(name, FIXTURES_DIR), "utf-8");

export const fixtureDataset = (): Dataset =>
  joinDataset(
    parseWorks(readFixture("goodreads_works.csv")),
    parseReviews(readFixture("goodreads_reviews_sample.csv")),
    { reviewsSource: "sample" }
  );

export const ids = (works: { id: string }[]): string[] => works.map((work) => work.id);

const BLANK_WORK_ROW: WorkRow = {
  work_id: "",
  original_title: "",
  author: "",
  genres: "",
  avg_rating: "",
  ratings_count: "",
  text_reviews_count: "",
  original_publication_year: "",
  num_pages: "",
  description: "",
  image_url: "",
  similar_books: "",
};

// A full works row with only the given cells filled in
export const workRow = (cells: CsvRow): WorkRow => ({ ...BLANK_WORK_ROW, ...cells });
