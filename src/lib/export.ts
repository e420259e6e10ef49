import { toCsv } from "./csv.js";
import type { Work } from "./types.js";

export const READING_LIST_FILE_NAME = "my_reading_list.csv";

export const READING_LIST_COLUMNS = [
  "work_id",
  "original_title",
  "author",
  "genres",
  "avg_rating",
  "original_publication_year",
  "num_pages",
  "description",
];

/**
 * Serialize works back to CSV using their original cells. `columns` is the
 * works header in file order; `subset` narrows it without reordering.
 */
export const exportCsv = (works: readonly Work[], columns: string[], subset?: string[]): string => {
  const keep = subset ? new Set(subset) : null;
  const selected = keep ? columns.filter((column) => keep.has(column)) : columns;
  return toCsv(
    works.map((work) => work.raw),
    selected
  );
};

export const readingListCsv = (works: readonly Work[], columns: string[]): string =>
  exportCsv(works, columns, READING_LIST_COLUMNS);
