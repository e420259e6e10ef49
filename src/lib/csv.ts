import Papa from "papaparse";

export type CsvRow = Record<string, string>;

export type CsvTable<Row extends CsvRow = CsvRow> = {
  columns: string[];
  rows: Row[];
};

/**
 * Parse CSV text with a header line. Every row gets every header column,
 * missing cells become "" and cells past the last header are dropped.
 */
export const parseCsv = (text: string): CsvTable => {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });
  const columns = (result.meta.fields ?? []).filter((field) => field !== "");
  const rows = result.data.map((row) => {
    const clean: CsvRow = {};
    for (const column of columns) {
      const value = row[column];
      clean[column] = typeof value === "string" ? value : "";
    }
    return clean;
  });
  return { columns, rows };
};

export const toCsv = (rows: CsvRow[], columns: string[]): string =>
  Papa.unparse({
    fields: columns,
    data: rows.map((row) => columns.map((column) => row[column] ?? "")),
  });

// Lenient number parsing: "1,234" -> 1234, "" / "n/a" -> null
export const parseNumber = (value: string | undefined | null): number | null => {
  if (value == null) return null;
  const cleaned = value.trim().replace(/,/g, "");
  if (!cleaned) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const splitList = (value: string | undefined | null): string[] =>
  !value
    ? []
    : value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean);

export const parseFlag = (value: string | undefined | null): boolean => {
  const normalized = (value ?? "").trim().toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes";
};
