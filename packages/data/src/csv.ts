import Papa from "papaparse";
import { CatalogFormatError } from "@practice/core";

export type CsvRecord = Record<string, string | undefined>;

/**
 * Parses a headed CSV into trimmed records. Missing required columns and
 * malformed quoting are reported together.
 */
export const parseCsvRecords = (
  text: string,
  requiredHeaders: readonly string[],
  label: string
): CsvRecord[] => {
  const result = Papa.parse<CsvRecord>(text.trim(), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: header => header.trim(),
    transform: value => value.trim()
  });

  const issues = result.errors
    .filter(error => error.code !== "UndetectableDelimiter")
    .map(error =>
      error.row !== undefined ? `row ${error.row + 1}: ${error.message}` : error.message
    );

  const headers = result.meta.fields ?? [];
  requiredHeaders.forEach(header => {
    if (!headers.includes(header)) {
      issues.push(`missing column "${header}"`);
    }
  });

  if (issues.length > 0) {
    throw new CatalogFormatError(`Invalid ${label} CSV`, issues);
  }
  return result.data;
};

export const cell = (record: CsvRecord, column: string): string => record[column] ?? "";
