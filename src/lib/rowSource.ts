import Papa from "papaparse";
import { RowParseError } from "./errors";
import { readAsset } from "./fileSystem";
import type { BadgeRecord, ColumnMapping, Row } from "./types";

/** Parses CSV text into rows of trimmed string cells; no header handling. */
export function parseCsvRows(text: string): string[][] {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    header: false,
    delimiter: ",",
    skipEmptyLines: true,
    transform: (value) => value.trim(),
  });

  if (result.errors.length > 0) {
    const firstError = result.errors[0];
    const line = firstError.row === undefined ? undefined : firstError.row + 1;
    throw new RowParseError(`Could not read CSV: ${firstError.message}`, line);
  }
  return result.data;
}

/**
 * Reads a CSV file as UTF-8. Undecodable bytes become U+FFFD, so a single
 * damaged cell fails its own record later instead of the whole file here.
 */
export async function readCsvRows(csvPath: string): Promise<string[][]> {
  const bytes = await readAsset(csvPath, "CSV file");
  return parseCsvRows(new TextDecoder("utf-8").decode(bytes));
}

function cellText(row: Row, column: number, label: string, rowIndex: number): string {
  if (column >= row.length) {
    throw new RowParseError(`missing ${label} column ${column} (row has ${row.length} cells)`, rowIndex);
  }
  const value = row[column];
  if (typeof value === "string") {
    return value;
  }
  if ((typeof value === "number" && Number.isFinite(value)) || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  throw new RowParseError(`${label} column ${column} holds ${value === null ? "null" : typeof value}`, rowIndex);
}

export function toBadgeRecord(row: Row, rowIndex: number, columns: ColumnMapping): BadgeRecord {
  return {
    displayName: cellText(row, columns.nameColumn, "name", rowIndex),
    identifier: cellText(row, columns.identifierColumn, "identifier", rowIndex),
    rowIndex,
  };
}

/** The name cell as text, for log lines about rows that failed to parse. */
export function rawNameOf(row: Row, nameColumn: number): string {
  const value = row[nameColumn];
  return typeof value === "string" || typeof value === "number" ? String(value) : "";
}
