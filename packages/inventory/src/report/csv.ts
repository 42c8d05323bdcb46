import type { ClusterRecord } from "../inventory/types.js";
import { FIELD_DEFINITIONS, type FieldToken } from "./fields.js";

const CSV_LINE_END = "\r\n";

/** Quote a value containing a delimiter, quote or line break */
function escapeCsv(value: string | number): string {
  const str = String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

/**
 * Format records as CSV with a title-cased header row
 */
export function formatCsv(records: readonly ClusterRecord[], fields: readonly FieldToken[]): string {
  if (records.length === 0) {
    return "";
  }

  const rows = [fields.map((field) => FIELD_DEFINITIONS[field].header)];
  for (const record of records) {
    rows.push(fields.map((field) => String(FIELD_DEFINITIONS[field].get(record))));
  }

  return rows.map((row) => row.map(escapeCsv).join(",") + CSV_LINE_END).join("");
}
