import type { ClusterRecord } from "../inventory/types.js";
import { FIELD_DEFINITIONS, type FieldToken } from "./fields.js";

function formatRow(cells: readonly string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/**
 * Format records as a pipe-delimited Markdown table.
 * Numeric columns are right-aligned.
 */
export function formatMarkdown(records: readonly ClusterRecord[], fields: readonly FieldToken[]): string {
  if (records.length === 0) {
    return "";
  }

  const lines = [
    formatRow(fields.map((field) => FIELD_DEFINITIONS[field].header)),
    formatRow(fields.map((field) => (FIELD_DEFINITIONS[field].align === "right" ? "---:" : "---"))),
  ];
  for (const record of records) {
    lines.push(formatRow(fields.map((field) => String(FIELD_DEFINITIONS[field].get(record)))));
  }

  return lines.join("\n");
}
