import type { ClusterRecord } from "../inventory/types.js";
import { formatCsv } from "./csv.js";
import type { FieldToken } from "./fields.js";
import { formatMarkdown } from "./markdown.js";

export const REPORT_FORMATS = ["csv", "markdown"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/** File extension per report format */
export const REPORT_EXTENSIONS: Readonly<Record<ReportFormat, string>> = {
  csv: "csv",
  markdown: "md",
};

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * Format records in the specified report format
 */
export function formatReport(
  records: readonly ClusterRecord[],
  fields: readonly FieldToken[],
  format: ReportFormat
): string {
  switch (format) {
    case "csv":
      return formatCsv(records, fields);
    case "markdown":
      return formatMarkdown(records, fields);
  }
}

export {
  FIELD_DEFINITIONS,
  FIELD_TOKENS,
  type FieldToken,
  parseEngineList,
  parseFieldList,
} from "./fields.js";
