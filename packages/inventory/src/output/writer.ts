import * as fs from "node:fs";
import * as path from "node:path";

import { REPORT_FILE_PREFIX } from "../constants.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as YYYYMMDD-HHMMSS */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

function isDirectoryTarget(outputPath: string): boolean {
  if (outputPath.endsWith("/") || outputPath.endsWith(path.sep)) {
    return true;
  }
  try {
    return fs.statSync(outputPath).isDirectory();
  } catch {
    return false; // Path doesn't exist yet
  }
}

export interface OutputTarget {
  /** File path or directory given by the user */
  output: string;
  region: string;
  extension: string;
  now?: Date;
}

/**
 * Resolve the report file path. A directory target gets a generated
 * `elasticache-{region}-{timestamp}.{ext}` file name.
 */
export function resolveOutputPath(target: OutputTarget): string {
  if (!isDirectoryTarget(target.output)) {
    return path.resolve(target.output);
  }
  const timestamp = formatTimestamp(target.now ?? new Date());
  const fileName = `${REPORT_FILE_PREFIX}-${target.region}-${timestamp}.${target.extension}`;
  return path.resolve(target.output, fileName);
}

/**
 * Write a report, creating parent directories as needed
 */
export function writeReport(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
}
