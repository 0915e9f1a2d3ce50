/**
 * Report Renderer
 *
 * Formats sorted records as a fixed-width table, a tab-separated listing
 * or bare paths. Terminal width is supplied by the caller.
 */

import * as path from "path";
import pc from "picocolors";
import { splitPath, type FileRecord, type TimeZone } from "../search/index.js";

// ============================================================================
// Constants
// ============================================================================

const SIZE_WIDTH = 10;
const CREATED_WIDTH = 16;
const MODIFIED_WIDTH = 16;
const SPACING = 2;

/** Width used when the output is not a terminal */
export const DEFAULT_WIDTH = 79;

/** Narrowest width the table is laid out for */
export const MIN_WIDTH = 50;

const TAB_HEADER = "Path\tSize\tCreated Date\tModified Date";
const TAB_FOOTER = `${"-".repeat(10)}\t${"-".repeat(8)}\t${"-".repeat(15)}\t${"-".repeat(15)}`;

// ============================================================================
// Types
// ============================================================================

export type ReportFormat = "table" | "tab" | "bare";

/**
 * Presentation settings, passed in by the CLI.
 */
export interface RenderOptions {
  format: ReportFormat;
  /** Omit header and summary */
  concise: boolean;
  /** Total line width for the table format */
  width: number;
  /** Print a heading per parent directory (table format) */
  groupByDirectory: boolean;
  timeZone: TimeZone;
  /** Colorize the table header */
  color: boolean;
  /** Path separator used for grouping (default: path.sep) */
  separator?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Width of a terminal as used for the table: one less than the column
 * count to avoid wrapping, never below MIN_WIDTH.
 */
export function resolveWidth(columns: number | undefined): number {
  if (!columns || columns <= 0) {
    return DEFAULT_WIDTH;
  }
  return Math.max(columns - 1, MIN_WIDTH);
}

function pathColumnWidth(width: number): number {
  return width - SIZE_WIDTH - CREATED_WIDTH - MODIFIED_WIDTH - SPACING * 3;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a timestamp as YYYY-MM-DD HH:MM, or with seconds.
 */
export function formatTime(date: Date, timeZone: TimeZone, withSeconds: boolean): string {
  const utc = timeZone === "utc";
  const year = utc ? date.getUTCFullYear() : date.getFullYear();
  const month = utc ? date.getUTCMonth() : date.getMonth();
  const day = utc ? date.getUTCDate() : date.getDate();
  const hours = utc ? date.getUTCHours() : date.getHours();
  const minutes = utc ? date.getUTCMinutes() : date.getMinutes();
  const seconds = utc ? date.getUTCSeconds() : date.getSeconds();

  const base = `${year}-${pad2(month + 1)}-${pad2(day)} ${pad2(hours)}:${pad2(minutes)}`;
  return withSeconds ? `${base}:${pad2(seconds)}` : base;
}

/**
 * Size in kilobytes, rounded up.
 */
export function sizeInKilobytes(bytes: number): number {
  return Math.ceil(bytes / 1024);
}

function truncatePath(value: string, width: number): string {
  if (value.length <= width) {
    return value.padEnd(width);
  }
  return `${value.slice(0, Math.max(width - 3, 0))}...`;
}

function tableLine(pathCell: string, size: string, created: string, modified: string, width: number): string {
  const gap = " ".repeat(SPACING);
  return (
    truncatePath(pathCell, pathColumnWidth(width)) +
    gap +
    size.padStart(SIZE_WIDTH) +
    gap +
    created.padStart(CREATED_WIDTH) +
    gap +
    modified.padStart(MODIFIED_WIDTH)
  );
}

function separatorLine(width: number): string {
  const gap = " ".repeat(SPACING);
  return [
    "-".repeat(Math.max(pathColumnWidth(width), 0)),
    "-".repeat(SIZE_WIDTH),
    "-".repeat(CREATED_WIDTH),
    "-".repeat(MODIFIED_WIDTH),
  ].join(gap);
}

// ============================================================================
// Rendering
// ============================================================================

function renderTableRow(record: FileRecord, pathCell: string, options: RenderOptions): string {
  return tableLine(
    pathCell,
    String(sizeInKilobytes(record.size)),
    formatTime(record.creationTime, options.timeZone, false),
    formatTime(record.modificationTime, options.timeZone, false),
    options.width
  );
}

function renderTabRow(record: FileRecord, options: RenderOptions): string {
  return [
    record.path,
    String(record.size),
    formatTime(record.creationTime, options.timeZone, true),
    formatTime(record.modificationTime, options.timeZone, true),
  ].join("\t");
}

function renderTable(records: readonly FileRecord[], options: RenderOptions): string[] {
  const lines: string[] = [];
  const colors = pc.createColors(options.color);

  if (!options.concise) {
    lines.push(colors.bold(tableLine("Path", "Size (KB)", "Created", "Modified", options.width)));
    lines.push(separatorLine(options.width));
  }

  const separator = options.separator ?? path.sep;
  let currentDirectory: string | undefined;

  for (const record of records) {
    if (!options.groupByDirectory) {
      lines.push(renderTableRow(record, record.path, options));
      continue;
    }

    const { directory, name } = splitPath(record.path, separator);
    if (directory !== currentDirectory) {
      if (currentDirectory !== undefined) {
        lines.push("");
      }
      lines.push(colors.cyan(`Directory: ${directory}`));
      currentDirectory = directory;
    }
    lines.push(renderTableRow(record, name, options));
  }

  if (!options.concise) {
    lines.push(separatorLine(options.width));
    lines.push(`Found ${records.length} files`);
  }
  return lines;
}

function renderTab(records: readonly FileRecord[], options: RenderOptions): string[] {
  const lines: string[] = [];
  if (!options.concise) {
    lines.push(TAB_HEADER);
  }
  for (const record of records) {
    lines.push(renderTabRow(record, options));
  }
  if (!options.concise) {
    lines.push(TAB_FOOTER);
    lines.push(`Found ${records.length} files`);
  }
  return lines;
}

/**
 * Render a report as lines, without trailing newlines.
 */
export function renderReport(records: readonly FileRecord[], options: RenderOptions): string[] {
  switch (options.format) {
    case "bare":
      return records.map((record) => record.path);
    case "tab":
      return renderTab(records, options);
    case "table":
      return renderTable(records, options);
  }
}
