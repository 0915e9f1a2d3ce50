/**
 * Date Filter
 *
 * Parses the date literals accepted by the date options and filters
 * records by creation and modification time. Range starts are inclusive,
 * range ends are exclusive.
 */

import { InvalidDateError } from './errors.js';
import type { FileRecord } from './record.js';

/**
 * Time zone used to interpret a literal that carries none.
 */
export type TimeZone = 'utc' | 'local';

/**
 * A half-open interval [start, end). Either side may be absent.
 */
export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface DateBounds {
  created?: DateRange;
  modified?: DateRange;
}

const COMPACT_FORMAT = /^(\d{4})(\d{2})(\d{2})(?:(\d{2})(\d{2})(\d{2})?)?$/;
const SLASHED_FORMAT = /^(\d{4})\/(\d{2})\/(\d{2})(?:-(\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse a date literal.
 *
 * Accepted shapes: YYYYMMDD, YYYYMMDDHHMM, YYYYMMDDHHMMSS, YYYY/MM/DD,
 * YYYY/MM/DD-HH:MM and YYYY/MM/DD-HH:MM:SS.
 *
 * @throws InvalidDateError for any other text or an impossible date
 */
export function parseDateTime(text: string, timeZone: TimeZone = 'utc'): Date {
  const match = COMPACT_FORMAT.exec(text) ?? SLASHED_FORMAT.exec(text);
  if (!match) {
    throw new InvalidDateError(text);
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number(part)));

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    throw new InvalidDateError(text, 'field out of range');
  }

  // The Date constructors map years 0-99 to 1900-1999; the setters do not.
  const date = new Date(0);
  if (timeZone === 'utc') {
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);
  } else {
    date.setFullYear(year, month - 1, day);
    date.setHours(hour, minute, second, 0);
  }

  // Date rolls 2024-02-30 over into March; reject instead.
  const actualDay = timeZone === 'utc' ? date.getUTCDate() : date.getDate();
  if (actualDay !== day) {
    throw new InvalidDateError(text, 'day does not exist in that month');
  }

  return date;
}

function inRange(value: Date, range?: DateRange): boolean {
  if (!range) {
    return true;
  }
  const time = value.getTime();
  if (range.start && time < range.start.getTime()) {
    return false;
  }
  if (range.end && time >= range.end.getTime()) {
    return false;
  }
  return true;
}

/**
 * Check whether any bound is set.
 */
export function hasDateBounds(bounds: DateBounds): boolean {
  return Boolean(
    bounds.created?.start || bounds.created?.end || bounds.modified?.start || bounds.modified?.end
  );
}

/**
 * Keep the records that satisfy every present bound.
 * With no bounds the input array is returned as is.
 */
export function filterByDate(records: FileRecord[], bounds: DateBounds): FileRecord[] {
  if (!hasDateBounds(bounds)) {
    return records;
  }
  return records.filter(
    (record) =>
      inRange(record.creationTime, bounds.created) &&
      inRange(record.modificationTime, bounds.modified)
  );
}
