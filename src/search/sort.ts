/**
 * Sorter
 *
 * Multi-key ordering of file records. Keys are written as a string of
 * field letters, each optionally preceded by '-' for descending order:
 *
 * - p: path
 * - n: name (text after the last separator)
 * - s: size
 * - c: creation time
 * - m: modification time
 *
 * Example: "-sp" sorts by size descending, then path ascending.
 */

import * as path from 'path';
import { splitPath, type FileRecord } from './record.js';

export type SortField = 'path' | 'name' | 'size' | 'created' | 'modified';

export interface SortKey {
  field: SortField;
  ascending: boolean;
}

const FIELD_LETTERS: Record<string, SortField> = {
  p: 'path',
  n: 'name',
  s: 'size',
  c: 'created',
  m: 'modified',
};

export const DEFAULT_SORT_KEYS: readonly SortKey[] = Object.freeze([
  Object.freeze({ field: 'path', ascending: true }),
]);

/**
 * Parse a sort specification.
 *
 * A '-' applies to the next recognised field only. Unknown characters are
 * skipped. An empty or entirely unknown specification sorts by path.
 */
export function parseSortKeys(order: string): SortKey[] {
  const keys: SortKey[] = [];
  let ascending = true;

  for (const char of order) {
    if (char === '-') {
      ascending = false;
      continue;
    }

    const field = FIELD_LETTERS[char];
    if (!field) {
      continue;
    }

    keys.push({ field, ascending });
    ascending = true;
  }

  return keys.length > 0 ? keys : DEFAULT_SORT_KEYS.map((key) => ({ ...key }));
}

/**
 * Format sort keys back into their letter form.
 */
export function formatSortKeys(keys: readonly SortKey[]): string {
  const letters = Object.fromEntries(
    Object.entries(FIELD_LETTERS).map(([letter, field]) => [field, letter])
  );
  return keys.map((key) => `${key.ascending ? '' : '-'}${letters[key.field]}`).join('');
}

function compareValues<T extends string | number>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareField(a: FileRecord, b: FileRecord, field: SortField, separator: string): number {
  switch (field) {
    case 'path':
      return compareValues(a.path, b.path);
    case 'name':
      return compareValues(splitPath(a.path, separator).name, splitPath(b.path, separator).name);
    case 'size':
      return compareValues(a.size, b.size);
    case 'created':
      return compareValues(a.creationTime.getTime(), b.creationTime.getTime());
    case 'modified':
      return compareValues(a.modificationTime.getTime(), b.modificationTime.getTime());
  }
}

/**
 * Build a comparator for the given keys, falling back to ascending path.
 */
export function createComparator(
  keys: readonly SortKey[],
  separator: string = path.sep
): (a: FileRecord, b: FileRecord) => number {
  return (a, b) => {
    for (const key of keys) {
      const result = compareField(a, b, key.field, separator);
      if (result !== 0) {
        return key.ascending ? result : -result;
      }
    }
    return compareValues(a.path, b.path);
  };
}

/**
 * Return a new, stably sorted array. The input is left untouched.
 */
export function sortRecords(
  records: readonly FileRecord[],
  keys: readonly SortKey[] = DEFAULT_SORT_KEYS,
  separator: string = path.sep
): FileRecord[] {
  return [...records].sort(createComparator(keys, separator));
}
