/**
 * Sorter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  parseSortKeys,
  formatSortKeys,
  sortRecords,
  createFileRecord,
  DEFAULT_SORT_KEYS,
  type FileRecord,
} from './index.js';

const day = (n: number) => new Date(Date.UTC(2024, 0, n));

const record = (
  filePath: string,
  fields: Partial<Omit<FileRecord, 'path'>> = {}
): FileRecord =>
  createFileRecord({
    path: filePath,
    size: fields.size ?? 0,
    creationTime: fields.creationTime ?? day(1),
    modificationTime: fields.modificationTime ?? day(1),
  });

const paths = (records: FileRecord[]) => records.map((r) => r.path);

describe('parseSortKeys', () => {
  it('should parse each field letter', () => {
    expect(parseSortKeys('pnscm')).toEqual([
      { field: 'path', ascending: true },
      { field: 'name', ascending: true },
      { field: 'size', ascending: true },
      { field: 'created', ascending: true },
      { field: 'modified', ascending: true },
    ]);
  });

  it('should apply - to the next field only', () => {
    expect(parseSortKeys('-np')).toEqual([
      { field: 'name', ascending: false },
      { field: 'path', ascending: true },
    ]);
  });

  it('should skip unknown characters', () => {
    expect(parseSortKeys('sxz-m')).toEqual([
      { field: 'size', ascending: true },
      { field: 'modified', ascending: false },
    ]);
  });

  it('should keep a pending - across unknown characters', () => {
    expect(parseSortKeys('-xs')).toEqual([{ field: 'size', ascending: false }]);
  });

  it('should default to ascending path', () => {
    expect(parseSortKeys('')).toEqual([{ field: 'path', ascending: true }]);
    expect(parseSortKeys('xyz-')).toEqual([{ field: 'path', ascending: true }]);
  });

  it('should not hand out the shared default', () => {
    const keys = parseSortKeys('');
    keys[0].ascending = false;
    expect(DEFAULT_SORT_KEYS[0].ascending).toBe(true);
  });
});

describe('formatSortKeys', () => {
  it('should write keys back as letters', () => {
    expect(formatSortKeys(parseSortKeys('-sp-m'))).toBe('-sp-m');
  });
});

describe('sortRecords', () => {
  it('should break ties by ascending path', () => {
    const records = [record('b', { size: 1 }), record('a', { size: 1 })];

    expect(paths(sortRecords(records, [{ field: 'size', ascending: true }]))).toEqual(['a', 'b']);
  });

  it('should keep the path tie-break ascending when the key is descending', () => {
    const records = [record('b', { size: 1 }), record('a', { size: 1 }), record('c', { size: 5 })];

    expect(paths(sortRecords(records, [{ field: 'size', ascending: false }]))).toEqual([
      'c',
      'a',
      'b',
    ]);
  });

  it('should sort by name descending then path', () => {
    const records = [
      record('/x/alpha.txt'),
      record('/y/beta.txt'),
      record('/a/beta.txt'),
      record('/z/alpha.txt'),
    ];

    expect(paths(sortRecords(records, parseSortKeys('-np'), '/'))).toEqual([
      '/a/beta.txt',
      '/y/beta.txt',
      '/x/alpha.txt',
      '/z/alpha.txt',
    ]);
  });

  it('should use the whole path as name when there is no separator', () => {
    const records = [record('b.txt'), record('/dir/a.txt')];

    expect(paths(sortRecords(records, parseSortKeys('n'), '/'))).toEqual(['/dir/a.txt', 'b.txt']);
  });

  it('should honour the separator given', () => {
    const records = [record('C:\\z\\a.txt'), record('C:\\a\\b.txt')];

    expect(paths(sortRecords(records, parseSortKeys('n'), '\\'))).toEqual([
      'C:\\z\\a.txt',
      'C:\\a\\b.txt',
    ]);
  });

  it('should apply later keys only to ties of earlier keys', () => {
    const records = [
      record('/d', { size: 2, modificationTime: day(3) }),
      record('/c', { size: 1, modificationTime: day(2) }),
      record('/b', { size: 2, modificationTime: day(1) }),
      record('/a', { size: 1, modificationTime: day(5) }),
    ];

    expect(paths(sortRecords(records, parseSortKeys('-sm')))).toEqual(['/b', '/d', '/c', '/a']);
  });

  it('should sort by creation time', () => {
    const records = [
      record('/new', { creationTime: day(9) }),
      record('/old', { creationTime: day(2) }),
    ];

    expect(paths(sortRecords(records, parseSortKeys('c')))).toEqual(['/old', '/new']);
    expect(paths(sortRecords(records, parseSortKeys('-c')))).toEqual(['/new', '/old']);
  });

  it('should compare paths by code unit, not locale', () => {
    const records = [record('/b'), record('/B'), record('/a')];

    expect(paths(sortRecords(records))).toEqual(['/B', '/a', '/b']);
  });

  it('should not modify the input', () => {
    const records = [record('b'), record('a')];
    sortRecords(records);
    expect(paths(records)).toEqual(['b', 'a']);
  });
});
