/**
 * Traverser Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  traverse,
  compilePattern,
  MemoryDirectoryReader,
  DirectoryAccessError,
  EntryAccessError,
  type FileRecord,
  type TraverseError,
} from './index.js';

const paths = (records: FileRecord[]) => records.map((record) => record.path).sort();

describe('traverse (filesystem)', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'findfiles-traverse-'));
    await fs.mkdir(path.join(tempDir, 'b'));
    await fs.writeFile(path.join(tempDir, '1.txt'), 'one');
    await fs.writeFile(path.join(tempDir, 'notes.md'), '# notes');
    await fs.writeFile(path.join(tempDir, 'b', '2.txt'), 'second');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('finds matching files in nested directories', async () => {
    const records = await traverse(tempDir, compilePattern('*.txt', false, false));

    expect(paths(records)).toEqual([
      path.join(tempDir, '1.txt'),
      path.join(tempDir, 'b', '2.txt'),
    ]);
  });

  it('stays in the root directory when not recursive', async () => {
    const records = await traverse(tempDir, compilePattern('*.txt', false, false), {
      recursive: false,
    });

    expect(paths(records)).toEqual([path.join(tempDir, '1.txt')]);
  });

  it('records size and timestamps from the filesystem', async () => {
    const records = await traverse(tempDir, compilePattern('2.txt', false, false));

    expect(records).toHaveLength(1);
    const [record] = records;
    const stats = await fs.stat(path.join(tempDir, 'b', '2.txt'));
    expect(record.size).toBe(6);
    expect(record.modificationTime.getTime()).toBe(stats.mtime.getTime());
    expect(record.creationTime.getTime()).toBe(stats.birthtime.getTime());
  });

  it('matches directories names only through path mode', async () => {
    const byName = await traverse(tempDir, compilePattern('b', false, false));
    expect(byName).toEqual([]);

    const byPath = await traverse(tempDir, compilePattern(`${path.sep}b${path.sep}`, false, true));
    expect(paths(byPath)).toEqual([path.join(tempDir, 'b', '2.txt')]);
  });

  it('returns nothing for a missing root without reporting an error', async () => {
    const errors: TraverseError[] = [];
    const records = await traverse(
      path.join(tempDir, 'does-not-exist'),
      compilePattern('*', false, false),
      { onError: (error) => errors.push(error) }
    );

    expect(records).toEqual([]);
    expect(errors).toEqual([]);
  });

  it('reports entries that cannot be stat\'ed and keeps the rest', async () => {
    const loopDir = await fs.mkdtemp(path.join(os.tmpdir(), 'findfiles-loop-'));
    try {
      await fs.writeFile(path.join(loopDir, 'ok.txt'), 'ok');
      await fs.symlink(path.join(loopDir, 'loop'), path.join(loopDir, 'loop'));
      await fs.symlink(path.join(loopDir, 'gone.txt'), path.join(loopDir, 'dangling'));
      const errors: TraverseError[] = [];

      const records = await traverse(loopDir, compilePattern('*', false, false), {
        onError: (error) => errors.push(error),
      });

      expect(paths(records)).toEqual([path.join(loopDir, 'ok.txt')]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(EntryAccessError);
      expect(errors[0].message).toBe(`Cannot read entry ${path.join(loopDir, 'loop')} (ELOOP)`);
    } finally {
      await fs.rm(loopDir, { recursive: true, force: true });
    }
  });

  it('produces frozen records', async () => {
    const [record] = await traverse(tempDir, compilePattern('1.txt', false, false));
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('traverse (memory reader)', () => {
  const createReader = () =>
    new MemoryDirectoryReader()
      .addFile('/root/a.log', { size: 10 })
      .addFile('/root/keep/b.log', { size: 20 })
      .addFile('/root/locked/c.log', { size: 30 })
      .addFile('/root/later/d.log', { size: 40 })
      .addFile('/root/later/deeper/e.txt', { size: 50 })
      .failWith('/root/locked', 'EACCES');

  it('reports unreadable directories and keeps walking siblings', async () => {
    const reader = createReader();
    const errors: TraverseError[] = [];

    const records = await traverse('/root', compilePattern('*.log', false, false), {
      reader,
      onError: (error) => errors.push(error),
    });

    expect(paths(records)).toEqual(['/root/a.log', '/root/keep/b.log', '/root/later/d.log']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DirectoryAccessError);
    expect(errors[0].path).toBe('/root/locked');
    expect(errors[0].errno).toBe('EACCES');
    expect(errors[0].code).toBe('DIRECTORY_ACCESS');
  });

  it('walks depth first in discovery order', async () => {
    const reader = createReader();

    const records = await traverse('/root', compilePattern('*', false, false), {
      reader,
      onError: () => undefined,
    });

    expect(records.map((record) => record.path)).toEqual([
      '/root/a.log',
      '/root/keep/b.log',
      '/root/later/d.log',
      '/root/later/deeper/e.txt',
    ]);
    expect(reader.listed).toEqual([
      '/root',
      '/root/keep',
      '/root/locked',
      '/root/later',
      '/root/later/deeper',
    ]);
  });

  it('never lists subdirectories in shallow mode', async () => {
    const reader = createReader();

    const records = await traverse('/root', compilePattern('*', false, false), {
      reader,
      recursive: false,
    });

    expect(paths(records)).toEqual(['/root/a.log']);
    expect(reader.listed).toEqual(['/root']);
  });

  it('reports an unreadable root and returns nothing', async () => {
    const reader = new MemoryDirectoryReader().addFile('/secret/x.txt').failWith('/secret', 'EPERM');
    const errors: TraverseError[] = [];

    const records = await traverse('/secret', compilePattern('*', false, false), {
      reader,
      onError: (error) => errors.push(error),
    });

    expect(records).toEqual([]);
    expect(errors.map((error) => error.message)).toEqual(['Cannot read directory /secret (EPERM)']);
  });

  it('reports unreadable entries without dropping their siblings', async () => {
    const reader = new MemoryDirectoryReader()
      .addFile('/data/a.txt')
      .addFile('/data/b.txt')
      .addFile('/data/c.txt')
      .failEntry('/data/b.txt', 'EACCES')
      .failEntry('/data/c.txt', 'ENOENT');
    const errors: TraverseError[] = [];

    const records = await traverse('/data', compilePattern('*', false, false), {
      reader,
      onError: (error) => errors.push(error),
    });

    expect(paths(records)).toEqual(['/data/a.txt']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(EntryAccessError);
    expect(errors[0].code).toBe('ENTRY_ACCESS');
    expect(errors[0].path).toBe('/data/b.txt');
    expect(errors[0].errno).toBe('EACCES');
  });

  it('joins a root that ends with a separator without doubling it', async () => {
    const reader = new MemoryDirectoryReader().addFile('/data/x.txt');

    const records = await traverse('/data/', compilePattern('*', false, false), { reader });

    expect(records.map((record) => record.path)).toEqual(['/data/x.txt']);
  });

  it('copies metadata from the enumeration', async () => {
    const created = new Date(Date.UTC(2024, 0, 1));
    const modified = new Date(Date.UTC(2024, 5, 1));
    const reader = new MemoryDirectoryReader().addFile('/data/x.txt', {
      size: 2048,
      creationTime: created,
      modificationTime: modified,
    });

    const [record] = await traverse('/data', compilePattern('x.txt', false, false), { reader });

    expect(record).toEqual({
      path: '/data/x.txt',
      size: 2048,
      creationTime: created,
      modificationTime: modified,
    });
  });
});
