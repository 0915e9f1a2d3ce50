/**
 * Node Backend
 *
 * Node.js filesystem implementation of DirectoryReader.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { errnoOf } from '../errors.js';
import type { DirectoryEntry, DirectoryReader, EntryErrorHandler, EntryKind } from '../reader.js';

/**
 * Reads directories with fs/promises, one stat per child.
 *
 * Symbolic links to files are reported as files; symbolic links to
 * directories are reported as 'other' and never descended into. Entries
 * that fail to stat are skipped.
 */
export class NodeDirectoryReader implements DirectoryReader {
  readonly separator = path.sep;

  async list(directory: string, onEntryError?: EntryErrorHandler): Promise<DirectoryEntry[]> {
    const dirents = await fs.readdir(directory, { withFileTypes: true });
    const entries: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      if (dirent.name === '.' || dirent.name === '..') {
        continue;
      }

      let stats: Stats;
      try {
        stats = await fs.stat(path.join(directory, dirent.name));
      } catch (error) {
        // ENOENT: dangling link, or removed since readdir
        if (errnoOf(error) !== 'ENOENT') {
          onEntryError?.(dirent.name, error);
        }
        continue;
      }

      let kind: EntryKind = 'other';
      if (stats.isFile()) {
        kind = 'file';
      } else if (stats.isDirectory() && !dirent.isSymbolicLink()) {
        kind = 'directory';
      }

      entries.push({
        name: dirent.name,
        kind,
        size: stats.size,
        creationTime: stats.birthtime,
        modificationTime: stats.mtime,
      });
    }

    return entries;
  }
}
