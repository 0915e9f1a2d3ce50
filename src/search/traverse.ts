/**
 * Traverser
 *
 * Depth-first directory walk that collects a FileRecord for every file
 * accepted by a compiled Pattern.
 *
 * Directories are read one at a time. Each call returns a new array that
 * the caller appends to its own, so no accumulator is shared between
 * recursion levels.
 */

import { DirectoryAccessError, EntryAccessError, errnoOf } from './errors.js';
import { createFileRecord, type FileRecord } from './record.js';
import type { Pattern } from './pattern.js';
import type { DirectoryEntry, DirectoryReader } from './reader.js';
import { NodeDirectoryReader } from './backends/node.js';

/**
 * A directory or entry that exists but could not be read.
 */
export type TraverseError = DirectoryAccessError | EntryAccessError;

/**
 * Options for traverse().
 */
export interface TraverseOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  /** Enumeration provider (default: Node filesystem) */
  reader?: DirectoryReader;
  /** Called for each directory or entry that exists but could not be read */
  onError?: (error: TraverseError) => void;
}

function joinPath(directory: string, name: string, separator: string): string {
  return directory.endsWith(separator) ? directory + name : directory + separator + name;
}

async function listOrReport(
  directory: string,
  reader: DirectoryReader,
  onError?: (error: TraverseError) => void
): Promise<DirectoryEntry[]> {
  const onEntryError = (name: string, error: unknown) => {
    onError?.(new EntryAccessError(joinPath(directory, name, reader.separator), errnoOf(error)));
  };

  try {
    return await reader.list(directory, onEntryError);
  } catch (error) {
    const errno = errnoOf(error);
    if (errno !== 'ENOENT') {
      onError?.(new DirectoryAccessError(directory, errno));
    }
    return [];
  }
}

async function walk(
  directory: string,
  pattern: Pattern,
  recursive: boolean,
  reader: DirectoryReader,
  onError?: (error: TraverseError) => void
): Promise<FileRecord[]> {
  const results: FileRecord[] = [];
  const entries = await listOrReport(directory, reader, onError);

  for (const entry of entries) {
    if (entry.name === '.' || entry.name === '..') {
      continue;
    }

    const fullPath = joinPath(directory, entry.name, reader.separator);

    if (entry.kind === 'directory') {
      if (recursive) {
        const nested = await walk(fullPath, pattern, recursive, reader, onError);
        results.push(...nested);
      }
      continue;
    }

    if (entry.kind !== 'file') {
      continue;
    }

    const candidate = pattern.target === 'path' ? fullPath : entry.name;
    if (pattern.matches(candidate)) {
      results.push(
        createFileRecord({
          path: fullPath,
          creationTime: entry.creationTime,
          modificationTime: entry.modificationTime,
          size: entry.size,
        })
      );
    }
  }

  return results;
}

/**
 * Find files under `root` accepted by `pattern`.
 *
 * Results follow enumeration order; apply sortRecords() for a
 * deterministic order. A missing root yields an empty result.
 */
export async function traverse(
  root: string,
  pattern: Pattern,
  options: TraverseOptions = {}
): Promise<FileRecord[]> {
  const { recursive = true, reader = new NodeDirectoryReader(), onError } = options;
  return walk(root, pattern, recursive, reader, onError);
}
