/**
 * File Records
 *
 * The value produced for every matched file and the path helpers
 * shared by sorting and command templating.
 */

import * as path from 'path';

/**
 * A matched file. Created once during traversal and never mutated.
 */
export interface FileRecord {
  /** Full path, joined from the search root */
  readonly path: string;
  readonly creationTime: Date;
  readonly modificationTime: Date;
  /** Size in bytes */
  readonly size: number;
}

export interface SplitPath {
  directory: string;
  name: string;
}

/**
 * Split a path at its last separator.
 *
 * A path without a separator lives in the current directory ('.').
 */
export function splitPath(filePath: string, separator: string = path.sep): SplitPath {
  const index = filePath.lastIndexOf(separator);
  if (index === -1) {
    return { directory: '.', name: filePath };
  }
  return {
    directory: filePath.slice(0, index),
    name: filePath.slice(index + separator.length),
  };
}

export function createFileRecord(fields: FileRecord): FileRecord {
  return Object.freeze({
    path: fields.path,
    creationTime: new Date(fields.creationTime.getTime()),
    modificationTime: new Date(fields.modificationTime.getTime()),
    size: fields.size,
  });
}
