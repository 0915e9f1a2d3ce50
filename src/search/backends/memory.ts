/**
 * Memory Backend
 *
 * In-memory DirectoryReader for testing.
 */

import type { DirectoryEntry, DirectoryReader, EntryErrorHandler } from '../reader.js';

/**
 * Metadata for an in-memory file.
 */
export interface MemoryFileOptions {
  size?: number;
  creationTime?: Date;
  modificationTime?: Date;
}

interface MemoryNode {
  kind: 'file' | 'directory';
  size: number;
  creationTime: Date;
  modificationTime: Date;
}

const EPOCH = new Date(0);

/**
 * Directory tree held in a map keyed by full path.
 * Paths use '/' and are stored without a trailing separator.
 */
export class MemoryDirectoryReader implements DirectoryReader {
  readonly separator = '/';
  private nodes: Map<string, MemoryNode> = new Map();
  private failures: Map<string, string> = new Map();
  private entryFailures: Map<string, string> = new Map();
  /** Directories passed to `list`, in call order */
  readonly listed: string[] = [];

  addDirectory(dirPath: string): this {
    const normalized = this.normalize(dirPath);
    const parent = this.parentOf(normalized);
    if (parent !== undefined && !this.nodes.has(parent)) {
      this.addDirectory(parent);
    }
    this.nodes.set(normalized, {
      kind: 'directory',
      size: 0,
      creationTime: EPOCH,
      modificationTime: EPOCH,
    });
    return this;
  }

  addFile(filePath: string, options: MemoryFileOptions = {}): this {
    const normalized = this.normalize(filePath);
    const parent = this.parentOf(normalized);
    if (parent !== undefined && !this.nodes.has(parent)) {
      this.addDirectory(parent);
    }
    this.nodes.set(normalized, {
      kind: 'file',
      size: options.size ?? 0,
      creationTime: options.creationTime ?? EPOCH,
      modificationTime: options.modificationTime ?? EPOCH,
    });
    return this;
  }

  /**
   * Make `list` reject for a directory with the given errno code.
   */
  failWith(dirPath: string, code: string): this {
    this.failures.set(this.normalize(dirPath), code);
    return this;
  }

  /**
   * Leave an entry out of its directory listing and report it with the
   * given errno code, as a failed stat would.
   */
  failEntry(entryPath: string, code: string): this {
    this.entryFailures.set(this.normalize(entryPath), code);
    return this;
  }

  async list(directory: string, onEntryError?: EntryErrorHandler): Promise<DirectoryEntry[]> {
    const normalized = this.normalize(directory);
    this.listed.push(normalized);

    const failure = this.failures.get(normalized);
    if (failure) {
      throw Object.assign(new Error(`${failure}: ${normalized}`), { code: failure });
    }

    const node = this.nodes.get(normalized);
    if (!node) {
      throw Object.assign(new Error(`ENOENT: ${normalized}`), { code: 'ENOENT' });
    }
    if (node.kind !== 'directory') {
      throw Object.assign(new Error(`ENOTDIR: ${normalized}`), { code: 'ENOTDIR' });
    }

    const entries: DirectoryEntry[] = [];
    for (const [nodePath, child] of this.nodes) {
      if (this.parentOf(nodePath) !== normalized) {
        continue;
      }
      const name = nodePath.slice(nodePath.lastIndexOf('/') + 1);
      const entryFailure = this.entryFailures.get(nodePath);
      if (entryFailure) {
        if (entryFailure !== 'ENOENT') {
          onEntryError?.(
            name,
            Object.assign(new Error(`${entryFailure}: ${nodePath}`), { code: entryFailure })
          );
        }
        continue;
      }
      entries.push({
        name,
        kind: child.kind,
        size: child.size,
        creationTime: child.creationTime,
        modificationTime: child.modificationTime,
      });
    }
    return entries;
  }

  private normalize(p: string): string {
    return p.length > 1 && p.endsWith('/') ? p.slice(0, -1) : p;
  }

  private parentOf(p: string): string | undefined {
    const index = p.lastIndexOf('/');
    if (index === -1 || p === '/') {
      return undefined;
    }
    return index === 0 ? '/' : p.slice(0, index);
  }
}
