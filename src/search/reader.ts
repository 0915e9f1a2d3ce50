/**
 * Directory Reader
 *
 * Enumeration provider consumed by the traverser. A reader returns the
 * immediate children of a directory together with the metadata needed to
 * build a FileRecord, so the traverser never stats an entry itself.
 */

export type EntryKind = 'file' | 'directory' | 'other';

/**
 * One child of an enumerated directory.
 */
export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  size: number;
  creationTime: Date;
  modificationTime: Date;
}

/**
 * Filesystem enumeration provider.
 *
 * `list` rejects with an error carrying an errno `code`; `ENOENT` is
 * treated by the traverser as an empty directory. A child whose metadata
 * cannot be read is left out of the result and, unless it has vanished
 * (`ENOENT`), passed to `onEntryError`.
 */
export interface DirectoryReader {
  /** Separator used to join a directory and a child name */
  readonly separator: string;
  list(directory: string, onEntryError?: EntryErrorHandler): Promise<DirectoryEntry[]>;
}

export type EntryErrorHandler = (name: string, error: unknown) => void;
