/**
 * Search Module
 *
 * Pattern compilation, directory traversal, date filtering and sorting.
 */

// Errors
export {
  FindFilesError,
  InvalidPatternError,
  InvalidDateError,
  DirectoryAccessError,
  EntryAccessError,
  CommandLaunchError,
  CommandExitError,
  ConfigError,
  isFindFilesError,
  errnoOf,
} from './errors.js';

// Records
export { createFileRecord, splitPath, type FileRecord, type SplitPath } from './record.js';

// Patterns
export {
  compilePattern,
  wildcardToRegex,
  type Pattern,
  type MatchStyle,
  type MatchTarget,
} from './pattern.js';

// Enumeration
export type { DirectoryReader, DirectoryEntry, EntryKind, EntryErrorHandler } from './reader.js';
export { NodeDirectoryReader } from './backends/node.js';
export { MemoryDirectoryReader, type MemoryFileOptions } from './backends/memory.js';
export { traverse, type TraverseOptions, type TraverseError } from './traverse.js';

// Filtering and ordering
export {
  parseDateTime,
  filterByDate,
  hasDateBounds,
  type DateBounds,
  type DateRange,
  type TimeZone,
} from './dates.js';
export {
  parseSortKeys,
  formatSortKeys,
  sortRecords,
  createComparator,
  DEFAULT_SORT_KEYS,
  type SortKey,
  type SortField,
} from './sort.js';
