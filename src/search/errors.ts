/**
 * Search Errors
 *
 * Error types raised while compiling patterns, parsing dates,
 * walking directories and running per-file commands.
 */

/**
 * Base class for all findfiles errors.
 */
export class FindFilesError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'FindFilesError';
  }
}

/**
 * Thrown when a regex or wildcard source cannot be compiled.
 */
export class InvalidPatternError extends FindFilesError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super('INVALID_PATTERN', `Invalid pattern "${source}": ${reason}`);
    this.name = 'InvalidPatternError';
  }
}

/**
 * Thrown when a date filter literal is not in one of the accepted shapes.
 */
export class InvalidDateError extends FindFilesError {
  constructor(
    public readonly text: string,
    reason = 'expected YYYYMMDD[HHMM[SS]] or YYYY/MM/DD[-HH:MM[:SS]]'
  ) {
    super('INVALID_DATE', `Invalid date "${text}": ${reason}`);
    this.name = 'InvalidDateError';
  }
}

/**
 * Reported when a directory exists but cannot be enumerated.
 * Not-found directories never produce this error.
 */
export class DirectoryAccessError extends FindFilesError {
  constructor(
    path: string,
    public readonly errno?: string
  ) {
    super(
      'DIRECTORY_ACCESS',
      `Cannot read directory ${path}${errno ? ` (${errno})` : ''}`,
      path
    );
    this.name = 'DirectoryAccessError';
  }
}

/**
 * Reported when a listed entry exists but its metadata cannot be read,
 * for example a symbolic link loop. Dangling links never produce this error.
 */
export class EntryAccessError extends FindFilesError {
  constructor(
    path: string,
    public readonly errno?: string
  ) {
    super('ENTRY_ACCESS', `Cannot read entry ${path}${errno ? ` (${errno})` : ''}`, path);
    this.name = 'EntryAccessError';
  }
}

/**
 * Raised per file when the rendered command could not be started.
 */
export class CommandLaunchError extends FindFilesError {
  constructor(
    public readonly command: string,
    filePath: string,
    public readonly errno: string,
    reason: string
  ) {
    super('COMMAND_LAUNCH', `Failed to launch "${command}" for ${filePath}: ${reason}`, filePath);
    this.name = 'CommandLaunchError';
  }
}

/**
 * Raised per file, in strict mode only, when a launched command exits non-zero.
 */
export class CommandExitError extends FindFilesError {
  constructor(
    public readonly command: string,
    filePath: string,
    public readonly exitCode: number
  ) {
    super('COMMAND_EXIT', `Command "${command}" for ${filePath} exited with code ${exitCode}`, filePath);
    this.name = 'CommandExitError';
  }
}

/**
 * Type guard for FindFilesError.
 */
export function isFindFilesError(error: unknown): error is FindFilesError {
  return error instanceof FindFilesError;
}

/**
 * Read the errno code from an unknown rejection value.
 */
export function errnoOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Thrown when a configuration file cannot be read or fails validation.
 */
export class ConfigError extends FindFilesError {
  constructor(configPath: string, message: string) {
    super('INVALID_CONFIG', message, configPath);
    this.name = 'ConfigError';
  }
}
