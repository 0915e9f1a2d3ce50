/**
 * CLI Logger
 *
 * Diagnostic output for the command line. Everything goes to stderr so
 * that stdout carries only the report or dry-run commands.
 * Uses picocolors for styling.
 */

import pc from "picocolors";

/**
 * Minimal writable stream used for CLI output.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  /** Terminal width, when the stream is a terminal */
  columns?: number;
  isTTY?: boolean;
}

/**
 * Options for the logger.
 */
export interface LoggerOptions {
  /** Destination (default: process.stderr) */
  stream?: OutputStream;
  /** Emit debug messages */
  debug?: boolean;
  /** Colorize output (default: when the stream is a terminal) */
  color?: boolean;
}

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger writing one line per message.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const colors = pc.createColors(options.color ?? (stream.isTTY === true && pc.isColorSupported));
  const debugEnabled = options.debug ?? false;

  const writeLine = (line: string) => {
    stream.write(`${line}\n`);
  };

  return {
    debug(message) {
      if (debugEnabled) {
        writeLine(colors.dim(message));
      }
    },
    warn(message) {
      writeLine(colors.yellow(message));
    },
    error(message) {
      writeLine(colors.red(message));
    },
  };
}
