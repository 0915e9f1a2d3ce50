/**
 * Command Executor
 *
 * Runs a rendered command for each matched file, one at a time.
 *
 * - The command is split with shlex and started without a shell; template
 *   values are passed through as they are.
 * - A command counts as successful once it has been launched; its exit
 *   code is recorded but only fails the run in strict mode.
 * - A failure for one file is reported and the next file is processed.
 */

import { spawn } from 'child_process';
import * as shlex from 'shlex';
import {
  CommandExitError,
  CommandLaunchError,
  errnoOf,
  type FileRecord,
  type FindFilesError,
} from '../search/index.js';
import { parseTemplate, renderTokens, splitTemplate, type TemplateOptions } from './template.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Starts a program and resolves with its exit code once it has finished.
 * Rejects with an errno-carrying error when the program cannot be started.
 */
export type ProcessLauncher = (file: string, args: string[]) => Promise<number | null>;

/**
 * Outcome of running (or printing) one command.
 */
export interface CommandResult {
  /** File the command was rendered for */
  path: string;
  /** The rendered command line */
  command: string;
  /** False when the command failed to launch, or exited non-zero in strict mode */
  ok: boolean;
  /** Whether a process was started */
  launched: boolean;
  /** Exit code of the process, when one ran to completion */
  exitCode?: number | null;
  error?: FindFilesError;
}

export interface ExecuteOptions {
  /** Print the command instead of running it */
  dryRun?: boolean;
  /** In dry-run mode, print the file path next to the command */
  verbose?: boolean;
  /** Treat a non-zero exit code as a failure */
  strictExitCode?: boolean;
  /** Process launcher (default: child_process.spawn with inherited stdio) */
  launcher?: ProcessLauncher;
  /** Receives dry-run output lines */
  write?: (line: string) => void;
}

// ============================================================================
// Launching
// ============================================================================

/**
 * Launch a program with inherited stdio and wait for it to exit.
 */
export const spawnProcess: ProcessLauncher = (file, args) => {
  return new Promise((resolve, reject) => {
    let settled = false;
    const child = spawn(file, args, {
      stdio: 'inherit',
      shell: false,
    });

    child.on('error', (err) => {
      if (!settled) {
        settled = true;
        reject(err);
      }
    });

    child.on('close', (code: number | null) => {
      if (!settled) {
        settled = true;
        resolve(code);
      }
    });
  });
};

/**
 * Split a command line into program and arguments.
 *
 * `split` defaults to shlex over the whole line; runCommands() passes a
 * template-aware split that keeps placeholder values intact.
 *
 * @throws CommandLaunchError if the line cannot be split or is empty
 */
export function splitCommandLine(
  command: string,
  filePath: string,
  split: () => string[] = () => shlex.split(command)
): [string, string[]] {
  let argv: string[];
  try {
    argv = split();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new CommandLaunchError(command, filePath, 'EINVAL', `cannot parse command: ${message}`);
  }

  const [file, ...args] = argv;
  if (file === undefined || file === '') {
    throw new CommandLaunchError(command, filePath, 'EINVAL', 'empty command');
  }
  return [file, args];
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Run or print one rendered command for a file.
 *
 * @param command - Display form of the command
 * @param split - Produces the argument list to launch (default: shlex over `command`)
 */
export async function executeCommand(
  command: string,
  record: FileRecord,
  options: ExecuteOptions = {},
  split?: () => string[]
): Promise<CommandResult> {
  const {
    dryRun = false,
    verbose = false,
    strictExitCode = false,
    launcher = spawnProcess,
    write = (line: string) => process.stdout.write(`${line}\n`),
  } = options;

  if (dryRun) {
    write(verbose ? `${record.path}: ${command}` : command);
    return { path: record.path, command, ok: true, launched: false };
  }

  let file: string;
  let args: string[];
  try {
    [file, args] = splitCommandLine(command, record.path, split);
  } catch (error) {
    if (error instanceof CommandLaunchError) {
      return { path: record.path, command, ok: false, launched: false, error };
    }
    throw error;
  }

  let exitCode: number | null;
  try {
    exitCode = await launcher(file, args);
  } catch (e) {
    const errno = errnoOf(e) ?? 'UNKNOWN';
    const reason = e instanceof Error ? e.message : String(e);
    return {
      path: record.path,
      command,
      ok: false,
      launched: false,
      error: new CommandLaunchError(command, record.path, errno, reason),
    };
  }

  if (strictExitCode && exitCode !== 0) {
    return {
      path: record.path,
      command,
      ok: false,
      launched: true,
      exitCode,
      error: new CommandExitError(command, record.path, exitCode ?? -1),
    };
  }

  return { path: record.path, command, ok: true, launched: true, exitCode };
}

/**
 * Summary of a batch of commands.
 */
export interface CommandBatchResult {
  results: CommandResult[];
  failures: CommandResult[];
}

export interface RunCommandsOptions extends ExecuteOptions, TemplateOptions {
  /** Called as soon as a command fails, before the next file runs */
  onFailure?: (result: CommandResult) => void;
}

/**
 * Render and run a command template for every record, in order.
 */
export async function runCommands(
  template: string,
  records: readonly FileRecord[],
  options: RunCommandsOptions = {}
): Promise<CommandBatchResult> {
  const tokens = parseTemplate(template);
  const results: CommandResult[] = [];
  const failures: CommandResult[] = [];

  const templateOptions = { separator: options.separator };

  for (const record of records) {
    const command = renderTokens(tokens, record, templateOptions);
    const result = await executeCommand(command, record, options, () =>
      splitTemplate(tokens, record, templateOptions)
    );
    results.push(result);
    if (!result.ok) {
      failures.push(result);
      options.onFailure?.(result);
    }
  }

  return { results, failures };
}
