#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * findfiles <directory> [pattern] [options]
 */

import { Command, CommanderError } from "commander";
import * as path from "path";
import {
  compilePattern,
  filterByDate,
  formatSortKeys,
  parseDateTime,
  parseSortKeys,
  sortRecords,
  traverse,
  type DateBounds,
  type DirectoryReader,
  type TimeZone,
} from "../search/index.js";
import { runCommands, type ProcessLauncher } from "../exec/index.js";
import { renderReport, resolveWidth } from "../report/index.js";
import {
  findProjectConfig,
  loadProjectConfigFile,
  mergeWithCLIOptions,
  type ProjectConfig,
  type Settings,
} from "../config/index.js";
import { createLogger, type Logger, type OutputStream } from "./logger.js";

/**
 * CLI options from command line.
 */
interface CLIOptions {
  regex?: boolean;
  shallow?: boolean;
  pathMatch?: boolean;
  sort?: string;
  createdSince?: string;
  createdBefore?: string;
  modifiedSince?: string;
  modifiedBefore?: string;
  execute?: string;
  dryRun?: boolean;
  verbose?: boolean;
  strictExit?: boolean;
  tab?: boolean;
  concise?: boolean;
  bare?: boolean;
  group?: boolean;
  localTime?: boolean;
  debug?: boolean;
  config?: string;
}

/**
 * Process environment for a CLI run. Tests replace the streams and the
 * launcher; everything defaults to the real process.
 */
export interface CLIEnvironment {
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Directory the configuration search starts from */
  cwd?: string;
  launcher?: ProcessLauncher;
  reader?: DirectoryReader;
}

/**
 * Translate command-line flags into settings overrides.
 * Flags that were not given stay undefined so config values show through.
 */
function toSettingsOverrides(options: CLIOptions): Partial<Settings> {
  let format: Settings["format"] | undefined;
  if (options.bare) {
    format = "bare";
  } else if (options.tab) {
    format = "tab";
  }

  return {
    sort: options.sort,
    format,
    concise: options.concise,
    regex: options.regex,
    pathMatch: options.pathMatch,
    recursive: options.shallow ? false : undefined,
    groupByDirectory: options.group,
    timeZone: options.localTime ? "local" : undefined,
    strictExitCode: options.strictExit,
  };
}

function parseOptionalDate(text: string | undefined, timeZone: TimeZone): Date | undefined {
  return text === undefined ? undefined : parseDateTime(text, timeZone);
}

/**
 * Parse all four date options. Fails before any directory is read.
 */
function parseDateBounds(options: CLIOptions, timeZone: TimeZone): DateBounds {
  return {
    created: {
      start: parseOptionalDate(options.createdSince, timeZone),
      end: parseOptionalDate(options.createdBefore, timeZone),
    },
    modified: {
      start: parseOptionalDate(options.modifiedSince, timeZone),
      end: parseOptionalDate(options.modifiedBefore, timeZone),
    },
  };
}

async function loadConfig(
  options: CLIOptions,
  cwd: string,
  logger: Logger
): Promise<ProjectConfig | undefined> {
  if (options.config) {
    const configPath = path.resolve(cwd, options.config);
    logger.debug(`Config file: ${configPath}`);
    return loadProjectConfigFile(configPath);
  }

  const found = await findProjectConfig(cwd);
  if (found) {
    logger.debug(`Config file: ${found.configPath}`);
  }
  return found?.config;
}

/**
 * Search, filter, sort, then print a report or run the command.
 *
 * @returns Process exit code
 */
async function executeSearch(
  directory: string,
  pattern: string,
  options: CLIOptions,
  env: Required<Pick<CLIEnvironment, "stdout" | "cwd">> & CLIEnvironment,
  logger: Logger
): Promise<number> {
  const projectConfig = await loadConfig(options, env.cwd, logger);
  const settings = mergeWithCLIOptions(projectConfig, toSettingsOverrides(options));

  const bounds = parseDateBounds(options, settings.timeZone);
  const compiled = compilePattern(pattern, settings.regex, settings.pathMatch);
  const sortKeys = parseSortKeys(settings.sort);

  logger.debug(`Searching in directory: ${directory}`);
  logger.debug(`Pattern: ${pattern}`);
  if (settings.regex) logger.debug("Using regex pattern matching");
  if (settings.pathMatch) logger.debug("Matching against full paths");
  if (!settings.recursive) logger.debug("Performing shallow search (not recursive)");
  logger.debug(`Output format: ${settings.format}${settings.concise ? " (concise)" : ""}`);
  if (options.execute) logger.debug(`Command to execute: ${options.execute}`);
  logger.debug(`Sort order: ${formatSortKeys(sortKeys)}`);

  const found = await traverse(directory, compiled, {
    recursive: settings.recursive,
    reader: env.reader,
    onError: (error) => logger.warn(`Warning: ${error.message}`),
  });
  const records = sortRecords(filterByDate(found, bounds), sortKeys, env.reader?.separator);
  logger.debug(`Matched ${found.length} files, ${records.length} after date filters`);

  const writeLine = (line: string) => {
    env.stdout.write(`${line}\n`);
  };

  if (options.execute !== undefined) {
    const { failures } = await runCommands(options.execute, records, {
      dryRun: options.dryRun,
      verbose: options.verbose,
      strictExitCode: settings.strictExitCode,
      launcher: env.launcher,
      separator: env.reader?.separator,
      write: writeLine,
      onFailure: (result) => logger.error(`Error: ${result.error?.message ?? result.command}`),
    });
    if (failures.length > 0) {
      logger.error(`${failures.length} of ${records.length} commands failed`);
      return 1;
    }
    return 0;
  }

  const lines = renderReport(records, {
    format: settings.format,
    concise: settings.concise,
    width: settings.width ?? resolveWidth(env.stdout.isTTY ? env.stdout.columns : undefined),
    groupByDirectory: settings.groupByDirectory,
    timeZone: settings.timeZone,
    color: env.stdout.isTTY === true,
    separator: env.reader?.separator,
  });
  for (const line of lines) {
    writeLine(line);
  }
  return 0;
}

/**
 * Build the commander program. The action stores its exit code in `result`.
 */
function createProgram(
  env: Required<Pick<CLIEnvironment, "stdout" | "stderr" | "cwd">> & CLIEnvironment,
  result: { exitCode: number }
): Command {
  const program = new Command();

  program
    .name("findfiles")
    .description("Recursively find files by wildcard or regex, then list them or run a command per file")
    .version("0.1.0")
    .argument("<directory>", "Directory to search")
    .argument("[pattern]", "Wildcard (* and ?) or regex pattern", "*")
    .option("-r, --regex", "Treat pattern as a regular expression instead of a wildcard")
    .option("-s, --shallow", "Do not recurse into subdirectories")
    .option("-p, --path-match", "Match the pattern anywhere in the full path instead of the file name")
    .option(
      "--sort <order>",
      "Sort keys: p=path, n=name, s=size, c=created, m=modified; prefix a key with - for descending (e.g. -np)"
    )
    .option("--created-since <date>", "Only files created at or after this time")
    .option("--created-before <date>", "Only files created before this time")
    .option("--modified-since <date>", "Only files modified at or after this time")
    .option("--modified-before <date>", "Only files modified before this time")
    .option("-x, --execute <command>", "Run a command for each file (%d = directory, %n = name, %f = full path)")
    .option("-n, --dry-run", "Print the commands instead of running them")
    .option("-v, --verbose", "With --dry-run, print each file path next to its command")
    .option("--strict-exit", "Count a non-zero command exit code as a failure")
    .option("-t, --tab", "Separate columns with a single tab")
    .option("-c, --concise", "Omit header and summary")
    .option("-b, --bare", "Print file paths only (implies --concise)")
    .option("-g, --group", "Group the table by directory")
    .option("--local-time", "Read date options and show times in local time instead of UTC")
    .option("-d, --debug", "Print search parameters to stderr")
    .option("--config <path>", "Configuration file (default: nearest findfiles.config.yaml)")
    .addHelpText(
      "after",
      "\nDates: YYYYMMDD, YYYYMMDDHHMM, YYYYMMDDHHMMSS, YYYY/MM/DD, YYYY/MM/DD-HH:MM, YYYY/MM/DD-HH:MM:SS"
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        env.stdout.write(str);
      },
      writeErr: (str) => {
        env.stderr.write(str);
      },
    })
    .action(async (directory: string, pattern: string, options: CLIOptions) => {
      const logger = createLogger({ stream: env.stderr, debug: options.debug });
      try {
        result.exitCode = await executeSearch(directory, pattern, options, env, logger);
      } catch (err) {
        logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        result.exitCode = 1;
      }
    });

  return program;
}

/**
 * Main CLI execution.
 *
 * @returns Exit code: 0 on success, 1 on invalid arguments or failed commands
 */
export async function runCLI(
  argv: string[] = process.argv,
  environment: CLIEnvironment = {}
): Promise<number> {
  const env = {
    ...environment,
    stdout: environment.stdout ?? process.stdout,
    stderr: environment.stderr ?? process.stderr,
    cwd: environment.cwd ?? process.cwd(),
  };
  const result = { exitCode: 0 };
  const program = createProgram(env, result);

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version end parsing with exit code 0
      return err.exitCode === 0 ? 0 : 1;
    }
    throw err;
  }

  return result.exitCode;
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
import { realpathSync } from "fs";
import { fileURLToPath } from "url";

function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1]);
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
