/**
 * Project Configuration
 *
 * Schema and loader for findfiles.config.yaml, which supplies defaults for
 * matching, sorting and report formatting. Command-line options override
 * the file, and the file overrides the built-in defaults.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigError } from "../search/index.js";
import { MIN_WIDTH } from "../report/index.js";

/**
 * Schema for the configuration file. Every key is optional.
 */
export const ProjectConfigSchema = z
  .object({
    /** Default sort keys, e.g. "-sp" */
    sort: z.string().optional(),
    /** Report format */
    format: z.enum(["table", "tab", "bare"]).optional(),
    /** Omit header and summary */
    concise: z.boolean().optional(),
    /** Treat patterns as regular expressions */
    regex: z.boolean().optional(),
    /** Match patterns against the full path */
    pathMatch: z.boolean().optional(),
    /** Descend into subdirectories */
    recursive: z.boolean().optional(),
    /** Group table output by parent directory */
    groupByDirectory: z.boolean().optional(),
    /** Time zone for date options and report times */
    timeZone: z.enum(["utc", "local"]).optional(),
    /** Fixed report width; detected from the terminal when absent */
    width: z.number().int().min(MIN_WIDTH).optional(),
    /** Count a non-zero command exit code as a failure */
    strictExitCode: z.boolean().optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Fully resolved settings.
 */
export interface Settings {
  sort: string;
  format: "table" | "tab" | "bare";
  concise: boolean;
  regex: boolean;
  pathMatch: boolean;
  recursive: boolean;
  groupByDirectory: boolean;
  timeZone: "utc" | "local";
  width?: number;
  strictExitCode: boolean;
}

/**
 * Project configuration file names to look for.
 */
export const CONFIG_FILE_NAMES = ["findfiles.config.yaml", "findfiles.config.yml"];

/**
 * Load configuration from a YAML file.
 *
 * An empty file is an empty configuration.
 *
 * @throws ConfigError if the file can't be read, parsed or validated
 */
export async function loadProjectConfigFile(configPath: string): Promise<ProjectConfig> {
  let parsed: unknown;
  try {
    const content = await fs.readFile(configPath, "utf-8");
    parsed = yaml.load(content);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Cannot load config ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = ProjectConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(configPath, `Invalid config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Find and load the nearest configuration file.
 *
 * Searches the given directory and its parents.
 *
 * @returns Config and path if found, null otherwise
 */
export async function findProjectConfig(
  startDir: string
): Promise<{ config: ProjectConfig; configPath: string } | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      try {
        await fs.access(configPath);
      } catch {
        continue;
      }
      return { config: await loadProjectConfigFile(configPath), configPath };
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Get the built-in settings.
 */
export function getDefaultSettings(): Settings {
  return {
    sort: "p",
    format: "table",
    concise: false,
    regex: false,
    pathMatch: false,
    recursive: true,
    groupByDirectory: false,
    timeZone: "utc",
    strictExitCode: false,
  };
}

/**
 * Merge CLI options with project config.
 *
 * CLI options take precedence over project config, which takes precedence
 * over the defaults. Undefined CLI options leave lower layers in place.
 */
export function mergeWithCLIOptions(
  projectConfig: ProjectConfig | undefined,
  cliOptions: Partial<Settings>
): Settings {
  const defaults = getDefaultSettings();
  const config: ProjectConfig = projectConfig ?? {};

  const format = cliOptions.format ?? config.format ?? defaults.format;

  return {
    sort: cliOptions.sort ?? config.sort ?? defaults.sort,
    format,
    // Bare output never has a header or summary
    concise: format === "bare" || (cliOptions.concise ?? config.concise ?? defaults.concise),
    regex: cliOptions.regex ?? config.regex ?? defaults.regex,
    pathMatch: cliOptions.pathMatch ?? config.pathMatch ?? defaults.pathMatch,
    recursive: cliOptions.recursive ?? config.recursive ?? defaults.recursive,
    groupByDirectory:
      cliOptions.groupByDirectory ?? config.groupByDirectory ?? defaults.groupByDirectory,
    timeZone: cliOptions.timeZone ?? config.timeZone ?? defaults.timeZone,
    width: cliOptions.width ?? config.width ?? defaults.width,
    strictExitCode: cliOptions.strictExitCode ?? config.strictExitCode ?? defaults.strictExitCode,
  };
}
