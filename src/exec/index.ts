/**
 * Exec Module
 *
 * Command templating and per-file command execution.
 */

export {
  parseTemplate,
  renderTokens,
  renderCommand,
  splitTemplate,
  quoteArgument,
  type TemplateToken,
  type PlaceholderKind,
  type TemplateOptions,
} from './template.js';

export {
  executeCommand,
  runCommands,
  splitCommandLine,
  spawnProcess,
  type ProcessLauncher,
  type CommandResult,
  type CommandBatchResult,
  type ExecuteOptions,
  type RunCommandsOptions,
} from './executor.js';
