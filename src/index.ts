/**
 * findfiles - recursive file search with sorting, date filters and per-file commands
 */

// Matching, traversal, filtering and sorting
export * from "./search/index.js";

// Command templating and execution
export * from "./exec/index.js";

// Report rendering
export * from "./report/index.js";

// Configuration
export * from "./config/index.js";

// CLI
export { runCLI, type CLIEnvironment } from "./cli/run.js";
export { createLogger, type Logger, type LoggerOptions, type OutputStream } from "./cli/logger.js";
