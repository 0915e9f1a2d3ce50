/**
 * Config Module
 *
 * Project configuration schema and loading.
 */

export {
  ProjectConfigSchema,
  CONFIG_FILE_NAMES,
  type ProjectConfig,
  type Settings,
  loadProjectConfigFile,
  findProjectConfig,
  getDefaultSettings,
  mergeWithCLIOptions,
} from "./project.js";
