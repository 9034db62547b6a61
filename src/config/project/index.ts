/**
 * Project configuration module.
 *
 * Usage:
 *   import { readProjectConfig } from "./config/index.js";
 *
 *   // Defaults, merged with release-glue.config.json when present
 *   const project = readProjectConfig("release-glue.config.json");
 */

export type { ProjectConfig, ProjectConfigFile, ChartSettings } from "./schema.js";

export {
  ProjectConfigSchema,
  ProjectConfigFileSchema,
  ChartSettingsSchema,
} from "./schema.js";

export {
  loadProjectConfig,
  validateProjectConfig,
  mergeProjectConfig,
  resolveProjectConfig,
  readProjectConfig,
  ProjectConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export {
  DEFAULT_PROJECT_CONFIG,
  DEFAULT_RELEASE_RULES,
  APP_RELEASE_TARGET,
  CHART_RELEASE_TARGET,
  DEFAULT_IMAGE_SPEC,
  DEFAULT_CHART_SETTINGS,
} from "./defaults.js";
