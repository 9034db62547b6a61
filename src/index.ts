/**
 * release-glue: generators for the repository's release and deployment
 * artifacts.
 *
 * - release/  semantic-release configs (.releaserc) per release target
 * - docker/   the service Dockerfile
 * - helm/     chart naming/label helpers, _helpers.tpl, Chart.yaml versioning
 * - git/      current-branch lookup
 */

export * from "./release/index.js";
export * from "./docker/index.js";
export * from "./helm/index.js";
export * from "./git/index.js";
export {
  ConfigError,
  config,
  validateConfig,
  readProjectConfig,
  resolveProjectConfig,
  loadProjectConfig,
  validateProjectConfig,
  mergeProjectConfig,
  ProjectConfigError,
  DEFAULT_PROJECT_CONFIG,
  DEFAULT_RELEASE_RULES,
  APP_RELEASE_TARGET,
  CHART_RELEASE_TARGET,
  DEFAULT_IMAGE_SPEC,
  DEFAULT_CHART_SETTINGS,
  type AppConfig,
  type ProjectConfig,
  type ProjectConfigFile,
  type ChartSettings,
} from "./config/index.js";
export { createLogger, initRunId, getRunId, type Logger, type LogLevel } from "./logging/index.js";
