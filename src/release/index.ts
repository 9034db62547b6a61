/**
 * semantic-release configuration generation.
 *
 * Usage:
 *   import { writeReleaseConfig } from "./release/index.js";
 *   import { DEFAULT_PROJECT_CONFIG } from "./config/index.js";
 *
 *   const [app] = DEFAULT_PROJECT_CONFIG.targets;
 *   writeReleaseConfig(app, "feature/search/ui");   // → app/.releaserc
 */

export {
  ReleaseType,
  ReleaseRuleSchema,
  ReleaseTargetSchema,
  type ReleaseRule,
  type ReleaseTarget,
  type ReleaseConfig,
  type ReleasePlugin,
  type PluginOptions,
  type PluginOptionValue,
  type BranchSpec,
} from "./schema.js";

export { channelSegment, sanitizeChannel, deriveChannel } from "./channel.js";

export {
  buildBranches,
  buildPlugins,
  buildReleaseConfig,
  DEFAULT_MAIN_BRANCH,
} from "./builder.js";

export { renderReleaseConfig } from "./render.js";

export {
  writeReleaseConfig,
  type WriteReleaseConfigOptions,
  type WrittenReleaseConfig,
} from "./writer.js";
