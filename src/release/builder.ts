/**
 * Assembles a semantic-release document for one release target.
 */

import { deriveChannel } from "./channel.js";
import type {
  BranchSpec,
  PluginOptions,
  ReleaseConfig,
  ReleasePlugin,
  ReleaseTarget,
} from "./schema.js";

export const DEFAULT_MAIN_BRANCH = "main";

/**
 * Release branches for a run on `branch`.
 *
 * On the main branch only the main branch is configured. Anywhere else the
 * current branch is added as a prerelease branch on its derived channel.
 */
export function buildBranches(
  branch: string,
  mainBranch: string = DEFAULT_MAIN_BRANCH
): BranchSpec[] {
  if (branch === mainBranch) {
    return [{ name: mainBranch }];
  }
  return [{ name: mainBranch }, { name: branch, prerelease: deriveChannel(branch) }];
}

export function buildPlugins(target: ReleaseTarget): ReleasePlugin[] {
  const analyzerOptions: PluginOptions = { preset: target.preset };
  if (target.releaseRules.length > 0) {
    analyzerOptions.releaseRules = target.releaseRules.map((rule) => ({
      type: rule.type,
      release: rule.release,
    }));
  }
  if (target.noteKeywords.length > 0) {
    analyzerOptions.parserOpts = { noteKeywords: [...target.noteKeywords] };
  }

  const plugins: ReleasePlugin[] = [
    ["@semantic-release/commit-analyzer", analyzerOptions],
    ["@semantic-release/release-notes-generator", { preset: target.preset }],
    ["@semantic-release/github", { successComment: target.github.successComment }],
  ];

  if (target.exec) {
    plugins.push(["@semantic-release/exec", { prepareCmd: target.exec.prepareCmd }]);
  }
  if (target.gitAssets) {
    plugins.push(["@semantic-release/git", { assets: [...target.gitAssets] }]);
  }

  return plugins;
}

export function buildReleaseConfig(
  target: ReleaseTarget,
  branch: string,
  mainBranch: string = DEFAULT_MAIN_BRANCH
): ReleaseConfig {
  return {
    extends: [...target.extends],
    tagFormat: target.tagFormat,
    plugins: buildPlugins(target),
    branches: buildBranches(branch, mainBranch),
  };
}
