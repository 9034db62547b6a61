/**
 * Writes rendered `.releaserc` files for release targets.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { buildReleaseConfig, DEFAULT_MAIN_BRANCH } from "./builder.js";
import { renderReleaseConfig } from "./render.js";
import type { BranchSpec, ReleaseTarget } from "./schema.js";

export interface WriteReleaseConfigOptions {
  /** Directory target output paths are relative to (default: cwd) */
  rootDir?: string;
  mainBranch?: string;
  /** Render without touching the filesystem */
  dryRun?: boolean;
}

export interface WrittenReleaseConfig {
  target: string;
  /** Absolute output path */
  path: string;
  content: string;
  /** Prerelease channel of the current branch, undefined on the main branch */
  channel?: string;
  written: boolean;
}

function prereleaseChannel(branches: BranchSpec[], branch: string): string | undefined {
  return branches.find((b) => b.name === branch)?.prerelease;
}

export function writeReleaseConfig(
  target: ReleaseTarget,
  branch: string,
  options: WriteReleaseConfigOptions = {}
): WrittenReleaseConfig {
  const { rootDir = process.cwd(), mainBranch = DEFAULT_MAIN_BRANCH, dryRun = false } = options;

  const config = buildReleaseConfig(target, branch, mainBranch);
  const content = renderReleaseConfig(config);
  const path = resolve(rootDir, target.outputPath);

  if (!dryRun) {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf-8");
  }

  return {
    target: target.name,
    path,
    content,
    channel: prereleaseChannel(config.branches, branch),
    written: !dryRun,
  };
}
