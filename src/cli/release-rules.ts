#!/usr/bin/env node
/**
 * Generate `.releaserc` files for the configured release targets.
 *
 * On the main branch each target gets a single-branch config. On any other
 * branch the branch is added as a prerelease branch whose channel is
 * derived from its name (see release/channel.ts).
 *
 * Usage:
 *   npx tsx src/cli/release-rules.ts [target...] [options]
 *   npm run release-rules -- chart --branch feature/search/ui
 *
 * Targets:
 *   app, chart, ... (names from the project config; default: all)
 *
 * Options:
 *   --branch <name>   Branch being released (default: $RELEASE_BRANCH, then git)
 *   --config <path>   Project config file (default: release-glue.config.json)
 *   --root <dir>      Repository root output paths are relative to (default: cwd)
 *   --stdout          Print the rendered configs instead of writing them
 *   --json            Print a JSON summary of what was generated
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - All configs generated
 *   1 - Invalid configuration, unknown target, or git failure
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  config,
  readProjectConfig,
  type ProjectConfig,
} from "../config/index.js";
import { currentBranch } from "../git/index.js";
import {
  writeReleaseConfig,
  type ReleaseTarget,
  type WrittenReleaseConfig,
} from "../release/index.js";
import type { Logger } from "../logging/index.js";
import { c, isDirectExecution, runCli } from "./shared.js";

const HELP = `
Usage: release-rules [target...] [options]

Targets:
  Names from the project config (default: all targets)

Options:
  --branch <name>   Branch being released (default: $RELEASE_BRANCH, then git)
  --config <path>   Project config file (default: release-glue.config.json)
  --root <dir>      Repository root output paths are relative to (default: cwd)
  --stdout          Print the rendered configs instead of writing them
  --json            Print a JSON summary of what was generated
  -h, --help        Show this help message
`;

export interface ReleaseRulesArgs {
  targets: string[];
  branch?: string;
  config: string;
  root: string;
  stdout: boolean;
  json: boolean;
  help: boolean;
}

export function parseReleaseRulesArgs(argv: string[]): ReleaseRulesArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      branch: { type: "string" },
      config: { type: "string", default: config.configFile },
      root: { type: "string", default: "." },
      stdout: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    targets: positionals,
    branch: values.branch,
    config: values.config ?? config.configFile,
    root: values.root ?? ".",
    stdout: values.stdout ?? false,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

/**
 * Resolve target names against the project config. No names, or "all",
 * selects every target.
 *
 * @throws ConfigError for an unknown target name
 */
export function selectTargets(
  project: Readonly<ProjectConfig>,
  names: string[]
): ReleaseTarget[] {
  if (names.length === 0 || names.includes("all")) {
    return [...project.targets];
  }

  return names.map((name) => {
    const target = project.targets.find((t) => t.name === name);
    if (!target) {
      const known = project.targets.map((t) => t.name).join(", ");
      throw new ConfigError(`Unknown release target "${name}". Known targets: ${known}`);
    }
    return target;
  });
}

export interface GenerateOptions {
  rootDir: string;
  dryRun: boolean;
}

/**
 * Render (and unless dry-running, write) one config per target, warning
 * when a prerelease channel comes out empty.
 */
export function generateReleaseConfigs(
  project: Readonly<ProjectConfig>,
  targets: ReleaseTarget[],
  branch: string,
  options: GenerateOptions,
  logger: Logger
): WrittenReleaseConfig[] {
  return targets.map((target) => {
    const result = writeReleaseConfig(target, branch, {
      rootDir: options.rootDir,
      mainBranch: project.mainBranch,
      dryRun: options.dryRun,
    });

    if (result.channel === "") {
      logger.warn("Branch name yields an empty prerelease channel", {
        target: target.name,
        branch,
      });
    }

    logger.info(result.written ? "Wrote release config" : "Rendered release config", {
      target: result.target,
      path: result.path,
      channel: result.channel ?? null,
    });

    return result;
  });
}

function main(argv: string[]): void {
  runCli(({ logger }) => {
    const args = parseReleaseRulesArgs(argv);
    if (args.help) {
      console.log(HELP);
      return;
    }

    const rootDir = resolve(args.root);
    const project = readProjectConfig(resolve(rootDir, args.config));
    const targets = selectTargets(project, args.targets);
    const branch = args.branch ?? currentBranch({ cwd: rootDir });

    logger.debug("Generating release configs", {
      branch,
      mainBranch: project.mainBranch,
      targets: targets.map((t) => t.name),
    });

    const results = generateReleaseConfigs(
      project,
      targets,
      branch,
      { rootDir, dryRun: args.stdout },
      logger
    );

    if (args.json) {
      console.log(JSON.stringify({
        branch,
        results: results.map(({ target, path, channel, written }) => ({
          target,
          path,
          channel: channel ?? null,
          written,
        })),
      }, null, 2));
      return;
    }

    for (const result of results) {
      if (args.stdout) {
        console.log(c("dim", `# ${result.path}`));
        console.log(result.content);
      } else {
        console.log(`${c("green", "✓")} ${c("bold", result.target)}: ${result.path}`);
      }
    }
  });
}

if (isDirectExecution(import.meta.url)) {
  main(process.argv.slice(2));
}
