#!/usr/bin/env node
/**
 * Prepare step of the chart release: set Chart.yaml's version from the tag
 * semantic-release is about to create.
 *
 * The chart's `.releaserc` runs `./chart-prerelease.sh ${nextRelease.gitTag}`
 * through @semantic-release/exec. semantic-release-monorepo runs from the
 * chart directory, so the hook script sits beside Chart.yaml and points
 * `--root` at the repository root:
 *
 *   #!/bin/sh
 *   set -e
 *   exec npx chart-prerelease "$1" --root ..
 *
 * Paths in the project config (`chart.chartFile`, default chart/Chart.yaml)
 * are resolved against `--root`, never against the working directory.
 *
 * Usage:
 *   npx tsx src/cli/chart-prerelease.ts <gitTag> [options]
 *   npx tsx src/cli/chart-prerelease.ts helm-1.4.0-feature.1
 *
 * Options:
 *   --config <path>   Project config file, relative to the root (default: release-glue.config.json)
 *   --root <dir>      Repository root (default: cwd)
 *   --chart <path>    Chart.yaml, relative to the root (default: from project config)
 *   -h, --help        Show help
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError, config, readProjectConfig, type ProjectConfig } from "../config/index.js";
import { setChartVersion, type ChartVersionUpdate } from "../helm/index.js";
import type { Logger } from "../logging/index.js";
import { isDirectExecution, runCli } from "./shared.js";

const HELP = `
Usage: chart-prerelease <gitTag> [options]

Options:
  --config <path>   Project config file, relative to the root (default: release-glue.config.json)
  --root <dir>      Repository root (default: cwd)
  --chart <path>    Chart.yaml, relative to the root (default: from project config)
  -h, --help        Show this help message

From the chart directory's hook script: chart-prerelease "$1" --root ..
`;

export interface ChartPrereleaseOptions {
  rootDir: string;
  chart?: string;
}

/**
 * Bump the project's Chart.yaml to the version carried by `tag`.
 */
export function prepareChartRelease(
  project: Readonly<ProjectConfig>,
  tag: string,
  options: ChartPrereleaseOptions,
  logger: Logger
): ChartVersionUpdate & { path: string } {
  const chartPath = resolve(options.rootDir, options.chart ?? project.chart.chartFile);
  const update = setChartVersion(chartPath, tag, project.chart.tagPrefix);

  if (update.changed) {
    logger.info("Updated chart version", {
      path: chartPath,
      from: update.previous,
      to: update.version,
    });
  } else {
    logger.info("Chart version already current", { path: chartPath, version: update.version });
  }
  return { ...update, path: chartPath };
}

function main(argv: string[]): void {
  runCli(({ logger }) => {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string" },
        root: { type: "string" },
        chart: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      console.log(HELP);
      return;
    }

    const [tag] = positionals;
    if (tag === undefined || positionals.length > 1) {
      throw new ConfigError("Expected exactly one argument: the release git tag");
    }

    const rootDir = resolve(values.root ?? ".");
    const project = readProjectConfig(resolve(rootDir, values.config ?? config.configFile));
    prepareChartRelease(project, tag, { rootDir, chart: values.chart }, logger);
  });
}

if (isDirectExecution(import.meta.url)) {
  main(process.argv.slice(2));
}
