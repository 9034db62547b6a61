#!/usr/bin/env node
/**
 * Write the chart's `_helpers.tpl`, or preview the names and labels the
 * helpers produce for a release.
 *
 * Usage:
 *   npx tsx src/cli/chart-helpers.ts [options]
 *   npx tsx src/cli/chart-helpers.ts --release prod --stdout
 *
 * Options:
 *   --config <path>    Project config file (default: release-glue.config.json)
 *   --root <dir>       Repository root (default: cwd)
 *   --chart <path>     Chart.yaml (default: from project config)
 *   --out <path>       Helpers file (default: from project config)
 *   --release <name>   Preview names and labels for this release instead
 *   --stdout           Print instead of writing
 *   -h, --help         Show help
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, readProjectConfig, type ProjectConfig } from "../config/index.js";
import {
  chartFullname,
  chartInfo,
  chartLabel,
  chartName,
  commonLabels,
  configMapName,
  createHelmContext,
  generateHelpersTpl,
  loadChartMetadata,
  renderLabels,
  serviceAccountName,
  type HelmContext,
} from "../helm/index.js";
import type { Logger } from "../logging/index.js";
import { c, isDirectExecution, runCli } from "./shared.js";

const HELP = `
Usage: chart-helpers [options]

Options:
  --config <path>    Project config file (default: release-glue.config.json)
  --root <dir>       Repository root (default: cwd)
  --chart <path>     Chart.yaml (default: from project config)
  --out <path>       Helpers file (default: from project config)
  --release <name>   Preview names and labels for this release instead
  --stdout           Print instead of writing
  -h, --help         Show this help message
`;

/**
 * Human-readable summary of what the helpers evaluate to.
 */
export function formatHelperPreview(ctx: HelmContext): string {
  return [
    `name:               ${chartName(ctx)}`,
    `fullname:           ${chartFullname(ctx)}`,
    `chart:              ${chartLabel(ctx)}`,
    `serviceAccountName: ${serviceAccountName(ctx)}`,
    `configMapName:      ${configMapName(ctx)}`,
    "labels:",
    renderLabels(commonLabels(ctx), 2),
  ].join("\n");
}

export interface WriteChartHelpersOptions {
  rootDir: string;
  /** Chart.yaml, overriding the project config. */
  chart?: string;
  /** Helpers file, overriding the project config. */
  out?: string;
}

/**
 * Generate `_helpers.tpl` for the project's chart and write it. Returns the
 * absolute path written.
 */
export function writeChartHelpers(
  project: Readonly<ProjectConfig>,
  options: WriteChartHelpersOptions,
  logger: Logger
): string {
  const meta = loadChartMetadata(resolve(options.rootDir, options.chart ?? project.chart.chartFile));
  const outPath = resolve(options.rootDir, options.out ?? project.chart.helpersFile);
  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, generateHelpersTpl(meta.name), "utf-8");
  logger.info("Wrote chart helpers", { chart: meta.name, path: outPath });
  return outPath;
}

function main(argv: string[]): void {
  runCli(({ logger }) => {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string" },
        root: { type: "string" },
        chart: { type: "string" },
        out: { type: "string" },
        release: { type: "string" },
        stdout: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      console.log(HELP);
      return;
    }

    const rootDir = resolve(values.root ?? ".");
    const project = readProjectConfig(resolve(rootDir, values.config ?? config.configFile));

    if (values.release === undefined && !values.stdout) {
      writeChartHelpers(project, { rootDir, chart: values.chart, out: values.out }, logger);
      return;
    }

    const meta = loadChartMetadata(resolve(rootDir, values.chart ?? project.chart.chartFile));
    if (values.release !== undefined) {
      const ctx = createHelmContext(chartInfo(meta), values.release);
      console.log(c("bold", `${meta.name} ${meta.version} as release "${values.release}"`));
      console.log(formatHelperPreview(ctx));
      return;
    }

    process.stdout.write(generateHelpersTpl(meta.name));
  });
}

if (isDirectExecution(import.meta.url)) {
  main(process.argv.slice(2));
}
