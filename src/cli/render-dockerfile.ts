#!/usr/bin/env node
/**
 * Render the service Dockerfile from the project's image definition.
 *
 * Usage:
 *   npx tsx src/cli/render-dockerfile.ts [options]
 *
 * Options:
 *   --config <path>   Project config file (default: release-glue.config.json)
 *   --root <dir>      Repository root (default: cwd)
 *   --out <path>      Output file, relative to the root (default: Dockerfile)
 *   --stdout          Print instead of writing
 *   -h, --help        Show help
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, readProjectConfig, type ProjectConfig } from "../config/index.js";
import { renderDockerfile } from "../docker/index.js";
import type { Logger } from "../logging/index.js";
import { isDirectExecution, runCli } from "./shared.js";

const HELP = `
Usage: render-dockerfile [options]

Options:
  --config <path>   Project config file (default: release-glue.config.json)
  --root <dir>      Repository root (default: cwd)
  --out <path>      Output file, relative to the root (default: Dockerfile)
  --stdout          Print instead of writing
  -h, --help        Show this help message
`;

export const DEFAULT_DOCKERFILE_PATH = "Dockerfile";

export interface WriteDockerfileOptions {
  rootDir: string;
  out?: string;
}

/**
 * Render the project's Dockerfile and write it under `rootDir`. Returns the
 * absolute path written.
 */
export function writeDockerfile(
  project: Readonly<ProjectConfig>,
  options: WriteDockerfileOptions,
  logger: Logger
): string {
  const outPath = resolve(options.rootDir, options.out ?? DEFAULT_DOCKERFILE_PATH);
  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, renderDockerfile(project.image), "utf-8");
  logger.info("Wrote Dockerfile", {
    path: outPath,
    baseImage: project.image.baseImage,
    port: project.image.exposePort,
  });
  return outPath;
}

function main(argv: string[]): void {
  runCli(({ logger }) => {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string" },
        root: { type: "string" },
        out: { type: "string" },
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

    if (values.stdout) {
      process.stdout.write(renderDockerfile(project.image));
      return;
    }

    writeDockerfile(project, { rootDir, out: values.out }, logger);
  });
}

if (isDirectExecution(import.meta.url)) {
  main(process.argv.slice(2));
}
