/**
 * Startup, output and failure reporting shared by the CLIs.
 */

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { ConfigError, ProjectConfigError, config, configuredLogLevel, validateConfig } from "../config/index.js";
import { ChartFileError } from "../helm/index.js";
import { DockerSpecError } from "../docker/index.js";
import { GitError } from "../git/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";

export interface CliContext {
  logger: Logger;
  runId: string;
}

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * Validate the environment and set up the run ID and logger.
 */
export function startCli(): CliContext {
  validateConfig();
  const runId = initRunId();
  const logger = createLogger({
    level: configuredLogLevel(),
    file: config.logToFile,
  });
  logger.debug("Run started", { runId, argv: process.argv.slice(2) });
  return { logger, runId };
}

/**
 * Log a failure with whatever detail its type carries.
 */
export function reportFailure(logger: Logger, err: unknown): void {
  if (err instanceof ProjectConfigError) {
    logger.error(err.format());
  } else if (err instanceof ChartFileError) {
    logger.error("Chart file error", { file: err.filePath, message: err.message });
  } else if (err instanceof DockerSpecError) {
    logger.error("Invalid image definition", { issues: err.issues });
  } else if (isArgumentError(err)) {
    logger.error(`Invalid arguments: ${err.message}`);
  } else if (err instanceof GitError || err instanceof ConfigError) {
    logger.error(err.message);
  } else if (err instanceof Error) {
    logger.error(`Unexpected error: ${err.message}`, { stack: err.stack });
  } else {
    logger.error(`Unexpected error: ${String(err)}`);
  }
}

function isArgumentError(err: unknown): err is TypeError {
  return err instanceof TypeError &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS_");
}

/**
 * Run a CLI body and return its exit code. Argument parsing belongs inside
 * the body so that bad flags are reported like any other failure.
 */
export function executeCli(
  body: (ctx: CliContext) => void,
  start: () => CliContext = startCli
): number {
  let logger: Logger = createLogger();
  try {
    const ctx = start();
    logger = ctx.logger;
    body(ctx);
    return 0;
  } catch (err) {
    reportFailure(logger, err);
    return 1;
  }
}

/**
 * Run a CLI body, exiting 1 when it throws.
 */
export function runCli(body: (ctx: CliContext) => void): void {
  const code = executeCli(body);
  if (code !== 0) {
    process.exit(code);
  }
}

/**
 * True when `moduleUrl` is the script Node was started with, rather than a
 * module imported by tests. Symlinks are resolved, so the extensionless
 * links npm puts in node_modules/.bin match the file they point at.
 */
export function isDirectExecution(
  moduleUrl: string,
  entry: string | undefined = process.argv[1]
): boolean {
  if (entry === undefined || !existsSync(entry)) {
    return false;
  }
  return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
}
