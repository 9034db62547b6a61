/**
 * Project configuration loader and validator.
 *
 * Responsible for:
 * - Reading the optional release-glue.config.json
 * - Merging it over the defaults
 * - Validating with fail-fast, structured errors
 * - Freezing the result
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

import {
  ProjectConfigSchema,
  ProjectConfigFileSchema,
  type ProjectConfig,
  type ProjectConfigFile,
} from "./schema.js";
import { DEFAULT_PROJECT_CONFIG } from "./defaults.js";
import type { ReleaseTarget } from "../../release/schema.js";
import type { DockerImageOverrides } from "../../docker/schema.js";

/**
 * Structured validation error for project configuration.
 */
export class ProjectConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ProjectConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Project configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code, or "invalid_json" for unreadable files */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate a fully resolved configuration and freeze it.
 *
 * @throws ProjectConfigError if validation fails
 */
export function loadProjectConfig(input: unknown): Readonly<ProjectConfig> {
  const result = ProjectConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ProjectConfigError(
      `Invalid project configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate without throwing. Useful for reporting every problem at once.
 */
export function validateProjectConfig(input: unknown): {
  success: boolean;
  config?: ProjectConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ProjectConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

function mergeTargets(
  base: ReleaseTarget[],
  overrides: ProjectConfigFile["targets"] = []
): Partial<ReleaseTarget>[] {
  const merged: Partial<ReleaseTarget>[] = [...base];
  for (const override of overrides) {
    const index = merged.findIndex((t) => t.name === override.name);
    if (index === -1) {
      merged.push(override);
    } else {
      merged[index] = { ...merged[index], ...override };
    }
  }
  return merged;
}

/**
 * Merge file overrides over a base configuration. The result is not yet
 * validated: new targets may still be missing fields.
 */
export function mergeProjectConfig(
  overrides: ProjectConfigFile,
  base: ProjectConfig = DEFAULT_PROJECT_CONFIG
): unknown {
  const { server: serverOverrides, ...imageOverrides }: DockerImageOverrides =
    overrides.image ?? {};
  return {
    mainBranch: overrides.mainBranch ?? base.mainBranch,
    targets: mergeTargets(base.targets, overrides.targets),
    image: {
      ...base.image,
      ...imageOverrides,
      server: { ...base.image.server, ...serverOverrides },
    },
    chart: { ...base.chart, ...overrides.chart },
  };
}

/**
 * Validate file contents, merge them over the defaults and load the result.
 *
 * @throws ProjectConfigError if either the file or the merged config is invalid
 */
export function resolveProjectConfig(input: unknown): Readonly<ProjectConfig> {
  const result = ProjectConfigFileSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ProjectConfigError(
      `Invalid project config file: ${issues.length} validation error(s)`,
      issues
    );
  }

  return loadProjectConfig(mergeProjectConfig(result.data));
}

/**
 * Read the project config file. A missing file means "use the defaults".
 *
 * @throws ProjectConfigError if the file is not JSON or fails validation
 */
export function readProjectConfig(filePath: string): Readonly<ProjectConfig> {
  if (!existsSync(filePath)) {
    return loadProjectConfig(DEFAULT_PROJECT_CONFIG);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ProjectConfigError(`Cannot read project config ${filePath}`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }

  return resolveProjectConfig(raw);
}
