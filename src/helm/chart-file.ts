/**
 * Chart.yaml reading and version bumping.
 *
 * The chart's release config runs `./chart-prerelease.sh ${nextRelease.gitTag}`
 * in the prepare step and then commits Chart.yaml; setChartVersion() is
 * what that step does.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { parseDocument } from "yaml";
import { z } from "zod";

import type { ChartInfo } from "./context.js";

export class ChartFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "ChartFileError";
  }
}

export const DEFAULT_CHART_TAG_PREFIX = "helm-";

/** SemVer 2, which Helm requires for chart versions. */
const SEMVER_RE =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export const ChartMetadataSchema = z
  .object({
    apiVersion: z.string().optional(),
    name: z.string().min(1),
    version: z.string().regex(SEMVER_RE, "must be a SemVer 2 version"),
    // Unquoted versions such as 1.0 parse as numbers
    appVersion: z.union([z.string(), z.number()]).transform(String).optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type ChartMetadata = z.infer<typeof ChartMetadataSchema>;

function readChartDocument(filePath: string) {
  if (!existsSync(filePath)) {
    throw new ChartFileError(filePath, `Chart file not found: ${filePath}`);
  }
  const doc = parseDocument(readFileSync(filePath, "utf-8"));
  if (doc.errors.length > 0) {
    throw new ChartFileError(
      filePath,
      `Chart file is not valid YAML: ${doc.errors.map((e) => e.message).join("; ")}`
    );
  }
  return doc;
}

function validateMetadata(filePath: string, data: unknown): ChartMetadata {
  const result = ChartMetadataSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ChartFileError(filePath, `Invalid chart metadata in ${filePath}: ${details}`);
  }
  return result.data;
}

export function loadChartMetadata(filePath: string): ChartMetadata {
  return validateMetadata(filePath, readChartDocument(filePath).toJS());
}

export function chartInfo(meta: ChartMetadata): ChartInfo {
  return { name: meta.name, version: meta.version, appVersion: meta.appVersion };
}

/**
 * Chart version carried by a release tag, e.g. "helm-1.4.0" → "1.4.0".
 *
 * @throws Error if the tag lacks the prefix or the remainder is not SemVer
 */
export function versionFromTag(tag: string, prefix: string = DEFAULT_CHART_TAG_PREFIX): string {
  if (!tag.startsWith(prefix)) {
    throw new Error(`Tag "${tag}" does not start with "${prefix}"`);
  }
  const version = tag.slice(prefix.length);
  if (!SEMVER_RE.test(version)) {
    throw new Error(`Tag "${tag}" does not carry a SemVer version`);
  }
  return version;
}

export interface ChartVersionUpdate {
  previous: string;
  version: string;
  changed: boolean;
}

/**
 * Set Chart.yaml's `version` from a release tag. Comments, key order and
 * all other fields are preserved.
 */
export function setChartVersion(
  filePath: string,
  tag: string,
  prefix: string = DEFAULT_CHART_TAG_PREFIX
): ChartVersionUpdate {
  const doc = readChartDocument(filePath);
  const meta = validateMetadata(filePath, doc.toJS());

  let version: string;
  try {
    version = versionFromTag(tag, prefix);
  } catch (err) {
    throw new ChartFileError(filePath, err instanceof Error ? err.message : String(err));
  }

  if (meta.version === version) {
    return { previous: meta.version, version, changed: false };
  }

  doc.set("version", version);
  writeFileSync(filePath, doc.toString(), "utf-8");
  return { previous: meta.version, version, changed: true };
}
