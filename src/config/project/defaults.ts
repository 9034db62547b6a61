/**
 * Default project configuration.
 *
 * Two release targets, the application (`v1.2.3` tags) and its Helm chart
 * (`helm-1.2.3` tags), both versioned from conventional commits in a
 * monorepo, plus the image definition for the Python service.
 */

import type { ReleaseRule, ReleaseTarget } from "../../release/schema.js";
import type { DockerImageSpec } from "../../docker/schema.js";
import type { ChartSettings, ProjectConfig } from "./schema.js";

/**
 * Features bump the minor version; every other recognised type a patch.
 */
export const DEFAULT_RELEASE_RULES: ReleaseRule[] = [
  { type: "feat", release: "minor" },
  { type: "fix", release: "patch" },
  { type: "chore", release: "patch" },
  { type: "docs", release: "patch" },
  { type: "style", release: "patch" },
  { type: "refactor", release: "patch" },
  { type: "perf", release: "patch" },
  { type: "test", release: "patch" },
  { type: "static", release: "patch" },
];

const SHARED_TARGET_SETTINGS: Pick<
  ReleaseTarget,
  "extends" | "preset" | "releaseRules" | "noteKeywords" | "github"
> = {
  extends: ["semantic-release-monorepo"],
  preset: "conventionalcommits",
  releaseRules: DEFAULT_RELEASE_RULES,
  noteKeywords: ["MAJOR RELEASE"],
  github: { successComment: false },
};

export const APP_RELEASE_TARGET: ReleaseTarget = {
  name: "app",
  outputPath: "app/.releaserc",
  tagFormat: "v${version}",
  ...SHARED_TARGET_SETTINGS,
};

export const CHART_RELEASE_TARGET: ReleaseTarget = {
  name: "chart",
  outputPath: "chart/.releaserc",
  tagFormat: "helm-${version}",
  ...SHARED_TARGET_SETTINGS,
  exec: { prepareCmd: "./chart-prerelease.sh ${nextRelease.gitTag}" },
  gitAssets: ["Chart.yaml"],
};

export const DEFAULT_IMAGE_SPEC: DockerImageSpec = {
  baseImage: "python:3.11-slim",
  workdir: "/app",
  aptPackages: ["git"],
  requirementsFile: "app/requirements.txt",
  pipExtras: ["gunicorn"],
  copies: [
    { from: "app/", to: "." },
    { from: "test_config.py", to: "." },
    { from: "simple_test.py", to: "." },
  ],
  exposePort: 8000,
  server: {
    command: "gunicorn",
    host: "0.0.0.0",
    port: 8000,
    workers: 1,
    threads: 1,
    workerClass: "sync",
    app: "app:create_app()",
  },
};

export const DEFAULT_CHART_SETTINGS: ChartSettings = {
  chartFile: "chart/Chart.yaml",
  helpersFile: "chart/templates/_helpers.tpl",
  tagPrefix: "helm-",
};

export const DEFAULT_PROJECT_CONFIG: ProjectConfig = {
  mainBranch: "main",
  targets: [APP_RELEASE_TARGET, CHART_RELEASE_TARGET],
  image: DEFAULT_IMAGE_SPEC,
  chart: DEFAULT_CHART_SETTINGS,
};
