/**
 * Release config assembly, rendering and writing tests.
 *
 * Run: node --import tsx src/release/releaserc.test.ts
 *
 * Tests cover:
 *   1. Branch list on and off the main branch
 *   2. Plugin list for the app and chart targets
 *   3. Exact YAML output and that it parses back to the same document
 *   4. Writing to disk and dry runs
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse } from "yaml";

import {
  buildBranches,
  buildPlugins,
  buildReleaseConfig,
  renderReleaseConfig,
  writeReleaseConfig,
  type ReleaseTarget,
} from "./index.js";
import { APP_RELEASE_TARGET, CHART_RELEASE_TARGET } from "../config/index.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const COMMON_HEAD = [
  "extends:",
  "  - semantic-release-monorepo",
];

const ANALYZER_AND_NOTES = [
  "plugins:",
  '  - - "@semantic-release/commit-analyzer"',
  "    - preset: conventionalcommits",
  "      releaseRules:",
  "        - { type: feat, release: minor }",
  "        - { type: fix, release: patch }",
  "        - { type: chore, release: patch }",
  "        - { type: docs, release: patch }",
  "        - { type: style, release: patch }",
  "        - { type: refactor, release: patch }",
  "        - { type: perf, release: patch }",
  "        - { type: test, release: patch }",
  "        - { type: static, release: patch }",
  "      parserOpts:",
  "        noteKeywords:",
  "          - MAJOR RELEASE",
  '  - - "@semantic-release/release-notes-generator"',
  "    - preset: conventionalcommits",
  '  - - "@semantic-release/github"',
  "    - successComment: false",
];

const EXPECTED_APP_MAIN = [
  ...COMMON_HEAD,
  "tagFormat: v${version}",
  ...ANALYZER_AND_NOTES,
  "branches:",
  "  - { name: main }",
  "",
].join("\n");

const EXPECTED_CHART_FEATURE = [
  ...COMMON_HEAD,
  "tagFormat: helm-${version}",
  ...ANALYZER_AND_NOTES,
  '  - - "@semantic-release/exec"',
  "    - prepareCmd: ./chart-prerelease.sh ${nextRelease.gitTag}",
  '  - - "@semantic-release/git"',
  "    - assets:",
  "        - Chart.yaml",
  "branches:",
  "  - { name: main }",
  "  - { name: feature/foo-Bar/baz, prerelease: foo-bar }",
  "",
].join("\n");

// ═══════════════════════════════════════════════════════════════════════════
// BRANCHES
// ═══════════════════════════════════════════════════════════════════════════

section("Branches");

test("main branch releases only main", () => {
  assert.deepEqual(buildBranches("main"), [{ name: "main" }]);
});

test("feature branch is added as a prerelease", () => {
  assert.deepEqual(buildBranches("feature/foo-Bar/baz"), [
    { name: "main" },
    { name: "feature/foo-Bar/baz", prerelease: "foo-bar" },
  ]);
});

test("flat branch uses its own name as channel", () => {
  assert.deepEqual(buildBranches("hotfix")[1], { name: "hotfix", prerelease: "hotfix" });
});

test("custom main branch", () => {
  assert.deepEqual(buildBranches("trunk", "trunk"), [{ name: "trunk" }]);
  assert.deepEqual(buildBranches("main", "trunk"), [
    { name: "trunk" },
    { name: "main", prerelease: "main" },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// PLUGINS
// ═══════════════════════════════════════════════════════════════════════════

section("Plugins");

test("app target has analyzer, notes and github", () => {
  assert.deepEqual(
    buildPlugins(APP_RELEASE_TARGET).map(([name]) => name),
    [
      "@semantic-release/commit-analyzer",
      "@semantic-release/release-notes-generator",
      "@semantic-release/github",
    ]
  );
});

test("chart target adds exec and git", () => {
  const plugins = buildPlugins(CHART_RELEASE_TARGET);
  assert.equal(plugins.length, 5);
  assert.deepEqual(plugins[3], [
    "@semantic-release/exec",
    { prepareCmd: "./chart-prerelease.sh ${nextRelease.gitTag}" },
  ]);
  assert.deepEqual(plugins[4], ["@semantic-release/git", { assets: ["Chart.yaml"] }]);
});

test("empty rules and keywords are left out of analyzer options", () => {
  const bare: ReleaseTarget = { ...APP_RELEASE_TARGET, releaseRules: [], noteKeywords: [] };
  assert.deepEqual(buildPlugins(bare)[0], [
    "@semantic-release/commit-analyzer",
    { preset: "conventionalcommits" },
  ]);
});

test("config carries the target's tag format", () => {
  assert.equal(buildReleaseConfig(CHART_RELEASE_TARGET, "main").tagFormat, "helm-${version}");
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("app config on main", () => {
  const text = renderReleaseConfig(buildReleaseConfig(APP_RELEASE_TARGET, "main"));
  assert.equal(text, EXPECTED_APP_MAIN);
});

test("chart config on a feature branch", () => {
  const text = renderReleaseConfig(
    buildReleaseConfig(CHART_RELEASE_TARGET, "feature/foo-Bar/baz")
  );
  assert.equal(text, EXPECTED_CHART_FEATURE);
});

test("rendered YAML parses to the assembled document", () => {
  const config = buildReleaseConfig(CHART_RELEASE_TARGET, "feat/My_Branch!/x");
  const parsed: unknown = parse(renderReleaseConfig(config));
  assert.deepEqual(parsed, {
    extends: config.extends,
    tagFormat: config.tagFormat,
    plugins: config.plugins,
    branches: [{ name: "main" }, { name: "feat/My_Branch!/x", prerelease: "mybranch" }],
  });
});

test("quotes in branch names survive a parse", () => {
  const parsed: unknown = parse(renderReleaseConfig(buildReleaseConfig(APP_RELEASE_TARGET, 'feat/a"b/c')));
  assert.deepEqual(parsed, {
    extends: ["semantic-release-monorepo"],
    tagFormat: "v${version}",
    plugins: buildPlugins(APP_RELEASE_TARGET),
    branches: [{ name: "main" }, { name: 'feat/a"b/c', prerelease: "ab" }],
  });
});

test("empty channel is emitted as an empty string", () => {
  const text = renderReleaseConfig(buildReleaseConfig(APP_RELEASE_TARGET, "a//b"));
  assert.ok(text.endsWith('  - { name: a//b, prerelease: "" }\n'));
});

test("empty extends renders as an empty list", () => {
  const text = renderReleaseConfig(
    buildReleaseConfig({ ...APP_RELEASE_TARGET, extends: [] }, "main")
  );
  assert.equal(text.split("\n")[0], "extends: []");
});

test("strings YAML would retype stay strings", () => {
  const target: ReleaseTarget = {
    ...APP_RELEASE_TARGET,
    tagFormat: "1.0-${version}",
    noteKeywords: ["true", "1.0", "# note"],
  };
  const config = buildReleaseConfig(target, "main");
  const parsed: unknown = parse(renderReleaseConfig(config));
  assert.deepEqual(parsed, {
    extends: config.extends,
    tagFormat: "1.0-${version}",
    plugins: config.plugins,
    branches: [{ name: "main" }],
  });
});

test("long values stay on one line", () => {
  const branch = `feature/${"x".repeat(90)}/y`;
  const text = renderReleaseConfig(buildReleaseConfig(APP_RELEASE_TARGET, branch));
  assert.ok(text.endsWith(`  - { name: ${branch}, prerelease: ${"x".repeat(90)} }\n`));
});

// ═══════════════════════════════════════════════════════════════════════════
// WRITING
// ═══════════════════════════════════════════════════════════════════════════

section("Writing");

const workDir = mkdtempSync(join(tmpdir(), "releaserc-test-"));

test("writes to the target's output path, creating directories", () => {
  const result = writeReleaseConfig(APP_RELEASE_TARGET, "main", { rootDir: workDir });
  const expectedPath = join(workDir, "app", ".releaserc");
  assert.equal(result.path, expectedPath);
  assert.equal(result.written, true);
  assert.equal(result.channel, undefined);
  assert.equal(readFileSync(expectedPath, "utf-8"), EXPECTED_APP_MAIN);
});

test("overwrites an existing file", () => {
  writeReleaseConfig(APP_RELEASE_TARGET, "hotfix", { rootDir: workDir });
  const content = readFileSync(join(workDir, "app", ".releaserc"), "utf-8");
  assert.ok(content.endsWith("  - { name: hotfix, prerelease: hotfix }\n"));
});

test("dry run renders without writing", () => {
  const result = writeReleaseConfig(CHART_RELEASE_TARGET, "feature/foo-Bar/baz", {
    rootDir: workDir,
    dryRun: true,
  });
  assert.equal(result.written, false);
  assert.equal(result.channel, "foo-bar");
  assert.equal(result.content, EXPECTED_CHART_FEATURE);
  assert.equal(existsSync(join(workDir, "chart", ".releaserc")), false);
});

rmSync(workDir, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
