/**
 * Dockerfile rendering tests.
 *
 * Run: node --import tsx src/docker/dockerfile.test.ts
 */

import { strict as assert } from "node:assert";

import { buildServerCommand, DockerSpecError, renderDockerfile } from "./dockerfile.js";
import type { DockerImageSpec } from "./schema.js";
import { DEFAULT_IMAGE_SPEC } from "../config/index.js";

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

const EXPECTED_DEFAULT = `FROM python:3.11-slim

WORKDIR /app

RUN apt-get update && apt-get install -y git && rm -rf /var/lib/apt/lists/*

COPY app/requirements.txt .

RUN pip install --no-cache-dir -r requirements.txt && \\
    pip install --no-cache-dir gunicorn

COPY app/ .
COPY test_config.py .
COPY simple_test.py .

EXPOSE 8000

CMD ["gunicorn", "--bind", "0.0.0.0:8000", "--workers", "1", "--threads", "1", "--worker-class", "sync", "app:create_app()"]
`;

function withOverrides(overrides: Partial<DockerImageSpec>): DockerImageSpec {
  return { ...DEFAULT_IMAGE_SPEC, ...overrides };
}

section("Server command");

test("default gunicorn command", () => {
  assert.deepEqual(buildServerCommand(DEFAULT_IMAGE_SPEC), [
    "gunicorn",
    "--bind", "0.0.0.0:8000",
    "--workers", "1",
    "--threads", "1",
    "--worker-class", "sync",
    "app:create_app()",
  ]);
});

test("worker and thread counts are passed through", () => {
  const spec = withOverrides({
    server: { ...DEFAULT_IMAGE_SPEC.server, workers: 4, threads: 2, workerClass: "gthread" },
  });
  const cmd = buildServerCommand(spec);
  assert.equal(cmd[4], "4");
  assert.equal(cmd[6], "2");
  assert.equal(cmd[8], "gthread");
});

section("Rendering");

test("default image definition", () => {
  assert.equal(renderDockerfile(DEFAULT_IMAGE_SPEC), EXPECTED_DEFAULT);
});

test("no apt step without OS packages", () => {
  const text = renderDockerfile(withOverrides({ aptPackages: [] }));
  assert.equal(text.includes("apt-get"), false);
  assert.ok(text.startsWith("FROM python:3.11-slim\n\nWORKDIR /app\n\nCOPY app/requirements.txt .\n"));
});

test("several apt packages are installed together", () => {
  const text = renderDockerfile(withOverrides({ aptPackages: ["git", "curl"] }));
  assert.ok(
    text.includes("RUN apt-get update && apt-get install -y git curl && rm -rf /var/lib/apt/lists/*\n")
  );
});

test("single pip step without extras", () => {
  const text = renderDockerfile(withOverrides({ pipExtras: [] }));
  assert.ok(text.includes("\n\nRUN pip install --no-cache-dir -r requirements.txt\n\n"));
});

test("requirements are installed by file name", () => {
  const text = renderDockerfile(withOverrides({ requirementsFile: "deploy/reqs/prod.txt" }));
  assert.ok(text.includes("COPY deploy/reqs/prod.txt .\n"));
  assert.ok(text.includes("-r prod.txt"));
});

section("Validation");

test("server port must match the exposed port", () => {
  const spec = withOverrides({ exposePort: 9000 });
  assert.throws(
    () => renderDockerfile(spec),
    (err: unknown) =>
      err instanceof DockerSpecError &&
      err.issues.length === 1 &&
      err.issues[0] === "server.port: server port 8000 does not match exposed port 9000"
  );
});

test("relative workdir is rejected", () => {
  assert.throws(
    () => renderDockerfile(withOverrides({ workdir: "app" })),
    (err: unknown) =>
      err instanceof DockerSpecError && err.issues[0] === "workdir: must be an absolute path"
  );
});

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
