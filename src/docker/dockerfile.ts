/**
 * Dockerfile rendering.
 */

import { basename } from "node:path";

import { DockerImageSpecSchema, type DockerImageSpec } from "./schema.js";

export class DockerSpecError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid image definition: ${issues.join("; ")}`);
    this.name = "DockerSpecError";
  }
}

/**
 * Exec-form arguments for the container's CMD.
 */
export function buildServerCommand(spec: DockerImageSpec): string[] {
  const { server } = spec;
  return [
    server.command,
    "--bind", `${server.host}:${server.port}`,
    "--workers", String(server.workers),
    "--threads", String(server.threads),
    "--worker-class", server.workerClass,
    server.app,
  ];
}

function aptInstall(packages: string[]): string {
  return (
    `RUN apt-get update && apt-get install -y ${packages.join(" ")} ` +
    "&& rm -rf /var/lib/apt/lists/*"
  );
}

function pipInstall(requirements: string, extras: string[]): string {
  const base = `RUN pip install --no-cache-dir -r ${requirements}`;
  if (extras.length === 0) return base;
  return `${base} && \\\n    pip install --no-cache-dir ${extras.join(" ")}`;
}

/**
 * Render the Dockerfile for an image spec.
 *
 * @throws DockerSpecError if the image definition fails validation
 */
export function renderDockerfile(spec: DockerImageSpec): string {
  const result = DockerImageSpecSchema.safeParse(spec);
  if (!result.success) {
    throw new DockerSpecError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const requirements = basename(spec.requirementsFile);
  const blocks: string[] = [`FROM ${spec.baseImage}`, `WORKDIR ${spec.workdir}`];

  if (spec.aptPackages.length > 0) {
    blocks.push(aptInstall(spec.aptPackages));
  }

  blocks.push(`COPY ${spec.requirementsFile} .`);
  blocks.push(pipInstall(requirements, spec.pipExtras));

  if (spec.copies.length > 0) {
    blocks.push(spec.copies.map((copy) => `COPY ${copy.from} ${copy.to}`).join("\n"));
  }

  blocks.push(`EXPOSE ${spec.exposePort}`);
  const args = buildServerCommand(spec).map((arg) => JSON.stringify(arg));
  blocks.push(`CMD [${args.join(", ")}]`);

  return blocks.join("\n\n") + "\n";
}
