/**
 * Current branch lookup.
 *
 * RELEASE_BRANCH wins when set (CI jobs that check out a detached HEAD set
 * it); otherwise `git branch --show-current` is asked.
 */

import { execFileSync } from "node:child_process";

export class GitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GitError";
  }
}

export const BRANCH_ENV_VAR = "RELEASE_BRANCH";

/** Runs git with the given arguments and returns its stdout. */
export type GitRunner = (args: string[], cwd: string) => string;

export const runGit: GitRunner = (args, cwd) =>
  execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
  });

export interface CurrentBranchOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  git?: GitRunner;
}

/**
 * Name of the branch being released.
 *
 * @throws GitError if git fails or HEAD is detached
 */
export function currentBranch(options: CurrentBranchOptions = {}): string {
  const { env = process.env, cwd = process.cwd(), git = runGit } = options;

  const override = env[BRANCH_ENV_VAR]?.trim();
  if (override) {
    return override;
  }

  let output: string;
  try {
    output = git(["branch", "--show-current"], cwd);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new GitError(`Could not determine current branch in ${cwd}: ${detail}`, {
      cause: err,
    });
  }

  const branch = output.trim();
  if (branch === "") {
    throw new GitError(
      `HEAD is detached in ${cwd}; set ${BRANCH_ENV_VAR} to the branch being released`
    );
  }
  return branch;
}
