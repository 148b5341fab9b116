/**
 * Git failure classification.
 *
 * A missing git binary is fatal for the whole scan; a git command that ran
 * and failed only affects the repository it ran against.
 */

import { existsSync } from "node:fs";

export class GitNotFoundError extends Error {
  constructor() {
    super("git command not found. Please install git.");
    this.name = "GitNotFoundError";
  }
}

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly cwd: string;
  readonly status: number | null;
  readonly stderr: string;

  constructor(
    args: readonly string[],
    cwd: string,
    status: number | null,
    stderr: string,
  ) {
    super(
      stderr ||
        `git ${args.join(" ")} failed` +
          (status === null ? "" : ` with exit code ${status}`),
    );
    this.name = "GitCommandError";
    this.args = args;
    this.cwd = cwd;
    this.status = status;
    this.stderr = stderr;
  }
}

/**
 * Inspect an error thrown by execFileSync and rethrow it as a git error.
 */
export function toGitError(
  err: unknown,
  args: readonly string[],
  cwd: string,
): never {
  if (!(err instanceof Error)) throw err;

  // ENOENT is also what spawn reports for a missing cwd
  if ("code" in err && (err as NodeJS.ErrnoException).code === "ENOENT") {
    if (!existsSync(cwd)) {
      throw new GitCommandError(args, cwd, null, `directory not found: ${cwd}`);
    }
    throw new GitNotFoundError();
  }

  // execFileSync attaches stderr and status when the child process fails
  const stderr =
    "stderr" in err ? String((err as { stderr: unknown }).stderr).trim() : "";
  const status =
    "status" in err && typeof err.status === "number" ? err.status : null;

  throw new GitCommandError(args, cwd, status, stderr || err.message);
}
