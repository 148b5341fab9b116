/**
 * git process execution.
 *
 * The target directory is handed to the child process as its cwd; the
 * process-wide working directory is never touched.
 */

import { execFileSync } from "node:child_process";
import { tmpdir } from "node:os";
import { toGitError } from "./errors.js";
import { log } from "./logger.js";

// 10 MB — generous buffer for repositories with many untracked files
const MAX_BUFFER = 10 * 1024 * 1024;

const EXEC_OPTS_BASE = {
  encoding: "utf8" as const,
  maxBuffer: MAX_BUFFER,
  stdio: ["pipe", "pipe", "pipe"] as ["pipe", "pipe", "pipe"],
};

/**
 * Split command output on any line-ending style.
 *
 * The empty element left behind by a final terminator is dropped, so `""`
 * and `"\n"` both yield `[]`. Leading whitespace is significant in porcelain
 * output and is kept.
 */
export function splitLines(text: string): string[] {
  const body = text.replace(/(\r\n|\r|\n)$/, "");
  if (body.length === 0) return [];
  return body.split(/\r\n|\r|\n/);
}

/**
 * Run `git <args>` inside `cwd` and return stdout as lines.
 *
 * @throws GitNotFoundError if git is not on the PATH
 * @throws GitCommandError if git exits non-zero
 */
export function runGit(cwd: string, args: readonly string[]): string[] {
  log.debug(`git ${args.join(" ")} (in ${cwd})`);

  let raw: string;
  try {
    raw = execFileSync("git", args, { ...EXEC_OPTS_BASE, cwd });
  } catch (err) {
    toGitError(err, args, cwd);
  }

  return splitLines(raw);
}

/**
 * Check for git once before scanning, so a missing binary is reported a
 * single time instead of once per repository.
 *
 * Runs in the temp directory: a deleted cwd also fails with ENOENT.
 */
export function assertGitAvailable(): string {
  const [version = ""] = runGit(tmpdir(), ["--version"]);
  return version;
}
