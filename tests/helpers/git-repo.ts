import { execFileSync } from "node:child_process";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export function git(dir: string, args: string[]): string {
  return execFileSync("git", args, { cwd: dir, encoding: "utf8", stdio: ["pipe", "pipe", "pipe"] });
}

/** `git init` with a local identity and `main` as the unborn branch. */
export function initRepo(dir: string): string {
  mkdirSync(dir, { recursive: true });
  git(dir, ["init", "-q"]);
  git(dir, ["symbolic-ref", "HEAD", "refs/heads/main"]);
  git(dir, ["config", "user.name", "Test"]);
  git(dir, ["config", "user.email", "test@test.com"]);
  git(dir, ["config", "core.autocrlf", "false"]);
  git(dir, ["config", "commit.gpgsign", "false"]);
  return dir;
}

export function commitFile(dir: string, file: string, content: string, msg: string): void {
  writeFileSync(join(dir, file), content);
  git(dir, ["add", file]);
  git(dir, ["commit", "-q", "-m", msg]);
}

/**
 * A repository with one commit on `main`, pushed to a bare remote at
 * `remoteDir` and tracking `origin/main`.
 */
export function createTrackedRepo(dir: string, remoteDir: string): string {
  mkdirSync(remoteDir, { recursive: true });
  git(remoteDir, ["init", "-q", "--bare"]);

  initRepo(dir);
  commitFile(dir, "file.txt", "initial content\n", "initial commit");
  git(dir, ["remote", "add", "origin", remoteDir]);
  git(dir, ["push", "-q", "-u", "origin", "main"]);
  return dir;
}
