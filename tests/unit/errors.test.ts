import { describe, it, expect } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GitCommandError, GitNotFoundError, toGitError } from "../../src/errors.js";

function caught(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

describe("toGitError", () => {
  it("maps ENOENT to GitNotFoundError", () => {
    const spawnError = Object.assign(new Error("spawnSync git ENOENT"), { code: "ENOENT" });
    const err = caught(() => toGitError(spawnError, ["status"], tmpdir()));
    expect(err).toBeInstanceOf(GitNotFoundError);
    expect((err as Error).message).toBe("git command not found. Please install git.");
  });

  it("maps ENOENT for a missing directory to GitCommandError", () => {
    const missing = join(tmpdir(), "git-wip-does-not-exist");
    const spawnError = Object.assign(new Error("spawnSync git ENOENT"), { code: "ENOENT" });
    const err = caught(() => toGitError(spawnError, ["status"], missing));
    expect(err).toBeInstanceOf(GitCommandError);
    expect((err as GitCommandError).message).toBe(`directory not found: ${missing}`);
    expect((err as GitCommandError).cwd).toBe(missing);
  });

  it("maps a failed command to GitCommandError with stderr", () => {
    const execError = Object.assign(new Error("Command failed: git status"), {
      status: 128,
      stderr: "fatal: not a git repository (or any of the parent directories): .git\n",
    });
    const err = caught(() => toGitError(execError, ["status"], "/repo"));
    expect(err).toBeInstanceOf(GitCommandError);
    const gitErr = err as GitCommandError;
    expect(gitErr.message).toBe("fatal: not a git repository (or any of the parent directories): .git");
    expect(gitErr.status).toBe(128);
    expect(gitErr.cwd).toBe("/repo");
    expect(gitErr.args).toEqual(["status"]);
  });

  it("falls back to the error message without stderr", () => {
    const err = caught(() => toGitError(new Error("Command failed: git stash list"), ["stash", "list"], "/repo"));
    expect((err as GitCommandError).message).toBe("Command failed: git stash list");
    expect((err as GitCommandError).status).toBeNull();
  });

  it("rethrows non-Error values untouched", () => {
    expect(caught(() => toGitError("boom", ["status"], "/repo"))).toBe("boom");
  });
});

describe("GitCommandError", () => {
  it("builds a message from the command when stderr is empty", () => {
    const err = new GitCommandError(["stash", "list"], "/repo", 1, "");
    expect(err.message).toBe("git stash list failed with exit code 1");
    expect(err.name).toBe("GitCommandError");
  });
});
