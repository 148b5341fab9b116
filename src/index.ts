#!/usr/bin/env node
/**
 * git-wip
 *
 * Scans directories for git repositories and lists unfinished work in each:
 * uncommitted changes, branches that are untracked or ahead of their remote,
 * and stashes.
 */

import { homedir } from "node:os";
import { run } from "./cli.js";

function main(): number {
  return run(process.argv.slice(2), {
    env: process.env,
    cwd: process.cwd(),
    home: homedir(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

try {
  process.exitCode = main();
} catch (error) {
  console.error("Fatal error in main():", error);
  process.exitCode = 1;
}
