/**
 * git-wip command line.
 *
 * Separated from index.ts so tests can drive `run()` in-process with
 * captured output instead of spawning a child process.
 */

import { Command, CommanderError } from "commander";
import {
  CliOptionsSchema,
  resolveSearchPlan,
  type CliOptions,
} from "./config.js";
import { GitNotFoundError } from "./errors.js";
import { assertGitAvailable } from "./exec-git.js";
import { defaultExclusions, findRepositories } from "./locate.js";
import { log } from "./logger.js";
import type { RepoReport, RepositoryRoot, SearchPlan } from "./models.js";
import { collectReports } from "./wip.js";

export const VERSION = "0.1.0";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_GIT_NOT_FOUND = 2;

export interface CliContext {
  env: NodeJS.ProcessEnv;
  cwd: string;
  home: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Force log colours on or off; detected from the terminal when omitted. */
  color?: boolean;
}

export function createProgram(ctx: CliContext): Command {
  return new Command()
    .name("git-wip")
    .description(
      "Report uncommitted changes, unpushed branches and stashes " +
        "across git repositories.",
    )
    .version(VERSION)
    .argument("[directories...]", "directories to search for repositories")
    .option("--json", "print reports as JSON", false)
    .option("--unmerged <ref>", "only report branches not merged into <ref>")
    .option("-v, --verbose", "log search progress to stderr", false)
    .addHelpText(
      "after",
      "\nWithout directories, searches $GIT_WIP_ROOTS (whitespace-separated), " +
        "else the current repository, else the home directory.",
    )
    .exitOverride()
    .configureOutput({ writeOut: ctx.stdout, writeErr: ctx.stderr });
}

/**
 * Parse `argv` (arguments after the program name), scan, print.
 *
 * @returns the process exit code
 */
export function run(argv: readonly string[], ctx: CliContext): number {
  const program = createProgram(ctx);
  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    // --help and --version also arrive here, with exit code 0
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  log.configure({ write: (line) => ctx.stderr(`${line}\n`), color: ctx.color });

  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    log.error(parsed.error.issues.map((issue) => issue.message).join("; "));
    return EXIT_USAGE;
  }
  const options = parsed.data;
  log.configure({ verbose: options.verbose });

  try {
    log.debug(assertGitAvailable());

    const plan = resolveSearchPlan({
      args: program.args,
      env: ctx.env,
      cwd: ctx.cwd,
      home: ctx.home,
    });
    const repos = locate(plan, ctx.home);
    const { reports } = collectReports(repos, { unmerged: options.unmerged });

    print(reports, options, ctx);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof GitNotFoundError) {
      log.error(err.message);
      return EXIT_GIT_NOT_FOUND;
    }
    throw err;
  }
}

function locate(plan: SearchPlan, home: string): RepositoryRoot[] {
  if (plan.mode === "single") {
    log.debug(`inside repository ${plan.repository}`);
    return [plan.repository];
  }

  for (const root of plan.roots) {
    log.debug(`searching ${root}`);
  }

  const repos = findRepositories(plan.roots, {
    isExcluded: defaultExclusions(home),
    onError: (dir, error) => {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`skipping ${dir}: ${message}`);
    },
  });

  log.debug(`found ${repos.length} repositories`);
  return repos;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/**
 * Text report: each repository's directory name, then its findings indented
 * by two spaces. Repositories without findings never reach this point.
 */
export function renderText(reports: readonly RepoReport[]): string[] {
  const lines: string[] = [];
  for (const report of reports) {
    lines.push(report.name);
    for (const finding of report.findings) {
      lines.push(`  ${finding}`);
    }
  }
  return lines;
}

function print(
  reports: readonly RepoReport[],
  options: CliOptions,
  ctx: CliContext,
): void {
  if (options.json) {
    ctx.stdout(`${JSON.stringify(reports, null, 2)}\n`);
    return;
  }

  for (const line of renderText(reports)) {
    ctx.stdout(`${line}\n`);
  }
}
