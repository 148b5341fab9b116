/**
 * Work-in-progress aggregation.
 *
 * Queries status, branches and stashes for each repository and collects the
 * findings in that fixed order. Read-only: running it twice against an
 * unchanged repository gives the same result.
 */

import { basename } from "node:path";
import { branchArgs, branchFindings, parseBranchTracking } from "./branches.js";
import { GitCommandError } from "./errors.js";
import { runGit } from "./exec-git.js";
import { log } from "./logger.js";
import type {
  Finding,
  RepoFailure,
  RepoReport,
  RepositoryRoot,
} from "./models.js";
import { parseStash, parseStatus, STASH_ARGS, STATUS_ARGS } from "./status.js";

export interface WipOptions {
  /** Only report branches not yet merged into this ref. */
  unmerged?: string;
}

/**
 * Findings for one repository: status lines, then branch findings sorted by
 * name, then the stash line.
 *
 * @throws GitCommandError if any of the three queries fails
 */
export function wip(repo: RepositoryRoot, options: WipOptions = {}): Finding[] {
  return [
    ...parseStatus(runGit(repo, STATUS_ARGS)),
    ...branchFindings(
      parseBranchTracking(runGit(repo, branchArgs(options.unmerged))),
    ),
    ...parseStash(runGit(repo, STASH_ARGS)),
  ];
}

export interface CollectResult {
  /** Repositories with at least one finding, in input order. */
  reports: RepoReport[];
  failures: RepoFailure[];
}

/**
 * Run `wip` over each repository in turn. A failing git command is logged
 * and recorded against its repository and the scan moves on; a missing git
 * binary propagates.
 */
export function collectReports(
  repos: readonly RepositoryRoot[],
  options: WipOptions = {},
): CollectResult {
  const reports: RepoReport[] = [];
  const failures: RepoFailure[] = [];

  for (const path of repos) {
    let findings: Finding[];
    try {
      findings = wip(path, options);
    } catch (err) {
      if (!(err instanceof GitCommandError)) throw err;
      log.warn(`${path}: ${err.message}`);
      failures.push({ path, message: err.message });
      continue;
    }

    log.debug(`${path}: ${findings.length} finding(s)`);
    if (findings.length > 0) {
      reports.push({ name: basename(path), path, findings });
    }
  }

  return { reports, failures };
}
