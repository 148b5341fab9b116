/**
 * Branch tracking analysis.
 *
 * Parses `git branch -vv` output into a per-branch tracking state and renders
 * the states that represent unpushed work.
 */

import type { BranchTrackingState, Finding } from "./models.js";

/**
 * One `git branch -vv` line:
 *
 *   * main             1a2b3c4 [origin/main: ahead 3] Subject
 *     feature/login    5d6e7f8 Subject
 *   + docs             9a8b7c6 (/src/docs-wt) [origin/docs] Subject
 *
 * A branch checked out in a linked worktree ("+") carries the worktree path
 * in parentheses between the sha and the upstream info.
 *
 * Group 1 is the branch name, group 2 the bracketed upstream info (if any).
 * Detached HEAD and rebase lines start with "(" and never match.
 */
const BRANCH_LINE =
  /^[*+ ] ([^\s(]\S*)\s+[0-9a-f]{4,}(?: \([^)]*\))?(?: \[([^\]]*)\])?/;

const AHEAD = /\bahead (\d+)\b/;

/**
 * Build the branch listing arguments, optionally limited to branches that
 * are not yet merged into `unmerged`.
 */
export function branchArgs(unmerged?: string): string[] {
  const args = ["branch", "--no-color", "-vv"];
  if (unmerged !== undefined) {
    args.push("--no-merged", unmerged);
  }
  return args;
}

/** Classify every branch line. A repeated name keeps its last state. */
export function parseBranchTracking(
  lines: readonly string[],
): Map<string, BranchTrackingState> {
  const states = new Map<string, BranchTrackingState>();

  for (const line of lines) {
    const match = BRANCH_LINE.exec(line);
    if (!match) continue;

    const [, name, upstream] = match;
    states.set(name, classify(upstream));
  }

  return states;
}

function classify(upstream: string | undefined): BranchTrackingState {
  if (upstream === undefined) return { kind: "untracked" };

  const ahead = AHEAD.exec(upstream);
  const count = ahead ? parseInt(ahead[1], 10) : 0;
  return count > 0 ? { kind: "ahead", count } : { kind: "up-to-date" };
}

/**
 * Render tracking states as findings, in lexicographic branch order.
 * Up-to-date branches produce nothing.
 */
export function branchFindings(
  states: ReadonlyMap<string, BranchTrackingState>,
): Finding[] {
  const names = [...states.keys()].sort();
  const findings: Finding[] = [];

  for (const name of names) {
    const state = states.get(name);
    switch (state?.kind) {
      case "untracked":
        findings.push(`${name} is not tracking a remote branch.`);
        break;
      case "ahead":
        findings.push(
          `${name} is ahead of its remote branch by ${state.count} commits.`,
        );
        break;
      default:
        break;
    }
  }

  return findings;
}
