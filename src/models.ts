/**
 * git-wip data models.
 *
 * Everything here is transient: computed fresh from the live repository and
 * filesystem state on each run, never persisted.
 */

/** Absolute path of the top of a git working tree. */
export type RepositoryRoot = string;

/** One human-readable line describing a unit of unfinished work. */
export type Finding = string;

export type BranchTrackingState =
  | { kind: "untracked" }
  | { kind: "up-to-date" }
  | { kind: "ahead"; count: number };

export interface RepoReport {
  /** Directory basename, used as the report heading. */
  name: string;
  path: RepositoryRoot;
  findings: Finding[];
}

export interface RepoFailure {
  path: RepositoryRoot;
  message: string;
}

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

export type SearchPlan =
  | { mode: "search"; roots: string[] }
  | { mode: "single"; repository: RepositoryRoot };
