/**
 * Working-tree status and stash presence.
 */

import type { Finding } from "./models.js";

export const STATUS_ARGS = [
  "status",
  "--porcelain",
  "--untracked-files=all",
] as const;

export const STASH_ARGS = ["stash", "list"] as const;

export const STASH_FINDING: Finding = "There are stashed changes.";

/**
 * Each porcelain status line is reported verbatim, in git's order.
 * An empty result means a clean working tree.
 */
export function parseStatus(lines: readonly string[]): Finding[] {
  return lines.filter((line) => line.length > 0);
}

/** Only presence matters; stash entries themselves are discarded. */
export function parseStash(lines: readonly string[]): Finding[] {
  return lines.some((line) => line.trim().length > 0) ? [STASH_FINDING] : [];
}
