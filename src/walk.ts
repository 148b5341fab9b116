/**
 * Pruned depth-first directory traversal.
 */

import { readdirSync } from "node:fs";
import { join } from "node:path";

export interface DirectoryVisitor {
  /** Skip this directory and everything beneath it. Checked first. */
  isExcluded(dir: string): boolean;
  /** Record this directory and do not descend into it. */
  isMatch(dir: string): boolean;
  onMatch(dir: string): void;
  /** A directory could not be listed; the walk continues without it. */
  onError?(dir: string, error: unknown): void;
}

/**
 * Walk directories beneath (and including) `root`. Children are visited in
 * sorted name order; symbolic links are not followed.
 */
export function walkDirectories(root: string, visitor: DirectoryVisitor): void {
  const stack = [root];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    if (visitor.isExcluded(dir)) continue;
    if (visitor.isMatch(dir)) {
      visitor.onMatch(dir);
      continue;
    }

    let names: string[];
    try {
      names = readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      visitor.onError?.(dir, err);
      continue;
    }

    // Reverse onto the stack so the smallest name is popped first
    for (let i = names.length - 1; i >= 0; i--) {
      stack.push(join(dir, names[i]));
    }
  }
}
