/**
 * Repository discovery.
 *
 * Downward search finds every repository root beneath a set of search roots,
 * stopping at the first `.git` on each path. Upward search finds the
 * repository that encloses a directory.
 */

import { statSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, join, resolve, sep } from "node:path";
import type { RepositoryRoot } from "./models.js";
import { walkDirectories } from "./walk.js";

const GIT_DIR = ".git";

/** Home-relative directories that are never searched, per platform. */
const HOME_EXCLUSIONS: Partial<Record<NodeJS.Platform, string[]>> = {
  darwin: [".Trash", "Library", "Movies", "Music", "Pictures"],
  linux: [".cache", join(".local", "share", "Trash"), "snap"],
  win32: ["AppData", "Music", "Pictures", "Videos"],
};

/** Directory names skipped wherever they occur. */
const NAME_EXCLUSIONS = new Set(["node_modules"]);

export type ExclusionPredicate = (dir: string) => boolean;

export interface FindRepositoriesOptions {
  /** Defaults to the platform exclusions under the user's home directory. */
  isExcluded?: ExclusionPredicate;
  onError?: (dir: string, error: unknown) => void;
}

export function isRepositoryRoot(dir: string): boolean {
  try {
    return statSync(join(dir, GIT_DIR)).isDirectory();
  } catch {
    return false;
  }
}

export function defaultExclusions(
  home: string,
  platform: NodeJS.Platform = process.platform,
): ExclusionPredicate {
  const excluded = new Set(
    (HOME_EXCLUSIONS[platform] ?? []).map((rel) => join(resolve(home), rel)),
  );
  return (dir) => excluded.has(dir) || NAME_EXCLUSIONS.has(basename(dir));
}

/**
 * Find all repository roots beneath `roots`, sorted by path. Nothing nested
 * inside a returned root is ever returned.
 */
export function findRepositories(
  roots: readonly string[],
  options: FindRepositoriesOptions = {},
): RepositoryRoot[] {
  const isExcluded = options.isExcluded ?? defaultExclusions(homedir());
  const found = new Set<RepositoryRoot>();
  const seenRoots = new Set<string>();

  for (const root of roots) {
    const absolute = resolve(root);
    if (seenRoots.has(absolute)) continue;
    seenRoots.add(absolute);

    walkDirectories(absolute, {
      isExcluded,
      isMatch: isRepositoryRoot,
      onMatch: (dir) => found.add(dir),
      onError: options.onError,
    });
  }

  return pruneNested([...found].sort());
}

/**
 * Overlapping search roots (e.g. `~/src` and `~/src/work/app`) can yield a
 * repository that sits inside another returned one.
 */
function pruneNested(sorted: RepositoryRoot[]): RepositoryRoot[] {
  const kept: RepositoryRoot[] = [];
  for (const repo of sorted) {
    const parent = kept.find((k) =>
      repo.startsWith(k.endsWith(sep) ? k : k + sep),
    );
    if (parent === undefined) kept.push(repo);
  }
  return kept;
}

/**
 * Walk upward from `dir` and return the deepest directory holding a `.git`
 * directory, or undefined once the filesystem root is passed.
 */
export function findEnclosingRepository(
  dir: string,
): RepositoryRoot | undefined {
  let current = resolve(dir);

  for (;;) {
    if (isRepositoryRoot(current)) return current;
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}
