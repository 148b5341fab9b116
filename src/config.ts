/**
 * Invocation configuration: option validation and search-mode resolution.
 */

import { statSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import { findEnclosingRepository } from "./locate.js";
import type { SearchPlan } from "./models.js";

export const ROOTS_ENV = "GIT_WIP_ROOTS";

const EnvSchema = z.object({
  [ROOTS_ENV]: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "").split(/\s+/).filter((root) => root.length > 0),
    ),
});

export const CliOptionsSchema = z.object({
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  unmerged: z
    .string()
    .trim()
    .min(1, "--unmerged requires a branch or ref name")
    .optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface PlanInputs {
  /** Positional directories from the command line. */
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  cwd: string;
  home: string;
}

/** Whitespace-separated search roots from the environment; empty when unset. */
export function parseEnvRoots(env: NodeJS.ProcessEnv): string[] {
  return EnvSchema.parse(env)[ROOTS_ENV];
}

/**
 * Decide what to scan, first rule that applies wins:
 *
 * 1. positional directories (non-directories silently dropped)
 * 2. directories listed in GIT_WIP_ROOTS
 * 3. the repository enclosing `cwd`, alone
 * 4. the home directory
 */
export function resolveSearchPlan(inputs: PlanInputs): SearchPlan {
  const { args, env, cwd, home } = inputs;

  if (args.length > 0) {
    return { mode: "search", roots: existingDirectories(args, cwd, home) };
  }

  const envRoots = parseEnvRoots(env);
  if (envRoots.length > 0) {
    return { mode: "search", roots: existingDirectories(envRoots, cwd, home) };
  }

  const enclosing = findEnclosingRepository(cwd);
  if (enclosing !== undefined) {
    return { mode: "single", repository: enclosing };
  }

  return { mode: "search", roots: [resolve(home)] };
}

function existingDirectories(
  paths: readonly string[],
  cwd: string,
  home: string,
): string[] {
  return paths
    .map((p) => resolve(cwd, expandHome(p, home)))
    .filter(isDirectory);
}

/** A quoted "~/src" in GIT_WIP_ROOTS never reaches tilde expansion. */
function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
