/**
 * Local git adapter.
 *
 * Resolves the feature and compare refs and runs
 * `git diff --name-status` between them, returning raw lines for the
 * change-record parser.
 */

import { execFileSync } from "node:child_process";

// 10 MB
const MAX_BUFFER = 10 * 1024 * 1024;

/** A failed git invocation. `exitCode` is git's exit status when it ran. */
export class GitError extends Error {
  constructor(message: string, readonly exitCode?: number) {
    super(message);
    this.name = "GitError";
  }
}

const EXEC_OPTS_BASE = {
  encoding: "utf8" as const,
  maxBuffer: MAX_BUFFER,
  stdio: ["pipe", "pipe", "pipe"] as ["pipe", "pipe", "pipe"],
};

/**
 * Run git with the given arguments and return stdout.
 *
 * @throws Error with a descriptive message on any git failure
 */
export function execGit(argv: string[], cwd?: string): string {
  try {
    return execFileSync("git", argv, { ...EXEC_OPTS_BASE, cwd: cwd ?? process.cwd() });
  } catch (err) {
    throwGitError(err);
  }
}

/**
 * Resolve a ref to its full commit SHA.
 *
 * @throws Error for a ref that git would read as an option
 */
export function resolveRef(ref: string, cwd?: string): string {
  if (ref.startsWith("-")) throw new Error(`Invalid ref: ${ref}`);
  let sha: string;
  try {
    sha = execGit(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], cwd).trim();
  } catch (err) {
    // rev-parse --verify --quiet exits 1 silently for unknown refs
    if (err instanceof GitError && err.exitCode === 1) {
      throw new Error(`Unknown ref: ${ref}`);
    }
    throw err;
  }
  if (sha.length === 0) throw new Error(`Unknown ref: ${ref}`);
  return sha;
}

/** Short name of the checked-out branch, or undefined when HEAD is detached. */
export function currentBranch(cwd?: string): string | undefined {
  let out: string;
  try {
    out = execGit(["symbolic-ref", "--short", "-q", "HEAD"], cwd);
  } catch (err) {
    // symbolic-ref -q exits 1 silently on a detached HEAD
    if (err instanceof GitError && err.exitCode === 1) return undefined;
    throw err;
  }
  const name = out.trim();
  return name.length > 0 ? name : undefined;
}

/**
 * Diff two refs and return tab-separated `--name-status` lines.
 *
 * The compare ref is the base: files present only on the feature ref show
 * up as added. Output is read with `-z` so paths come back unquoted.
 */
export function getNameStatusDiff(compare: string, feature: string, cwd?: string): string[] {
  const compareSha = resolveRef(compare, cwd);
  const featureSha = resolveRef(feature, cwd);

  const raw = execGit(
    ["--no-pager", "diff", "--name-status", "--no-color", "-z", compareSha, featureSha],
    cwd,
  );
  return parseNameStatusZ(raw);
}

/**
 * Convert NUL-separated `--name-status -z` output to tab-separated lines.
 * Renames and copies carry two path fields, everything else one.
 */
export function parseNameStatusZ(raw: string): string[] {
  const fields = raw.split("\0");
  const lines: string[] = [];
  let i = 0;
  while (i < fields.length) {
    const code = fields[i++];
    if (code.length === 0) continue;
    const pathCount = /^[RC]/.test(code) ? 2 : 1;
    const paths = fields.slice(i, i + pathCount);
    i += pathCount;
    lines.push([code, ...paths].join("\t"));
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Inspect a git error and throw a descriptive message.
 */
function throwGitError(err: unknown): never {
  if (!(err instanceof Error)) throw err;

  // execFileSync attaches stderr to the error object when the child process fails
  const stderr = "stderr" in err ? String(err.stderr).trim() : "";

  // "not a git repository" appears in stderr from git
  if (stderr.includes("not a git repository")) {
    throw new GitError("Not a git repository");
  }

  // ENOENT means git binary was not found
  if ("code" in err && err.code === "ENOENT") {
    throw new GitError("git command not found. Please install git.");
  }

  const exitCode = "status" in err && typeof err.status === "number" ? err.status : undefined;
  throw new GitError(stderr || err.message || "Unknown git error", exitCode);
}
