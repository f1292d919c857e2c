/**
 * Change-record parsing.
 *
 * Turns one line of `git diff --name-status` output (or the equivalent line
 * produced by the Bitbucket adapter) into a ChangeRecord. Malformed lines
 * never throw; they produce records that fail classification later.
 */

import type { ChangeRecord, ChangeStatus } from "./models.js";

/** Bitbucket diff-stat statuses, matched case-insensitively. */
const WORD_STATUSES: ReadonlyMap<string, ChangeStatus> = new Map([
  ["added", "Added"],
  ["removed", "Deleted"],
  ["modified", "Modified"],
  ["renamed", "Renamed"],
  ["merge conflict", "MergeConflict"],
  ["remote deleted", "RemoteDeleted"],
]);

const LETTER_STATUSES: ReadonlyMap<string, ChangeStatus> = new Map([
  ["A", "Added"],
  ["D", "Deleted"],
  ["M", "Modified"],
  ["R", "Renamed"],
  ["U", "MergeConflict"],
]);

// Letter code with an optional similarity score, e.g. R072
const LETTER_CODE = /^([A-Z?])\d*$/;

/**
 * Normalize a status token to a ChangeStatus.
 * Unrecognized tokens map to "Unknown".
 */
export function parseStatus(token: string): ChangeStatus {
  const word = WORD_STATUSES.get(token.trim().toLowerCase());
  if (word) return word;

  const match = token.trim().match(LETTER_CODE);
  if (!match) return "Unknown";
  return LETTER_STATUSES.get(match[1]) ?? "Unknown";
}

/** Deletions and renames go to destructiveChanges.xml. */
export function isDestructive(status: ChangeStatus): boolean {
  return status === "Deleted" || status === "RemoteDeleted" || status === "Renamed";
}

/**
 * Parse a single diff line such as `M\tforce-app/main/default/classes/Foo.cls`
 * or `R072\told/path.cls\tnew/path.cls`.
 *
 * Returns undefined for blank lines (length 0 or 1 after stripping the line
 * terminator).
 */
export function parseChangeLine(line: string): ChangeRecord | undefined {
  const text = line.replace(/[\r\n]+$/, "");
  if (text.length <= 1) return undefined;

  const { code, rest } = splitStatusToken(text);
  const status = parseStatus(code);
  const { path, renamedPath } = splitPaths(rest, status === "Renamed");

  if (renamedPath !== undefined) {
    return { status, code, path, renamedPath };
  }
  return { status, code, path };
}

/** Split raw command output into lines. Blank lines are left for the parser to drop. */
export function splitLines(text: string): string[] {
  return text.split("\n");
}

/** Parse every line of raw diff output, dropping blank lines. */
export function parseChangeLines(lines: readonly string[]): ChangeRecord[] {
  const records: ChangeRecord[] = [];
  for (const line of lines) {
    const record = parseChangeLine(line);
    if (record) records.push(record);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function splitStatusToken(text: string): { code: string; rest: string } {
  // Two-word statuses would otherwise be cut at the first space
  const lower = text.toLowerCase();
  for (const word of WORD_STATUSES.keys()) {
    if (!word.includes(" ")) continue;
    if (lower.startsWith(word) && /^\s/.test(text.slice(word.length))) {
      return { code: text.slice(0, word.length), rest: text.slice(word.length).trimStart() };
    }
  }

  const match = text.match(/^(\S+)\s+([\s\S]*)$/);
  if (!match) return { code: text, rest: "" };
  return { code: match[1], rest: match[2] };
}

/**
 * Separate the primary path from a rename target.
 *
 * Git separates columns with tabs, so a tab always ends the primary path.
 * Space-separated renames split at the first whitespace run that follows the
 * primary path's extension.
 */
function splitPaths(
  rest: string,
  renamed: boolean,
): { path: string; renamedPath?: string } {
  const columns = rest.split(/\t+/).filter((c) => c.length > 0);
  if (columns.length === 0) return { path: "" };

  if (columns.length > 1) {
    const path = columns[0].trim();
    return renamed ? { path, renamedPath: columns[1].trim() } : { path };
  }

  const single = columns[0].trimEnd();
  if (!renamed) return { path: single };

  const dot = single.indexOf(".");
  const gap = /\s+/g;
  gap.lastIndex = dot < 0 ? 0 : dot;
  const found = gap.exec(single);
  if (!found) return { path: single };

  const renamedPath = single.slice(found.index + found[0].length);
  const path = single.slice(0, found.index);
  return renamedPath.length > 0 ? { path, renamedPath } : { path };
}
