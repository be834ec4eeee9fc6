/**
 * Task Ledger - parses and rewrites tasks.md checkbox entries.
 *
 * A task entry is a list item whose checkbox is followed by a task identifier:
 *
 *   - [ ] T001 Set up project structure
 *   - [x] T002 [P] Add config loader
 *
 * Everything else in the document is opaque and preserved byte-for-byte.
 * Rewrites touch only the single marker character inside the brackets.
 */

import { MalformedLedgerError } from "../../infra/errors.js";

export interface TaskEntry {
  /** Task identifier, e.g. "T042" */
  identifier: string;
  done: boolean;
  /** 1-based line number */
  line: number;
  /** Offset of the checkbox marker character in the document */
  markerOffset: number;
}

export interface TaskCounts {
  total: number;
  completed: number;
}

export interface MarkDoneResult {
  text: string;
  /** Entries toggled from open to done */
  marked: number;
}

// Anything shaped like "<bullet> [..] T123"; validated against ENTRY_MARKERS below
const LOOSE_ENTRY = /^(\s*[-*+]\s+\[)([^\]\r\n]*)\](\s*)(T\d+)\b/;
const ENTRY_MARKERS = new Set([" ", "x", "X"]);

export function parse(text: string): TaskEntry[] {
  const entries: TaskEntry[] = [];
  let lineStart = 0;
  let lineNumber = 1;

  while (lineStart <= text.length) {
    const newline = text.indexOf("\n", lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const line = text.slice(lineStart, lineEnd);

    const match = LOOSE_ENTRY.exec(line);
    if (match) {
      const [, opening = "", marker = "", spacing = "", identifier = ""] = match;
      if (!ENTRY_MARKERS.has(marker) || spacing.length === 0) {
        throw new MalformedLedgerError(lineNumber, line);
      }
      entries.push({
        identifier,
        done: marker !== " ",
        line: lineNumber,
        markerOffset: lineStart + opening.length,
      });
    }

    if (newline === -1) break;
    lineStart = newline + 1;
    lineNumber++;
  }

  return entries;
}

/**
 * Write the `done` flags of `entries` back into `text`. Markers whose state
 * already matches are left as they are (an existing "X" stays uppercase).
 */
export function serialize(text: string, entries: readonly TaskEntry[]): string {
  const ordered = [...entries].sort((a, b) => a.markerOffset - b.markerOffset);
  let output = "";
  let cursor = 0;

  for (const entry of ordered) {
    const current = text.charAt(entry.markerOffset);
    const wasDone = current === "x" || current === "X";
    if (wasDone === entry.done) continue;

    output += text.slice(cursor, entry.markerOffset) + (entry.done ? "x" : " ");
    cursor = entry.markerOffset + 1;
  }

  return output + text.slice(cursor);
}

/**
 * Mark the given identifiers done. Identifiers that are already done or not
 * present in the document are ignored.
 */
export function markDone(text: string, identifiers: Iterable<string>): MarkDoneResult {
  const wanted = new Set(identifiers);
  let marked = 0;

  const entries = parse(text).map((entry) => {
    if (entry.done || !wanted.has(entry.identifier)) {
      return entry;
    }
    marked++;
    return { ...entry, done: true };
  });

  if (marked === 0) {
    return { text, marked };
  }
  return { text: serialize(text, entries), marked };
}

export function count(text: string): TaskCounts {
  const entries = parse(text);
  return {
    total: entries.length,
    completed: entries.filter((entry) => entry.done).length,
  };
}

export function incomplete(text: string): TaskEntry[] {
  return parse(text).filter((entry) => !entry.done);
}
