/**
 * Parent issue checklist handling for multi-phase features.
 *
 * A parent (umbrella) issue tracks its phases as checklist lines that
 * reference the phase issue:
 *
 *   - [x] Phase 1: Setup (#601)
 *   - [ ] Phase 2: Core engine (#610)
 *
 * Phase lines are located by their `#<number>` reference, never by position,
 * and toggling one rewrites only its marker character.
 */

export interface ChecklistItem {
  /** 1-based line number */
  line: number;
  checked: boolean;
  /** Issue numbers referenced on the line */
  references: number[];
  /** Offset of the marker character in the body */
  markerOffset: number;
}

export interface PhaseProgress {
  complete: number;
  total: number;
}

const CHECKLIST_LINE = /^(\s*[-*+]\s+\[)([ xX])\]/;
const ISSUE_REFERENCE = /#(\d+)(?!\d)/g;

export function parseChecklist(body: string): ChecklistItem[] {
  const items: ChecklistItem[] = [];
  let lineStart = 0;
  let lineNumber = 1;

  while (lineStart <= body.length) {
    const newline = body.indexOf("\n", lineStart);
    const lineEnd = newline === -1 ? body.length : newline;
    const line = body.slice(lineStart, lineEnd);

    const match = CHECKLIST_LINE.exec(line);
    if (match) {
      const [, opening = "", marker = ""] = match;
      items.push({
        line: lineNumber,
        checked: marker !== " ",
        references: [...line.matchAll(ISSUE_REFERENCE)].map((m) => parseInt(m[1] ?? "", 10)),
        markerOffset: lineStart + opening.length,
      });
    }

    if (newline === -1) break;
    lineStart = newline + 1;
    lineNumber++;
  }

  return items;
}

/** Checklist lines that reference an issue; each one is a phase */
export function phaseItems(body: string): ChecklistItem[] {
  return parseChecklist(body).filter((item) => item.references.length > 0);
}

export function findPhaseItems(body: string, phaseIssue: number): ChecklistItem[] {
  return phaseItems(body).filter((item) => item.references.includes(phaseIssue));
}

/**
 * Check the line for `phaseIssue`. Returns the body unchanged when there is no
 * single matching line or the line is already checked.
 */
export function checkPhase(body: string, phaseIssue: number): string {
  const matches = findPhaseItems(body, phaseIssue);
  const [item] = matches;
  if (matches.length !== 1 || item === undefined || item.checked) {
    return body;
  }
  return body.slice(0, item.markerOffset) + "x" + body.slice(item.markerOffset + 1);
}

export function phaseProgress(body: string): PhaseProgress {
  const items = phaseItems(body);
  return {
    complete: items.filter((item) => item.checked).length,
    total: items.length,
  };
}

export function formatProgress(progress: PhaseProgress): string {
  return `${progress.complete}/${progress.total} phases complete`;
}
