/**
 * Line/column position within a text.
 * Both counters start at 1; (0, 0) marks a position outside any text.
 */
export interface Position {
  /** 1-based line number. */
  line: number;

  /** 1-based character number within the current line. */
  column: number;
}

/** Counters stop here rather than lose integer precision. */
export const MAX_COUNTER = Number.MAX_SAFE_INTEGER;

export function createPosition(line: number = 0, column: number = 0): Position {
  return { line, column };
}

/** Advance by one non-line-break character. */
export function advanceChar(position: Position): void {
  if (position.column < MAX_COUNTER) position.column++;
}

/** Advance to the first column of the next line. */
export function advanceLine(position: Position): void {
  if (position.line < MAX_COUNTER) position.line++;
  position.column = 1;
}

/** Bump the line counter only (vertical tab). */
export function advanceLineKeepColumn(position: Position): void {
  if (position.line < MAX_COUNTER) position.line++;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

export function formatPosition(position: Position): string {
  return position.line + ':' + position.column;
}
