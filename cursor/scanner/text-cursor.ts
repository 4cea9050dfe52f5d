import {
  classifyLineBreak,
  codePointLength,
  LineBreakKind
} from './character-codes';
import {
  advanceChar,
  advanceLine,
  advanceLineKeepColumn,
  createPosition,
  type Position
} from './position';

export interface TextCursor extends Iterable<string> {
  /** Re-target the cursor at a text (or a start/length range of it) and reset all state. */
  initText(text: string, start?: number, length?: number): void;

  /** Position of the character the next call to next() will return. */
  getPosition(): Position;

  /** Next code point without consuming it, or undefined at the end. */
  peekNext(): string | undefined;

  /** Consume and return the next code point, or undefined at the end. */
  next(): string | undefined;

  /** Remember the current read offset as the start of a slice. */
  setMarker(): void;

  clearMarker(): void;

  hasMarker(): boolean;

  /**
   * Source text from the marker up to, and excluding, the current read offset.
   * Throws when no marker is set.
   */
  sliceFromMarker(): string;

  /** Independent copy of this cursor, including lookahead and marker. */
  fork(): TextCursor;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: TextCursorDebugState): void;

  /** Offset (UTF-16 code units) of the character next() will return. */
  readonly offsetNext: number;
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface TextCursorDebugState {
  /** Offset of the underlying read head, past any buffered lookahead. */
  pos: number;

  /** Exclusive end of the scanned range. */
  end: number;

  /** Offset of the character next() will return. */
  offsetNext: number;

  /** Current 1-based line number. */
  line: number;

  /** Current 1-based column number. */
  column: number;

  /** Buffered lookahead code point, if any. */
  lookahead: string | undefined;

  /** Marker offset, or -1 when no marker is set. */
  marker: number;

  /** True when the last consumed character was \r. */
  lastWasCR: boolean;
}

interface CursorState {
  source: string;
  pos: number;
  end: number;
  position: Position;
  lookahead: string | undefined;
  marker: number;
  lastWasCR: boolean;
}

/**
 * Cursor over a text with line/column tracking and marker slicing
 */
export function createTextCursor(text: string = '', start: number = 0, length?: number): TextCursor {
  const debug = typeof process !== 'undefined' && !!process.env.CURSOR_DEBUG;
  const state: CursorState = {
    source: '',
    pos: 0,
    end: 0,
    position: createPosition(1, 1),
    lookahead: undefined,
    marker: -1,
    lastWasCR: false,
  };
  const cursor = createCursorFromState(state, debug);
  cursor.initText(text, start, length);
  return cursor;
}

function createCursorFromState(state: CursorState, debug: boolean): TextCursor {

  function initText(text: string, start: number = 0, length?: number): void {
    const end = length !== undefined ? start + length : text.length;
    if (!Number.isInteger(start) || !Number.isInteger(end) ||
        start < 0 || start > text.length || end < start || end > text.length)
      throw new Error(`TextCursor: invalid range start=${start} length=${length} for text of length ${text.length}`);

    state.source = text;
    state.pos = start;
    state.end = end;
    state.position = createPosition(1, 1);
    state.lookahead = undefined;
    state.marker = -1;
    state.lastWasCR = false;
  }

  function readOffset(): number {
    return state.lookahead === undefined ? state.pos : state.pos - state.lookahead.length;
  }

  function readCodePoint(): string | undefined {
    if (state.pos >= state.end) return undefined;

    let len = codePointLength(state.source.codePointAt(state.pos) ?? 0);
    // a surrogate pair split by the range end yields its high half only
    if (state.pos + len > state.end) len = 1;
    const text = state.source.substring(state.pos, state.pos + len);
    state.pos += len;
    return text;
  }

  function advancePosition(ch: string): void {
    switch (classifyLineBreak(ch.codePointAt(0) ?? 0)) {
      case LineBreakKind.CarriageReturn:
        state.lastWasCR = true;
        advanceLine(state.position);
        break;
      case LineBreakKind.LineFeed:
        if (!state.lastWasCR) advanceLine(state.position);
        state.lastWasCR = false;
        break;
      case LineBreakKind.VerticalTab:
        state.lastWasCR = false;
        advanceLineKeepColumn(state.position);
        break;
      case LineBreakKind.Other:
        state.lastWasCR = false;
        advanceLine(state.position);
        break;
      default:
        state.lastWasCR = false;
        advanceChar(state.position);
        break;
    }
  }

  function getPosition(): Position {
    return createPosition(state.position.line, state.position.column);
  }

  function peekNext(): string | undefined {
    if (state.lookahead === undefined) state.lookahead = readCodePoint();
    return state.lookahead;
  }

  function next(): string | undefined {
    let ch: string | undefined;
    if (state.lookahead !== undefined) {
      ch = state.lookahead;
      state.lookahead = undefined;
    } else {
      ch = readCodePoint();
    }

    if (ch !== undefined) {
      advancePosition(ch);
      if (debug) console.log('[CURSOR] next', {
        ch,
        offsetNext: readOffset(),
        line: state.position.line,
        column: state.position.column
      });
    }
    return ch;
  }

  function setMarker(): void {
    state.marker = readOffset();
    if (debug) console.log('[CURSOR] marker', { marker: state.marker });
  }

  function clearMarker(): void {
    state.marker = -1;
    if (debug) console.log('[CURSOR] marker', { marker: state.marker });
  }

  function hasMarker(): boolean {
    return state.marker >= 0;
  }

  function sliceFromMarker(): string {
    if (state.marker < 0)
      throw new Error('TextCursor: sliceFromMarker called without a marker set');
    return state.source.substring(state.marker, readOffset());
  }

  function fork(): TextCursor {
    return createCursorFromState({
      ...state,
      position: getPosition()
    }, debug);
  }

  function* iterate(): Generator<string, void, undefined> {
    let ch = next();
    while (ch !== undefined) {
      yield ch;
      ch = next();
    }
  }

  function fillDebugState(debugState: TextCursorDebugState): void {
    debugState.pos = state.pos;
    debugState.end = state.end;
    debugState.offsetNext = readOffset();
    debugState.line = state.position.line;
    debugState.column = state.position.column;
    debugState.lookahead = state.lookahead;
    debugState.marker = state.marker;
    debugState.lastWasCR = state.lastWasCR;
  }

  return {
    initText,
    getPosition,
    peekNext,
    next,
    setMarker,
    clearMarker,
    hasMarker,
    sliceFromMarker,
    fork,
    fillDebugState,
    [Symbol.iterator]: iterate,

    get offsetNext() { return readOffset(); }
  };
}
