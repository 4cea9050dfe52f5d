export { createTextCursor } from './scanner/text-cursor';
export type { TextCursor, TextCursorDebugState } from './scanner/text-cursor';

export {
  MAX_COUNTER,
  advanceChar,
  advanceLine,
  advanceLineKeepColumn,
  createPosition,
  formatPosition,
  positionsEqual
} from './scanner/position';
export type { Position } from './scanner/position';

export {
  CharacterCodes,
  LineBreakKind,
  classifyLineBreak,
  codePointLength
} from './scanner/character-codes';
