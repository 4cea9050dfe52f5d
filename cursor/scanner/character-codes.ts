/**
 * Character code constants and line-break classification
 * Code points are compared as numbers, never as one-character strings
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  nextLine = 0x0085,

  // Control characters
  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,

  space = 0x20,

  maxBmpCharacter = 0xFFFF,
}

/** How a consumed character moves the line/column counters. */
export const enum LineBreakKind {
  /** Not a line break: column advances. */
  None = 0,

  /** \r - starts a new line and may pair with a following \n. */
  CarriageReturn = 1,

  /** \n - starts a new line unless it completes a \r\n pair. */
  LineFeed = 2,

  /** U+000B - bumps the line counter but keeps the column. */
  VerticalTab = 3,

  /** Form feed, NEL, U+2028, U+2029 - start a new line. */
  Other = 4,
}

export function classifyLineBreak(ch: number): LineBreakKind {
  switch (ch) {
    case CharacterCodes.carriageReturn:
      return LineBreakKind.CarriageReturn;
    case CharacterCodes.lineFeed:
      return LineBreakKind.LineFeed;
    case CharacterCodes.verticalTab:
      return LineBreakKind.VerticalTab;
    case CharacterCodes.formFeed:
    case CharacterCodes.nextLine:
    case CharacterCodes.lineSeparator:
    case CharacterCodes.paragraphSeparator:
      return LineBreakKind.Other;
    default:
      return LineBreakKind.None;
  }
}

/**
 * Number of UTF-16 code units taken by a code point
 */
export function codePointLength(ch: number): number {
  return ch > CharacterCodes.maxBmpCharacter ? 2 : 1;
}
