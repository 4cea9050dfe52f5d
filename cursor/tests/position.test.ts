import { describe, expect, test } from 'vitest';

import {
  MAX_COUNTER,
  advanceChar,
  advanceLine,
  advanceLineKeepColumn,
  createPosition,
  formatPosition,
  positionsEqual
} from '../scanner/position';

describe('Position', () => {

  test('unset position is 0:0', () => {
    expect(createPosition()).toEqual({ line: 0, column: 0 });
  });

  test('createPosition takes line and column as given', () => {
    expect(createPosition(7, 3)).toEqual({ line: 7, column: 3 });
    expect(createPosition(0, 12)).toEqual({ line: 0, column: 12 });
  });

  test('advanceChar moves the column only', () => {
    const position = createPosition(2, 5);
    advanceChar(position);
    expect(position).toEqual({ line: 2, column: 6 });
  });

  test('advanceLine moves to the first column of the next line', () => {
    const position = createPosition(2, 5);
    advanceLine(position);
    expect(position).toEqual({ line: 3, column: 1 });
  });

  test('advanceLine from the unset position lands on line 1', () => {
    const position = createPosition();
    advanceLine(position);
    expect(position).toEqual({ line: 1, column: 1 });
  });

  test('advanceLineKeepColumn moves the line only', () => {
    const position = createPosition(2, 5);
    advanceLineKeepColumn(position);
    expect(position).toEqual({ line: 3, column: 5 });
  });

  test('counters saturate at MAX_COUNTER', () => {
    const position = createPosition(MAX_COUNTER, MAX_COUNTER);
    advanceChar(position);
    expect(position).toEqual({ line: MAX_COUNTER, column: MAX_COUNTER });
    advanceLineKeepColumn(position);
    expect(position).toEqual({ line: MAX_COUNTER, column: MAX_COUNTER });
    advanceLine(position);
    expect(position).toEqual({ line: MAX_COUNTER, column: 1 });
  });

  test('positionsEqual compares line and column', () => {
    expect(positionsEqual(createPosition(1, 4), createPosition(1, 4))).toBe(true);
    expect(positionsEqual(createPosition(1, 4), createPosition(4, 1))).toBe(false);
    expect(positionsEqual(createPosition(), createPosition(0, 0))).toBe(true);
  });

  test('formatPosition', () => {
    expect(formatPosition(createPosition(12, 40))).toBe('12:40');
  });
});
