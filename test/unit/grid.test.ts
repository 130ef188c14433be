import { describe, test, expect } from '@jest/globals';
import { cellAt, firstBlankIndex, gridWidth, padGrid, sameCellValue, toGrid } from '../../src/grid.js';

describe('toGrid', () => {
  test('an omitted payload is an empty grid', () => {
    expect(toGrid(undefined)).toEqual([]);
  });

  test('keeps scalar types', () => {
    expect(toGrid([['a', 1, true, null], []])).toEqual([['a', 1, true, null], []]);
  });

  test('stringifies anything that is not a scalar', () => {
    expect(toGrid([[{ x: 1 }]])).toEqual([['[object Object]']]);
  });

  test('wraps a bare row value', () => {
    expect(toGrid(['a'])).toEqual([['a']]);
  });
});

describe('padGrid', () => {
  test('pads every row to the widest one', () => {
    expect(padGrid([['a'], ['b', 'c'], []])).toEqual([
      ['a', ''],
      ['b', 'c'],
      ['', '']
    ]);
  });

  test('leaves an empty grid alone', () => {
    expect(padGrid([])).toEqual([]);
  });
});

describe('grid helpers', () => {
  test('gridWidth', () => {
    expect(gridWidth([['a'], ['b', 'c', 'd']])).toBe(3);
    expect(gridWidth([])).toBe(0);
  });

  test('cellAt reads null outside the grid', () => {
    const grid = [['a', 'b']];
    expect(cellAt(grid, 0, 1)).toBe('b');
    expect(cellAt(grid, 0, 2)).toBeNull();
    expect(cellAt(grid, 1, 0)).toBeNull();
  });

  test('firstBlankIndex finds gaps before the end', () => {
    expect(firstBlankIndex(['a', '', 'b'])).toBe(1);
    expect(firstBlankIndex(['a', 'b'])).toBe(2);
    expect(firstBlankIndex([])).toBe(0);
  });

  test('sameCellValue compares as strings', () => {
    expect(sameCellValue(30, '30')).toBe(true);
    expect(sameCellValue(null, '')).toBe(true);
    expect(sameCellValue('Ann', 'ann')).toBe(false);
  });
});
