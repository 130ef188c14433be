import { CellAddress, RangeAddress } from './types.js';

const CELL_PATTERN = /^\$?([A-Za-z]{1,3})\$?([1-9][0-9]*)$/;

/**
 * Converts column letters (A, B, ..., AA) to a 0-based index.
 */
export function columnLetterToIndex(letter: string): number {
  const upperLetter = letter.toUpperCase();
  let index = 0;
  for (let i = 0; i < upperLetter.length; i++) {
    index = index * 26 + (upperLetter.charCodeAt(i) - 'A'.charCodeAt(0) + 1);
  }
  return index - 1;
}

/**
 * Converts a 0-based column index to column letters.
 */
export function indexToColumnLetter(index: number): string {
  let letter = '';
  let num = index + 1;

  while (num > 0) {
    num--;
    letter = String.fromCharCode((num % 26) + 65) + letter;
    num = Math.floor(num / 26);
  }

  return letter;
}

export function parseCellAddress(address: string): CellAddress | null {
  const match = CELL_PATTERN.exec(address.trim());
  if (!match) return null;

  const row = Number(match[2]);
  if (!Number.isSafeInteger(row)) return null;

  return { row, column: columnLetterToIndex(match[1]) + 1 };
}

/**
 * Parses "A1" or "A1:C10". Corners may be given in any order; the result is
 * always top-left to bottom-right.
 */
export function parseRange(range: string): RangeAddress | null {
  const parts = range.split(':');
  if (parts.length > 2) return null;

  const first = parseCellAddress(parts[0]);
  if (!first) return null;
  if (parts.length === 1) {
    return { start: first, end: first, bounded: false };
  }

  const second = parseCellAddress(parts[1]);
  if (!second) return null;

  return {
    start: {
      row: Math.min(first.row, second.row),
      column: Math.min(first.column, second.column)
    },
    end: {
      row: Math.max(first.row, second.row),
      column: Math.max(first.column, second.column)
    },
    bounded: true
  };
}

export function formatCellAddress(cell: CellAddress): string {
  return `${indexToColumnLetter(cell.column - 1)}${cell.row}`;
}

export function formatRange(start: CellAddress, end: CellAddress): string {
  if (start.row === end.row && start.column === end.column) {
    return formatCellAddress(start);
  }
  return `${formatCellAddress(start)}:${formatCellAddress(end)}`;
}
