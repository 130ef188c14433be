import { CellValue, Grid } from './types.js';

export function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function toCellValue(value: unknown): CellValue {
  if (value === undefined) return '';
  if (isCellValue(value)) return value;
  return String(value);
}

/**
 * Shapes the `values` payload of a values API read into a grid. The API omits
 * the payload entirely for an empty range and trims trailing blanks per row.
 */
export function toGrid(raw: unknown): Grid {
  if (!Array.isArray(raw)) return [];

  return raw.map((row: unknown) => (Array.isArray(row) ? row.map(toCellValue) : [toCellValue(row)]));
}

/**
 * Pads every row with "" to the width of the widest row.
 */
export function padGrid(grid: Grid): Grid {
  const width = gridWidth(grid);
  return grid.map(row => {
    if (row.length === width) return row;
    return [...row, ...new Array<CellValue>(width - row.length).fill('')];
  });
}

export function gridWidth(grid: Grid): number {
  return grid.reduce((max, row) => Math.max(max, row.length), 0);
}

export function valueAt(row: CellValue[], column: number): CellValue {
  const value = row.at(column);
  return value === undefined ? null : value;
}

export function cellAt(grid: Grid, row: number, column: number): CellValue {
  return valueAt(grid.at(row) ?? [], column);
}

export function isBlank(value: CellValue | undefined): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Index of the first blank cell in a row, or the row length when it has none.
 */
export function firstBlankIndex(row: CellValue[]): number {
  const index = row.findIndex(isBlank);
  return index === -1 ? row.length : index;
}

export function sameCellValue(a: CellValue, b: CellValue): boolean {
  return String(a ?? '') === String(b ?? '');
}
