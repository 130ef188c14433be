import type { JWT } from 'google-auth-library';
import type winston from 'winston';

export type CellValue = string | number | boolean | null;

export type Grid = CellValue[][];

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
  project_id?: string;
}

export type CredentialsSource = string | ServiceAccountCredentials;

export interface CellAddress {
  /** 1-based */
  row: number;
  /** 1-based */
  column: number;
}

export interface RangeAddress {
  start: CellAddress;
  end: CellAddress;
  /** false when the range was written as a single cell */
  bounded: boolean;
}

export type ValueRenderOption = 'FORMATTED_VALUE' | 'UNFORMATTED_VALUE' | 'FORMULA';

export interface WorksheetCell {
  value: unknown;
}

/**
 * The slice of a google-spreadsheet worksheet that SheetClient calls.
 */
export interface Worksheet {
  readonly sheetId: number;
  readonly title: string;
  readonly rowCount: number;
  readonly columnCount: number;
  getCellsInRange(a1Range: string, options?: { valueRenderOption?: ValueRenderOption }): Promise<unknown>;
  loadCells(a1Range: string): Promise<void>;
  getCell(rowIndex: number, columnIndex: number): WorksheetCell;
  saveUpdatedCells(): Promise<void>;
  /** Drops loaded cells and their unsaved edits; `dataOnly` keeps the sheet properties. */
  resetLocalCache(dataOnly?: boolean): void;
  clear(a1Range?: string): Promise<void>;
  resize(gridProperties: { rowCount: number; columnCount: number }): Promise<unknown>;
  delete(): Promise<unknown>;
}

export interface NewWorksheetProperties {
  title?: string;
  gridProperties?: { rowCount: number; columnCount: number };
}

/**
 * The slice of a google-spreadsheet document that SheetClient calls.
 */
export interface SpreadsheetDocument {
  readonly spreadsheetId: string;
  readonly sheetsByIndex: Worksheet[];
  readonly sheetsByTitle: Record<string, Worksheet>;
  loadInfo(): Promise<void>;
  addSheet(properties: NewWorksheetProperties): Promise<Worksheet>;
}

export type DocumentFactory = (spreadsheetId: string, auth: JWT) => SpreadsheetDocument;

export interface SheetClientOptions {
  spreadsheetId: string;
  credentials: CredentialsSource;
  sheetName?: string;
  logger?: winston.Logger;
  createDocument?: DocumentFactory;
}

export interface CreateSheetOptions {
  rowCount?: number;
  columnCount?: number;
}

export interface SheetsConfig {
  spreadsheetId: string;
  sheetName?: string;
  credentials: string;
  logFilePath?: string;
  logLevel: string;
}
