export { SheetClient, ID_COLUMN } from './sheet-client.js';
export type { WorksheetRef } from './sheet-client.js';
export { SheetError, isSheetError, classifyRemoteError, toSheetError } from './errors.js';
export type { SheetErrorKind, SheetErrorDetails } from './errors.js';
export {
  columnLetterToIndex,
  indexToColumnLetter,
  parseCellAddress,
  parseRange,
  formatCellAddress,
  formatRange
} from './a1.js';
export { toGrid, padGrid } from './grid.js';
export { loadServiceAccount, createJwt, SHEETS_SCOPES } from './credentials.js';
export { loadConfig, resolveCredentialsPath } from './config.js';
export type { LoadConfigOptions } from './config.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export type {
  CellValue,
  Grid,
  ServiceAccountCredentials,
  CredentialsSource,
  SheetClientOptions,
  CreateSheetOptions,
  SheetsConfig,
  SpreadsheetDocument,
  Worksheet,
  DocumentFactory
} from './types.js';
