import { GoogleSpreadsheet } from 'google-spreadsheet';
import winston from 'winston';
import { formatCellAddress, formatRange, indexToColumnLetter, parseCellAddress, parseRange } from './a1.js';
import { createJwt, loadServiceAccount } from './credentials.js';
import { SheetError, toSheetError } from './errors.js';
import { cellAt, firstBlankIndex, gridWidth, isBlank, padGrid, sameCellValue, toGrid, valueAt } from './grid.js';
import { createLogger } from './logger.js';
import {
  CellAddress,
  CellValue,
  CreateSheetOptions,
  DocumentFactory,
  Grid,
  RangeAddress,
  SheetClientOptions,
  SpreadsheetDocument,
  Worksheet
} from './types.js';

/**
 * Opaque handle to a worksheet. Only SheetClient can resolve it back to the
 * remote worksheet; callers can read its title and id.
 */
export interface WorksheetRef {
  readonly sheetId: number;
  readonly title: string;
}

const refsBySheet = new WeakMap<Worksheet, WorksheetRef>();
const sheetsByRef = new WeakMap<WorksheetRef, Worksheet>();

function refFor(sheet: Worksheet): WorksheetRef {
  const existing = refsBySheet.get(sheet);
  if (existing) return existing;

  const ref: WorksheetRef = Object.freeze({
    sheetId: sheet.sheetId,
    get title() {
      return sheet.title;
    }
  });
  refsBySheet.set(sheet, ref);
  sheetsByRef.set(ref, sheet);
  return ref;
}

const defaultDocumentFactory: DocumentFactory = (spreadsheetId, auth) => new GoogleSpreadsheet(spreadsheetId, auth);

const DEFAULT_NEW_SHEET_ROWS = 100;
const DEFAULT_NEW_SHEET_COLUMNS = 20;

export const ID_COLUMN = 'ID';

export class SheetClient {
  private doc: SpreadsheetDocument | null = null;
  private sheet: Worksheet | null = null;
  private readonly logger: winston.Logger;
  private readonly createDocument: DocumentFactory;
  private readonly reported = new WeakSet<SheetError>();

  constructor(private readonly options: SheetClientOptions) {
    this.logger = options.logger ?? createLogger();
    this.createDocument = options.createDocument ?? defaultDocumentFactory;
  }

  static async connect(options: SheetClientOptions): Promise<SheetClient> {
    const client = new SheetClient(options);
    await client.initialize();
    return client;
  }

  get spreadsheetId(): string {
    return this.options.spreadsheetId;
  }

  async initialize(): Promise<void> {
    const { spreadsheetId, sheetName } = this.options;

    try {
      const creds = await loadServiceAccount(this.options.credentials);
      const doc = this.createDocument(spreadsheetId, createJwt(creds));
      await doc.loadInfo();

      const sheet = sheetName === undefined ? doc.sheetsByIndex.at(0) : findByTitle(doc, sheetName);
      if (!sheet) {
        throw new SheetError('NotFound', `worksheet ${sheetName ?? '(first)'} does not exist`, {
          operation: 'initialize',
          target: spreadsheetId
        });
      }

      this.doc = doc;
      this.sheet = sheet;
      this.logger.info('Sheet client initialized', {
        spreadsheetId,
        sheetName: sheet.title
      });
    } catch (error) {
      throw this.report(error, 'initialize', spreadsheetId);
    }
  }

  close(): void {
    this.doc = null;
    this.sheet = null;
    this.logger.info('Sheet client closed', { spreadsheetId: this.spreadsheetId });
  }

  // Sheet management

  async setSheet(target: string | WorksheetRef): Promise<void> {
    const name = typeof target === 'string' ? target : target.title;

    await this.run('setSheet', name, async (_sheet, doc) => {
      await doc.loadInfo();

      const next = typeof target === 'string' ? findByTitle(doc, target) : findByRef(doc, target);
      if (!next) {
        throw new SheetError('NotFound', 'worksheet does not exist', { operation: 'setSheet', target: name });
      }

      this.sheet = next;
      this.logger.info('Active worksheet changed', {
        spreadsheetId: this.spreadsheetId,
        sheetName: next.title
      });
    });
  }

  getSheet(): WorksheetRef {
    return refFor(this.active().sheet);
  }

  getSheetName(): string {
    return this.active().sheet.title;
  }

  async getAllSheets(): Promise<string[]> {
    return this.run('getAllSheets', undefined, async (_sheet, doc) => {
      await doc.loadInfo();
      return doc.sheetsByIndex.map(sheet => sheet.title);
    });
  }

  async sheetExists(name: string): Promise<boolean> {
    const names = await this.getAllSheets();
    return names.includes(name);
  }

  async createSheet(name: string, options: CreateSheetOptions = {}): Promise<WorksheetRef> {
    return this.run('createSheet', name, async (_sheet, doc) => {
      await doc.loadInfo();
      if (findByTitle(doc, name)) {
        throw new SheetError('AlreadyExists', 'worksheet already exists', { operation: 'createSheet', target: name });
      }

      const created = await doc.addSheet({
        title: name,
        gridProperties: {
          rowCount: options.rowCount ?? DEFAULT_NEW_SHEET_ROWS,
          columnCount: options.columnCount ?? DEFAULT_NEW_SHEET_COLUMNS
        }
      });
      this.logger.info('Worksheet created', { spreadsheetId: this.spreadsheetId, sheetName: name });
      return refFor(created);
    });
  }

  async deleteSheet(name: string): Promise<void> {
    await this.run('deleteSheet', name, async (active, doc) => {
      await doc.loadInfo();
      const sheet = findByTitle(doc, name);
      if (!sheet) {
        throw new SheetError('NotFound', 'worksheet does not exist', { operation: 'deleteSheet', target: name });
      }

      const { sheetId } = sheet;
      await sheet.delete();
      this.logger.info('Worksheet deleted', { spreadsheetId: this.spreadsheetId, sheetName: name });

      if (active.sheetId === sheetId) {
        const next = doc.sheetsByIndex.find(candidate => candidate.sheetId !== sheetId);
        if (next) {
          this.sheet = next;
        }
      }
    });
  }

  // Cell operations

  async getCell(address: string): Promise<CellValue> {
    return this.run('getCell', address, async sheet => {
      const cell = requireCell('getCell', address);
      const raw = await sheet.getCellsInRange(formatCellAddress(cell), { valueRenderOption: 'UNFORMATTED_VALUE' });
      const value = cellAt(toGrid(raw), 0, 0);
      return isBlank(value) ? null : value;
    });
  }

  async updateCell(address: string, value: CellValue): Promise<void> {
    await this.run('updateCell', address, async (sheet, doc) => {
      const cell = requireCell('updateCell', address);
      const values = requireWritable('updateCell', address, [[value]]);
      await writeGrid(doc, sheet, cell, values);
    });
  }

  async delCell(address: string): Promise<void> {
    await this.run('delCell', address, async sheet => {
      const cell = requireCell('delCell', address);
      await sheet.clear(formatCellAddress(cell));
    });
  }

  async getRange(range: string): Promise<Grid> {
    return this.run('getRange', range, async sheet => {
      const { start, end } = requireRange('getRange', range);
      const raw = await sheet.getCellsInRange(formatRange(start, end), { valueRenderOption: 'UNFORMATTED_VALUE' });
      return padGrid(toGrid(raw));
    });
  }

  async updateRange(range: string, values: Grid): Promise<void> {
    await this.run('updateRange', range, async (sheet, doc) => {
      const parsed = requireRange('updateRange', range);
      requireWritable('updateRange', range, values);
      if (parsed.bounded) {
        const rows = parsed.end.row - parsed.start.row + 1;
        const columns = parsed.end.column - parsed.start.column + 1;
        if (values.length > rows || gridWidth(values) > columns) {
          throw new SheetError(
            'InvalidAddress',
            `values (${values.length}x${gridWidth(values)}) do not fit in ${rows}x${columns}`,
            { operation: 'updateRange', target: range }
          );
        }
      }
      await writeGrid(doc, sheet, parsed.start, values);
    });
  }

  async delRange(range: string): Promise<void> {
    await this.run('delRange', range, async sheet => {
      const { start, end } = requireRange('delRange', range);
      await sheet.clear(formatRange(start, end));
    });
  }

  async getAllValues(): Promise<Grid> {
    return this.run('getAllValues', undefined, async (sheet, doc) => {
      // the library caches the grid size; another writer may have grown it
      await doc.loadInfo();
      const extent = formatRange(
        { row: 1, column: 1 },
        { row: Math.max(sheet.rowCount, 1), column: Math.max(sheet.columnCount, 1) }
      );
      const raw = await sheet.getCellsInRange(extent, { valueRenderOption: 'UNFORMATTED_VALUE' });
      return padGrid(toGrid(raw));
    });
  }

  async clear(): Promise<void> {
    await this.run('clear', undefined, sheet => sheet.clear());
  }

  // Database operations: row 1 holds the headers, every later row is a record

  async dbGetHeaders(): Promise<string[]> {
    const headers = await this.headerRow();
    let end = headers.length;
    while (end > 0 && isBlank(headers[end - 1])) end--;
    return headers.slice(0, end).map(header => String(header ?? ''));
  }

  async dbAddHeader(header: string): Promise<void> {
    const headers = await this.headerRow();
    const column = firstBlankIndex(headers);
    await this.updateCell(`${indexToColumnLetter(column)}1`, header);
  }

  async dbAddHeaders(headers: string[]): Promise<void> {
    for (const header of headers) {
      await this.dbAddHeader(header);
    }
  }

  /**
   * Clears the worksheet and writes `headers` as row 1. Without headers the
   * worksheet is only cleared.
   */
  async dbCreate(headers?: string[]): Promise<void> {
    await this.clear();
    if (headers && headers.length > 0) {
      await this.updateRange('A1', [headers]);
    }
  }

  async dbAddValue(values: CellValue[]): Promise<void> {
    if (values.length === 0) return;

    const rows = await this.getAllValues();
    await this.updateRange(`A${rows.length + 1}`, [values]);
  }

  async dbGetAllValues(): Promise<Grid> {
    const rows = await this.getAllValues();
    return rows.slice(1);
  }

  async dbGetColumn(header: string): Promise<CellValue[]> {
    const [headers = [], ...rows] = await this.getAllValues();
    const index = headers.findIndex(candidate => !isBlank(candidate) && sameCellValue(candidate, header));
    if (index === -1) return [];

    return rows.map(row => valueAt(row, index));
  }

  async dbFindWhere(header: string, value: CellValue): Promise<Grid> {
    const [headers = [], ...rows] = await this.getAllValues();
    const index = headers.findIndex(candidate => !isBlank(candidate) && sameCellValue(candidate, header));
    if (index === -1) return [];

    return rows.filter(row => sameCellValue(valueAt(row, index), value));
  }

  async dbFindById(id: string | number): Promise<Grid> {
    return this.dbFindWhere(ID_COLUMN, id);
  }

  private async headerRow(): Promise<CellValue[]> {
    const rows = await this.getAllValues();
    return rows.at(0) ?? [];
  }

  private active(): { doc: SpreadsheetDocument; sheet: Worksheet } {
    if (!this.doc || !this.sheet) {
      throw new Error('Sheet client not initialized');
    }
    return { doc: this.doc, sheet: this.sheet };
  }

  private async run<T>(
    operation: string,
    target: string | undefined,
    action: (sheet: Worksheet, doc: SpreadsheetDocument) => Promise<T>
  ): Promise<T> {
    const { doc, sheet } = this.active();

    try {
      const result = await action(sheet, doc);
      this.logger.debug('Sheet operation completed', { operation, sheetName: sheet.title, target });
      return result;
    } catch (error) {
      throw this.report(error, operation, target);
    }
  }

  private report(error: unknown, operation: string, target?: string): SheetError {
    const sheetError = toSheetError(error, operation, target);

    if (!this.reported.has(sheetError)) {
      this.reported.add(sheetError);
      this.logger.error('Sheet operation failed', {
        operation: sheetError.operation,
        target: sheetError.target,
        kind: sheetError.kind,
        sheetName: this.sheet?.title,
        error: sheetError.message
      });
    }

    return sheetError;
  }
}

function findByTitle(doc: SpreadsheetDocument, title: string): Worksheet | undefined {
  return doc.sheetsByIndex.find(sheet => sheet.title === title);
}

function findByRef(doc: SpreadsheetDocument, ref: WorksheetRef): Worksheet | undefined {
  const sheetId = sheetsByRef.get(ref)?.sheetId;
  if (sheetId === undefined) return undefined;
  return doc.sheetsByIndex.find(sheet => sheet.sheetId === sheetId);
}

function requireCell(operation: string, address: string): CellAddress {
  const cell = parseCellAddress(address);
  if (!cell) {
    throw new SheetError('InvalidAddress', 'not an A1 cell address', { operation, target: address });
  }
  return cell;
}

function requireRange(operation: string, range: string): RangeAddress {
  const parsed = parseRange(range);
  if (!parsed) {
    throw new SheetError('InvalidAddress', 'not an A1 range', { operation, target: range });
  }
  return parsed;
}

function requireWritable(operation: string, target: string, values: Grid): Grid {
  for (const row of values) {
    for (const value of row) {
      if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new SheetError('InvalidValue', `${value} cannot be stored in a cell`, { operation, target });
      }
    }
  }
  return values;
}

function beyondGrid(sheet: Worksheet, end: CellAddress): boolean {
  return end.row > sheet.rowCount || end.column > sheet.columnCount;
}

/**
 * Writes `values` with its top-left cell at `start`, growing the worksheet
 * grid first when the write reaches past it. Ragged rows write only the
 * cells they hold.
 *
 * The library stages cell edits in a per-worksheet cache and sends every
 * staged edit on the next save, so the cache is dropped once this write
 * settles, whether or not the save went through.
 */
async function writeGrid(doc: SpreadsheetDocument, sheet: Worksheet, start: CellAddress, values: Grid): Promise<void> {
  const height = values.length;
  const width = gridWidth(values);
  if (height === 0 || width === 0) return;

  const end = { row: start.row + height - 1, column: start.column + width - 1 };
  if (beyondGrid(sheet, end)) {
    // re-read the grid size so a stale one never shrinks the worksheet
    await doc.loadInfo();
    if (beyondGrid(sheet, end)) {
      await sheet.resize({
        rowCount: Math.max(sheet.rowCount, end.row),
        columnCount: Math.max(sheet.columnCount, end.column)
      });
    }
  }

  try {
    await sheet.loadCells(formatRange(start, end));
    values.forEach((row, rowOffset) => {
      row.forEach((value, columnOffset) => {
        sheet.getCell(start.row - 1 + rowOffset, start.column - 1 + columnOffset).value = value;
      });
    });
    await sheet.saveUpdatedCells();
  } finally {
    sheet.resetLocalCache(true);
  }
}
