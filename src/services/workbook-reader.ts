import * as fs from 'fs';
import * as path from 'path';
import * as ExcelJS from 'exceljs';
import * as xlsx from 'xlsx';
import type { Cell, CellBorder, CellEntry, RawCellValue, Sheet, SpreadsheetDocument } from '../types';
import { compareA1, formatA1Cell, parseA1Cell } from '../utils/a1';
import { WorkbookLoadError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

// Legacy binary workbooks; exceljs reads only the Open XML formats
const LEGACY_EXTENSIONS = ['.xls'];

export const WORKBOOK_EXTENSIONS = ['.xlsx', '.xlsm', '.xltx', '.xltm', ...LEGACY_EXTENSIONS];

/**
 * Read-only snapshot of one worksheet
 */
class SnapshotSheet implements Sheet {
  constructor(public readonly name: string, private readonly data: Map<string, Cell>) { }

  getCell(address: string): Cell {
    return this.data.get(formatA1Cell(parseA1Cell(address))) ?? { value: null };
  }

  cells(): CellEntry[] {
    return [...this.data.keys()]
      .sort(compareA1)
      .map(address => ({ address, cell: this.getCell(address) }));
  }
}

function snapshotDocument(sheets: Sheet[]): SpreadsheetDocument {
  const byName = new Map(sheets.map(sheet => [sheet.name, sheet]));
  return {
    sheetNames: sheets.map(sheet => sheet.name),
    getSheet: (name: string) => byName.get(name)
  };
}

function fromExcelJsValue(value: ExcelJS.CellValue): RawCellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value !== 'object') {
    return value;
  }
  if ('error' in value) {
    return value.error;
  }
  if ('richText' in value) {
    return value.richText.map(run => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  // Formula cells carry their cached result, if the file has one
  if ('result' in value && value.result !== undefined) {
    return fromExcelJsValue(value.result);
  }
  return null;
}

function fromExcelJsBorder(borders: Partial<ExcelJS.Borders> | undefined): CellBorder | undefined {
  if (!borders) {
    return undefined;
  }
  const border: CellBorder = {
    top: borders.top?.style,
    bottom: borders.bottom?.style,
    left: borders.left?.style,
    right: borders.right?.style
  };
  return Object.values(border).some(Boolean) ? border : undefined;
}

function fromExcelJsCell(cell: ExcelJS.Cell): Cell {
  // Cells covered by a merge read as blank; the value belongs to the top-left cell
  const covered = cell.isMerged && cell.master.address !== cell.address;
  const value = covered ? null : fromExcelJsValue(cell.value);
  const border = fromExcelJsBorder(cell.border);
  return border ? { value, border } : { value };
}

function fromExcelJsSheet(worksheet: ExcelJS.Worksheet): Sheet {
  const data = new Map<string, Cell>();
  worksheet.eachRow({ includeEmpty: false }, row => {
    row.eachCell({ includeEmpty: true }, cell => {
      const entry = fromExcelJsCell(cell);
      if (entry.value !== null || entry.border) {
        data.set(cell.address, entry);
      }
    });
  });
  return new SnapshotSheet(worksheet.name, data);
}

/**
 * Wraps a loaded exceljs workbook as a SpreadsheetDocument
 */
export function fromExcelJs(workbook: ExcelJS.Workbook): SpreadsheetDocument {
  return snapshotDocument(workbook.worksheets.map(fromExcelJsSheet));
}

function isCellObject(value: unknown): value is xlsx.CellObject {
  return typeof value === 'object' && value !== null && 't' in value && typeof value.t === 'string';
}

function fromSheetJsValue(cell: xlsx.CellObject): RawCellValue {
  switch (cell.t) {
    case 'z':
      return null;
    case 'e':
    case 'd':
      return cell.w ?? (cell.v instanceof Date ? cell.v.toISOString() : cell.v);
    default:
      return cell.v instanceof Date ? cell.v.toISOString() : cell.v;
  }
}

function fromSheetJsSheet(name: string, worksheet: xlsx.WorkSheet): Sheet {
  const data = new Map<string, Cell>();
  for (const address of Object.keys(worksheet)) {
    const raw: unknown = worksheet[address];
    if (!address.startsWith('!') && isCellObject(raw)) {
      data.set(address, { value: fromSheetJsValue(raw) });
    }
  }
  return new SnapshotSheet(name, data);
}

/**
 * Wraps a parsed SheetJS workbook as a SpreadsheetDocument. SheetJS does not surface cell
 * borders, so no cell carries one.
 */
export function fromSheetJs(workbook: xlsx.WorkBook): SpreadsheetDocument {
  const sheets: Sheet[] = [];
  for (const name of workbook.SheetNames) {
    const worksheet = workbook.Sheets[name];
    if (worksheet) {
      sheets.push(fromSheetJsSheet(name, worksheet));
    }
  }
  return snapshotDocument(sheets);
}

/**
 * Parses an Open XML workbook (.xlsx and friends) held in memory
 */
export async function readWorkbook(data: Buffer): Promise<SpreadsheetDocument> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  return fromExcelJs(workbook);
}

export class WorkbookReader {
  canHandle(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return WORKBOOK_EXTENSIONS.includes(ext);
  }

  /**
   * Opens a workbook file. Formula cells carry their cached values.
   */
  async open(filePath: string): Promise<SpreadsheetDocument> {
    try {
      logger.info(`Opening workbook: ${filePath}`);
      if (LEGACY_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) {
        const data = await fs.promises.readFile(filePath);
        return fromSheetJs(xlsx.read(data, { type: 'buffer', cellDates: false }));
      }
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(filePath);
      return fromExcelJs(workbook);
    } catch (error) {
      throw new WorkbookLoadError(errorMessage(error), filePath);
    }
  }
}
