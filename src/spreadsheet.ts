/**
 * Tabular input: spreadsheet files read into rows of trimmed cell text
 */

import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import { SourceUnavailableError } from './errors.js';

const pad2 = (n: number) => String(n).padStart(2, '0');

// Date cells are stored as UTC midnight; render them the way the sheet displays them
function formatUtcDayMonthYear(date: Date): string {
  return `${pad2(date.getUTCDate())}/${pad2(date.getUTCMonth() + 1)}/${date.getUTCFullYear()}`;
}

// Blank cells are undefined
export type SheetRow = Array<string | undefined>;

/**
 * All non-empty rows of a worksheet, header row included
 */
export function worksheetRows(worksheet: Worksheet): SheetRow[] {
  const rows: SheetRow[] = [];
  const columnCount = worksheet.columnCount;

  worksheet.eachRow({ includeEmpty: false }, row => {
    const cells: SheetRow = [];
    for (let col = 1; col <= columnCount; col++) {
      const cell = row.getCell(col);
      const text = cell.value instanceof Date ? formatUtcDayMonthYear(cell.value) : cell.text.trim();
      cells.push(text.length > 0 ? text : undefined);
    }
    rows.push(cells);
  });

  return rows;
}

/**
 * Read one sheet of an .xlsx workbook (first sheet unless named) or a .csv file
 */
export async function readSheetRows(filePath: string, sheetName?: string): Promise<SheetRow[]> {
  if (!existsSync(filePath)) {
    throw new SourceUnavailableError(`File not found: ${filePath}`, { filePath });
  }

  const workbook = new ExcelJS.Workbook();

  if (extname(filePath).toLowerCase() === '.csv') {
    const worksheet = await workbook.csv.readFile(filePath);
    return worksheetRows(worksheet);
  }

  await workbook.xlsx.readFile(filePath);
  const worksheet = sheetName ? workbook.getWorksheet(sheetName) : workbook.worksheets[0];
  if (!worksheet) {
    throw new SourceUnavailableError(`Sheet "${sheetName ?? '(first)'}" not found in ${filePath}`, { filePath, sheetName });
  }

  return worksheetRows(worksheet);
}
