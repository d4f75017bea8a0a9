/**
 * Gazette report rows and their table sinks (TSV, Excel)
 */

import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { kindLabel } from './kinds.js';
import { ensureDir } from './utils.js';
import type { ClassifiedDocument } from './types.js';

export const REPORT_COLUMNS = [
  'type',
  'number',
  'date',
  'title',
  'body',
  'identifier',
  'publication_code',
  'hash_code',
  'signatories',
  'has_web_annex',
  'topics',
  'keywords',
  'accounts',
  'raw_text'
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export type DocumentRow = Record<ReportColumn, string>;

const LIST_SEPARATOR = '; ';

// Excel rejects cells longer than this
const EXCEL_CELL_LIMIT = 32767;

/**
 * Flatten a classified document into one report row. Newlines in the raw text
 * are escaped so each document stays on a single line.
 */
export function buildDocumentRow(classified: ClassifiedDocument): DocumentRow {
  const { document, matches, accounts } = classified;

  return {
    type: kindLabel(document.type),
    number: document.number ?? '',
    date: document.issue_date ?? '',
    title: document.title?.replace(/[\r\n]+/g, ' ') ?? '',
    body: document.issuing_body ?? '',
    identifier: document.identifier ?? '',
    publication_code: document.publication_code ?? '',
    hash_code: document.hash_code ?? '',
    signatories: document.signatories.join(LIST_SEPARATOR),
    has_web_annex: String(document.has_web_annex),
    topics: matches.map(m => m.topic).join(LIST_SEPARATOR),
    keywords: matches.map(m => m.matched_keyword).join(LIST_SEPARATOR),
    accounts: accounts.join(LIST_SEPARATOR),
    raw_text: document.raw_text.replace(/\r/g, ' ').replace(/\n/g, '\\n')
  };
}

export function buildDocumentRows(classified: readonly ClassifiedDocument[]): DocumentRow[] {
  return classified.map(buildDocumentRow);
}

function quoteTsvField(value: string): string {
  if (/[\t"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Tab-separated text with a header line; fields are quoted only when they
 * contain a tab, a quote or a line break. Starts with a UTF-8 BOM.
 */
export function toTsv(rows: readonly DocumentRow[]): string {
  const lines = [REPORT_COLUMNS.join('\t')];
  for (const row of rows) {
    lines.push(REPORT_COLUMNS.map(column => quoteTsvField(row[column])).join('\t'));
  }
  return `\uFEFF${lines.join('\n')}\n`;
}

export async function writeTsv(filePath: string, rows: readonly DocumentRow[]): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, toTsv(rows), 'utf-8');
}

/**
 * Single-sheet workbook with a bold header row
 */
export function buildWorkbook(rows: readonly DocumentRow[], sheetName = 'Documents'): Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);

  worksheet.columns = REPORT_COLUMNS.map(column => ({
    header: column,
    key: column,
    width: column === 'raw_text' || column === 'title' ? 60 : 18
  }));
  worksheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    worksheet.addRow({ ...row, raw_text: row.raw_text.slice(0, EXCEL_CELL_LIMIT) });
  }

  return workbook;
}

export async function writeExcel(filePath: string, rows: readonly DocumentRow[]): Promise<void> {
  await ensureDir(dirname(filePath));
  await buildWorkbook(rows).xlsx.writeFile(filePath);
}
