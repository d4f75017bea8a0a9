/**
 * Gazette pipeline: locate or read the issue PDF, parse it into documents,
 * classify them and write the reports
 */

import { readdir, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { DOWNLOAD_DIR, GAZETTE_REPORTS_DIR, SUMMARY_PAGE_COUNT } from './config.js';
import { classifyDocuments, documentsForAccount } from './classify.js';
import { errorMessage } from './errors.js';
import { extractDocument, extractIssueMetadata } from './extract.js';
import { downloadGazette, locateGazette, type FetchBytes, type UrlProbe } from './fetch.js';
import { readPdfPages } from './pdf.js';
import { buildDocumentRows, writeExcel, writeTsv } from './report.js';
import { pagesToLines, segmentDocuments } from './segment.js';
import { extractSummary } from './summary.js';
import { loadTaxonomy } from './taxonomy.js';
import { formatTimestamp, readJson, safeFileName, writeJson } from './utils.js';
import { buildGazetteAccountReport, writeDocx } from './word.js';
import type { ClassifiedDocument, GazetteIssue, Taxonomy } from './types.js';

const ISSUE_FILE_PATTERN = /^gazette_.+\.json$/;

export interface ProcessGazetteOptions {
  /** Local PDF; skips locating and downloading */
  pdfPath?: string;
  today?: Date;
  taxonomy?: Taxonomy;
  outputDir?: string;
  downloadDir?: string;
  probe?: UrlProbe;
  download?: FetchBytes;
}

export interface GazetteResult {
  issue: GazetteIssue;
  classified: ClassifiedDocument[];
  outputs: string[];
}

/**
 * Parse page texts into the issue aggregate. Metadata comes from the first
 * page, the SUMARIO from the leading pages, documents from every page.
 */
export function parseGazette(pages: readonly string[]): GazetteIssue {
  const metadata = extractIssueMetadata(pages[0] ?? '');
  const summary = extractSummary(pages.slice(0, SUMMARY_PAGE_COUNT));
  const documents = segmentDocuments(pagesToLines(pages)).map(block => extractDocument(block.kind, block.text));

  return { ...metadata, summary, documents };
}

/**
 * Run one sink, logging instead of throwing so the others still run
 */
async function runSink(label: string, filePath: string, write: () => Promise<void>, outputs: string[]): Promise<void> {
  try {
    await write();
    outputs.push(filePath);
    console.log(`  ${label}: ${filePath}`);
  } catch (err) {
    console.error(`  ${label} failed: ${errorMessage(err)}`);
  }
}

/**
 * Write the TSV, Excel and JSON reports plus one Excel/Word pair per account
 * with matched documents. Returns the paths written.
 */
export async function writeGazetteReports(
  issue: GazetteIssue,
  classified: readonly ClassifiedDocument[],
  taxonomy: Taxonomy,
  options: { outputDir?: string; generatedAt?: Date } = {}
): Promise<string[]> {
  const outputDir = options.outputDir ?? GAZETTE_REPORTS_DIR;
  const generatedAt = options.generatedAt ?? new Date();
  const stamp = formatTimestamp(generatedAt);
  const baseName = `gazette_${issue.issue_number ?? stamp}`;
  const rows = buildDocumentRows(classified);
  const outputs: string[] = [];

  const tsvPath = join(outputDir, `${baseName}_documents.tsv`);
  await runSink('TSV', tsvPath, () => writeTsv(tsvPath, rows), outputs);

  const excelPath = join(outputDir, `${baseName}_documents.xlsx`);
  await runSink('Excel', excelPath, () => writeExcel(excelPath, rows), outputs);

  const jsonPath = join(outputDir, `${baseName}_${stamp}.json`);
  await runSink('JSON', jsonPath, () => writeJson(jsonPath, issue), outputs);

  const accountsDir = join(outputDir, `${baseName}_accounts`);
  for (const account of taxonomy.accounts) {
    const matched = documentsForAccount(classified, account.name);
    if (matched.length === 0) continue;

    const fileName = safeFileName(account.name);
    const accountRows = buildDocumentRows(matched);

    const accountExcel = join(accountsDir, `report_${fileName}.xlsx`);
    await runSink(`${account.name} Excel`, accountExcel, () => writeExcel(accountExcel, accountRows), outputs);

    const accountWord = join(accountsDir, `report_${fileName}.docx`);
    await runSink(
      `${account.name} Word`,
      accountWord,
      () => writeDocx(accountWord, buildGazetteAccountReport(account.name, matched, generatedAt)),
      outputs
    );
  }

  return outputs;
}

/**
 * Most recently written issue aggregate, null when none exists
 */
export async function loadLatestIssue(dir: string = GAZETTE_REPORTS_DIR): Promise<GazetteIssue | null> {
  if (!existsSync(dir)) {
    return null;
  }

  const files = (await readdir(dir)).filter(name => ISSUE_FILE_PATTERN.test(name));
  if (files.length === 0) {
    return null;
  }

  // The file name ends in the write timestamp
  const latest = files.sort((a, b) => a.slice(-20).localeCompare(b.slice(-20))).at(-1);
  return latest ? readJson<GazetteIssue>(join(dir, latest)) : null;
}

/**
 * Full gazette run: locate (or read) the PDF, parse, classify, write reports
 */
export async function processGazette(options: ProcessGazetteOptions = {}): Promise<GazetteResult> {
  const taxonomy = options.taxonomy ?? await loadTaxonomy();

  let pdfPath = options.pdfPath;
  if (!pdfPath) {
    console.log('Locating gazette...');
    const located = await locateGazette({ today: options.today, probe: options.probe });
    console.log(`  Found issue at ${located.url}`);
    pdfPath = await downloadGazette(located, options.downloadDir ?? DOWNLOAD_DIR, options.download);
  }

  console.log(`Reading ${pdfPath}...`);
  const pages = await readPdfPages(new Uint8Array(await readFile(pdfPath)));

  const issue = parseGazette(pages);
  console.log(`  Issue ${issue.issue_number ?? '(unnumbered)'} ${issue.issue_date ?? ''}`.trimEnd());
  console.log(`  ${issue.summary.length} summary entries, ${issue.documents.length} documents`);

  const classified = classifyDocuments(issue.documents, taxonomy);
  const matched = classified.filter(c => c.matches.length > 0).length;
  console.log(`  ${matched}/${classified.length} documents matched at least one topic`);

  console.log('Writing reports...');
  const outputs = await writeGazetteReports(issue, classified, taxonomy, { outputDir: options.outputDir });

  return { issue, classified, outputs };
}
