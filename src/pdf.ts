/**
 * PDF text extraction: bytes in, one text per page out
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { InvalidPdfError } from './errors.js';

const PDF_MAGIC = '%PDF';

// Vertical distance (in PDF units) that starts a new line
const LINE_BREAK_DELTA = 2;

export function isPdf(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_MAGIC.length) return false;
  return Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;
}

// Horizontal gap (in PDF units) between two runs that reads as a word break
const WORD_GAP = 1;

interface PositionedText {
  str: string;
  hasEOL: boolean;
  x: number | null;
  y: number | null;
  width: number | null;
}

/**
 * Rebuild lines from positioned text runs: a run ends the current line when
 * it carries an explicit end-of-line, or when the next run moves vertically.
 * Runs on one line are joined with a space only across a visible gap, since
 * pdf.js splits words into several runs.
 */
export function joinTextRuns(runs: readonly PositionedText[]): string {
  const lines: string[] = [];
  let current = '';
  let lastY: number | null = null;
  let lastEnd: number | null = null;

  const pushLine = () => {
    const trimmed = current.replace(/ {2,}/g, ' ').trim();
    if (trimmed) {
      lines.push(trimmed);
    }
    current = '';
    lastEnd = null;
  };

  const separator = (run: PositionedText): string => {
    if (!current || current.endsWith(' ') || run.str.startsWith(' ')) return '';
    if (run.x === null || lastEnd === null) return ' ';
    return run.x - lastEnd > WORD_GAP ? ' ' : '';
  };

  for (const run of runs) {
    if (lastY !== null && run.y !== null && Math.abs(run.y - lastY) > LINE_BREAK_DELTA) {
      pushLine();
    }

    if (run.str) {
      current += separator(run) + run.str;
      lastEnd = run.x !== null && run.width !== null ? run.x + run.width : null;
    }
    if (run.hasEOL) {
      pushLine();
    }

    if (run.y !== null) {
      lastY = run.y;
    }
  }

  pushLine();
  return lines.join('\n');
}

/**
 * Extract page texts in page order. The document is released before returning.
 */
export async function readPdfPages(bytes: Uint8Array): Promise<string[]> {
  if (!isPdf(bytes)) {
    throw new InvalidPdfError('Input is not a PDF (missing %PDF header)');
  }

  // pdf.js takes ownership of the buffer it is given
  const pdf = await getDocument({ data: new Uint8Array(bytes), isEvalSupported: false }).promise;
  const pages: string[] = [];

  try {
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();

      const runs: PositionedText[] = [];
      for (const item of content.items) {
        if (!('str' in item)) continue;
        const [, , , , x, y] = item.transform;
        runs.push({
          str: item.str,
          hasEOL: item.hasEOL,
          x: typeof x === 'number' ? x : null,
          y: typeof y === 'number' ? y : null,
          width: item.width
        });
      }

      pages.push(joinTextRuns(runs));
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  console.log(`  Extracted text from ${pages.length} page${pages.length === 1 ? '' : 's'}`);
  return pages;
}
