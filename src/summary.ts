/**
 * SUMARIO (table of contents) extraction from the leading pages.
 *
 * Best-effort index, independent of the per-document parse; the two are not
 * cross-checked.
 */

import { DOCUMENT_KINDS } from './kinds.js';
import type { DocumentKind, SummaryEntry } from './types.js';

const START_MARKER = 'SUMARIO';
const END_MARKER = 'Primera Sección';

interface SummaryPattern {
  kind: DocumentKind;
  keyword: RegExp;
  entry: RegExp;
}

// "Decreto 350/2025. DECTO-2025-350-APN-PTE - Desígnase. .......... pág. 3"
const SUMMARY_PATTERNS: SummaryPattern[] = DOCUMENT_KINDS.map(def => ({
  kind: def.kind,
  keyword: new RegExp(def.keyword, 'i'),
  entry: new RegExp(`${def.keyword}\\s+(\\d+/\\d{4}).*?\\.+\\s*p[áa]g\\.\\s*(\\d+)`, 'i')
}));

function parseSummaryLine(line: string): SummaryEntry | null {
  for (const pattern of SUMMARY_PATTERNS) {
    if (!pattern.keyword.test(line)) continue;

    const match = pattern.entry.exec(line);
    if (match) {
      return {
        type: pattern.kind,
        number: match[1],
        page: parseInt(match[2], 10),
        raw_line: line.trim()
      };
    }
  }
  return null;
}

export function extractSummary(pages: readonly string[]): SummaryEntry[] {
  const entries: SummaryEntry[] = [];
  let capturing = false;

  for (const page of pages) {
    for (const line of page.split('\n')) {
      if (!capturing) {
        if (line.includes(START_MARKER)) {
          capturing = true;
        }
        continue;
      }

      if (!line.trim()) continue;

      const entry = parseSummaryLine(line);
      if (entry) {
        entries.push(entry);
      }

      if (line.includes(END_MARKER)) {
        return entries;
      }
    }
  }

  return entries;
}
