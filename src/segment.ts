/**
 * Split the gazette's linear text into one block per legal document
 */

import { detectKind } from './kinds.js';
import type { DocumentKind, SegmentedBlock } from './types.js';

/**
 * Walk the lines in page order. A line that starts with a document header
 * closes the open block and opens a new one; other lines extend the open
 * block. Lines before the first header (front matter, SUMARIO) are dropped.
 */
export function segmentDocuments(lines: Iterable<string>): SegmentedBlock[] {
  const blocks: SegmentedBlock[] = [];
  let currentKind: DocumentKind | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (currentKind && buffer.length > 0) {
      blocks.push({ kind: currentKind, text: buffer.join('\n') });
    }
  };

  for (const line of lines) {
    const kind = detectKind(line);

    if (kind) {
      flush();
      currentKind = kind;
      buffer = [line];
    } else if (currentKind) {
      buffer.push(line);
    }
  }

  flush();
  return blocks;
}

/**
 * Flatten page texts into lines, in page order
 */
export function pagesToLines(pages: readonly string[]): string[] {
  return pages.flatMap(page => page.split('\n'));
}
