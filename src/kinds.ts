/**
 * Legal-document kinds published in the gazette and their header patterns.
 *
 * The set is closed: a new kind is added by extending DocumentKind and
 * appending a definition here. Declaration order is the detection order.
 */

import type { DocumentKind } from './types.js';

export interface DocumentKindDefinition {
  kind: DocumentKind;
  /** Name as printed in the gazette */
  label: string;
  /** Regex source matching the keyword itself */
  keyword: string;
  /** Line-start header pattern; group 1 is the document number */
  header: RegExp;
}

// Optional "N°"/"Nº" marker, then 27000, 27.000 or 350/2025
const NUMBER_TOKEN = String.raw`\s+(?:N[°º]\s*)?(\d+(?:\.\d+)*(?:/\d{4})?)`;

function defineKind(kind: DocumentKind, label: string, keyword: string): DocumentKindDefinition {
  return {
    kind,
    label,
    keyword,
    header: new RegExp(`^${keyword}${NUMBER_TOKEN}`, 'i')
  };
}

export const DOCUMENT_KINDS: readonly DocumentKindDefinition[] = [
  defineKind('LAW', 'LEY', 'LEY'),
  defineKind('DECREE', 'DECRETO', 'DECRETO'),
  defineKind('RESOLUTION', 'RESOLUCIÓN', 'RESOLUCI[ÓO]N'),
  defineKind('DISPOSITION', 'DISPOSICIÓN', 'DISPOSICI[ÓO]N'),
  defineKind('ADMINISTRATIVE_DECISION', 'DECISIÓN ADMINISTRATIVA', String.raw`DECISI[ÓO]N\s+ADMINISTRATIVA`)
];

const BY_KIND = new Map(DOCUMENT_KINDS.map(def => [def.kind, def]));

export function kindDefinition(kind: DocumentKind): DocumentKindDefinition {
  const def = BY_KIND.get(kind);
  if (!def) {
    throw new Error(`Unknown document kind: ${kind}`);
  }
  return def;
}

/**
 * First kind whose header pattern matches the start of the line
 */
export function detectKind(line: string): DocumentKind | null {
  for (const def of DOCUMENT_KINDS) {
    if (def.header.test(line)) {
      return def.kind;
    }
  }
  return null;
}

export function kindLabel(kind: DocumentKind): string {
  return kindDefinition(kind).label;
}
