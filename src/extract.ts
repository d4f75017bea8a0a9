/**
 * Field extraction for a single gazette document block.
 *
 * Every field is looked up independently; a field whose pattern does not
 * match is left undefined and the document is still produced.
 */

import { kindDefinition } from './kinds.js';
import type { DocumentKind, GazetteDocument } from './types.js';

const LETTERS = 'A-Za-zÁÉÍÓÚáéíóúñÑ';

export const FIELD_PATTERNS = {
  // RESOL-2025-123-APN-MS, EX-2025-01234567-APN-DGDYD#MS
  identifier: /[A-Z]+-\d{4}-\d+-[A-Z]+-[A-Z]+(?:#[A-Z]+)?/,
  cityDate: new RegExp(`Ciudad de Buenos Aires,\\s*(\\d{1,2}\\s+de\\s+[${LETTERS}]+\\s+de\\s+\\d{4})`),
  numericDate: /(\d{2}\/\d{2}\/\d{4})/,
  // e. 18/10/2026 N° 12345/26 v. 18/10/2026
  publicationCode: /e\.\s+\d{2}\/\d{2}\/\d{4}\s+N[°º]\s+\d+\/\d{2}\s+v\.\s+\d{2}\/\d{2}\/\d{4}/,
  hashCode: /#[IF]\d+[IF]#/,
  issueNumber: /Boletín\s+Oficial\s+N[°º]\s+(\d+\.?\d*)/,
  issueDate: new RegExp(`(?:Lunes|Martes|Miércoles|Jueves|Viernes)\\s+(\\d{1,2})\\s+de\\s+([${LETTERS}]+)\\s+de\\s+(\\d{4})`)
};

// Institutional names stay on one line; matching is case-sensitive
const ISSUING_BODY_PATTERNS: RegExp[] = [
  /MINISTERIO[ \t]+DE[ \t]+[A-ZÁÉÍÓÚÑ \t]+/,
  /SECRETAR[ÍI]A[ \t]+[A-ZÁÉÍÓÚÑ \t]+/,
  /PRESIDENCIA[ \t]+DE[ \t]+LA[ \t]+NACI[ÓO]N/
];

const NAME_WORD = '[A-ZÁÉÍÓÚÑ][A-Za-zÁÉÍÓÚÑáéíóúñ]+';
const SIGNATORY_PATTERN = new RegExp(`^${NAME_WORD}(?:\\s+${NAME_WORD})+$`);

// Places, institutions and enacting formulas share the shape of a bare name
const NON_SIGNATORY_LINES = new RegExp(
  [
    String.raw`^(?:CIUDAD\s+(?:AUT[ÓO]NOMA\s+)?DE\s+)?BUENOS\s+AIRES$`,
    String.raw`^REP[ÚU]BLICA\s+ARGENTINA$`,
    String.raw`^(?:MINISTERIO|SECRETAR[ÍI]A|SUBSECRETAR[ÍI]A|PRESIDENCIA|JEFATURA)\b`,
    String.raw`^(?:EL|LA)\s+(?:VICE)?PRESIDENT[EA]\b`
  ].join('|'),
  'i'
);

const TITLE_SCAN_LINES = 5;
const TITLE_MIN_LENGTH = 10;
const SIGNATORY_SCAN_LINES = 10;

export function extractNumber(kind: DocumentKind, text: string): string | undefined {
  return kindDefinition(kind).header.exec(text)?.[1];
}

export function extractIdentifier(text: string): string | undefined {
  return FIELD_PATTERNS.identifier.exec(text)?.[0];
}

export function extractIssueDate(text: string): string | undefined {
  for (const pattern of [FIELD_PATTERNS.cityDate, FIELD_PATTERNS.numericDate]) {
    const match = pattern.exec(text);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * First of the leading lines that looks like "SUBJECT - detail".
 * Preamble lines containing a dash can be picked up as well.
 */
export function extractTitle(text: string): string | undefined {
  const lines = text.split('\n').slice(0, TITLE_SCAN_LINES);
  const line = lines.find(l => l.includes('-') && l.length > TITLE_MIN_LENGTH);
  return line?.trim();
}

export function extractIssuingBody(text: string): string | undefined {
  for (const pattern of ISSUING_BODY_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return match[0].trim();
    }
  }
  return undefined;
}

export function extractSignatories(text: string): string[] {
  return text
    .split('\n')
    .slice(-SIGNATORY_SCAN_LINES)
    .map(line => line.trim())
    .filter(line => SIGNATORY_PATTERN.test(line) && !NON_SIGNATORY_LINES.test(line));
}

export function extractPublicationCode(text: string): string | undefined {
  return FIELD_PATTERNS.publicationCode.exec(text)?.[0];
}

export function extractHashCode(text: string): string | undefined {
  return FIELD_PATTERNS.hashCode.exec(text)?.[0];
}

export function hasWebAnnex(text: string): boolean {
  return text.includes('ANEXO') && text.toLowerCase().includes('web');
}

/**
 * Build the structured record for one segmented block
 */
export function extractDocument(kind: DocumentKind, text: string): GazetteDocument {
  return {
    type: kind,
    number: extractNumber(kind, text),
    identifier: extractIdentifier(text),
    issue_date: extractIssueDate(text),
    title: extractTitle(text),
    issuing_body: extractIssuingBody(text),
    signatories: extractSignatories(text),
    publication_code: extractPublicationCode(text),
    hash_code: extractHashCode(text),
    has_web_annex: hasWebAnnex(text),
    raw_text: text
  };
}

/**
 * Issue number and date, read from the first page
 */
export function extractIssueMetadata(firstPageText: string): { issue_number?: string; issue_date?: string } {
  const metadata: { issue_number?: string; issue_date?: string } = {};

  const numberMatch = FIELD_PATTERNS.issueNumber.exec(firstPageText);
  if (numberMatch) {
    metadata.issue_number = numberMatch[1];
  }

  const dateMatch = FIELD_PATTERNS.issueDate.exec(firstPageText);
  if (dateMatch) {
    metadata.issue_date = `${dateMatch[1]} de ${dateMatch[2]} de ${dateMatch[3]}`;
  }

  return metadata;
}
