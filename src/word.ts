/**
 * Word report builders for accounts and news digests
 */

import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import { writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { kindLabel } from './kinds.js';
import { ensureDir, formatDayMonthYear } from './utils.js';
import type { Account, ClassifiedDocument, TopicNews } from './types.js';

const SEPARATOR = '_'.repeat(50);

function formatGeneratedAt(date: Date): string {
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(n => String(n).padStart(2, '0'))
    .join(':');
  return `${formatDayMonthYear(date)} ${time}`;
}

function labelled(label: string, value: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text: `${label}: `, bold: true }), new TextRun(value)]
  });
}

// One run per line so line breaks survive in Word
function multiline(text: string): Paragraph {
  return new Paragraph({
    children: text.split('\n').map((line, index) => new TextRun({ text: line, break: index > 0 ? 1 : undefined }))
  });
}

function newsEntry(entry: TopicNews): Paragraph[] {
  const { item } = entry;
  const runs = [
    new TextRun({ text: `• ${item.title}`, bold: true }),
    new TextRun({ text: `  ${item.source_id} - ${item.published ?? 'Fecha no disponible'}`, break: 1 }),
    new TextRun({ text: `  Palabra clave encontrada: ${entry.matched_keyword}`, break: 1 })
  ];
  if (item.link) {
    runs.push(new TextRun({ text: `  ${item.link}`, break: 1 }));
  }
  return [new Paragraph({ children: runs }), new Paragraph({ text: '' })];
}

/**
 * Detail paragraphs for gazette documents, one block per document
 */
export function gazetteDocumentParagraphs(documents: readonly ClassifiedDocument[]): Paragraph[] {
  const children: Paragraph[] = [];

  for (const { document, matches } of documents) {
    children.push(new Paragraph({
      text: `${kindLabel(document.type)} ${document.number ?? 'S/N'}`,
      heading: HeadingLevel.HEADING_1
    }));

    children.push(labelled('Fecha', document.issue_date ?? 'No especificada'));
    children.push(labelled('Organismo', document.issuing_body ?? 'No especificado'));
    if (document.identifier) {
      children.push(labelled('Identificador', document.identifier));
    }
    if (matches.length > 0) {
      children.push(labelled('Temas detectados', matches.map(m => m.topic).join('; ')));
      children.push(labelled('Palabras clave', matches.map(m => m.matched_keyword).join('; ')));
    }

    if (document.title) {
      children.push(new Paragraph({ text: 'Descripción', heading: HeadingLevel.HEADING_2 }));
      children.push(new Paragraph({ text: document.title }));
    }

    children.push(new Paragraph({ text: 'Contenido completo', heading: HeadingLevel.HEADING_2 }));
    children.push(multiline(document.raw_text));
    children.push(new Paragraph({ text: SEPARATOR }));
    children.push(new Paragraph({ text: '' }));
  }

  return children;
}

export function buildGazetteAccountReport(
  account: string,
  documents: readonly ClassifiedDocument[],
  generatedAt: Date
): Document {
  const children: Paragraph[] = [
    new Paragraph({ text: `Reporte de Boletín Oficial - ${account}`, heading: HeadingLevel.TITLE }),
    new Paragraph({ text: `Fecha de generación: ${formatGeneratedAt(generatedAt)}` }),
    new Paragraph({ text: `Total de documentos relevantes: ${documents.length}` }),
    new Paragraph({ text: '' }),
    ...gazetteDocumentParagraphs(documents)
  ];

  return new Document({ sections: [{ children }] });
}

export interface NewsReportContext {
  generatedAt: Date;
  media: string[];
  elapsedSeconds: number;
}

/**
 * General digest: every topic with news, in taxonomy order
 */
export function buildNewsReport(byTopic: Map<string, TopicNews[]>, context: NewsReportContext): Document {
  const total = Array.from(byTopic.values()).reduce((sum, list) => sum + list.length, 0);

  const children: Paragraph[] = [
    new Paragraph({ text: 'Reporte de Noticias por Tema', heading: HeadingLevel.TITLE }),
    new Paragraph({ text: `Fecha del reporte: ${formatGeneratedAt(context.generatedAt)}` }),
    new Paragraph({ text: `Total de noticias clasificadas: ${total}` }),
    new Paragraph({ text: `Tiempo de procesamiento: ${context.elapsedSeconds.toFixed(2)} segundos` }),
    new Paragraph({ text: 'Medios consultados', heading: HeadingLevel.HEADING_1 }),
    ...context.media.map(outlet => new Paragraph({ text: `• ${outlet}` }))
  ];

  for (const [topic, entries] of byTopic) {
    children.push(new Paragraph({ text: `${topic} (${entries.length} noticias)`, heading: HeadingLevel.HEADING_1 }));
    for (const entry of entries) {
      children.push(...newsEntry(entry));
    }
  }

  return new Document({ sections: [{ children }] });
}

/**
 * Per-account digest: the account's topics with news, followed by its gazette
 * documents when an issue was processed
 */
export function buildAccountNewsReport(
  account: Account,
  byTopic: Map<string, TopicNews[]>,
  context: NewsReportContext,
  gazette: readonly ClassifiedDocument[] = []
): Document {
  const children: Paragraph[] = [
    new Paragraph({ text: `Reporte de Noticias - ${account.name}`, heading: HeadingLevel.TITLE }),
    new Paragraph({ text: `Fecha del reporte: ${formatGeneratedAt(context.generatedAt)}` }),
    new Paragraph({ text: `Temas monitoreados: ${account.interested_topics.join(', ')}` }),
    new Paragraph({ text: `Medios relevados: ${context.media.join(', ')}` }),
    new Paragraph({ text: '' })
  ];

  for (const topic of account.interested_topics) {
    const entries = byTopic.get(topic);
    if (!entries || entries.length === 0) continue;

    children.push(new Paragraph({ text: topic.toUpperCase(), heading: HeadingLevel.HEADING_1 }));
    children.push(new Paragraph({ text: '_'.repeat(80) }));
    for (const entry of entries) {
      children.push(...newsEntry(entry));
    }
  }

  if (gazette.length > 0) {
    children.push(new Paragraph({ text: 'DOCUMENTOS DEL BOLETÍN OFICIAL', heading: HeadingLevel.HEADING_1 }));
    children.push(new Paragraph({ text: '_'.repeat(80) }));
    children.push(...gazetteDocumentParagraphs(gazette));
  }

  return new Document({ sections: [{ children }] });
}

export async function writeDocx(filePath: string, document: Document): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, await Packer.toBuffer(document));
}
