/**
 * Locate and download the day's Boletín Oficial PDF
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DOWNLOAD_DIR, GAZETTE_PDF_URL_TEMPLATE, USER_AGENT } from './config.js';
import { GazetteNotFoundError, InvalidPdfError, SourceUnavailableError } from './errors.js';
import { isPdf } from './pdf.js';
import { ensureDir, formatCompactDate } from './utils.js';

/**
 * Answers whether a document exists at the URL (HEAD request in production)
 */
export type UrlProbe = (url: string) => Promise<boolean>;

export type FetchBytes = (url: string) => Promise<Uint8Array>;

export interface LocateOptions {
  today?: Date;
  probe?: UrlProbe;
}

export interface LocatedGazette {
  url: string;
  date: Date;
}

function addDays(date: Date, days: number): Date {
  const shifted = new Date(date);
  shifted.setDate(shifted.getDate() + days);
  return shifted;
}

/**
 * The date itself on weekdays, the preceding Friday on weekends
 */
export function previousBusinessDay(date: Date): Date {
  const day = date.getDay();
  if (day === 6) return addDays(date, -1);
  if (day === 0) return addDays(date, -2);
  return new Date(date);
}

export function gazetteUrlFor(date: Date): string {
  return GAZETTE_PDF_URL_TEMPLATE.replace('{date}', formatCompactDate(date));
}

export async function headExists(url: string): Promise<boolean> {
  const response = await fetch(url, {
    method: 'HEAD',
    headers: { 'User-Agent': USER_AGENT }
  });

  if (response.status === 404) {
    return false;
  }
  if (!response.ok) {
    throw new SourceUnavailableError(`HEAD ${url} returned ${response.status}`, { url, status: response.status });
  }
  return true;
}

/**
 * Find the latest issue: the business day on or before `today`, then the
 * calendar day before it. Weekends and holidays without an issue end in
 * GazetteNotFoundError naming the probed range.
 */
export async function locateGazette(options: LocateOptions = {}): Promise<LocatedGazette> {
  const probe = options.probe ?? headExists;
  const businessDay = previousBusinessDay(options.today ?? new Date());
  const fallbackDay = addDays(businessDay, -1);

  for (const date of [businessDay, fallbackDay]) {
    const url = gazetteUrlFor(date);
    console.log(`  Checking ${url}`);

    if (await probe(url)) {
      return { url, date };
    }
  }

  throw new GazetteNotFoundError(formatCompactDate(fallbackDay), formatCompactDate(businessDay));
}

export async function fetchBytes(url: string): Promise<Uint8Array> {
  const response = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });

  if (!response.ok) {
    throw new SourceUnavailableError(`Download failed: ${response.status} ${response.statusText}`, { url, status: response.status });
  }

  return new Uint8Array(await response.arrayBuffer());
}

/**
 * Download a located issue into `dir`. Nothing is written unless the body
 * starts with the %PDF signature.
 */
export async function downloadGazette(
  located: LocatedGazette,
  dir: string = DOWNLOAD_DIR,
  download: FetchBytes = fetchBytes
): Promise<string> {
  const bytes = await download(located.url);

  if (!isPdf(bytes)) {
    throw new InvalidPdfError('Downloaded file is not a PDF', { url: located.url });
  }

  await ensureDir(dir);
  const filePath = join(dir, `boletin_${formatCompactDate(located.date)}.pdf`);
  await writeFile(filePath, bytes);

  console.log(`  Saved ${filePath} (${(bytes.length / 1024).toFixed(0)} KB)`);
  return filePath;
}
