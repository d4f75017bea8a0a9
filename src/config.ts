/**
 * Configuration for the pipeline
 */

import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import type { RetryPolicy } from './retry.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// __dirname is src/ under the test runner and dist/ at runtime; both sit one level below the root
const ROOT_DIR = join(__dirname, '..');

export const DATA_DIR = process.env.GAZETTE_DATA_DIR
  ? resolve(process.env.GAZETTE_DATA_DIR)
  : join(ROOT_DIR, 'data');
export const OUTPUT_DIR = process.env.GAZETTE_OUTPUT_DIR
  ? resolve(process.env.GAZETTE_OUTPUT_DIR)
  : join(ROOT_DIR, 'output');

export const DOWNLOAD_DIR = join(OUTPUT_DIR, 'downloads');
export const GAZETTE_REPORTS_DIR = join(OUTPUT_DIR, 'gazette');
export const NEWS_REPORTS_DIR = join(OUTPUT_DIR, 'news');

// Taxonomy and account tables (.xlsx or .csv)
export const DICTIONARY_FILE = process.env.DICTIONARY_FILE ?? join(DATA_DIR, 'dictionary.csv');
export const ACCOUNTS_FILE = process.env.ACCOUNTS_FILE ?? join(DATA_DIR, 'accounts.csv');

// Manually curated news, one row per headline
export const NEWS_SHEET_FILE = process.env.NEWS_SHEET_FILE ?? join(DATA_DIR, 'news.xlsx');
export const NEWS_SHEET_NAME = 'Noticias';
export const NEWS_SHEET_DATE_COLUMN = 'Fecha';
export const NEWS_SHEET_SOURCE_ID = 'news_sheet';

export const FEEDS_FILE = join(DATA_DIR, 'feeds.json');

// Boletín Oficial
export const GAZETTE_BASE_URL = 'https://www.boletinoficial.gob.ar';
export const GAZETTE_PDF_URL_TEMPLATE = `${GAZETTE_BASE_URL}/pdf/pdfPorNombre/{date}`;

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// Pages scanned for the SUMARIO index
export const SUMMARY_PAGE_COUNT = 3;

// Feed fetching
export const FEED_POOL_SIZE = 3;
export const FEED_ENTRY_LIMIT = 50;
export const FEED_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 2000
};
