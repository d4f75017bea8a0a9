/**
 * News collection: syndication feeds and the curated news sheet, reduced to
 * today's headlines
 */

import { parseStringPromise } from 'xml2js';
import {
  FEED_ENTRY_LIMIT,
  FEED_POOL_SIZE,
  FEED_RETRY_POLICY,
  FEEDS_FILE,
  NEWS_SHEET_DATE_COLUMN,
  NEWS_SHEET_FILE,
  NEWS_SHEET_NAME,
  NEWS_SHEET_SOURCE_ID,
  USER_AGENT
} from './config.js';
import { SourceUnavailableError, errorMessage } from './errors.js';
import { runPool } from './pool.js';
import { withRetry, type RetryPolicy } from './retry.js';
import { readSheetRows, type SheetRow } from './spreadsheet.js';
import { calendarDayOf, formatDayMonthYear, isSameCalendarDay, readJson } from './utils.js';
import type { FeedEntry, FeedSource, NewsItem } from './types.js';

const UNTITLED = 'Sin título';

export type FetchText = (url: string) => Promise<string>;

export interface FeedFetchOptions {
  today: Date;
  fetchText?: FetchText;
  retry?: RetryPolicy;
  wait?: (ms: number) => Promise<void>;
  limit?: number;
}

// =============================================================================
// NORMALISATION
// =============================================================================

/**
 * Turn a feed entry into a NewsItem when the date it carries, read in its own
 * zone, is `today`'s calendar day. Entries without a parseable date are dropped.
 */
export function normalizeFeedEntry(entry: FeedEntry, sourceId: string, today: Date): NewsItem | null {
  if (!entry.published) {
    return null;
  }

  const published = calendarDayOf(entry.published);
  if (!published) {
    console.warn(`    ${sourceId}: unparseable publication date "${entry.published}"`);
    return null;
  }

  if (!isSameCalendarDay(published, today)) {
    return null;
  }

  return {
    title: entry.title?.trim() || UNTITLED,
    source_id: sourceId,
    published: entry.published,
    link: entry.link,
    summary: entry.summary
  };
}

/**
 * Turn a sheet row (keyed by header) into a NewsItem when its date cell reads
 * as today in DD/MM/YYYY. The title is taken from the first column.
 */
export function normalizeSheetRow(
  row: Record<string, string | undefined>,
  dateColumn: string,
  today: Date,
  titleColumn?: string
): NewsItem | null {
  const date = row[dateColumn]?.trim();
  if (!date || date !== formatDayMonthYear(today)) {
    return null;
  }

  const title = (titleColumn ? row[titleColumn] : Object.values(row)[0])?.trim();
  if (!title) {
    return null;
  }

  return {
    title,
    source_id: NEWS_SHEET_SOURCE_ID,
    published: date
  };
}

// =============================================================================
// FEED PARSING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// xml2js wraps every child in an array and puts text next to attributes under "_"
function textOf(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (isRecord(value)) {
    return textOf(value._);
  }
  return undefined;
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function atomLink(value: unknown): string | undefined {
  const links = listOf(value).filter(isRecord);
  const preferred = links.find(link => {
    const attrs = link.$;
    return isRecord(attrs) && (attrs.rel === undefined || attrs.rel === 'alternate');
  }) ?? links[0];

  const attrs = preferred?.$;
  return isRecord(attrs) && typeof attrs.href === 'string' ? attrs.href : undefined;
}

/**
 * Read the entries of an RSS 2.0 or Atom document, in document order
 */
export async function parseFeedXml(xml: string): Promise<FeedEntry[]> {
  const parsed: unknown = await parseStringPromise(xml);
  if (!isRecord(parsed)) {
    return [];
  }

  if (isRecord(parsed.rss)) {
    const channel = listOf(parsed.rss.channel)[0];
    if (!isRecord(channel)) return [];

    return listOf(channel.item).filter(isRecord).map(item => ({
      title: textOf(item.title),
      link: textOf(item.link),
      published: textOf(item.pubDate) ?? textOf(item['dc:date']),
      summary: textOf(item.description)
    }));
  }

  if (isRecord(parsed.feed)) {
    return listOf(parsed.feed.entry).filter(isRecord).map(entry => ({
      title: textOf(entry.title),
      link: atomLink(entry.link),
      published: textOf(entry.published) ?? textOf(entry.updated),
      summary: textOf(entry.summary) ?? textOf(entry.content)
    }));
  }

  throw new Error('Unrecognised feed format (expected RSS or Atom)');
}

// =============================================================================
// FETCHING
// =============================================================================

export async function fetchText(url: string): Promise<string> {
  const response = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });

  if (!response.ok) {
    throw new SourceUnavailableError(`HTTP ${response.status} ${response.statusText}`, { url, status: response.status });
  }

  return response.text();
}

/**
 * Fetch one feed and keep up to `limit` of today's entries. Fetch and parse
 * failures are retried under the policy; the final failure is thrown.
 */
export async function fetchFeedEntries(source: FeedSource, options: FeedFetchOptions): Promise<NewsItem[]> {
  const load = options.fetchText ?? fetchText;
  const limit = options.limit ?? FEED_ENTRY_LIMIT;

  const entries = await withRetry(
    async () => parseFeedXml(await load(source.url)),
    options.retry ?? FEED_RETRY_POLICY,
    { name: source.id, wait: options.wait }
  );

  if (entries.length === 0) {
    console.warn(`    ${source.id}: feed has no entries`);
    return [];
  }

  const items: NewsItem[] = [];
  for (const entry of entries) {
    const item = normalizeFeedEntry(entry, source.id, options.today);
    if (!item) continue;

    items.push(item);
    if (items.length >= limit) break;
  }

  console.log(`    ${source.id}: ${items.length} entr${items.length === 1 ? 'y' : 'ies'} from today`);
  return items;
}

/**
 * Fetch every feed through a fixed-width pool. A feed that keeps failing
 * contributes nothing; the batch always resolves.
 */
export async function collectFeedNews(sources: readonly FeedSource[], options: FeedFetchOptions): Promise<NewsItem[]> {
  console.log(`  Fetching ${sources.length} feed${sources.length === 1 ? '' : 's'} (${FEED_POOL_SIZE} at a time)...`);

  const tasks = sources.map(source => async () => {
    try {
      return await fetchFeedEntries(source, options);
    } catch (err) {
      console.error(`    ${source.id}: giving up (${errorMessage(err)})`);
      return [];
    }
  });

  const results = await runPool(tasks, FEED_POOL_SIZE);
  return results.flat();
}

export async function loadFeedSources(filePath: string = FEEDS_FILE): Promise<FeedSource[]> {
  const data = await readJson<{ feeds?: FeedSource[] }>(filePath);
  const feeds = data?.feeds ?? [];

  if (feeds.length === 0) {
    console.warn(`  No feed sources found in ${filePath}`);
  }
  return feeds;
}

// =============================================================================
// NEWS SHEET
// =============================================================================

/**
 * Key data rows by the header row's labels; unlabelled columns are dropped
 */
export function rowsToRecords(rows: readonly SheetRow[]): Array<Record<string, string | undefined>> {
  const [header, ...data] = rows;
  if (!header) return [];

  return data.map(row => {
    const record: Record<string, string | undefined> = {};
    header.forEach((label, index) => {
      if (label) {
        record[label] = row[index];
      }
    });
    return record;
  });
}

/**
 * Today's rows of the curated news sheet. A missing or unreadable sheet
 * contributes nothing.
 */
export async function loadSheetNews(filePath: string = NEWS_SHEET_FILE, today: Date = new Date()): Promise<NewsItem[]> {
  let rows: SheetRow[];
  try {
    rows = await readSheetRows(filePath, NEWS_SHEET_NAME);
  } catch (err) {
    console.warn(`  News sheet skipped: ${errorMessage(err)}`);
    return [];
  }

  const titleColumn = rows[0]?.[0];
  const items: NewsItem[] = [];
  for (const record of rowsToRecords(rows)) {
    const item = normalizeSheetRow(record, NEWS_SHEET_DATE_COLUMN, today, titleColumn);
    if (item) {
      items.push(item);
    }
  }

  console.log(`  News sheet: ${items.length} headline${items.length === 1 ? '' : 's'} from ${formatDayMonthYear(today)}`);
  return items;
}

/**
 * Media outlets behind the feeds, without section suffixes ("La Voz - Política" → "La Voz")
 */
export function listMedia(sources: readonly FeedSource[]): string[] {
  const outlets = new Set(sources.map(source => source.name.split(' - ')[0].trim()));
  return Array.from(outlets).sort((a, b) => a.localeCompare(b, 'es'));
}
