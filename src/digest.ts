/**
 * News pipeline: collect today's headlines, classify them by topic and write
 * the general and per-account digests
 */

import { join } from 'node:path';
import { NEWS_REPORTS_DIR, NEWS_SHEET_FILE } from './config.js';
import { classifyDocuments, classifyNews, documentsForAccount } from './classify.js';
import { errorMessage } from './errors.js';
import { loadLatestIssue } from './gazette.js';
import { collectFeedNews, listMedia, loadFeedSources, loadSheetNews, type FetchText } from './news.js';
import { loadTaxonomy } from './taxonomy.js';
import { formatTimestamp, safeFileName } from './utils.js';
import { buildAccountNewsReport, buildNewsReport, writeDocx, type NewsReportContext } from './word.js';
import type { ClassifiedDocument, FeedSource, NewsItem, Taxonomy, TopicNews } from './types.js';

export interface ProcessNewsOptions {
  today?: Date;
  taxonomy?: Taxonomy;
  sources?: FeedSource[];
  sheetFile?: string;
  outputDir?: string;
  /** Gazette documents to append to account digests; the latest stored issue when omitted */
  gazette?: ClassifiedDocument[];
  fetchText?: FetchText;
  wait?: (ms: number) => Promise<void>;
}

export interface NewsResult {
  items: NewsItem[];
  byTopic: Map<string, TopicNews[]>;
  outputs: string[];
}

async function latestGazetteDocuments(taxonomy: Taxonomy): Promise<ClassifiedDocument[]> {
  const issue = await loadLatestIssue();
  if (!issue) {
    console.log('  No stored gazette issue; account digests will carry news only');
    return [];
  }
  return classifyDocuments(issue.documents, taxonomy);
}

export async function processNews(options: ProcessNewsOptions = {}): Promise<NewsResult> {
  const today = options.today ?? new Date();
  const taxonomy = options.taxonomy ?? await loadTaxonomy();
  const sources = options.sources ?? await loadFeedSources();
  const startedAt = Date.now();

  console.log('Collecting news...');
  const sheetItems = await loadSheetNews(options.sheetFile ?? NEWS_SHEET_FILE, today);
  const feedItems = await collectFeedNews(sources, { today, fetchText: options.fetchText, wait: options.wait });
  const items = [...sheetItems, ...feedItems];
  const elapsedSeconds = (Date.now() - startedAt) / 1000;
  console.log(`  ${items.length} headlines collected in ${elapsedSeconds.toFixed(2)}s`);

  const byTopic = classifyNews(items, taxonomy.topics);
  for (const [topic, entries] of byTopic) {
    console.log(`  ${topic}: ${entries.length}`);
  }

  const generatedAt = new Date();
  const stamp = formatTimestamp(generatedAt);
  const outputDir = options.outputDir ?? NEWS_REPORTS_DIR;
  const context: NewsReportContext = { generatedAt, media: listMedia(sources), elapsedSeconds };
  const outputs: string[] = [];

  console.log('Writing digests...');
  const generalPath = join(outputDir, `news_${stamp}.docx`);
  try {
    await writeDocx(generalPath, buildNewsReport(byTopic, context));
    outputs.push(generalPath);
    console.log(`  General digest: ${generalPath}`);
  } catch (err) {
    console.error(`  General digest failed: ${errorMessage(err)}`);
  }

  const gazette = options.gazette ?? await latestGazetteDocuments(taxonomy);
  const accountsDir = join(outputDir, `accounts_${stamp}`);

  for (const account of taxonomy.accounts) {
    const accountPath = join(accountsDir, `news_${safeFileName(account.name)}.docx`);
    try {
      const report = buildAccountNewsReport(account, byTopic, context, documentsForAccount(gazette, account.name));
      await writeDocx(accountPath, report);
      outputs.push(accountPath);
      console.log(`  ${account.name}: ${accountPath}`);
    } catch (err) {
      console.error(`  ${account.name} digest failed: ${errorMessage(err)}`);
    }
  }

  return { items, byTopic, outputs };
}
