/**
 * Taxonomy loader
 *
 * Two tables feed the classifier:
 * - the dictionary: column 1 = topic, column 2 = keyword, one keyword per row
 *   (a topic repeats across rows)
 * - the accounts: column 1 = account name, every further column holds at most
 *   one topic name the account follows
 *
 * Both files start with a header row. The result is an explicit Taxonomy
 * object handed to the pipelines; nothing is cached at module level.
 */

import { ACCOUNTS_FILE, DICTIONARY_FILE } from './config.js';
import { errorMessage } from './errors.js';
import { readSheetRows, type SheetRow } from './spreadsheet.js';
import type { Account, Taxonomy, Topic } from './types.js';

export interface TaxonomyFiles {
  dictionaryFile: string;
  accountsFile: string;
}

/**
 * Build topics from dictionary rows (header excluded). Rows without a topic
 * are skipped; a topic listed without keywords is kept with an empty list.
 */
export function buildTopics(rows: readonly SheetRow[]): Topic[] {
  const topics = new Map<string, Topic>();

  for (const row of rows) {
    const name = row[0]?.trim();
    if (!name) continue;

    let topic = topics.get(name);
    if (!topic) {
      topic = { name, keywords: [] };
      topics.set(name, topic);
    }

    const keyword = row[1]?.trim().toLowerCase();
    if (keyword) {
      topic.keywords.push(keyword);
    }
  }

  return Array.from(topics.values());
}

/**
 * Build accounts from account rows (header excluded). Repeated account rows
 * are merged and topic names deduplicated.
 */
export function buildAccounts(rows: readonly SheetRow[]): Account[] {
  const accounts = new Map<string, Account>();

  for (const row of rows) {
    const name = row[0]?.trim();
    if (!name) continue;

    let account = accounts.get(name);
    if (!account) {
      account = { name, interested_topics: [] };
      accounts.set(name, account);
    }

    for (const cell of row.slice(1)) {
      const topic = cell?.trim();
      if (topic && !account.interested_topics.includes(topic)) {
        account.interested_topics.push(topic);
      }
    }
  }

  return Array.from(accounts.values());
}

async function loadTable<T>(label: string, filePath: string, build: (rows: SheetRow[]) => T[]): Promise<T[]> {
  try {
    const rows = await readSheetRows(filePath);
    return build(rows.slice(1));
  } catch (err) {
    console.error(`  Could not load ${label} from ${filePath}: ${errorMessage(err)}`);
    return [];
  }
}

/**
 * Load both tables. A table that cannot be read degrades to empty, which
 * leaves the classifier matching nothing.
 */
export async function loadTaxonomy(files: TaxonomyFiles = {
  dictionaryFile: DICTIONARY_FILE,
  accountsFile: ACCOUNTS_FILE
}): Promise<Taxonomy> {
  const topics = await loadTable('dictionary', files.dictionaryFile, buildTopics);
  const accounts = await loadTable('accounts', files.accountsFile, buildAccounts);

  const keywordCount = topics.reduce((sum, t) => sum + t.keywords.length, 0);
  console.log(`Loaded taxonomy: ${topics.length} topics (${keywordCount} keywords), ${accounts.length} accounts`);

  return { topics, accounts };
}
