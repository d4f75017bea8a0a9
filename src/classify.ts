/**
 * Keyword classification shared by the gazette and news pipelines.
 *
 * Matching is plain substring containment on lowercased text, so "ley"
 * also matches inside "leyenda".
 */

import type {
  Account,
  ClassificationMatch,
  ClassifiedDocument,
  GazetteDocument,
  NewsItem,
  Taxonomy,
  Topic,
  TopicNews
} from './types.js';

/**
 * Topics whose keywords occur in the text. Each topic contributes at most one
 * match: the first of its keywords, in list order, that is found.
 */
export function classify(text: string, topics: readonly Topic[]): ClassificationMatch[] {
  const lowered = text.toLowerCase();
  const matches: ClassificationMatch[] = [];

  for (const topic of topics) {
    const keyword = topic.keywords.find(k => k.length > 0 && lowered.includes(k));
    if (keyword !== undefined) {
      matches.push({ topic: topic.name, matched_keyword: keyword });
    }
  }

  return matches;
}

/**
 * Accounts interested in at least one of the matched topics (deduplicated)
 */
export function interestedAccounts(matches: readonly ClassificationMatch[], accounts: readonly Account[]): string[] {
  const matchedTopics = new Set(matches.map(m => m.topic));
  const names = new Set<string>();

  for (const account of accounts) {
    if (account.interested_topics.some(topic => matchedTopics.has(topic))) {
      names.add(account.name);
    }
  }

  return Array.from(names);
}

export function classifyDocuments(documents: readonly GazetteDocument[], taxonomy: Taxonomy): ClassifiedDocument[] {
  return documents.map(document => {
    const matches = classify(document.raw_text, taxonomy.topics);
    return {
      document,
      matches,
      accounts: interestedAccounts(matches, taxonomy.accounts)
    };
  });
}

/**
 * Classify headlines, record the matches on each item and group items by topic.
 * Topics keep taxonomy order; topics without news are omitted.
 */
export function classifyNews(items: readonly NewsItem[], topics: readonly Topic[]): Map<string, TopicNews[]> {
  const byTopic = new Map<string, TopicNews[]>();

  for (const item of items) {
    const matches = classify(item.title, topics);
    if (item.matches === undefined) {
      item.matches = matches;
    }

    for (const match of matches) {
      const list = byTopic.get(match.topic) ?? [];
      list.push({ item, matched_keyword: match.matched_keyword });
      byTopic.set(match.topic, list);
    }
  }

  const ordered = new Map<string, TopicNews[]>();
  for (const topic of topics) {
    const list = byTopic.get(topic.name);
    if (list) {
      ordered.set(topic.name, list);
    }
  }
  return ordered;
}

/**
 * Documents whose interested accounts include the given account
 */
export function documentsForAccount(classified: readonly ClassifiedDocument[], account: string): ClassifiedDocument[] {
  return classified.filter(c => c.accounts.includes(account));
}
