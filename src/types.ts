/**
 * Type definitions for the gazette and news monitoring pipeline
 */

// =============================================================================
// TAXONOMY TYPES
// =============================================================================

export interface Topic {
  name: string;
  keywords: string[];
}

export interface Account {
  name: string;
  interested_topics: string[];
}

export interface Taxonomy {
  topics: Topic[];
  accounts: Account[];
}

export interface ClassificationMatch {
  topic: string;
  matched_keyword: string;
}

// =============================================================================
// GAZETTE TYPES
// =============================================================================

export type DocumentKind =
  | 'LAW'
  | 'DECREE'
  | 'RESOLUTION'
  | 'DISPOSITION'
  | 'ADMINISTRATIVE_DECISION';

export interface SegmentedBlock {
  kind: DocumentKind;
  text: string;
}

export interface GazetteDocument {
  type: DocumentKind;
  number?: string;
  identifier?: string;
  issue_date?: string;
  title?: string;
  issuing_body?: string;
  signatories: string[];
  publication_code?: string;
  hash_code?: string;
  has_web_annex: boolean;
  raw_text: string;
}

export interface SummaryEntry {
  type: DocumentKind;
  number: string;
  page: number;
  raw_line: string;
}

export interface GazetteIssue {
  issue_number?: string;
  issue_date?: string;
  summary: SummaryEntry[];
  documents: GazetteDocument[];
}

export interface ClassifiedDocument {
  document: GazetteDocument;
  matches: ClassificationMatch[];
  accounts: string[];
}

// =============================================================================
// NEWS TYPES
// =============================================================================

export interface FeedSource {
  id: string;
  name: string;
  url: string;
}

// Entry as read from an RSS/Atom document, before normalisation
export interface FeedEntry {
  title?: string;
  link?: string;
  published?: string;
  summary?: string;
}

export interface NewsItem {
  title: string;
  source_id: string;
  published?: string;
  link?: string;
  summary?: string;
  matches?: ClassificationMatch[];
}

export interface TopicNews {
  item: NewsItem;
  matched_keyword: string;
}
