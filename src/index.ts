/**
 * Gazette Monitor
 *
 * Parses the Boletín Oficial into structured documents and collects the
 * day's news, classifying both against a keyword taxonomy of topics and
 * the accounts that follow them.
 */

export { segmentDocuments, pagesToLines } from './segment.js';
export { extractDocument, extractIssueMetadata } from './extract.js';
export { extractSummary } from './summary.js';
export { classify, interestedAccounts, classifyDocuments, classifyNews, documentsForAccount } from './classify.js';
export { loadTaxonomy, buildTopics, buildAccounts } from './taxonomy.js';
export {
  normalizeFeedEntry,
  normalizeSheetRow,
  parseFeedXml,
  fetchFeedEntries,
  collectFeedNews,
  loadSheetNews
} from './news.js';
export { previousBusinessDay, gazetteUrlFor, locateGazette, downloadGazette } from './fetch.js';
export { isPdf, readPdfPages } from './pdf.js';
export { parseGazette, processGazette, writeGazetteReports } from './gazette.js';
export { processNews } from './digest.js';
export { buildDocumentRows, toTsv } from './report.js';
export * from './errors.js';
export * from './types.js';
