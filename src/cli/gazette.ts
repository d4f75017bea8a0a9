#!/usr/bin/env node
/**
 * CLI for processing the day's Boletín Oficial
 *
 * Usage:
 *   npm run gazette                                  # Locate, download and process today's issue
 *   npm run gazette -- --date 2025-03-14             # Process the issue for a given day
 *   npm run gazette -- --pdf ./boletin_20250314.pdf  # Process a local PDF
 */

import 'dotenv/config';
import { processGazette } from '../gazette.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const pdfPath = typeof args.pdf === 'string' ? args.pdf : undefined;
const today = typeof args.date === 'string' ? new Date(`${args.date}T12:00:00`) : undefined;

if (today && Number.isNaN(today.getTime())) {
  console.error('Usage: npm run gazette -- [--date YYYY-MM-DD] [--pdf <file>]');
  process.exit(1);
}

processGazette({ pdfPath, today }).catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
