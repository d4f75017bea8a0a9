#!/usr/bin/env node
/**
 * CLI for the daily news digest
 *
 * Usage:
 *   npm run news                       # Collect today's feeds and sheet news
 *   npm run news -- --date 2025-03-14  # Treat the given day as today
 */

import 'dotenv/config';
import { processNews } from '../digest.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const today = typeof args.date === 'string' ? new Date(`${args.date}T12:00:00`) : undefined;

if (today && Number.isNaN(today.getTime())) {
  console.error('Usage: npm run news -- [--date YYYY-MM-DD]');
  process.exit(1);
}

processNews({ today }).catch((err) => {
  console.error('Error:', err.message);
  process.exit(1);
});
