#!/usr/bin/env node
/**
 * CLI for running the gazette and news pipelines back to back
 *
 * Usage:
 *   npm run pipeline                                 # Gazette, then news digests
 *   npm run pipeline -- --pdf ./boletin.pdf          # Use a local gazette PDF
 *   npm run pipeline -- --skip-gazette               # News only (appends the latest stored issue)
 *   npm run pipeline -- --skip-news                  # Gazette only
 */

import 'dotenv/config';
import { processGazette } from '../gazette.js';
import { processNews } from '../digest.js';
import { loadTaxonomy } from '../taxonomy.js';
import { parseArgs } from '../utils.js';
import type { ClassifiedDocument } from '../types.js';

const args = parseArgs(process.argv.slice(2));

const pdfPath = typeof args.pdf === 'string' ? args.pdf : undefined;
const skipGazette = Boolean(args['skip-gazette']);
const skipNews = Boolean(args['skip-news']);

if (skipGazette && skipNews) {
  console.error('Usage: npm run pipeline -- [--pdf <file>] [--skip-gazette | --skip-news]');
  process.exit(1);
}

async function runPipeline() {
  const today = new Date();

  console.log(`\n========================================`);
  console.log(`Running pipeline for ${today.toDateString()}`);
  console.log(`========================================\n`);

  const taxonomy = await loadTaxonomy();
  console.log('');

  // Step 1: Gazette
  let gazette: ClassifiedDocument[] | undefined;
  if (!skipGazette) {
    console.log(`[1/2] Processing gazette...`);
    console.log('----------------------------------------');
    try {
      const result = await processGazette({ pdfPath, today, taxonomy });
      gazette = result.classified;
    } catch (err) {
      // The news digest still runs without a gazette
      console.error(`Gazette step failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    console.log('');
  } else {
    console.log(`[1/2] Skipping gazette (--skip-gazette)`);
    console.log('');
  }

  // Step 2: News
  if (!skipNews) {
    console.log(`[2/2] Collecting news...`);
    console.log('----------------------------------------');
    await processNews({ today, taxonomy, gazette });
    console.log('');
  } else {
    console.log(`[2/2] Skipping news (--skip-news)`);
    console.log('');
  }

  console.log(`========================================`);
  console.log(`Pipeline complete`);
  console.log(`========================================\n`);
}

runPipeline().catch((err) => {
  console.error('Pipeline error:', err.message);
  process.exit(1);
});
