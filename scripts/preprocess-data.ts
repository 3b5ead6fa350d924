#!/usr/bin/env tsx
/**
 * Fold the raw match log into fixtures and write one CSV per season.
 *
 * Usage:
 *   npx tsx scripts/preprocess-data.ts
 *   npx tsx scripts/preprocess-data.ts --input data/01_raw/final_matches.csv --output-dir data/02_preprocessed
 */

import { join } from 'path';
import { buildPreprocessConfig, FIXTURE_COLUMNS } from '../src/config.js';
import { stringifyError } from '../src/errors.js';
import { Logger } from '../src/logger.js';
import { loadMatchLog } from '../data/loaders/match-log.js';
import { writeTableFile } from '../data/loaders/season-csv.js';
import { preprocessMatchLog } from '../data/merge-fixtures.js';

async function main() {
  const config = buildPreprocessConfig(process.argv.slice(2));
  const logger = new Logger({ debugEnabled: config.debug });

  logger.info('=== Season Features - Preprocess ===');
  logger.info(`Loading match log from ${config.input}...`);
  const rows = await loadMatchLog(config.input);
  logger.info(`Loaded ${rows.length} team rows`);

  const seasons = preprocessMatchLog(rows, logger);

  for (const season of seasons) {
    const outputPath = join(config.outputDir, `${season.label}.csv`);
    await writeTableFile(outputPath, { columns: [...FIXTURE_COLUMNS], records: season.fixtures });
    logger.info(`Saved ${season.fixtures.length} fixtures to ${outputPath}`);
  }

  logger.info('Data preprocessing completed!');
}

main().catch(err => {
  new Logger().error(`Fatal error: ${stringifyError(err)}`);
  process.exit(1);
});
