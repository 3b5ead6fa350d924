#!/usr/bin/env tsx
/**
 * Build the feature table for every season file in a directory.
 *
 * Usage:
 *   npx tsx scripts/build-features.ts
 *   npx tsx scripts/build-features.ts --input-dir data/02_preprocessed --output-dir data/03_feature_engineered
 *   npx tsx scripts/build-features.ts --debug
 */

import { basename, extname, join } from 'path';
import { buildFeaturesConfig, ENGINEERED_SUFFIX } from '../src/config.js';
import { isPipelineError, stringifyError } from '../src/errors.js';
import { Logger } from '../src/logger.js';
import { listSeasonFiles, readSeasonFile, writeTableFile } from '../data/loaders/season-csv.js';
import { processSeason } from '../ml/features.js';

async function main() {
  const config = buildFeaturesConfig(process.argv.slice(2));
  const logger = new Logger({ debugEnabled: config.debug });

  logger.info('=== Season Features - Build Features ===');

  let files: string[];
  try {
    files = await listSeasonFiles(config.inputDir);
  } catch (err) {
    logger.error(`Input directory not readable: ${config.inputDir} (${stringifyError(err)})`);
    process.exit(1);
  }

  if (files.length === 0) {
    logger.error(`No CSV files found in '${config.inputDir}'.`);
    process.exit(1);
  }

  let failed = 0;
  for (const inputFile of files) {
    const base = basename(inputFile, extname(inputFile));
    const outputFile = join(config.outputDir, `${base}${ENGINEERED_SUFFIX}.csv`);

    logger.info(`==================== PROCESSING: ${basename(inputFile)} ====================`);
    try {
      const rows = await readSeasonFile(inputFile);
      const { table, summary } = processSeason(rows, { logger });
      await writeTableFile(outputFile, table);

      logger.info(`Shape: (${summary.rows}, ${summary.columns})`);
      logger.info(`Missing values: ${summary.missingValues}`);
      logger.info(`Output saved to: ${outputFile}`);
    } catch (err) {
      failed++;
      const kind = isPipelineError(err) ? ` [${err.kind}]` : '';
      logger.error(`Error processing ${basename(inputFile)}${kind}: ${stringifyError(err)}`);
    }
  }

  logger.info(`Done: ${files.length - failed} processed, ${failed} failed`);
  if (failed > 0) {
    process.exit(1);
  }
}

main().catch(err => {
  new Logger().error(`Fatal error: ${stringifyError(err)}`);
  process.exit(1);
});
