/**
 * Season Files
 *
 * Reads and writes the per-season CSV files the pipeline works on.
 * Missing values are written as empty cells.
 */

import { readFile, readdir, writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { csvRecordsSchema } from '../../src/schemas.js';
import type { FeatureTable } from '../../src/types/index.js';

/**
 * Parse CSV text into header-keyed records.
 */
export function parseCSVRecords(csvContent: string): Record<string, string>[] {
  const records: unknown = parse(csvContent, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  return csvRecordsSchema.parse(records);
}

export async function readSeasonFile(filepath: string): Promise<Record<string, string>[]> {
  const content = await readFile(filepath, 'utf-8');
  return parseCSVRecords(content);
}

/**
 * Render a table as CSV, header first, columns in table order.
 */
export function formatTableCSV(table: FeatureTable): string {
  // Array rows: header names are never read as property paths
  return stringify([
    table.columns,
    ...table.records.map(record => table.columns.map(col => record[col] ?? null)),
  ]);
}

export async function writeTableFile(filepath: string, table: FeatureTable): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, formatTableCSV(table), 'utf-8');
}

/**
 * CSV files in a directory, sorted by name, as full paths.
 */
export async function listSeasonFiles(dir: string): Promise<string[]> {
  const files = await readdir(dir);
  return files
    .filter(f => f.toLowerCase().endsWith('.csv'))
    .sort()
    .map(f => join(dir, f));
}
