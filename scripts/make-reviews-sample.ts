/**
 * Write a small random sample of the reviews file, used when the full
 * file is not deployed.
 *
 * Usage:
 *   npm run sample
 *   npm run sample -- --rows 2000 --seed 7
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parseCsv, toCsv } from '../src/lib/csv.js';
import { DEFAULT_PATHS } from '../src/lib/dataset.js';
import { sample, seededRng } from '../src/lib/random.js';

const DATA_DIR = process.env.DATA_DIR || join(process.cwd(), 'data');
const FULL_PATH = join(DATA_DIR, process.env.REVIEWS_FILE || DEFAULT_PATHS.reviews);
const SAMPLE_PATH = join(DATA_DIR, process.env.REVIEWS_SAMPLE_FILE || DEFAULT_PATHS.reviewsSample);

const N_SAMPLE = 5000;
const SEED = 42;

function readOption(name: string, fallback: number): number {
  const index = process.argv.indexOf(`--${name}`);
  if (index === -1) return fallback;
  const value = Number(process.argv[index + 1]);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} expects a non-negative integer`);
  }
  return value;
}

function main() {
  const rows = readOption('rows', N_SAMPLE);
  const seed = readOption('seed', SEED);

  if (!existsSync(FULL_PATH)) {
    console.error(`Full reviews file not found at ${FULL_PATH}. Please make sure it exists.`);
    process.exitCode = 1;
    return;
  }

  console.log(`Loading full reviews file from ${FULL_PATH}...`);
  const table = parseCsv(readFileSync(FULL_PATH, 'utf-8'));
  console.log(`Full reviews file has ${table.rows.length.toLocaleString()} rows.`);

  console.log(`Sampling ${rows} random rows (seed ${seed})...`);
  const picked = sample(table.rows, rows, seededRng(seed));
  writeFileSync(SAMPLE_PATH, toCsv(picked, table.columns));
  console.log(`Sample saved to ${SAMPLE_PATH} (${picked.length.toLocaleString()} rows).`);
}

main();
