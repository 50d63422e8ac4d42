/**
 * Persistence utility - JSON file-based storage for market state.
 * Stores data in the project's data/ directory (gitignored).
 * Bigints are written as { "$bigint": "<decimal>" } so they survive a round trip.
 */
import { readFileSync, writeFileSync, mkdirSync, existsSync, unlinkSync } from 'fs';
import { join } from 'path';

const DEFAULT_DATA_DIR = join(process.cwd(), 'data');

function ensureDataDir(dataDir: string): void {
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? { $bigint: value.toString() } : value;
}

function bigintReviver(_key: string, value: unknown): unknown {
  if (
    typeof value === 'object' &&
    value !== null &&
    '$bigint' in value &&
    typeof value.$bigint === 'string' &&
    /^-?\d+$/.test(value.$bigint)
  ) {
    return BigInt(value.$bigint);
  }
  return value;
}

export function serializeJson<T>(data: T): string {
  return JSON.stringify(data, bigintReplacer, 2);
}

export function parseJson(raw: string): unknown {
  return JSON.parse(raw, bigintReviver);
}

/**
 * Write `data` to the data directory. Returns false (and logs) when the
 * write fails.
 */
export function saveJson<T>(filename: string, data: T, dataDir: string = DEFAULT_DATA_DIR): boolean {
  const filePath = join(dataDir, filename);
  try {
    ensureDataDir(dataDir);
    writeFileSync(filePath, serializeJson(data), 'utf-8');
    return true;
  } catch (error) {
    console.error(`Failed to save ${filename}:`, error);
    return false;
  }
}

/**
 * Load a JSON file, or `undefined` when it does not exist
 */
export function loadJson(filename: string, dataDir: string = DEFAULT_DATA_DIR): unknown {
  const filePath = join(dataDir, filename);
  if (!existsSync(filePath)) return undefined;
  return parseJson(readFileSync(filePath, 'utf-8'));
}

export function deleteJson(filename: string, dataDir: string = DEFAULT_DATA_DIR): void {
  const filePath = join(dataDir, filename);
  if (existsSync(filePath)) {
    unlinkSync(filePath);
  }
}
