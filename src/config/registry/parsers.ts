/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

import { existsSync } from 'node:fs';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// PROJECT ROOT
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Nearest directory holding package.json; sources and dist/ sit at different depths
function findProjectRoot(start: string): string {
  let dir = start;
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return resolve(start, '../../..');
    dir = parent;
  }
}

export const projectRoot = findProjectRoot(__dirname);

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 * Matching is case-insensitive; the canonical spelling is returned.
 */
export function parseString<T extends string>(
  value: string | undefined,
  defaultValue: T,
  allowedValues?: readonly T[]
): T {
  if (value === undefined || value === '') return defaultValue;
  if (!allowedValues) return defaultValue;
  const match = allowedValues.find((allowed) => allowed.toLowerCase() === value.toLowerCase());
  return match ?? defaultValue;
}

/**
 * Parse a comma-separated list, dropping empty items.
 */
export function parseStringArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value === '') return defaultValue;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

// =============================================================================
// DURATIONS AND TIMESTAMPS
// =============================================================================

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/**
 * Parse a human-friendly duration into milliseconds.
 *
 * Components combine in any order of size: "1d12h", "90s", "1h30m", "250ms".
 * A plain integer is taken as milliseconds.
 *
 * @returns milliseconds, or undefined when the input is not a duration
 */
export function parseDurationMs(input: string): number | undefined {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) return undefined;

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const componentRegex = /(\d+)(ms|s|m|h|d)/g;
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(componentRegex)) {
    const [, amount, unit] = match;
    if (amount === undefined || unit === undefined) return undefined;
    const unitMs = DURATION_UNITS_MS[unit];
    if (unitMs === undefined) return undefined;
    total += parseInt(amount, 10) * unitMs;
    consumed += amount.length + unit.length;
  }

  // Anything the component regex did not account for is garbage
  return consumed === trimmed.length ? total : undefined;
}

/**
 * Parse an ISO-8601 date or epoch milliseconds.
 *
 * @returns epoch milliseconds, or undefined when unparseable
 */
export function parseTimestamp(input: string): number | undefined {
  const trimmed = input.trim();
  if (!trimmed) return undefined;
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10);
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? undefined : parsed;
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Expand tilde (~) to home directory in file paths.
 * Supports both Unix-style HOME and Windows-style USERPROFILE.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Get the base data directory.
 * Priority:
 * 1. DEDUP_DATA_DIR environment variable (highest)
 * 2. ~/.dedupe-scanner (when installed as package via node_modules)
 * 3. projectRoot/data (development mode)
 */
export function getDataDir(): string {
  const dataDir = process.env.DEDUP_DATA_DIR;
  if (dataDir) {
    return expandTilde(dataDir);
  }
  // Check if running from node_modules (installed as package)
  if (__dirname.includes('node_modules')) {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    if (home) {
      return resolve(home, '.dedupe-scanner');
    }
  }
  return resolve(projectRoot, 'data');
}

/**
 * Resolve a data path with priority:
 * 1. Specific env var override (highest priority)
 * 2. DEDUP_DATA_DIR + relative path
 * 3. projectRoot/data + relative path (default)
 */
export function resolveDataPath(envVar: string | undefined, relativePath: string): string {
  // ':memory:' is a SQLite pseudo-path, never a file
  if (envVar === ':memory:' || (!envVar && relativePath === ':memory:')) {
    return ':memory:';
  }
  if (envVar) {
    return expandTilde(envVar);
  }
  return resolve(getDataDir(), relativePath);
}
