import type { AnalysisOutcome, NormalizedRow } from './types.js';
import { extractJsonFromResponse } from '../utils/validators.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ResponseNormalizer');

/** Joins parent and child keys when flattening nested mappings */
export const KEY_SEPARATOR = '_';

/** Joins sequence elements into one cell */
export const LIST_SEPARATOR = ', ';

/** Value written into cells a row has no data for */
export const PLACEHOLDER = '';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScalar(value: unknown): string {
  if (value === null || value === undefined) return PLACEHOLDER;
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    return value
      .map((item) => (typeof item === 'object' && item !== null ? JSON.stringify(item) : toScalar(item)))
      .join(LIST_SEPARATOR);
  }
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Flatten nested mappings into one level
 *
 * `{ details: { sentiment: { score: 7 } } }` becomes
 * `{ details_sentiment_score: '7' }`. Sequences are joined, every other
 * leaf is stringified. A flat string mapping flattens to itself.
 * When two paths join to the same key the later value is kept and a
 * warning is logged.
 */
export function flatten(value: Record<string, unknown>): Record<string, string> {
  const out = new Map<string, string>();
  flattenInto(out, value, '');
  return Object.fromEntries(out);
}

function flattenInto(out: Map<string, string>, value: Record<string, unknown>, prefix: string): void {
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}${KEY_SEPARATOR}${key}` : key;
    if (isPlainObject(child)) {
      flattenInto(out, child, path);
      continue;
    }
    if (out.has(path)) {
      logger.warn('Flattened key collision, keeping the later value', { key: path });
    }
    out.set(path, toScalar(child));
  }
}

/**
 * Parse one raw service response into an outcome
 *
 * Never throws: unparseable or non-object payloads become `degraded`
 * with the raw text preserved as-is.
 */
export function normalize(rawText: string): AnalysisOutcome {
  let parsed: unknown;
  try {
    parsed = extractJsonFromResponse(rawText);
  } catch (error) {
    return {
      kind: 'degraded',
      rawText,
      reason: `parse failure: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!isPlainObject(parsed)) {
    return { kind: 'degraded', rawText, reason: 'parse failure: response is not a JSON object' };
  }

  return { kind: 'success', fields: flatten(parsed) };
}

/**
 * Align rows to one column set
 *
 * The key set is the union over all rows, ordered by first appearance.
 * Missing cells get PLACEHOLDER. Unifying unified rows changes nothing.
 */
export function unify(rows: readonly NormalizedRow[]): NormalizedRow[] {
  const keys = unifiedKeys(rows);

  return rows.map((row) =>
    Object.fromEntries(
      keys.map((key): [string, string] => [key, Object.hasOwn(row, key) ? row[key] : PLACEHOLDER])
    )
  );
}

export function unifiedKeys(rows: readonly NormalizedRow[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) keys.add(key);
  }
  return [...keys];
}
