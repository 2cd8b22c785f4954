import fs from 'fs/promises';
import path from 'path';
import { AD_RECORD_COLUMNS, type BatchResult, type RateLimitState } from './types.js';
import { unifiedKeys } from './ResponseNormalizer.js';
import { toCsv } from '../utils/csv.js';

export interface RunSummary {
  processedAt: string;
  jobType: string;
  model: string;
  context: string;
  quota: RateLimitState;
  totalRecords: number;
  attempted: number;
  succeeded: number;
  degraded: number;
  failed: number;
  successRate: string;
  outputDirectory: string;
}

interface FailureRecord {
  row: number;
  status: 'degraded' | 'failed';
  reason: string;
}

/**
 * Column order for export: AdRecord columns first, then analysis keys
 * in first-seen order.
 */
export function exportColumns(result: BatchResult): string[] {
  const keys = unifiedKeys(result.rows);
  const recordColumns: string[] = AD_RECORD_COLUMNS.filter((column) => keys.includes(column));
  return [...recordColumns, ...keys.filter((key) => !recordColumns.includes(key))];
}

export function buildSummary(
  result: BatchResult,
  meta: { jobType: string; model: string; context: string; quota: RateLimitState; outputDirectory: string }
): RunSummary {
  const { attempted, succeeded, degraded, failed } = result.counters;
  const totalRecords = result.rows.length;

  return {
    processedAt: new Date().toISOString(),
    ...meta,
    totalRecords,
    attempted,
    succeeded,
    degraded,
    failed,
    successRate: totalRecords > 0 ? `${((succeeded / totalRecords) * 100).toFixed(1)}%` : '0.0%',
  };
}

/**
 * Persists a finished batch:
 * - analysis-results.csv: unified rows in input order
 * - summary.json: counters and run settings
 * - failures.json: degraded and failed rows with reasons
 */
export class ResultWriter {
  private baseDir: string;

  constructor(baseDir: string = path.join(process.cwd(), 'results')) {
    this.baseDir = baseDir;
  }

  outputDirectoryFor(jobType: string, timestamp: Date = new Date()): string {
    return path.join(this.baseDir, jobType, timestamp.toISOString().replace(/[:.]/g, '-'));
  }

  async write(outputDirectory: string, result: BatchResult, summary: RunSummary): Promise<void> {
    await fs.mkdir(outputDirectory, { recursive: true });

    const failures: FailureRecord[] = [];
    result.outcomes.forEach((outcome, index) => {
      if (outcome.kind !== 'success') {
        failures.push({ row: index + 1, status: outcome.kind, reason: outcome.reason });
      }
    });

    await Promise.all([
      fs.writeFile(
        path.join(outputDirectory, 'analysis-results.csv'),
        toCsv(exportColumns(result), result.rows),
        'utf-8'
      ),
      fs.writeFile(path.join(outputDirectory, 'summary.json'), JSON.stringify(summary, null, 2), 'utf-8'),
      fs.writeFile(path.join(outputDirectory, 'failures.json'), JSON.stringify(failures, null, 2), 'utf-8'),
    ]);
  }
}
