import pLimit from 'p-limit';
import type {
  AdRecord,
  AnalysisOutcome,
  BatchCounters,
  BatchResult,
  NormalizedRow,
  ProgressSink,
  RateLimitState,
  RecordEvent,
} from './types.js';
import { BatchCancelledError, CallFailedError, describeError } from './errors.js';
import { normalize, unify } from './ResponseNormalizer.js';
import { JobLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

/**
 * Anything that turns one record into the service's raw text answer
 */
export interface RecordCaller {
  call(record: AdRecord, context: string): Promise<string>;
}

export interface OrchestratorOptions {
  /**
   * Calls in flight at once inside one quota-sized chunk. Default: 1
   */
  concurrency?: number;
  sleep?: Sleep;
  /** Polled between records; waits already in progress are not interrupted */
  signal?: AbortSignal;
  jobId?: string;
}

export const STATUS_COLUMN = 'analysis_status';
export const ERROR_COLUMN = 'analysis_error';
export const RAW_RESPONSE_COLUMN = 'raw_response';

const RESERVED_COLUMNS = new Set([STATUS_COLUMN, ERROR_COLUMN, RAW_RESPONSE_COLUMN]);

/**
 * Join one outcome with the record it came from
 *
 * Record fields come first. Analysis keys that would overwrite a record
 * field, a status column or an earlier analysis key are prefixed with
 * `analysis_` until the name is free.
 */
export function buildRow(record: AdRecord, outcome: AnalysisOutcome): NormalizedRow {
  const row = new Map<string, string>([
    ['title', record.title],
    ['snippet', record.snippet],
    ['displayed_link', record.displayed_link],
  ]);
  if (record.extensions !== undefined) {
    row.set('extensions', record.extensions);
  }

  switch (outcome.kind) {
    case 'success':
      for (const [key, value] of Object.entries(outcome.fields)) {
        let column = key;
        while (row.has(column) || RESERVED_COLUMNS.has(column)) {
          column = `analysis_${column}`;
        }
        row.set(column, value);
      }
      break;
    case 'degraded':
      row.set(STATUS_COLUMN, 'degraded');
      row.set(ERROR_COLUMN, outcome.reason);
      row.set(RAW_RESPONSE_COLUMN, outcome.rawText);
      break;
    case 'failed':
      row.set(STATUS_COLUMN, 'failed');
      row.set(ERROR_COLUMN, outcome.reason);
      break;
  }

  return Object.fromEntries(row);
}

/**
 * Batch Orchestrator
 *
 * Drives records through the caller and normalizer, paces calls against
 * the quota, and folds every outcome into one unified table. A record's
 * failure never stops the batch; rows keep input order.
 */
export class BatchOrchestrator {
  private caller: RecordCaller;
  private concurrency: number;
  private sleep: Sleep;
  private signal?: AbortSignal;
  private logger: JobLogger;

  constructor(caller: RecordCaller, options: OrchestratorOptions = {}) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`concurrency must be an integer >= 1, got ${concurrency}`);
    }

    this.caller = caller;
    this.concurrency = concurrency;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.logger = new JobLogger(`BatchOrchestrator:${options.jobId ?? 'batch'}`);
  }

  async run(
    records: readonly AdRecord[],
    context: string,
    quota: RateLimitState,
    sink: ProgressSink
  ): Promise<BatchResult> {
    if (!Number.isInteger(quota.max_requests) || quota.max_requests < 1 || !(quota.interval_seconds > 0)) {
      throw new Error(`Invalid rate limit: ${JSON.stringify(quota)}`);
    }

    const total = records.length;
    const outcomes: AnalysisOutcome[] = new Array(total);
    const rows: NormalizedRow[] = new Array(total);
    const counters: BatchCounters = { attempted: 0, succeeded: 0, degraded: 0, failed: 0 };

    this.logger.started({ total, context, quota, concurrency: this.concurrency });

    const emit = (action: () => void) => {
      try {
        action();
      } catch (error) {
        this.logger.error('Progress sink threw', error);
      }
    };

    const processRecord = async (index: number): Promise<void> => {
      if (this.signal?.aborted) return;

      const record = records[index];
      emit(() => sink.onRecord({ type: 'started', index }));

      let outcome: AnalysisOutcome;
      try {
        const rawText = await this.caller.call(record, context);
        outcome = normalize(rawText);
      } catch (error) {
        if (!(error instanceof CallFailedError)) {
          this.logger.error(`Unexpected error on record ${index + 1}`, error);
        }
        outcome = {
          kind: 'failed',
          reason: error instanceof CallFailedError ? error.reason : describeError(error),
        };
      }

      outcomes[index] = outcome;
      rows[index] = buildRow(record, outcome);

      counters.attempted++;
      let event: RecordEvent;
      switch (outcome.kind) {
        case 'success':
          counters.succeeded++;
          event = { type: 'succeeded', index };
          break;
        case 'degraded':
          counters.degraded++;
          event = { type: 'degraded', index, reason: outcome.reason };
          break;
        case 'failed':
          counters.failed++;
          event = { type: 'failed', index, reason: outcome.reason };
          break;
      }

      emit(() => sink.onRecord(event));
      emit(() => sink.onProgress(counters.attempted, total));
    };

    const chunkSize = quota.max_requests;
    for (let start = 0; start < total; start += chunkSize) {
      const end = Math.min(start + chunkSize, total);
      const limit = pLimit(this.concurrency);

      const indices: number[] = [];
      for (let index = start; index < end; index++) indices.push(index);
      await Promise.all(indices.map((index) => limit(() => processRecord(index))));

      if (this.signal?.aborted) {
        this.logger.warn('Batch cancelled', { processed: counters.attempted, total });
        throw new BatchCancelledError(counters.attempted, total);
      }

      if (end < total) {
        this.logger.info(`Quota chunk done, pausing ${quota.interval_seconds}s`, {
          processed: end,
          total,
        });
        await this.sleep(quota.interval_seconds * 1000);
      }
    }

    const result: BatchResult = { rows: unify(rows), outcomes, counters };
    this.logger.completed({ ...counters });

    return result;
  }
}
