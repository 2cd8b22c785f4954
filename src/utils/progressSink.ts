import type { ProgressSink, RecordEvent } from '../core/types.js';
import { JobLogger } from './logger.js';

/**
 * Progress sink that reports through the logger
 *
 * Per-record problems are logged as they happen; progress every
 * `every` records and on the last one.
 */
export class LoggingProgressSink implements ProgressSink {
  private logger: JobLogger;
  private every: number;

  constructor(jobId: string, every = 10) {
    this.logger = new JobLogger(`Progress:${jobId}`);
    this.every = every;
  }

  onRecord(event: RecordEvent): void {
    switch (event.type) {
      case 'started':
        this.logger.debug(`Record ${event.index + 1} started`);
        break;
      case 'succeeded':
        this.logger.debug(`Record ${event.index + 1} analyzed`);
        break;
      case 'degraded':
        this.logger.warn(`Record ${event.index + 1} partially analyzed`, { reason: event.reason });
        break;
      case 'failed':
        this.logger.error(`Record ${event.index + 1} failed`, event.reason);
        break;
    }
  }

  onProgress(processed: number, total: number): void {
    if (processed % this.every === 0 || processed === total) {
      this.logger.info(`Progress: ${processed}/${total} processed`);
    }
  }
}
