import type { AdRecord } from '../core/types.js';
import type { RetryPolicy } from '../concurrent/ResilientCaller.js';

/**
 * Job Configuration Interface
 *
 * Defines one kind of analysis run: what to ask the model and how.
 * Each job lives in src/jobs/configs/<id>.ts and default-exports a JobConfig.
 */
export interface JobConfig {
  /**
   * Unique identifier for the job
   * Examples: "analyze-ad-copy"
   */
  id: string;

  /**
   * Human-readable description of what this job does
   */
  description: string;

  /**
   * System instruction sent with every call
   */
  systemPrompt: string;

  /**
   * Builds the user prompt for one record.
   *
   * `context` is an opaque label (product or search term) supplied by the
   * caller or detected from the batch; it may be empty.
   */
  promptTemplate: (record: AdRecord, context: string) => string;

  /**
   * Model identifier; falls back to OPENROUTER_MODEL
   */
  model?: string;

  maxOutputTokens?: number;

  temperature?: number;

  /**
   * Concurrent calls inside one quota-sized chunk.
   * Overridden by --concurrency / ANALYZER_CONCURRENCY. Default: 1
   */
  concurrencyLimit?: number;

  /**
   * Per-job overrides of the call retry policy. `maxAttempts` can lower
   * the attempt count but never raise it above MAX_ATTEMPTS (3).
   */
  retry?: Partial<RetryPolicy>;
}
