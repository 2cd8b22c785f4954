/**
 * Core data model for the ad analysis pipeline
 */

/** One input advertisement row */
export interface AdRecord {
  readonly title: string;
  readonly snippet: string;
  readonly displayed_link: string;
  readonly extensions?: string;
}

/** Required AdRecord columns, in output order */
export const AD_RECORD_FIELDS = ['title', 'snippet', 'displayed_link'] as const;

/** All AdRecord columns, in output order */
export const AD_RECORD_COLUMNS = [...AD_RECORD_FIELDS, 'extensions'] as const;

/**
 * Upstream allowance, fetched once per batch
 */
export interface RateLimitState {
  readonly max_requests: number;
  readonly interval_seconds: number;
}

/**
 * Tagged result of analyzing one AdRecord
 */
export type AnalysisOutcome =
  | { readonly kind: 'success'; readonly fields: Readonly<Record<string, string>> }
  | { readonly kind: 'degraded'; readonly rawText: string; readonly reason: string }
  | { readonly kind: 'failed'; readonly reason: string };

/** Flat row of scalar strings */
export type NormalizedRow = Readonly<Record<string, string>>;

export interface BatchCounters {
  attempted: number;
  succeeded: number;
  degraded: number;
  failed: number;
}

/**
 * Finalized output of one batch run
 *
 * rows[k] and outcomes[k] both belong to input record k.
 */
export interface BatchResult {
  readonly rows: readonly NormalizedRow[];
  readonly outcomes: readonly AnalysisOutcome[];
  readonly counters: Readonly<BatchCounters>;
}

/**
 * Per-record notification emitted by the orchestrator
 */
export type RecordEvent =
  | { type: 'started'; index: number }
  | { type: 'succeeded'; index: number }
  | { type: 'degraded'; index: number; reason: string }
  | { type: 'failed'; index: number; reason: string };

/**
 * Receiver for progress and failure notifications (the UI side)
 */
export interface ProgressSink {
  onRecord(event: RecordEvent): void;
  onProgress(processed: number, total: number): void;
}
