/**
 * Error taxonomy
 *
 * QuotaUnavailableError, PreconditionFailedError and BatchCancelledError
 * abort a batch. CallFailedError is per-record and is folded into a
 * Failed outcome by the orchestrator.
 */

export class AnalyzerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class QuotaUnavailableError extends AnalyzerError {
  readonly status?: number;

  constructor(reason: string, status?: number) {
    super(`Quota unavailable: ${reason}`);
    this.status = status;
  }
}

export interface PreconditionViolation {
  /** 1-based data row number */
  row: number;
  missingFields: string[];
}

export class PreconditionFailedError extends AnalyzerError {
  readonly violations: readonly PreconditionViolation[];

  constructor(violations: PreconditionViolation[], message?: string) {
    super(
      message ??
        `Input records are missing required fields: ${violations
          .slice(0, 5)
          .map((v) => `row ${v.row} (${v.missingFields.join(', ')})`)
          .join('; ')}${violations.length > 5 ? `; and ${violations.length - 5} more` : ''}`
    );
    this.violations = violations;
  }
}

export class CallFailedError extends AnalyzerError {
  readonly reason: string;
  readonly attempts: number;

  constructor(reason: string, attempts: number) {
    super(`Call failed after ${attempts} attempt(s): ${reason}`);
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class BatchCancelledError extends AnalyzerError {
  readonly processed: number;
  readonly total: number;

  constructor(processed: number, total: number) {
    super(`Batch cancelled after ${processed}/${total} records`);
    this.processed = processed;
    this.total = total;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
