import OpenAI from 'openai';
import type { AdRecord } from '../core/types.js';
import { CallFailedError, describeError } from '../core/errors.js';
import type { JobConfig } from '../jobs/JobConfig.js';
import { JobLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import type { ChatMessage, CompletionClient, CompletionSettings } from './OpenRouterClient.js';

/** Hard ceiling on attempts per record, first call included */
export const MAX_ATTEMPTS = 3;

export interface RetryPolicy {
  /** Total attempts, first call included; clamped to 1..MAX_ATTEMPTS */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: MAX_ATTEMPTS,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
};

export interface ResilientCallerOptions {
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
}

/**
 * Transient = connection/timeout failures, HTTP 429 and 5xx.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true; // includes APIConnectionTimeoutError
  }

  const status =
    typeof error === 'object' && error !== null && 'status' in error ? error.status : undefined;
  return typeof status === 'number' && (status === 429 || status >= 500);
}

/**
 * Delay before the attempt that follows `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

/**
 * Resilient Caller
 *
 * One analysis call per record with bounded retries and exponential
 * backoff. A response that comes back is returned as-is, whatever its
 * content; judging it is the normalizer's job.
 */
export class ResilientCaller {
  private client: CompletionClient;
  private config: JobConfig;
  private settings: CompletionSettings;
  private policy: RetryPolicy;
  private sleep: Sleep;
  private logger: JobLogger;

  constructor(client: CompletionClient, config: JobConfig, model: string, options: ResilientCallerOptions = {}) {
    this.client = client;
    this.config = config;
    this.settings = {
      model: config.model ?? model,
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = new JobLogger(`ResilientCaller:${config.id}`);

    const policy = { ...DEFAULT_RETRY_POLICY, ...config.retry, ...options.retry };
    const maxAttempts = Math.min(Math.max(Math.floor(policy.maxAttempts), 1), MAX_ATTEMPTS);
    if (maxAttempts !== policy.maxAttempts) {
      this.logger.warn('Retry attempts out of range, clamped', {
        requested: policy.maxAttempts,
        maxAttempts,
      });
    }
    this.policy = { ...policy, maxAttempts };
  }

  /**
   * @returns the raw text block produced by the service
   * @throws CallFailedError once retries are exhausted or on a non-transient error
   */
  async call(record: AdRecord, context: string): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.config.systemPrompt },
      { role: 'user', content: this.config.promptTemplate(record, context) },
    ];

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.complete(messages, this.settings);
      } catch (error) {
        if (error instanceof CallFailedError) {
          throw error;
        }

        const reason = describeError(error);

        if (!isTransientError(error)) {
          this.logger.warn('Non-transient error, giving up', { attempt, reason });
          throw new CallFailedError(reason, attempt);
        }

        if (attempt >= this.policy.maxAttempts) {
          this.logger.warn('Retries exhausted', { attempts: attempt, reason });
          throw new CallFailedError(reason, attempt);
        }

        const delayMs = backoffDelay(attempt, this.policy);
        this.logger.warn('Transient error, retrying', {
          attempt,
          maxAttempts: this.policy.maxAttempts,
          delayMs,
          reason,
        });
        await this.sleep(delayMs);
      }
    }
  }
}
