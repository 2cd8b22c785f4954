import type { RateLimitState } from './types.js';
import { QuotaUnavailableError, describeError } from './errors.js';
import { checkKeyInfoPayload, keyInfoErrors } from '../utils/validators.js';
import { createLogger } from '../utils/logger.js';

const FETCH_TIMEOUT_MS = 30000;

const log = createLogger('QuotaProbe');

export interface QuotaProbeOptions {
  apiKey: string;
  /** Service base URL, e.g. https://openrouter.ai/api/v1 */
  baseUrl: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const UNIT_SECONDS: Record<string, number> = {
  ms: 0.001,
  s: 1,
  m: 60,
  h: 3600,
};

/**
 * Parse an interval such as "10s", "1m" or "500ms" into seconds.
 * A bare number is taken as seconds.
 *
 * @returns undefined when the text is not a positive interval
 */
export function parseIntervalSeconds(interval: string): number | undefined {
  const match = interval.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/);
  if (!match) return undefined;

  const seconds = parseFloat(match[1]) * UNIT_SECONDS[match[2] ?? 's'];
  return seconds > 0 ? seconds : undefined;
}

/**
 * Quota Probe
 *
 * Asks the upstream service for the key's current rate allowance.
 * The first successful answer is cached; create one probe per batch.
 */
export class QuotaProbe {
  private options: Required<QuotaProbeOptions>;
  private cached: RateLimitState | null = null;

  constructor(options: QuotaProbeOptions) {
    this.options = {
      apiKey: options.apiKey,
      baseUrl: options.baseUrl.replace(/\/+$/, ''),
      fetchImpl: options.fetchImpl ?? ((input, init) => fetch(input, init)),
      timeoutMs: options.timeoutMs ?? FETCH_TIMEOUT_MS,
    };
  }

  /**
   * @throws QuotaUnavailableError on non-2xx status, network failure or malformed payload
   */
  async fetchQuota(): Promise<RateLimitState> {
    if (this.cached) {
      return this.cached;
    }

    const url = `${this.options.baseUrl}/auth/key`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.options.fetchImpl(url, {
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new QuotaUnavailableError(`HTTP ${response.status}: ${errorBody.slice(0, 200)}`, response.status);
      }

      try {
        body = await response.json();
      } catch {
        throw new QuotaUnavailableError('response is not valid JSON', response.status);
      }
    } catch (err) {
      if (err instanceof QuotaUnavailableError) {
        throw err;
      }
      if (err instanceof Error && err.name === 'AbortError') {
        throw new QuotaUnavailableError(`request timed out after ${this.options.timeoutMs}ms`);
      }
      throw new QuotaUnavailableError(describeError(err));
    } finally {
      clearTimeout(timeoutId);
    }

    if (!checkKeyInfoPayload(body)) {
      throw new QuotaUnavailableError(`malformed payload (${keyInfoErrors()})`, response.status);
    }

    const { requests, interval } = body.data.rate_limit;
    const intervalSeconds = parseIntervalSeconds(interval);

    if (requests <= 0) {
      throw new QuotaUnavailableError(`malformed payload (requests must be positive, got ${requests})`);
    }
    if (intervalSeconds === undefined) {
      throw new QuotaUnavailableError(`malformed payload (unrecognised interval "${interval}")`);
    }

    this.cached = { max_requests: requests, interval_seconds: intervalSeconds };
    log.info('Quota acquired', this.cached);

    return this.cached;
  }
}
