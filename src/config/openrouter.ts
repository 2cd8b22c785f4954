import OpenAI from 'openai';
import dotenv from 'dotenv';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const log = createLogger('OpenRouterConfig');

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'anthropic/claude-3.5-sonnet';

export interface OpenRouterSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  siteUrl?: string;
  appName?: string;
  concurrency: number;
}

/**
 * Parse a concurrency setting; `source` names it in the error
 */
export function parseConcurrency(raw: string, source: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid ${source}: ${raw} (expected an integer >= 1)`);
  }
  return value;
}

/**
 * OpenRouter Configuration
 *
 * Manages the connection to the OpenRouter API (OpenAI-compatible).
 * The SDK's built-in retries are disabled: ResilientCaller owns retry policy.
 */
export class OpenRouterConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig(): OpenRouterSettings {
    const apiKey = process.env.OPENROUTER_API_KEY;
    const baseUrl = (process.env.OPENROUTER_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, '');
    const model = process.env.OPENROUTER_MODEL || DEFAULT_MODEL;

    if (!apiKey) {
      throw new Error(
        'Missing required OpenRouter configuration. ' +
          'Please ensure OPENROUTER_API_KEY is set in .env'
      );
    }

    const concurrency = parseConcurrency(process.env.ANALYZER_CONCURRENCY || '1', 'ANALYZER_CONCURRENCY');

    return {
      apiKey,
      baseUrl,
      model,
      siteUrl: process.env.OPENROUTER_SITE_URL || undefined,
      appName: process.env.OPENROUTER_APP_NAME || undefined,
      concurrency,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create the OpenRouter client
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      const defaultHeaders: Record<string, string> = {};
      if (config.siteUrl) defaultHeaders['HTTP-Referer'] = config.siteUrl;
      if (config.appName) defaultHeaders['X-Title'] = config.appName;

      this.client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        defaultHeaders,
        maxRetries: 0,
        timeout: 120000,
      });

      log.info('OpenRouter client initialized', {
        baseUrl: config.baseUrl,
        model: config.model,
      });
    }

    return this.client;
  }

  static getModel(): string {
    return this.getConfig().model;
  }

  /**
   * Validate configuration without creating the client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      log.error('OpenRouter configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
