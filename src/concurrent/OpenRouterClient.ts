import { OpenRouterConfig } from '../config/openrouter.js';
import { CallFailedError } from '../core/errors.js';
import { JobLogger } from '../utils/logger.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Completion Settings
 */
export interface CompletionSettings {
  model: string;
  maxOutputTokens?: number;
  temperature?: number;
}

/**
 * One request/response exchange with the text-generation service
 */
export interface CompletionClient {
  complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string>;
}

/**
 * Completion body as it arrives. OpenRouter can answer 200 with an
 * `error` object and no `choices`.
 */
export interface CompletionBody {
  model?: string;
  choices?: ReadonlyArray<{
    finish_reason?: string | null;
    message?: { content?: string | null };
  }>;
  usage?: { total_tokens?: number } | null;
  error?: { message?: string; code?: number | string };
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
}

/**
 * The slice of the OpenAI SDK this client calls
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: CompletionRequest): PromiseLike<CompletionBody>;
    };
  };
}

/**
 * OpenRouter Client
 *
 * Chat Completions through the OpenAI SDK pointed at OpenRouter.
 * Single attempt per call; retries belong to ResilientCaller.
 */
export class OpenRouterClient implements CompletionClient {
  private client: ChatCompletionsApi;
  private logger: JobLogger;

  constructor(jobId: string, client: ChatCompletionsApi = OpenRouterConfig.getClient()) {
    this.client = client;
    this.logger = new JobLogger(`OpenRouter:${jobId}`);
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: settings.model,
      messages,
      ...(settings.maxOutputTokens !== undefined ? { max_tokens: settings.maxOutputTokens } : {}),
      ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
    });

    const choice = completion.choices?.[0];
    if (!choice) {
      // Answered without a choice; not retried
      const detail = completion.error?.message;
      throw new CallFailedError(detail ? `No choices in response: ${detail}` : 'No choices in response', 1);
    }

    if (completion.usage) {
      this.logger.debug('Completion received', {
        model: completion.model,
        finishReason: choice.finish_reason,
        totalTokens: completion.usage.total_tokens,
      });
    }

    return choice.message?.content ?? '';
  }
}
