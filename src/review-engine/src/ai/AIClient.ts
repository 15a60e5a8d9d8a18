/**
 * AIClient - Chat completions through Groq with timeout and retry support.
 *
 * The client owns retries: the SDK is built with `maxRetries: 0`, and a
 * request that outlives `timeoutMs` is aborted before the next attempt.
 */

import Groq from 'groq-sdk';
import { ConfigurationError, errorMessage } from '../errors';
import { Logger } from '../logging';

export interface AIClientConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Maximum retries on timeout or rate limiting */
  maxRetries: number;
  /** First backoff delay; doubles on every retry (default 1000) */
  retryBaseDelayMs?: number;
}

export interface ChatRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

export interface ChatCompletion {
  content: string;
  tokensUsed: number;
}

/** One completion request; must stop when the signal aborts */
export type ChatCompletionFn = (request: ChatRequest, signal: AbortSignal) => Promise<ChatCompletion>;

export interface AIResponse {
  text: string;
  tokensUsed: number;
  model: string;
  latencyMs: number;
}

export interface AIStats {
  totalTokensUsed: number;
  callCount: number;
}

const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

export function groqChatCompletion(client: Groq): ChatCompletionFn {
  return async (request, signal) => {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal }
    );
    return {
      content: response.choices[0]?.message?.content ?? '',
      tokensUsed: response.usage?.total_tokens ?? 0,
    };
  };
}

export class AIClient {
  private complete: ChatCompletionFn;
  private totalTokensUsed: number = 0;
  private callCount: number = 0;

  constructor(
    private config: AIClientConfig,
    private logger: Logger,
    complete?: ChatCompletionFn
  ) {
    if (complete) {
      this.complete = complete;
    } else {
      if (!config.apiKey) {
        throw new ConfigurationError('A Groq API key is required for AI operations');
      }
      this.complete = groqChatCompletion(
        new Groq({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 })
      );
    }
  }

  /**
   * Send a prompt, retrying timeouts and rate limits with exponential backoff.
   */
  async query(systemPrompt: string, userPrompt: string): Promise<AIResponse> {
    const startTime = Date.now();
    const request: ChatRequest = {
      model: this.config.model,
      systemPrompt,
      userPrompt,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };
    const baseDelayMs = this.config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;

    for (let attempt = 0; ; attempt++) {
      try {
        const completion = await this.withTimeout(request, this.config.timeoutMs);
        this.totalTokensUsed += completion.tokensUsed;
        this.callCount++;
        return {
          text: completion.content,
          tokensUsed: completion.tokensUsed,
          model: this.config.model,
          latencyMs: Date.now() - startTime,
        };
      } catch (error) {
        const message = errorMessage(error).toLowerCase();
        const isRetryable = message.includes('timeout') || message.includes('rate limit');

        if (!isRetryable || attempt >= this.config.maxRetries) {
          throw error;
        }

        // Exponential backoff: base, 2x base, 4x base
        const backoffMs = Math.pow(2, attempt) * baseDelayMs;
        this.logger.warn(
          `AI request attempt ${attempt + 1} failed (${errorMessage(error)}), retrying in ${backoffMs}ms...`
        );
        await this.delay(backoffMs);
      }
    }
  }

  getStats(): AIStats {
    return { totalTokensUsed: this.totalTokensUsed, callCount: this.callCount };
  }

  /**
   * Run one completion, aborting it when it outlives the timeout.
   */
  private async withTimeout(request: ChatRequest, timeoutMs: number): Promise<ChatCompletion> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error(`AI request timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.complete(request, controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
