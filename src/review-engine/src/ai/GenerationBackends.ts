/**
 * Generation backends - Free-text completion for the generative review pass.
 */

import { GenerationConfig } from '../config';
import { Logger } from '../logging';
import { AIClient, ChatCompletionFn } from './AIClient';

export interface GenerationBackend {
  readonly name: string;
  readonly model: string;
  readonly available: boolean;
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export class NullGenerationBackend implements GenerationBackend {
  readonly name = 'none';
  readonly model = 'none';
  readonly available = false;

  async complete(): Promise<string> {
    throw new Error('No generation backend configured');
  }
}

export class GroqGenerationBackend implements GenerationBackend {
  readonly name = 'groq';
  readonly available = true;
  readonly model: string;
  private client: AIClient;

  constructor(
    config: GenerationConfig,
    private logger: Logger,
    complete?: ChatCompletionFn
  ) {
    this.model = config.model;
    this.client = new AIClient(config, logger, complete);
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.query(systemPrompt, userPrompt);
    const stats = this.client.getStats();
    this.logger.debug(
      `Generation took ${response.latencyMs}ms, ${response.tokensUsed} tokens ` +
        `(${stats.totalTokensUsed} over ${stats.callCount} calls)`
    );
    return response.text;
  }
}
