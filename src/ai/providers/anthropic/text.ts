/**
 * Anthropic Text Generation Service
 */

import Anthropic from '@anthropic-ai/sdk';
import { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { ProviderRequestError } from '../../errors.js';
import { logger } from '@/config/logger.js';

export interface AnthropicTextConfig {
  apiKey: string;
}

export class AnthropicTextService implements ITextGenerationService {
  private client: Anthropic;

  constructor(config: AnthropicTextConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });

    logger.info('Anthropic Text Service initialized');
  }

  async complete(prompt: string, options: TextGenerationOptions): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens ?? 4096,
        temperature: options.temperature ?? 0.7,
        ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        messages: [{ role: 'user', content: prompt }],
      });

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      if (!text) {
        throw new ProviderRequestError({
          provider: 'anthropic',
          model: options.model,
          message: 'Empty response from Anthropic Messages API',
        });
      }

      logger.debug('Anthropic text generation completed', {
        model: options.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      });

      return text;
    } catch (error) {
      logger.error('Anthropic text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model: options.model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
