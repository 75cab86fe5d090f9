/**
 * OpenAI Text Generation Service
 * Chat Completions over fetch
 */

import { z } from 'zod';
import { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { ProviderRequestError } from '../../errors.js';
import { logger } from '@/config/logger.js';

export interface OpenAITextConfig {
  apiKey: string;
  baseURL?: string;
}

interface OpenAIChatRequestBody {
  model: string;
  messages: Array<{
    role: 'system' | 'user';
    content: string;
  }>;
  temperature?: number;
  max_tokens?: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullish(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export class OpenAITextService implements ITextGenerationService {
  private apiKey: string;
  private baseURL: string;

  constructor(config: OpenAITextConfig) {
    this.apiKey = config.apiKey;
    this.baseURL = config.baseURL || 'https://api.openai.com/v1';

    logger.info('OpenAI Text Service initialized', { baseURL: this.baseURL });
  }

  async complete(prompt: string, options: TextGenerationOptions): Promise<string> {
    const requestBody: OpenAIChatRequestBody = {
      model: options.model,
      messages: [
        ...(options.systemPrompt
          ? [{ role: 'system' as const, content: options.systemPrompt }]
          : []),
        { role: 'user', content: prompt },
      ],
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? 4096,
    };

    try {
      const response = await fetch(`${this.baseURL}/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const errorData = await response.text();
        throw new ProviderRequestError({
          provider: 'openai',
          model: options.model,
          status: response.status,
          message: `OpenAI Chat Completions error: ${response.status} - ${errorData}`,
        });
      }

      const data = ChatCompletionResponseSchema.parse(await response.json());
      const content = data.choices[0]?.message.content;

      if (!content) {
        throw new ProviderRequestError({
          provider: 'openai',
          model: options.model,
          message: 'No text generated from OpenAI Chat Completions',
        });
      }

      logger.debug('OpenAI text generation completed', {
        model: options.model,
        promptTokens: data.usage?.prompt_tokens,
        completionTokens: data.usage?.completion_tokens,
      });

      return content;
    } catch (error) {
      logger.error('OpenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model: options.model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
