/**
 * Google GenAI Text Generation Service
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { ProviderRequestError } from '../../errors.js';
import { logger } from '@/config/logger.js';

export interface GoogleGenAITextConfig {
  apiKey: string;
}

export class GoogleGenAITextService implements ITextGenerationService {
  private genAI: GoogleGenerativeAI;

  constructor(config: GoogleGenAITextConfig) {
    this.genAI = new GoogleGenerativeAI(config.apiKey);

    logger.info('Google GenAI Text Service initialized');
  }

  async complete(prompt: string, options: TextGenerationOptions): Promise<string> {
    try {
      const generativeModel = this.genAI.getGenerativeModel({
        model: options.model,
        ...(options.systemPrompt ? { systemInstruction: options.systemPrompt } : {}),
        generationConfig: {
          maxOutputTokens: options.maxTokens ?? 4096,
          temperature: options.temperature ?? 0.7,
        },
      });

      const result = await generativeModel.generateContent(prompt);
      const text = result.response.text();

      if (!text) {
        throw new ProviderRequestError({
          provider: 'google-genai',
          model: options.model,
          message: 'No text generated from Google GenAI',
        });
      }

      return text;
    } catch (error) {
      logger.error('Google GenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model: options.model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
