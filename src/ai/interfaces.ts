/**
 * AI Gateway Interfaces
 * Provider-agnostic interfaces for text generation services
 */

export type TextProvider = 'openai' | 'anthropic' | 'google-genai';

export interface TextGenerationOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

export interface ITextGenerationService {
  /**
   * Complete a text generation request with the given model
   */
  complete(prompt: string, options: TextGenerationOptions): Promise<string>;
}

export interface AIProviderCredentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  googleGenAIApiKey?: string;
}

export interface AIProviderConfig {
  defaultModel: string;
  credentials: AIProviderCredentials;
}

export interface ModelInfo {
  id: string;
  label: string;
  provider: TextProvider;
  /** USD per 1K tokens, used for rough cost estimates. */
  costPer1kTokens: number;
}

export interface TextCompletion {
  text: string;
  /** Model that actually produced the text. */
  model: string;
  provider: TextProvider;
  requestedModel: string;
  fallbackUsed: boolean;
}
