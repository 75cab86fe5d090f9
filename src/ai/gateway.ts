/**
 * AI Gateway
 * Owns the text providers that initialised and routes each request to the
 * provider serving the requested model, falling back to the first available
 * model when that provider is missing.
 */

import {
  AIProviderConfig,
  ITextGenerationService,
  ModelInfo,
  TextCompletion,
  TextGenerationOptions,
  TextProvider,
} from './interfaces.js';
import { NoModelAvailableError } from './errors.js';
import { MODEL_CATALOG, PROVIDER_PRIORITY, resolveProvider } from './models.js';
import { OpenAITextService } from './providers/openai/text.js';
import { AnthropicTextService } from './providers/anthropic/text.js';
import { GoogleGenAITextService } from './providers/google-genai/text.js';
import { logger } from '@/config/logger.js';

export type ProviderRegistrations = Partial<Record<TextProvider, ITextGenerationService>>;

export class AIGateway {
  private readonly providers: ProviderRegistrations;
  private readonly defaultModel: string;

  constructor(providers: ProviderRegistrations, defaultModel = 'gpt-4o-mini') {
    this.providers = providers;
    this.defaultModel = defaultModel;

    logger.info('AI Gateway initialized', {
      providers: this.getAvailableProviders(),
      defaultModel,
    });
  }

  /** Providers that initialised, in priority order. */
  public getAvailableProviders(): TextProvider[] {
    return PROVIDER_PRIORITY.filter((provider) => this.providers[provider] !== undefined);
  }

  /** Catalog models whose provider is available, in priority order. */
  public getAvailableModels(): ModelInfo[] {
    return this.getAvailableProviders().flatMap((provider) =>
      MODEL_CATALOG.filter((model) => model.provider === provider),
    );
  }

  public getDefaultModel(): string {
    return this.defaultModel;
  }

  /**
   * Pick the model that will serve `requestedModel`: the model itself when its
   * provider is available, otherwise the first available model.
   */
  public selectModel(requestedModel: string): { model: string; provider: TextProvider; fallbackUsed: boolean } {
    const provider = resolveProvider(requestedModel);
    if (provider && this.providers[provider]) {
      return { model: requestedModel, provider, fallbackUsed: false };
    }

    const [fallback] = this.getAvailableModels();
    if (!fallback) {
      throw new NoModelAvailableError(requestedModel);
    }

    logger.warn('Requested model unavailable, falling back', {
      requestedModel,
      fallbackModel: fallback.id,
      fallbackProvider: fallback.provider,
    });
    return { model: fallback.id, provider: fallback.provider, fallbackUsed: true };
  }

  public async complete(
    prompt: string,
    options: Omit<TextGenerationOptions, 'model'> & { model?: string } = {},
  ): Promise<TextCompletion> {
    const requestedModel = options.model || this.defaultModel;
    const selection = this.selectModel(requestedModel);
    const service = this.providers[selection.provider];
    if (!service) {
      throw new NoModelAvailableError(requestedModel);
    }

    const text = await service.complete(prompt, { ...options, model: selection.model });

    return {
      text,
      model: selection.model,
      provider: selection.provider,
      requestedModel,
      fallbackUsed: selection.fallbackUsed,
    };
  }

  /**
   * Create the gateway from configured credentials. A provider whose client
   * cannot be constructed is left out and logged.
   */
  public static fromConfig(config: AIProviderConfig): AIGateway {
    const providers: ProviderRegistrations = {};
    const { credentials } = config;

    const register = (provider: TextProvider, create: () => ITextGenerationService): void => {
      try {
        providers[provider] = create();
      } catch (error) {
        logger.error('Failed to initialize text provider', {
          provider,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };

    if (credentials.openaiApiKey) {
      const apiKey = credentials.openaiApiKey;
      register('openai', () => new OpenAITextService({ apiKey }));
    }
    if (credentials.anthropicApiKey) {
      const apiKey = credentials.anthropicApiKey;
      register('anthropic', () => new AnthropicTextService({ apiKey }));
    }
    if (credentials.googleGenAIApiKey) {
      const apiKey = credentials.googleGenAIApiKey;
      register('google-genai', () => new GoogleGenAITextService({ apiKey }));
    }

    if (Object.keys(providers).length === 0) {
      logger.warn('No text generation providers configured');
    }

    return new AIGateway(providers, config.defaultModel);
  }
}
