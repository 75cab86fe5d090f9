import { describe, it, expect } from '@jest/globals';
import { AIGateway } from '../ai/gateway';
import { NoModelAvailableError } from '../ai/errors';
import { costPer1kTokens, resolveProvider } from '../ai/models';
import { FakeTextService } from './helpers/fake-text-service';

describe('AIGateway', () => {
  describe('model catalog', () => {
    it('resolves providers by model prefix', () => {
      expect(resolveProvider('gpt-4o')).toBe('openai');
      expect(resolveProvider('claude-3-haiku-20240307')).toBe('anthropic');
      expect(resolveProvider('gemini-2.5-flash')).toBe('google-genai');
      expect(resolveProvider('llama-3')).toBeNull();
    });

    it('uses the default cost for unknown models', () => {
      expect(costPer1kTokens('gpt-4o-mini')).toBe(0.0006);
      expect(costPer1kTokens('custom-model')).toBe(0.002);
    });
  });

  describe('availability', () => {
    it('lists providers and models in priority order', () => {
      const gateway = new AIGateway({
        'google-genai': new FakeTextService('ok'),
        anthropic: new FakeTextService('ok'),
      });

      expect(gateway.getAvailableProviders()).toEqual(['anthropic', 'google-genai']);
      expect(gateway.getAvailableModels().map((model) => model.id)).toEqual([
        'claude-3-5-sonnet-20241022',
        'claude-3-haiku-20240307',
        'gemini-2.5-flash',
      ]);
    });

    it('has no models without providers', () => {
      const gateway = new AIGateway({});

      expect(gateway.getAvailableProviders()).toEqual([]);
      expect(gateway.getAvailableModels()).toEqual([]);
    });
  });

  describe('complete', () => {
    it('routes to the provider of the requested model', async () => {
      const openai = new FakeTextService('from openai');
      const anthropic = new FakeTextService('from anthropic');
      const gateway = new AIGateway({ openai, anthropic });

      const completion = await gateway.complete('Say hi', {
        model: 'claude-3-haiku-20240307',
        maxTokens: 50,
      });

      expect(completion).toEqual({
        text: 'from anthropic',
        model: 'claude-3-haiku-20240307',
        provider: 'anthropic',
        requestedModel: 'claude-3-haiku-20240307',
        fallbackUsed: false,
      });
      expect(openai.calls).toHaveLength(0);
      expect(anthropic.calls[0]?.options).toEqual({ model: 'claude-3-haiku-20240307', maxTokens: 50 });
    });

    it('uses the default model when none is requested', async () => {
      const openai = new FakeTextService('hello');
      const gateway = new AIGateway({ openai }, 'gpt-4o');

      const completion = await gateway.complete('Say hi');

      expect(completion.model).toBe('gpt-4o');
      expect(completion.requestedModel).toBe('gpt-4o');
    });

    it('falls back to the first available model when the provider is missing', async () => {
      const google = new FakeTextService('from gemini');
      const gateway = new AIGateway({ 'google-genai': google });

      const completion = await gateway.complete('Say hi', { model: 'gpt-4o' });

      expect(completion).toMatchObject({
        text: 'from gemini',
        model: 'gemini-2.5-flash',
        provider: 'google-genai',
        requestedModel: 'gpt-4o',
        fallbackUsed: true,
      });
      expect(google.calls[0]?.options.model).toBe('gemini-2.5-flash');
    });

    it('falls back for a model no provider recognises', () => {
      const gateway = new AIGateway({ openai: new FakeTextService('x') });

      expect(gateway.selectModel('llama-3')).toEqual({
        model: 'gpt-4o-mini',
        provider: 'openai',
        fallbackUsed: true,
      });
    });

    it('throws NoModelAvailableError without providers', async () => {
      const gateway = new AIGateway({});

      await expect(gateway.complete('Say hi', { model: 'gpt-4o' })).rejects.toBeInstanceOf(
        NoModelAvailableError,
      );
    });

    it('lets provider failures propagate', async () => {
      const gateway = new AIGateway({ openai: new FakeTextService(new Error('rate limited')) });

      await expect(gateway.complete('Say hi')).rejects.toThrow('rate limited');
    });
  });

  describe('fromConfig', () => {
    it('registers only the providers with credentials', () => {
      const gateway = AIGateway.fromConfig({
        defaultModel: 'claude-3-5-sonnet-20241022',
        credentials: { anthropicApiKey: 'test-secret' },
      });

      expect(gateway.getAvailableProviders()).toEqual(['anthropic']);
      expect(gateway.getDefaultModel()).toBe('claude-3-5-sonnet-20241022');
    });

    it('starts with no providers when nothing is configured', () => {
      const gateway = AIGateway.fromConfig({ defaultModel: 'gpt-4o-mini', credentials: {} });

      expect(gateway.getAvailableProviders()).toEqual([]);
    });
  });
});
