/**
 * Model catalog
 * Known text models, the provider that serves each one and a cost figure for estimates.
 */

import type { ModelInfo, TextProvider } from './interfaces.js';

export const PROVIDER_PRIORITY: readonly TextProvider[] = ['openai', 'anthropic', 'google-genai'];

export const DEFAULT_COST_PER_1K_TOKENS = 0.002;

export const MODEL_CATALOG: readonly ModelInfo[] = [
  { id: 'gpt-4o-mini', label: 'GPT-4o mini', provider: 'openai', costPer1kTokens: 0.0006 },
  { id: 'gpt-4o', label: 'GPT-4o', provider: 'openai', costPer1kTokens: 0.005 },
  {
    id: 'claude-3-5-sonnet-20241022',
    label: 'Claude 3.5 Sonnet',
    provider: 'anthropic',
    costPer1kTokens: 0.003,
  },
  {
    id: 'claude-3-haiku-20240307',
    label: 'Claude 3 Haiku',
    provider: 'anthropic',
    costPer1kTokens: 0.00025,
  },
  { id: 'gemini-2.5-flash', label: 'Gemini 2.5 Flash', provider: 'google-genai', costPer1kTokens: 0.0003 },
];

/** Provider for a model id, judged by its prefix; null when no provider claims it. */
export function resolveProvider(modelId: string): TextProvider | null {
  const id = modelId.toLowerCase();
  if (id.startsWith('gpt-') || id.startsWith('o1') || id.startsWith('o3')) return 'openai';
  if (id.startsWith('claude-')) return 'anthropic';
  if (id.startsWith('gemini-')) return 'google-genai';
  return null;
}

export function findModel(modelId: string): ModelInfo | undefined {
  return MODEL_CATALOG.find((model) => model.id === modelId);
}

export function costPer1kTokens(modelId: string): number {
  return findModel(modelId)?.costPer1kTokens ?? DEFAULT_COST_PER_1K_TOKENS;
}
