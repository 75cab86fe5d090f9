import { describe, it, expect, beforeEach, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

jest.mock('fs/promises', () => ({
  readFile: jest.fn(),
}));

jest.mock('@/shared/path-utils', () => ({
  getPromptsPath: jest.fn(() => '/prompts'),
}));

import { readFile } from 'fs/promises';
import { PromptService } from '../services/prompt';
import { logger } from '@/config/logger';

describe('PromptService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('loads prompt template', async () => {
    jest.mocked(readFile).mockResolvedValue('{"systemPrompt":"Be brief","userPrompt":"Hi"}');

    const result = await PromptService.loadPrompt('calendar', 'motivational');

    expect(result).toEqual({ systemPrompt: 'Be brief', userPrompt: 'Hi' });
    expect(readFile).toHaveBeenCalledWith('/prompts/calendar/motivational.json', 'utf-8');
    expect(logger.debug).toHaveBeenCalled();
  });

  it('throws when prompt template missing', async () => {
    jest.mocked(readFile).mockRejectedValue(new Error('missing'));

    await expect(PromptService.loadPrompt('video-script', 'miss')).rejects.toThrow(
      'Failed to load prompt template: video-script/miss',
    );
    expect(logger.error).toHaveBeenCalled();
  });

  it('rejects a template without a user prompt', async () => {
    jest.mocked(readFile).mockResolvedValue('{"systemPrompt":"Only system"}');

    await expect(PromptService.loadPrompt('calendar', 'broken')).rejects.toThrow(
      'Failed to load prompt template: calendar/broken',
    );
  });

  it('processes variables and conditionals', () => {
    const template = 'Hello {{name}} {{#extra}}Extra: {{extra}}{{/extra}}';
    const result = PromptService.processPrompt(template, { name: 'World', extra: '!' });
    expect(result).toBe('Hello World Extra: !');

    const noExtra = PromptService.processPrompt(template, { name: 'World', extra: '' });
    expect(noExtra).toBe('Hello World ');
  });

  it('joins arrays and drops conditionals for empty arrays', () => {
    const template = 'Focus: {{areas}}{{#tags}} Tags: {{tags}}{{/tags}}';

    expect(PromptService.processPrompt(template, { areas: ['a', 'b'], tags: [] })).toBe('Focus: a, b');
  });

  it('keeps replacement text with dollar signs literal', () => {
    expect(PromptService.processPrompt('Budget: {{amount}}', { amount: '$& $1' })).toBe('Budget: $& $1');
  });

  it('does not expand placeholders that arrive inside inserted values', () => {
    const template = '{{#topic}}Focus on {{topic}}. {{/topic}}Plan {{days}} days';

    expect(PromptService.processPrompt(template, { topic: '{{days}} {{/topic}}', days: 7 })).toBe(
      'Focus on {{days}} {{/topic}}. Plan 7 days',
    );
  });

  it('leaves unknown and prototype-named placeholders in place', () => {
    expect(PromptService.processPrompt('Hi {{name}} {{missing}} {{constructor}}', { name: 'Ana' })).toBe(
      'Hi Ana {{missing}} {{constructor}}',
    );
  });

  it('renders both parts of a template', () => {
    const rendered = PromptService.renderPrompt(
      { systemPrompt: 'sys {{v}}', userPrompt: 'user {{v}}' },
      { v: 'x' },
    );
    expect(rendered).toEqual({ systemPrompt: 'sys x', userPrompt: 'user x' });

    expect(PromptService.renderPrompt({ userPrompt: 'only' }, {})).toEqual({ userPrompt: 'only' });
  });
});
