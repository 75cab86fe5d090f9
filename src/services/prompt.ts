/**
 * Prompt Service
 * Handles loading and processing of AI prompts from JSON files
 */

import { readFile } from 'fs/promises';
import { posix as pathPosix } from 'path';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { getPromptsPath } from '../shared/path-utils.js';

export const PromptTemplateSchema = z.object({
  systemPrompt: z.string().optional(),
  userPrompt: z.string().min(1),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

export type PromptKind = 'calendar' | 'video-script' | 'tools';

export interface RenderedPrompt {
  systemPrompt?: string;
  userPrompt: string;
}

export class PromptService {
  private static readonly PROMPTS_BASE_PATH = getPromptsPath();

  /**
   * Load a prompt template from src/prompts/<kind>/<name>.json
   */
  static async loadPrompt(kind: PromptKind, promptName: string): Promise<PromptTemplate> {
    const promptPath = pathPosix.join(this.PROMPTS_BASE_PATH, kind, `${promptName}.json`);
    try {
      const promptContent = await readFile(promptPath, 'utf-8');
      const promptTemplate = PromptTemplateSchema.parse(JSON.parse(promptContent));

      logger.debug('Prompt template loaded successfully', {
        kind,
        promptName,
        promptPath,
      });

      return promptTemplate;
    } catch (error) {
      logger.error('Failed to load prompt template', {
        error: error instanceof Error ? error.message : String(error),
        kind,
        promptName,
      });
      throw new Error(`Failed to load prompt template: ${kind}/${promptName}`);
    }
  }

  /**
   * Process a prompt template by replacing variables
   */
  static processPrompt(template: string, variables: Record<string, unknown>): string {
    const lookup = (key: string): unknown => (Object.hasOwn(variables, key) ? variables[key] : undefined);

    // Conditional sections (e.g., {{#topic}}...{{/topic}}) are resolved on the
    // template text before any value is inserted
    const withSections = template.replace(
      /\{\{#(\w+)\}\}(.*?)\{\{\/\1\}\}/gs,
      (_block, key: string, body: string) => {
        const value = lookup(key);
        const present = Array.isArray(value) ? value.length > 0 : String(value ?? '').trim() !== '';
        return present ? body : '';
      },
    );

    // Single pass over the placeholders; inserted values are never rescanned.
    // Unknown placeholders are left as they are.
    return withSections.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
      if (!Object.hasOwn(variables, key)) {
        return placeholder;
      }
      const value = variables[key];
      return Array.isArray(value) ? value.join(', ') : String(value ?? '');
    });
  }

  /**
   * Fill both parts of a template
   */
  static renderPrompt(promptTemplate: PromptTemplate, variables: Record<string, unknown>): RenderedPrompt {
    const userPrompt = this.processPrompt(promptTemplate.userPrompt, variables);

    if (promptTemplate.systemPrompt) {
      return {
        systemPrompt: this.processPrompt(promptTemplate.systemPrompt, variables),
        userPrompt,
      };
    }

    return { userPrompt };
  }
}
