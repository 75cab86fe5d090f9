/**
 * Content Generation Service
 * Builds segment prompts and turns model replies into calendars and scripts.
 */

import { z } from 'zod';
import { logger } from '@/config/logger.js';
import type { AIGateway } from '@/ai/gateway.js';
import type { ModelInfo, TextCompletion, TextProvider } from '@/ai/interfaces.js';
import { NoModelAvailableError } from '@/ai/errors.js';
import { costPer1kTokens } from '@/ai/models.js';
import {
  generationFailedError,
  noModelAvailableError,
  notFoundError,
  validationError,
  type ServiceError,
} from '@/shared/errors.js';
import { fail, ok, type Result } from '@/shared/result.js';
import { isPlainObject, parseAIResponse } from '@/shared/utils.js';
import { serializeError } from '@/utils/errorHandling.js';
import { PromptService, type PromptKind, type RenderedPrompt } from './prompt.js';
import {
  CONTENT_SEGMENTS,
  getAudience,
  listSegmentSummaries,
  type AudienceProfile,
  type ContentSegment,
  type SegmentSummary,
} from './segments.js';
import {
  findTool,
  listToolCategories,
  searchTools,
  type Tool,
  type ToolCategory,
  type ToolMatch,
} from './tools.js';

export const CALENDAR_MAX_TOKENS = 4000;
export const SCRIPT_MAX_TOKENS = 2500;
export const GENERATION_TEMPERATURE = 0.7;
export const ESTIMATED_TOKENS_PER_DAY = 500;
export const TOOL_COMPARISON_MAX_TOKENS = 3000;
export const TOOL_TUTORIAL_MAX_TOKENS = 3500;
export const TOOL_NEWS_MAX_TOKENS = 2000;
export const TOOL_GUIDE_TEMPERATURE = 0.3;

export const GenerateCalendarSchema = z.object({
  segment: z.enum(CONTENT_SEGMENTS),
  audience: z.string().trim().min(1),
  topic: z.string().trim().default(''),
  days: z.number().int().min(1).max(30).default(7),
  model: z.string().trim().min(1).optional(),
});

export const GenerateScriptsSchema = z.object({
  segment: z.enum(CONTENT_SEGMENTS),
  audience: z.string().trim().min(1),
  ideas: z.array(z.string().trim().min(1)).min(1).max(10),
  model: z.string().trim().min(1).optional(),
});

export const EstimateCostSchema = z.object({
  model: z.string().trim().min(1),
  days: z.number().int().min(1).max(30),
});

export const CompareToolsSchema = z.object({
  tools: z.array(z.string().trim().min(1)).min(1).max(10),
  aspect: z.string().trim().min(1),
  model: z.string().trim().min(1).optional(),
});

export const ToolTutorialSchema = z.object({
  tool: z.string().trim().min(1),
  useCase: z.string().trim().min(1),
  audience: z.string().trim().min(1),
  model: z.string().trim().min(1).optional(),
});

export const ToolNewsSchema = z.object({
  model: z.string().trim().min(1).optional(),
});

export type GenerateCalendarInput = z.input<typeof GenerateCalendarSchema>;
export type GenerateScriptsInput = z.input<typeof GenerateScriptsSchema>;
export type CompareToolsInput = z.input<typeof CompareToolsSchema>;
export type ToolTutorialInput = z.input<typeof ToolTutorialSchema>;
export type ToolNewsInput = z.input<typeof ToolNewsSchema>;

export interface PromptContext {
  kind: Exclude<PromptKind, 'tools'>;
  audience: string;
  profile: AudienceProfile;
  variables: Record<string, unknown>;
}

export type PromptBuilder = (context: PromptContext) => Promise<RenderedPrompt>;

function templateBuilder(segment: ContentSegment, extra: Record<string, unknown> = {}): PromptBuilder {
  return async ({ kind, audience, profile, variables }) => {
    const template = await PromptService.loadPrompt(kind, segment);
    return PromptService.renderPrompt(template, {
      audience,
      audienceDescription: profile.description,
      focusAreas: profile.focusAreas,
      riskLevel: profile.riskLevel,
      ...extra,
      ...variables,
    });
  };
}

export const PROMPT_BUILDERS: Record<ContentSegment, PromptBuilder> = {
  'ai-education': templateBuilder('ai-education'),
  'finance-education': templateBuilder('finance-education'),
  motivational: templateBuilder('motivational'),
  'ai-tool-discovery': templateBuilder('ai-tool-discovery'),
};

interface GenerationMeta {
  model: string;
  provider: TextProvider;
  requestedModel: string;
  fallbackUsed: boolean;
  warnings: string[];
}

export interface CalendarResult extends GenerationMeta {
  segment: ContentSegment;
  audience: string;
  days: number;
  calendar: Record<string, unknown>;
}

export interface VideoScript {
  idea: string;
  script: string;
  segment: ContentSegment;
  audience: string;
  model: string;
}

export interface ScriptsResult {
  scripts: VideoScript[];
  failed: Array<{ idea: string; error: string }>;
  warnings: string[];
}

export interface CostEstimate {
  model: string;
  days: number;
  estimatedTokens: number;
  costPer1kTokens: number;
  estimatedCost: number;
}

export interface ToolComparisonResult extends GenerationMeta {
  aspect: string;
  tools: string[];
  /** Requested names missing from the catalog; they are left out of the prompt. */
  unknownTools: string[];
  content: string;
}

export interface ToolTutorialResult extends GenerationMeta {
  tool: string;
  category: string;
  useCase: string;
  audience: string;
  content: string;
}

export interface ToolNewsResult extends GenerationMeta {
  date: string;
  content: string;
}

export interface ContentGenerationServiceDeps {
  gateway: AIGateway;
  builders?: Record<ContentSegment, PromptBuilder>;
  now?: () => Date;
}

const newsDateFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: '2-digit',
  year: 'numeric',
  timeZone: 'UTC',
});

function toolDetails(match: ToolMatch): Tool {
  return {
    name: match.name,
    description: match.description,
    features: match.features,
    pricing: match.pricing,
    bestFor: match.bestFor,
    website: match.website,
    releaseDate: match.releaseDate,
  };
}

function generationMeta(completion: TextCompletion): GenerationMeta {
  return {
    model: completion.model,
    provider: completion.provider,
    requestedModel: completion.requestedModel,
    fallbackUsed: completion.fallbackUsed,
    warnings: fallbackWarning(completion),
  };
}

function fallbackWarning(completion: TextCompletion): string[] {
  return completion.fallbackUsed
    ? [`Model ${completion.requestedModel} is unavailable; used ${completion.model} instead`]
    : [];
}

export class ContentGenerationService {
  private readonly gateway: AIGateway;
  private readonly builders: Record<ContentSegment, PromptBuilder>;
  private readonly now: () => Date;

  constructor(deps: ContentGenerationServiceDeps) {
    this.gateway = deps.gateway;
    this.builders = deps.builders ?? PROMPT_BUILDERS;
    this.now = deps.now ?? (() => new Date());
  }

  listModels(): ModelInfo[] {
    return this.gateway.getAvailableModels();
  }

  listSegments(): SegmentSummary[] {
    return listSegmentSummaries();
  }

  listToolCategories(): ToolCategory[] {
    return listToolCategories();
  }

  searchTools(query: string, category?: string): ToolMatch[] {
    return searchTools(query, category);
  }

  /** Rough cost: 500 tokens per day at the model's rate (0.002 per 1K for unknown models). */
  estimateCalendarCost(model: string, days: number): Result<CostEstimate> {
    const parsed = EstimateCostSchema.safeParse({ model, days });
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const estimatedTokens = ESTIMATED_TOKENS_PER_DAY * parsed.data.days;
    const rate = costPer1kTokens(parsed.data.model);
    return ok({
      model: parsed.data.model,
      days: parsed.data.days,
      estimatedTokens,
      costPer1kTokens: rate,
      estimatedCost: (estimatedTokens / 1000) * rate,
    });
  }

  /**
   * Generate a multi-platform content calendar. A reply that is not a JSON
   * object is kept as raw text under `day_1`.
   */
  async generateCalendar(input: GenerateCalendarInput): Promise<Result<CalendarResult>> {
    const parsed = GenerateCalendarSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { segment, audience, topic, days } = parsed.data;
    const requestedModel = parsed.data.model ?? this.gateway.getDefaultModel();
    const profile = getAudience(segment, audience);
    if (!profile) {
      return fail(validationError(`Unknown audience "${audience}" for segment ${segment}`));
    }

    const completed = await this.run(requestedModel, async () => {
      const prompt = await this.builders[segment]({
        kind: 'calendar',
        audience,
        profile,
        variables: { topic, days },
      });
      return this.gateway.complete(prompt.userPrompt, {
        model: requestedModel,
        maxTokens: CALENDAR_MAX_TOKENS,
        temperature: GENERATION_TEMPERATURE,
        ...(prompt.systemPrompt ? { systemPrompt: prompt.systemPrompt } : {}),
      });
    });
    if (!completed.success) {
      return completed;
    }

    const completion = completed.data;
    const warnings = fallbackWarning(completion);
    let calendar: Record<string, unknown>;

    try {
      const reply = parseAIResponse(completion.text);
      if (!isPlainObject(reply)) {
        throw new SyntaxError('Reply is not a JSON object');
      }
      calendar = reply;
    } catch {
      warnings.push('Received text instead of JSON; the raw reply is stored under day_1');
      logger.warn('Calendar reply was not a JSON object', {
        segment,
        model: completion.model,
        replyLength: completion.text.length,
      });
      calendar = { day_1: { content: completion.text } };
    }

    logger.info('Content calendar generated', {
      segment,
      audience,
      days,
      model: completion.model,
      fallbackUsed: completion.fallbackUsed,
    });

    return ok({
      segment,
      audience,
      days,
      calendar,
      model: completion.model,
      provider: completion.provider,
      requestedModel: completion.requestedModel,
      fallbackUsed: completion.fallbackUsed,
      warnings,
    });
  }

  /**
   * One generation call per idea. Ideas whose call fails are reported in
   * `failed`; the others are still returned.
   */
  async generateVideoScripts(input: GenerateScriptsInput): Promise<Result<ScriptsResult>> {
    const parsed = GenerateScriptsSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { segment, audience, ideas } = parsed.data;
    const requestedModel = parsed.data.model ?? this.gateway.getDefaultModel();
    const profile = getAudience(segment, audience);
    if (!profile) {
      return fail(validationError(`Unknown audience "${audience}" for segment ${segment}`));
    }
    if (this.gateway.getAvailableProviders().length === 0) {
      return fail(noModelAvailableError(requestedModel));
    }

    const result: ScriptsResult = { scripts: [], failed: [], warnings: [] };

    for (const idea of ideas) {
      const completed = await this.run(requestedModel, async () => {
        const prompt = await this.builders[segment]({
          kind: 'video-script',
          audience,
          profile,
          variables: { idea },
        });
        return this.gateway.complete(prompt.userPrompt, {
          model: requestedModel,
          maxTokens: SCRIPT_MAX_TOKENS,
          temperature: GENERATION_TEMPERATURE,
          ...(prompt.systemPrompt ? { systemPrompt: prompt.systemPrompt } : {}),
        });
      });

      if (!completed.success) {
        if (completed.error.type === 'NO_MODEL_AVAILABLE') {
          return completed;
        }
        result.failed.push({ idea, error: completed.error.message });
        continue;
      }

      for (const warning of fallbackWarning(completed.data)) {
        if (!result.warnings.includes(warning)) result.warnings.push(warning);
      }
      result.scripts.push({
        idea,
        script: completed.data.text,
        segment,
        audience,
        model: completed.data.model,
      });
    }

    return ok(result);
  }

  /**
   * Compare catalog tools on one aspect. Unknown names are skipped and
   * reported; a request naming no known tool is rejected.
   */
  async generateToolComparison(input: CompareToolsInput): Promise<Result<ToolComparisonResult>> {
    const parsed = CompareToolsSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { aspect } = parsed.data;
    const known: ToolMatch[] = [];
    const unknownTools: string[] = [];
    for (const name of parsed.data.tools) {
      const match = findTool(name);
      if (match) {
        known.push(match);
      } else {
        unknownTools.push(name);
      }
    }
    if (known.length === 0) {
      return fail(validationError('No tools found for comparison'));
    }

    const requestedModel = parsed.data.model ?? this.gateway.getDefaultModel();
    const completed = await this.completeToolPrompt(
      'comparison',
      requestedModel,
      { aspect, toolDetails: JSON.stringify(known.map(toolDetails), null, 2) },
      TOOL_COMPARISON_MAX_TOKENS,
      TOOL_GUIDE_TEMPERATURE,
    );
    if (!completed.success) {
      return completed;
    }

    logger.info('Tool comparison generated', {
      tools: known.length,
      unknownTools: unknownTools.length,
      model: completed.data.model,
    });

    return ok({
      aspect,
      tools: known.map((tool) => tool.name),
      unknownTools,
      content: completed.data.text,
      ...generationMeta(completed.data),
    });
  }

  async generateToolTutorial(input: ToolTutorialInput): Promise<Result<ToolTutorialResult>> {
    const parsed = ToolTutorialSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { tool, useCase, audience } = parsed.data;
    const match = findTool(tool);
    if (!match) {
      return fail(notFoundError('Tool', tool));
    }

    const requestedModel = parsed.data.model ?? this.gateway.getDefaultModel();
    const completed = await this.completeToolPrompt(
      'tutorial',
      requestedModel,
      { tool, useCase, audience, toolDetails: JSON.stringify(toolDetails(match), null, 2) },
      TOOL_TUTORIAL_MAX_TOKENS,
      TOOL_GUIDE_TEMPERATURE,
    );
    if (!completed.success) {
      return completed;
    }

    return ok({
      tool,
      category: match.category,
      useCase,
      audience,
      content: completed.data.text,
      ...generationMeta(completed.data),
    });
  }

  /** Newsletter-style AI tool update dated with the current UTC day. */
  async generateToolNews(input: ToolNewsInput = {}): Promise<Result<ToolNewsResult>> {
    const parsed = ToolNewsSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const date = newsDateFormat.format(this.now());
    const requestedModel = parsed.data.model ?? this.gateway.getDefaultModel();
    const completed = await this.completeToolPrompt(
      'news',
      requestedModel,
      { date },
      TOOL_NEWS_MAX_TOKENS,
      GENERATION_TEMPERATURE,
    );
    if (!completed.success) {
      return completed;
    }

    return ok({ date, content: completed.data.text, ...generationMeta(completed.data) });
  }

  private completeToolPrompt(
    promptName: 'comparison' | 'tutorial' | 'news',
    requestedModel: string,
    variables: Record<string, unknown>,
    maxTokens: number,
    temperature: number,
  ): Promise<Result<TextCompletion, ServiceError>> {
    return this.run(requestedModel, async () => {
      const template = await PromptService.loadPrompt('tools', promptName);
      const prompt = PromptService.renderPrompt(template, variables);
      return this.gateway.complete(prompt.userPrompt, {
        model: requestedModel,
        maxTokens,
        temperature,
        ...(prompt.systemPrompt ? { systemPrompt: prompt.systemPrompt } : {}),
      });
    });
  }

  private async run(
    requestedModel: string,
    call: () => Promise<TextCompletion>,
  ): Promise<Result<TextCompletion, ServiceError>> {
    try {
      return ok(await call());
    } catch (error) {
      if (error instanceof NoModelAvailableError) {
        logger.error('No AI models available', { requestedModel });
        return fail(noModelAvailableError(requestedModel));
      }
      logger.error('Content generation failed', {
        requestedModel,
        error: serializeError(error),
      });
      return fail(generationFailedError(requestedModel, error));
    }
  }
}
