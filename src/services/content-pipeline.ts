/**
 * Content Pipeline Service
 * Moves content pieces through the production stages, tracks their tasks and
 * records publication and performance data.
 */

import { z } from 'zod';
import { logger } from '@/config/logger.js';
import {
  invalidTransitionError,
  notFoundError,
  validationError,
} from '@/shared/errors.js';
import { isEntityId } from '@/shared/ids.js';
import type {
  IAnalyticsRepository,
  IContentProjectRepository,
  IContentTaskRepository,
  IDashboardSummarySource,
  IPipelineRepository,
} from '@/shared/interfaces.js';
import { fail, ok, type Result } from '@/shared/result.js';
import {
  CONTENT_TASK_STATUSES,
  PIPELINE_STAGES,
  TASK_PRIORITIES,
  type AnalyticsRecord,
  type ContentProject,
  type ContentTask,
  type ContentTaskPatch,
  type DashboardSummary,
  type PipelineItem,
  type PipelineItemPatch,
  type PipelineItemWithAnalytics,
  type PipelineStage,
} from '@/shared/types.js';
import { normalizeHashtags } from '@/shared/utils.js';
import { TERMINAL_STAGE, emptyStageCounts, nextStage } from '@/workflows/stages.js';
import { computePerformanceSummary, type PerformanceSummary } from './metrics.js';

const isoDateTime = z.string().datetime({ offset: true });
const counter = z.number().int().nonnegative().default(0);

export const CreateProjectSchema = z.object({
  userId: z.string().uuid(),
  name: z.string().trim().min(1, 'Project name is required'),
  description: z.string().default(''),
  contentSegment: z.string().trim().min(1),
  targetAudience: z.string().trim().min(1),
  startDate: z.string().date().nullish(),
  endDate: z.string().date().nullish(),
  targetPlatforms: z.array(z.string().trim().min(1)).default([]),
  totalContentPieces: z.number().int().nonnegative().default(0),
});

export const AddContentSchema = z.object({
  userId: z.string().uuid(),
  projectId: z.string().uuid().nullish(),
  title: z.string().trim().min(1, 'Title is required'),
  contentType: z.string().trim().min(1),
  platform: z.string().trim().min(1),
  contentData: z.record(z.unknown()).default({}),
  scheduledPublishDate: isoDateTime.nullish(),
  hashtags: z.array(z.string()).default([]),
  callToAction: z.string().default(''),
});

export const PublicationSchema = z.object({
  publishDate: isoDateTime.nullish(),
  postId: z.string().min(1).nullish(),
  url: z.string().url().nullish(),
});

export const PerformanceMetricsSchema = z.object({
  views: counter,
  likes: counter,
  comments: counter,
  shares: counter,
  clicks: counter,
  impressions: counter,
  engagementRate: z.number().nonnegative().nullish(),
  revenue: z.number().nonnegative().default(0),
});

export const CreateTaskSchema = z.object({
  userId: z.string().uuid(),
  contentPipelineId: z.string().uuid(),
  title: z.string().trim().min(1, 'Title is required'),
  description: z.string().default(''),
  taskType: z.string().trim().min(1),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  dueDate: isoDateTime.nullish(),
  estimatedHours: z.number().positive().nullish(),
  assignedTo: z.string().uuid().nullish(),
});

const StageFilterSchema = z.enum(PIPELINE_STAGES).optional();
const TaskStatusFilterSchema = z.enum(CONTENT_TASK_STATUSES).optional();
const ActualHoursSchema = z.number().nonnegative().optional();

export type CreateProjectInput = z.input<typeof CreateProjectSchema>;
export type AddContentInput = z.input<typeof AddContentSchema>;
export type PublicationInput = z.input<typeof PublicationSchema>;
export type PerformanceMetricsInput = z.input<typeof PerformanceMetricsSchema>;
export type CreateTaskInput = z.input<typeof CreateTaskSchema>;

export interface StageAdvance {
  stage: PipelineStage;
  previousStage: PipelineStage;
  /** False when the item was already at the terminal stage and nothing was written. */
  advanced: boolean;
  item: PipelineItem;
}

export interface ContentPipelineServiceDeps {
  projects: IContentProjectRepository;
  pipeline: IPipelineRepository;
  contentTasks: IContentTaskRepository;
  analytics: IAnalyticsRepository;
  dashboard: IDashboardSummarySource;
  now?: () => Date;
}

export class ContentPipelineService {
  private readonly deps: ContentPipelineServiceDeps;
  private readonly now: () => Date;

  constructor(deps: ContentPipelineServiceDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  async createProject(input: CreateProjectInput): Promise<Result<ContentProject>> {
    const parsed = CreateProjectSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { startDate, endDate, ...rest } = parsed.data;
    return this.deps.projects.insert({
      ...rest,
      startDate: startDate ?? null,
      endDate: endDate ?? null,
    });
  }

  listProjects(userId: string): Promise<Result<ContentProject[]>> {
    return this.deps.projects.list({ userId }, { field: 'createdAt', direction: 'desc' });
  }

  // ---------------------------------------------------------------------------
  // Pipeline items
  // ---------------------------------------------------------------------------

  /** New content always enters the pipeline at `idea`. */
  async addContent(input: AddContentInput): Promise<Result<PipelineItem>> {
    const parsed = AddContentSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { projectId, scheduledPublishDate, hashtags, ...rest } = parsed.data;
    const inserted = await this.deps.pipeline.insert({
      ...rest,
      projectId: projectId ?? null,
      scheduledPublishDate: scheduledPublishDate ?? null,
      hashtags: normalizeHashtags(hashtags),
      workflowStage: 'idea',
    });

    if (inserted.success) {
      logger.info('Content added to pipeline', {
        contentId: inserted.data.id,
        userId: rest.userId,
        platform: rest.platform,
      });
    }
    return inserted;
  }

  /** Newest items first, each with its analytics history (newest record first). */
  async getPipeline(
    userId: string,
    stage?: string,
  ): Promise<Result<PipelineItemWithAnalytics[]>> {
    const parsedStage = StageFilterSchema.safeParse(stage);
    if (!parsedStage.success) {
      return fail(validationError(parsedStage.error));
    }

    const listed = await this.deps.pipeline.list(
      { userId, stage: parsedStage.data },
      { field: 'createdAt', direction: 'desc' },
    );
    if (!listed.success) {
      return listed;
    }

    const analytics = await this.deps.analytics.list({
      contentPipelineIds: listed.data.map((item) => item.id),
    });
    if (!analytics.success) {
      return analytics;
    }

    const byItem = new Map<string, AnalyticsRecord[]>();
    for (const record of analytics.data) {
      const records = byItem.get(record.contentPipelineId) ?? [];
      records.push(record);
      byItem.set(record.contentPipelineId, records);
    }

    return ok(
      listed.data.map((item) => ({
        ...item,
        analytics: (byItem.get(item.id) ?? []).sort(
          (a, b) => Date.parse(b.recordedAt) - Date.parse(a.recordedAt),
        ),
      })),
    );
  }

  /** Calendar view: items with a scheduled publish date, soonest first. */
  async getScheduledContent(userId: string): Promise<Result<PipelineItem[]>> {
    const listed = await this.deps.pipeline.list(
      { userId },
      { field: 'scheduledPublishDate', direction: 'asc' },
    );
    if (!listed.success) {
      return listed;
    }

    const scheduled = listed.data.filter(
      (item): item is PipelineItem & { scheduledPublishDate: string } =>
        item.scheduledPublishDate !== null,
    );
    scheduled.sort(
      (a, b) => Date.parse(a.scheduledPublishDate) - Date.parse(b.scheduledPublishDate),
    );
    return ok(scheduled);
  }

  async getStageCounts(userId: string): Promise<Result<Record<PipelineStage, number>>> {
    const listed = await this.deps.pipeline.list({ userId });
    if (!listed.success) {
      return listed;
    }

    const counts = emptyStageCounts();
    for (const item of listed.data) {
      counts[item.workflowStage] += 1;
    }
    return ok(counts);
  }

  /**
   * Move an item one stage forward. At the terminal stage this is a no-op:
   * nothing is written and `advanced` is false.
   */
  async advanceStage(userId: string, contentId: string): Promise<Result<StageAdvance>> {
    const found = await this.findItem(userId, contentId);
    if (!found.success) {
      return found;
    }

    const item = found.data;
    const previousStage = item.workflowStage;
    const stage = nextStage(previousStage);

    if (!stage) {
      logger.debug('Content already at terminal stage', { contentId, stage: previousStage });
      return ok({ stage: previousStage, previousStage, advanced: false, item });
    }

    const patch: PipelineItemPatch = { workflowStage: stage };
    if (stage === 'published') {
      patch.actualPublishDate = this.now().toISOString();
    }

    const updated = await this.deps.pipeline.update(contentId, patch);
    if (!updated.success) {
      return updated;
    }
    if (!updated.data) {
      return fail(notFoundError('Content', contentId));
    }

    logger.info('Content stage advanced', { contentId, from: previousStage, to: stage });
    return ok({ stage, previousStage, advanced: true, item: updated.data });
  }

  async recordPublication(
    userId: string,
    contentId: string,
    publication: PublicationInput,
  ): Promise<Result<PipelineItem>> {
    const parsed = PublicationSchema.safeParse(publication);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const found = await this.findItem(userId, contentId);
    if (!found.success) {
      return found;
    }
    if (found.data.workflowStage === TERMINAL_STAGE) {
      return fail(invalidTransitionError('Content', TERMINAL_STAGE, 'published'));
    }

    const updated = await this.deps.pipeline.update(contentId, {
      workflowStage: 'published',
      actualPublishDate: parsed.data.publishDate ?? this.now().toISOString(),
      platformPostId: parsed.data.postId ?? null,
      platformUrl: parsed.data.url ?? null,
    });
    if (!updated.success) {
      return updated;
    }
    if (!updated.data) {
      return fail(notFoundError('Content', contentId));
    }
    return ok(updated.data);
  }

  /** Appends a new analytics snapshot; earlier snapshots are kept. */
  async recordPerformance(
    userId: string,
    contentId: string,
    metrics: PerformanceMetricsInput,
  ): Promise<Result<AnalyticsRecord>> {
    const parsed = PerformanceMetricsSchema.safeParse(metrics);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const found = await this.findItem(userId, contentId);
    if (!found.success) {
      return found;
    }

    return this.deps.analytics.insert({
      ...parsed.data,
      contentPipelineId: contentId,
      engagementRate: parsed.data.engagementRate ?? null,
    });
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  async createTask(input: CreateTaskInput): Promise<Result<ContentTask>> {
    const parsed = CreateTaskSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const found = await this.findItem(parsed.data.userId, parsed.data.contentPipelineId);
    if (!found.success) {
      return found;
    }

    const { dueDate, estimatedHours, assignedTo, ...rest } = parsed.data;
    return this.deps.contentTasks.insert({
      ...rest,
      dueDate: dueDate ?? null,
      estimatedHours: estimatedHours ?? null,
      assignedTo: assignedTo ?? rest.userId,
    });
  }

  async listTasks(userId: string, status?: string): Promise<Result<ContentTask[]>> {
    const parsedStatus = TaskStatusFilterSchema.safeParse(status);
    if (!parsedStatus.success) {
      return fail(validationError(parsedStatus.error));
    }
    return this.deps.contentTasks.list(
      { userId, status: parsedStatus.data },
      { field: 'dueDate', direction: 'asc' },
    );
  }

  async startTask(userId: string, taskId: string): Promise<Result<ContentTask>> {
    const found = await this.findTask(userId, taskId);
    if (!found.success) {
      return found;
    }
    if (found.data.status !== 'todo') {
      return fail(invalidTransitionError('Task', found.data.status, 'in_progress'));
    }

    return this.updateTask(taskId, { status: 'in_progress' });
  }

  async completeTask(
    userId: string,
    taskId: string,
    actualHours?: number,
  ): Promise<Result<ContentTask>> {
    const parsedHours = ActualHoursSchema.safeParse(actualHours);
    if (!parsedHours.success) {
      return fail(validationError(parsedHours.error));
    }

    const found = await this.findTask(userId, taskId);
    if (!found.success) {
      return found;
    }

    return this.updateTask(taskId, {
      status: 'completed',
      completedAt: this.now().toISOString(),
      ...(parsedHours.data !== undefined ? { actualHours: parsedHours.data } : {}),
    });
  }

  // ---------------------------------------------------------------------------
  // Summaries
  // ---------------------------------------------------------------------------

  getDashboardSummary(userId: string): Promise<Result<DashboardSummary>> {
    return this.deps.dashboard.fetchDashboardSummary(userId);
  }

  async getPerformanceSummary(userId: string): Promise<Result<PerformanceSummary>> {
    const pipeline = await this.getPipeline(userId);
    if (!pipeline.success) {
      return pipeline;
    }
    return ok(computePerformanceSummary(pipeline.data));
  }

  /** Items and tasks of another user are reported exactly like missing ones. */
  private async findItem(userId: string, contentId: string): Promise<Result<PipelineItem>> {
    if (!isEntityId(contentId)) {
      return fail(notFoundError('Content', contentId));
    }

    const found = await this.deps.pipeline.findById(contentId);
    if (!found.success) {
      return found;
    }
    if (!found.data || found.data.userId !== userId) {
      return fail(notFoundError('Content', contentId));
    }
    return ok(found.data);
  }

  private async findTask(userId: string, taskId: string): Promise<Result<ContentTask>> {
    if (!isEntityId(taskId)) {
      return fail(notFoundError('Task', taskId));
    }

    const found = await this.deps.contentTasks.findById(taskId);
    if (!found.success) {
      return found;
    }
    if (!found.data || found.data.userId !== userId) {
      return fail(notFoundError('Task', taskId));
    }
    return ok(found.data);
  }

  private async updateTask(
    taskId: string,
    patch: ContentTaskPatch,
  ): Promise<Result<ContentTask>> {
    const updated = await this.deps.contentTasks.update(taskId, patch);
    if (!updated.success) {
      return updated;
    }
    if (!updated.data) {
      return fail(notFoundError('Task', taskId));
    }
    return ok(updated.data);
  }
}
