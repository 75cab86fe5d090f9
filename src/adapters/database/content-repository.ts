import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from '@/db/connection.js';
import {
  contentAnalytics,
  contentPipeline,
  contentProjects,
  contentTasks,
} from '@/db/schema/index.js';
import type {
  AnalyticsFilter,
  ContentProjectFilter,
  ContentTaskFilter,
  IAnalyticsRepository,
  IContentProjectRepository,
  IContentTaskRepository,
  IDashboardSummarySource,
  IPipelineRepository,
  ListOrder,
  PipelineFilter,
} from '@/shared/interfaces.js';
import { ok, type Result } from '@/shared/result.js';
import type {
  AnalyticsRecord,
  ContentProject,
  ContentProjectPatch,
  ContentTask,
  ContentTaskPatch,
  DashboardSummary,
  NewAnalyticsRecord,
  NewContentProject,
  NewContentTask,
  NewPipelineItem,
  PipelineItem,
  PipelineItemPatch,
} from '@/shared/types.js';
import { firstRow, firstRowOrNull, storeCall } from './store-call.js';

// -----------------------------------------------------------------------------
// Content Projects
// -----------------------------------------------------------------------------

const PROJECT_ORDER_COLUMNS = {
  createdAt: contentProjects.createdAt,
  startDate: contentProjects.startDate,
};

export class DrizzleContentProjectRepository implements IContentProjectRepository {
  constructor(private readonly db: Database) {}

  list(
    filter: ContentProjectFilter,
    order: ListOrder<keyof typeof PROJECT_ORDER_COLUMNS> = { field: 'createdAt', direction: 'desc' },
  ): Promise<Result<ContentProject[]>> {
    const column = PROJECT_ORDER_COLUMNS[order.field];
    return storeCall('list', 'content_projects', async () =>
      this.db
        .select()
        .from(contentProjects)
        .where(eq(contentProjects.userId, filter.userId))
        .orderBy(order.direction === 'asc' ? asc(column) : desc(column)),
    );
  }

  findById(id: string): Promise<Result<ContentProject | null>> {
    return storeCall('findById', 'content_projects', async () =>
      firstRowOrNull(
        await this.db.select().from(contentProjects).where(eq(contentProjects.id, id)).limit(1),
      ),
    );
  }

  insert(record: NewContentProject): Promise<Result<ContentProject>> {
    return storeCall('insert', 'content_projects', async () =>
      firstRow(
        await this.db.insert(contentProjects).values(record).returning(),
        'insert',
        'content_projects',
      ),
    );
  }

  update(id: string, patch: ContentProjectPatch): Promise<Result<ContentProject | null>> {
    return storeCall('update', 'content_projects', async () =>
      firstRowOrNull(
        await this.db
          .update(contentProjects)
          .set(patch)
          .where(eq(contentProjects.id, id))
          .returning(),
      ),
    );
  }

  delete(id: string): Promise<Result<boolean>> {
    return storeCall('delete', 'content_projects', async () => {
      const deleted = await this.db
        .delete(contentProjects)
        .where(eq(contentProjects.id, id))
        .returning({ id: contentProjects.id });
      return deleted.length > 0;
    });
  }
}

// -----------------------------------------------------------------------------
// Content Pipeline
// -----------------------------------------------------------------------------

const PIPELINE_ORDER_COLUMNS = {
  createdAt: contentPipeline.createdAt,
  scheduledPublishDate: contentPipeline.scheduledPublishDate,
};

export class DrizzlePipelineRepository implements IPipelineRepository {
  constructor(private readonly db: Database) {}

  list(
    filter: PipelineFilter,
    order: ListOrder<keyof typeof PIPELINE_ORDER_COLUMNS> = { field: 'createdAt', direction: 'desc' },
  ): Promise<Result<PipelineItem[]>> {
    const column = PIPELINE_ORDER_COLUMNS[order.field];
    return storeCall('list', 'content_pipeline', async () =>
      this.db
        .select()
        .from(contentPipeline)
        .where(
          and(
            eq(contentPipeline.userId, filter.userId),
            filter.stage ? eq(contentPipeline.workflowStage, filter.stage) : undefined,
          ),
        )
        .orderBy(order.direction === 'asc' ? asc(column) : desc(column)),
    );
  }

  findById(id: string): Promise<Result<PipelineItem | null>> {
    return storeCall('findById', 'content_pipeline', async () =>
      firstRowOrNull(
        await this.db.select().from(contentPipeline).where(eq(contentPipeline.id, id)).limit(1),
      ),
    );
  }

  insert(record: NewPipelineItem): Promise<Result<PipelineItem>> {
    return storeCall('insert', 'content_pipeline', async () =>
      firstRow(
        await this.db.insert(contentPipeline).values(record).returning(),
        'insert',
        'content_pipeline',
      ),
    );
  }

  update(id: string, patch: PipelineItemPatch): Promise<Result<PipelineItem | null>> {
    return storeCall('update', 'content_pipeline', async () =>
      firstRowOrNull(
        await this.db
          .update(contentPipeline)
          .set({ ...patch, updatedAt: new Date().toISOString() })
          .where(eq(contentPipeline.id, id))
          .returning(),
      ),
    );
  }

  delete(id: string): Promise<Result<boolean>> {
    return storeCall('delete', 'content_pipeline', async () => {
      const deleted = await this.db
        .delete(contentPipeline)
        .where(eq(contentPipeline.id, id))
        .returning({ id: contentPipeline.id });
      return deleted.length > 0;
    });
  }
}

// -----------------------------------------------------------------------------
// Content Tasks
// -----------------------------------------------------------------------------

const CONTENT_TASK_ORDER_COLUMNS = {
  dueDate: contentTasks.dueDate,
  createdAt: contentTasks.createdAt,
};

export class DrizzleContentTaskRepository implements IContentTaskRepository {
  constructor(private readonly db: Database) {}

  list(
    filter: ContentTaskFilter,
    order: ListOrder<keyof typeof CONTENT_TASK_ORDER_COLUMNS> = { field: 'dueDate', direction: 'asc' },
  ): Promise<Result<ContentTask[]>> {
    const column = CONTENT_TASK_ORDER_COLUMNS[order.field];
    return storeCall('list', 'content_tasks', async () =>
      this.db
        .select()
        .from(contentTasks)
        .where(
          and(
            eq(contentTasks.userId, filter.userId),
            filter.status ? eq(contentTasks.status, filter.status) : undefined,
            filter.contentPipelineId
              ? eq(contentTasks.contentPipelineId, filter.contentPipelineId)
              : undefined,
          ),
        )
        .orderBy(order.direction === 'desc' ? desc(column) : asc(column)),
    );
  }

  findById(id: string): Promise<Result<ContentTask | null>> {
    return storeCall('findById', 'content_tasks', async () =>
      firstRowOrNull(
        await this.db.select().from(contentTasks).where(eq(contentTasks.id, id)).limit(1),
      ),
    );
  }

  insert(record: NewContentTask): Promise<Result<ContentTask>> {
    return storeCall('insert', 'content_tasks', async () =>
      firstRow(
        await this.db.insert(contentTasks).values(record).returning(),
        'insert',
        'content_tasks',
      ),
    );
  }

  update(id: string, patch: ContentTaskPatch): Promise<Result<ContentTask | null>> {
    return storeCall('update', 'content_tasks', async () =>
      firstRowOrNull(
        await this.db.update(contentTasks).set(patch).where(eq(contentTasks.id, id)).returning(),
      ),
    );
  }

  delete(id: string): Promise<Result<boolean>> {
    return storeCall('delete', 'content_tasks', async () => {
      const deleted = await this.db
        .delete(contentTasks)
        .where(eq(contentTasks.id, id))
        .returning({ id: contentTasks.id });
      return deleted.length > 0;
    });
  }
}

// -----------------------------------------------------------------------------
// Content Analytics (append-only)
// -----------------------------------------------------------------------------

export class DrizzleAnalyticsRepository implements IAnalyticsRepository {
  constructor(private readonly db: Database) {}

  async list(filter: AnalyticsFilter): Promise<Result<AnalyticsRecord[]>> {
    if (filter.contentPipelineIds.length === 0) {
      return ok([]);
    }
    return storeCall('list', 'content_analytics', async () =>
      this.db
        .select()
        .from(contentAnalytics)
        .where(inArray(contentAnalytics.contentPipelineId, filter.contentPipelineIds))
        .orderBy(desc(contentAnalytics.recordedAt)),
    );
  }

  insert(record: NewAnalyticsRecord): Promise<Result<AnalyticsRecord>> {
    return storeCall('insert', 'content_analytics', async () =>
      firstRow(
        await this.db.insert(contentAnalytics).values(record).returning(),
        'insert',
        'content_analytics',
      ),
    );
  }
}

// -----------------------------------------------------------------------------
// Dashboard summary procedure
// -----------------------------------------------------------------------------

const count = z.coerce.number().default(0);

export const dashboardSummaryRowSchema = z
  .object({
    total_projects: count,
    total_content_pieces: count,
    published_pieces: count,
    pending_tasks: count,
    total_views: count,
  })
  .transform(
    (row): DashboardSummary => ({
      totalProjects: row.total_projects,
      totalContentPieces: row.total_content_pieces,
      publishedPieces: row.published_pieces,
      pendingTasks: row.pending_tasks,
      totalViews: row.total_views,
    }),
  );

export const EMPTY_DASHBOARD_SUMMARY: DashboardSummary = {
  totalProjects: 0,
  totalContentPieces: 0,
  publishedPieces: 0,
  pendingTasks: 0,
  totalViews: 0,
};

export class DrizzleDashboardSummarySource implements IDashboardSummarySource {
  constructor(private readonly db: Database) {}

  fetchDashboardSummary(userId: string): Promise<Result<DashboardSummary>> {
    return storeCall('fetchDashboardSummary', 'get_user_dashboard_summary', async () => {
      const result = await this.db.execute(
        sql`select * from get_user_dashboard_summary(${userId})`,
      );
      const [row] = result.rows;
      return row ? dashboardSummaryRowSchema.parse(row) : { ...EMPTY_DASHBOARD_SUMMARY };
    });
  }
}
