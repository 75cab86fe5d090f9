// -----------------------------------------------------------------------------
// Database Adapters - Drizzle implementations of the store contracts
// These can be swapped with in-memory implementations for testing
// -----------------------------------------------------------------------------

import { and, asc, desc, eq } from 'drizzle-orm';
import type { Database } from '@/db/connection.js';
import { workflows, workflowTasks } from '@/db/schema/index.js';
import type {
  IWorkflowRepository,
  IWorkflowTaskRepository,
  ListOrder,
  WorkflowFilter,
  WorkflowTaskFilter,
} from '@/shared/interfaces.js';
import type { Result } from '@/shared/result.js';
import type {
  NewWorkflow,
  NewWorkflowTask,
  Workflow,
  WorkflowPatch,
  WorkflowTask,
  WorkflowTaskPatch,
} from '@/shared/types.js';
import { firstRow, firstRowOrNull, storeCall } from './store-call.js';

const WORKFLOW_ORDER_COLUMNS = {
  createdAt: workflows.createdAt,
  targetDate: workflows.targetDate,
  title: workflows.title,
};

export class DrizzleWorkflowRepository implements IWorkflowRepository {
  constructor(private readonly db: Database) {}

  list(
    filter: WorkflowFilter,
    order: ListOrder<keyof typeof WORKFLOW_ORDER_COLUMNS> = { field: 'createdAt', direction: 'desc' },
  ): Promise<Result<Workflow[]>> {
    const column = WORKFLOW_ORDER_COLUMNS[order.field];
    return storeCall('list', 'workflows', async () =>
      this.db
        .select()
        .from(workflows)
        .where(
          and(
            eq(workflows.userId, filter.userId),
            filter.status ? eq(workflows.status, filter.status) : undefined,
          ),
        )
        .orderBy(order.direction === 'asc' ? asc(column) : desc(column)),
    );
  }

  findById(id: string): Promise<Result<Workflow | null>> {
    return storeCall('findById', 'workflows', async () =>
      firstRowOrNull(await this.db.select().from(workflows).where(eq(workflows.id, id)).limit(1)),
    );
  }

  insert(record: NewWorkflow): Promise<Result<Workflow>> {
    return storeCall('insert', 'workflows', async () =>
      firstRow(await this.db.insert(workflows).values(record).returning(), 'insert', 'workflows'),
    );
  }

  update(id: string, patch: WorkflowPatch): Promise<Result<Workflow | null>> {
    return storeCall('update', 'workflows', async () =>
      firstRowOrNull(
        await this.db
          .update(workflows)
          .set({ ...patch, updatedAt: new Date().toISOString() })
          .where(eq(workflows.id, id))
          .returning(),
      ),
    );
  }

  delete(id: string): Promise<Result<boolean>> {
    return storeCall('delete', 'workflows', async () => {
      const deleted = await this.db
        .delete(workflows)
        .where(eq(workflows.id, id))
        .returning({ id: workflows.id });
      return deleted.length > 0;
    });
  }
}

const TASK_ORDER_COLUMNS = {
  orderIndex: workflowTasks.orderIndex,
  createdAt: workflowTasks.createdAt,
};

export class DrizzleWorkflowTaskRepository implements IWorkflowTaskRepository {
  constructor(private readonly db: Database) {}

  list(
    filter: WorkflowTaskFilter,
    order: ListOrder<keyof typeof TASK_ORDER_COLUMNS> = { field: 'orderIndex', direction: 'asc' },
  ): Promise<Result<WorkflowTask[]>> {
    const column = TASK_ORDER_COLUMNS[order.field];
    return storeCall('list', 'workflow_tasks', async () =>
      this.db
        .select()
        .from(workflowTasks)
        .where(eq(workflowTasks.workflowId, filter.workflowId))
        .orderBy(order.direction === 'desc' ? desc(column) : asc(column)),
    );
  }

  findById(id: string): Promise<Result<WorkflowTask | null>> {
    return storeCall('findById', 'workflow_tasks', async () =>
      firstRowOrNull(
        await this.db.select().from(workflowTasks).where(eq(workflowTasks.id, id)).limit(1),
      ),
    );
  }

  insert(record: NewWorkflowTask): Promise<Result<WorkflowTask>> {
    return storeCall('insert', 'workflow_tasks', async () =>
      firstRow(
        await this.db.insert(workflowTasks).values(record).returning(),
        'insert',
        'workflow_tasks',
      ),
    );
  }

  update(id: string, patch: WorkflowTaskPatch): Promise<Result<WorkflowTask | null>> {
    return storeCall('update', 'workflow_tasks', async () =>
      firstRowOrNull(
        await this.db.update(workflowTasks).set(patch).where(eq(workflowTasks.id, id)).returning(),
      ),
    );
  }

  delete(id: string): Promise<Result<boolean>> {
    return storeCall('delete', 'workflow_tasks', async () => {
      const deleted = await this.db
        .delete(workflowTasks)
        .where(eq(workflowTasks.id, id))
        .returning({ id: workflowTasks.id });
      return deleted.length > 0;
    });
  }
}
