import { sql } from "drizzle-orm";
import { pgTable, uuid, text, integer, timestamp, index, foreignKey } from "drizzle-orm/pg-core";
import { workflowStatusEnum, workflowTaskStatusEnum } from "./enums.js";

// -----------------------------------------------------------------------------
// Workflows Table
// -----------------------------------------------------------------------------

export const workflows = pgTable("workflows", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  userId: uuid("user_id").notNull(),
  title: text("title").notNull(),
  contentType: text("content_type").notNull(),
  platforms: text("platforms").array().notNull().default(sql`'{}'::text[]`),
  targetDate: timestamp("target_date", { withTimezone: true, mode: 'string' }),
  status: workflowStatusEnum("status").default('planned').notNull(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  index("workflows_user_id_idx").on(table.userId),
  index("workflows_status_idx").on(table.status),
]);

// -----------------------------------------------------------------------------
// Workflow Tasks Table
// -----------------------------------------------------------------------------

export const workflowTasks = pgTable("workflow_tasks", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  workflowId: uuid("workflow_id").notNull(),
  title: text("title").notNull(),
  orderIndex: integer("order_index").notNull(),
  status: workflowTaskStatusEnum("status").default('pending').notNull(),
  completedAt: timestamp("completed_at", { withTimezone: true, mode: 'string' }),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  // Deleting a workflow removes its checklist
  foreignKey({
    columns: [table.workflowId],
    foreignColumns: [workflows.id],
    name: "workflow_tasks_workflow_id_workflows_id_fk"
  }).onDelete("cascade"),
  index("workflow_tasks_workflow_id_idx").on(table.workflowId),
]);

export type InsertWorkflow = typeof workflows.$inferInsert;
export type SelectWorkflow = typeof workflows.$inferSelect;
export type InsertWorkflowTask = typeof workflowTasks.$inferInsert;
export type SelectWorkflowTask = typeof workflowTasks.$inferSelect;
