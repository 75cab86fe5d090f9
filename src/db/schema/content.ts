import { sql } from "drizzle-orm";
import {
  pgTable,
  uuid,
  text,
  integer,
  date,
  doublePrecision,
  jsonb,
  timestamp,
  index,
  foreignKey,
} from "drizzle-orm/pg-core";
import { contentTaskStatusEnum, pipelineStageEnum, taskPriorityEnum } from "./enums.js";

// -----------------------------------------------------------------------------
// Content Projects Table
// -----------------------------------------------------------------------------

export const contentProjects = pgTable("content_projects", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  userId: uuid("user_id").notNull(),
  name: text("name").notNull(),
  description: text("description").default('').notNull(),
  contentSegment: text("content_segment").notNull(),
  targetAudience: text("target_audience").notNull(),
  startDate: date("start_date", { mode: 'string' }),
  endDate: date("end_date", { mode: 'string' }),
  targetPlatforms: text("target_platforms").array().notNull().default(sql`'{}'::text[]`),
  totalContentPieces: integer("total_content_pieces").default(0).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  index("content_projects_user_id_idx").on(table.userId),
]);

// -----------------------------------------------------------------------------
// Content Pipeline Table
// -----------------------------------------------------------------------------

export const contentPipeline = pgTable("content_pipeline", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  userId: uuid("user_id").notNull(),
  projectId: uuid("project_id"),
  title: text("title").notNull(),
  contentType: text("content_type").notNull(),
  platform: text("platform").notNull(),
  workflowStage: pipelineStageEnum("workflow_stage").default('idea').notNull(),
  contentData: jsonb("content_data").$type<Record<string, unknown>>().default({}).notNull(),
  scheduledPublishDate: timestamp("scheduled_publish_date", { withTimezone: true, mode: 'string' }),
  actualPublishDate: timestamp("actual_publish_date", { withTimezone: true, mode: 'string' }),
  platformPostId: text("platform_post_id"),
  platformUrl: text("platform_url"),
  hashtags: text("hashtags").array().notNull().default(sql`'{}'::text[]`),
  callToAction: text("call_to_action").default('').notNull(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  foreignKey({
    columns: [table.projectId],
    foreignColumns: [contentProjects.id],
    name: "content_pipeline_project_id_content_projects_id_fk"
  }).onDelete("set null"),
  index("content_pipeline_user_id_idx").on(table.userId),
  index("content_pipeline_workflow_stage_idx").on(table.workflowStage),
]);

// -----------------------------------------------------------------------------
// Content Tasks Table
// -----------------------------------------------------------------------------

export const contentTasks = pgTable("content_tasks", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  userId: uuid("user_id").notNull(),
  contentPipelineId: uuid("content_pipeline_id").notNull(),
  title: text("title").notNull(),
  description: text("description").default('').notNull(),
  taskType: text("task_type").notNull(),
  priority: taskPriorityEnum("priority").default('medium').notNull(),
  status: contentTaskStatusEnum("status").default('todo').notNull(),
  dueDate: timestamp("due_date", { withTimezone: true, mode: 'string' }),
  estimatedHours: doublePrecision("estimated_hours"),
  actualHours: doublePrecision("actual_hours"),
  assignedTo: uuid("assigned_to"),
  completedAt: timestamp("completed_at", { withTimezone: true, mode: 'string' }),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  foreignKey({
    columns: [table.contentPipelineId],
    foreignColumns: [contentPipeline.id],
    name: "content_tasks_content_pipeline_id_content_pipeline_id_fk"
  }).onDelete("cascade"),
  index("content_tasks_user_id_idx").on(table.userId),
  index("content_tasks_status_idx").on(table.status),
]);

// -----------------------------------------------------------------------------
// Content Analytics Table (append-only)
// -----------------------------------------------------------------------------

export const contentAnalytics = pgTable("content_analytics", {
  id: uuid("id").defaultRandom().primaryKey().notNull(),
  contentPipelineId: uuid("content_pipeline_id").notNull(),
  views: integer("views").default(0).notNull(),
  likes: integer("likes").default(0).notNull(),
  comments: integer("comments").default(0).notNull(),
  shares: integer("shares").default(0).notNull(),
  clicks: integer("clicks").default(0).notNull(),
  impressions: integer("impressions").default(0).notNull(),
  engagementRate: doublePrecision("engagement_rate"),
  revenue: doublePrecision("revenue").default(0).notNull(),
  recordedAt: timestamp("recorded_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  foreignKey({
    columns: [table.contentPipelineId],
    foreignColumns: [contentPipeline.id],
    name: "content_analytics_content_pipeline_id_content_pipeline_id_fk"
  }).onDelete("cascade"),
  index("content_analytics_content_pipeline_id_idx").on(table.contentPipelineId),
]);

export type SelectContentProject = typeof contentProjects.$inferSelect;
export type SelectPipelineItem = typeof contentPipeline.$inferSelect;
export type SelectContentTask = typeof contentTasks.$inferSelect;
export type SelectAnalyticsRecord = typeof contentAnalytics.$inferSelect;
