// -----------------------------------------------------------------------------
// Shared Types - Records exchanged between the store adapter and the engine
// -----------------------------------------------------------------------------

export const WORKFLOW_STATUSES = ['planned', 'in_progress', 'published'] as const;
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

export const WORKFLOW_TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export type WorkflowTaskStatus = (typeof WORKFLOW_TASK_STATUSES)[number];

export const PIPELINE_STAGES = [
  'idea',
  'outlined',
  'drafted',
  'scripted',
  'recorded',
  'edited',
  'reviewed',
  'scheduled',
  'published',
  'analyzed',
] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const CONTENT_TASK_STATUSES = ['todo', 'in_progress', 'completed'] as const;
export type ContentTaskStatus = (typeof CONTENT_TASK_STATUSES)[number];

// Timestamps travel as ISO strings, as the store returns them.

export interface Workflow {
  id: string;
  userId: string;
  title: string;
  contentType: string;
  platforms: string[];
  targetDate: string | null;
  status: WorkflowStatus;
  createdAt: string;
  updatedAt: string;
}

export interface WorkflowTask {
  id: string;
  workflowId: string;
  title: string;
  orderIndex: number;
  status: WorkflowTaskStatus;
  completedAt: string | null;
  createdAt: string;
}

export interface ContentProject {
  id: string;
  userId: string;
  name: string;
  description: string;
  contentSegment: string;
  targetAudience: string;
  startDate: string | null;
  endDate: string | null;
  targetPlatforms: string[];
  totalContentPieces: number;
  createdAt: string;
}

export interface PipelineItem {
  id: string;
  userId: string;
  projectId: string | null;
  title: string;
  contentType: string;
  platform: string;
  workflowStage: PipelineStage;
  contentData: Record<string, unknown>;
  scheduledPublishDate: string | null;
  actualPublishDate: string | null;
  platformPostId: string | null;
  platformUrl: string | null;
  hashtags: string[];
  callToAction: string;
  createdAt: string;
  updatedAt: string;
}

export interface ContentTask {
  id: string;
  userId: string;
  contentPipelineId: string;
  title: string;
  description: string;
  taskType: string;
  priority: TaskPriority;
  status: ContentTaskStatus;
  dueDate: string | null;
  estimatedHours: number | null;
  actualHours: number | null;
  assignedTo: string | null;
  completedAt: string | null;
  createdAt: string;
}

export interface AnalyticsRecord {
  id: string;
  contentPipelineId: string;
  views: number;
  likes: number;
  comments: number;
  shares: number;
  clicks: number;
  impressions: number;
  engagementRate: number | null;
  revenue: number;
  recordedAt: string;
}

/** Pipeline item with its analytics history, newest record first. */
export interface PipelineItemWithAnalytics extends PipelineItem {
  analytics: AnalyticsRecord[];
}

export interface DashboardSummary {
  totalProjects: number;
  totalContentPieces: number;
  publishedPieces: number;
  pendingTasks: number;
  totalViews: number;
}

// -----------------------------------------------------------------------------
// Insert and patch shapes
// -----------------------------------------------------------------------------

export type NewWorkflow = Pick<
  Workflow,
  'userId' | 'title' | 'contentType' | 'platforms' | 'targetDate' | 'status'
>;
export type WorkflowPatch = Partial<Pick<Workflow, 'title' | 'status' | 'platforms' | 'targetDate'>>;

export type NewWorkflowTask = Pick<WorkflowTask, 'workflowId' | 'title' | 'orderIndex' | 'status'>;
export type WorkflowTaskPatch = Partial<Pick<WorkflowTask, 'status' | 'completedAt' | 'title'>>;

export type NewContentProject = Omit<ContentProject, 'id' | 'createdAt'>;
export type ContentProjectPatch = Partial<Omit<NewContentProject, 'userId'>>;

export type NewPipelineItem = Omit<
  PipelineItem,
  'id' | 'createdAt' | 'updatedAt' | 'actualPublishDate' | 'platformPostId' | 'platformUrl'
>;
export type PipelineItemPatch = Partial<
  Pick<
    PipelineItem,
    | 'workflowStage'
    | 'actualPublishDate'
    | 'platformPostId'
    | 'platformUrl'
    | 'scheduledPublishDate'
    | 'contentData'
  >
>;

export type NewContentTask = Omit<
  ContentTask,
  'id' | 'createdAt' | 'status' | 'actualHours' | 'completedAt'
>;
export type ContentTaskPatch = Partial<Pick<ContentTask, 'status' | 'completedAt' | 'actualHours'>>;

export type NewAnalyticsRecord = Omit<AnalyticsRecord, 'id' | 'recordedAt'>;
