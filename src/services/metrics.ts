/**
 * Metrics
 * Pure aggregations over records already fetched from the store.
 */

import { hasReachedStage } from '@/workflows/stages.js';
import { incrementCount } from '@/shared/utils.js';
import type { PipelineItemWithAnalytics, Workflow } from '@/shared/types.js';

export interface WorkflowMetrics {
  total: number;
  planned: number;
  inProgress: number;
  completed: number;
  /** Percentage of workflows that reached `published`, 0 when there are none. */
  completionRate: number;
  platformDistribution: Record<string, number>;
  contentTypeDistribution: Record<string, number>;
}

export const EMPTY_WORKFLOW_METRICS: WorkflowMetrics = {
  total: 0,
  planned: 0,
  inProgress: 0,
  completed: 0,
  completionRate: 0,
  platformDistribution: {},
  contentTypeDistribution: {},
};

export function computeWorkflowMetrics(workflows: Workflow[]): WorkflowMetrics {
  const metrics: WorkflowMetrics = {
    ...EMPTY_WORKFLOW_METRICS,
    platformDistribution: {},
    contentTypeDistribution: {},
  };
  // Platforms and content types are free text; count in maps, not object keys
  const platforms = new Map<string, number>();
  const contentTypes = new Map<string, number>();

  for (const workflow of workflows) {
    metrics.total += 1;

    switch (workflow.status) {
      case 'planned':
        metrics.planned += 1;
        break;
      case 'in_progress':
        metrics.inProgress += 1;
        break;
      case 'published':
        metrics.completed += 1;
        break;
    }

    for (const platform of workflow.platforms) {
      incrementCount(platforms, platform);
    }
    incrementCount(contentTypes, workflow.contentType);
  }

  metrics.platformDistribution = Object.fromEntries(platforms);
  metrics.contentTypeDistribution = Object.fromEntries(contentTypes);

  metrics.completionRate = metrics.total > 0 ? (metrics.completed / metrics.total) * 100 : 0;

  return metrics;
}

export interface PlatformPerformance {
  views: number;
  engagement: number;
  count: number;
}

export interface PerformanceSummary {
  publishedItems: number;
  totalViews: number;
  /** Likes plus comments. */
  totalEngagement: number;
  averageEngagementRate: number;
  byPlatform: Record<string, PlatformPerformance>;
}

/**
 * Sum the newest analytics record of every item that has reached `published`
 * (so `analyzed` items count too). Items without analytics still count
 * towards `publishedItems`.
 */
export function computePerformanceSummary(items: PipelineItemWithAnalytics[]): PerformanceSummary {
  const summary: PerformanceSummary = {
    publishedItems: 0,
    totalViews: 0,
    totalEngagement: 0,
    averageEngagementRate: 0,
    byPlatform: {},
  };
  const byPlatform = new Map<string, PlatformPerformance>();

  for (const item of items) {
    if (!hasReachedStage(item.workflowStage, 'published')) {
      continue;
    }

    summary.publishedItems += 1;

    const platform = byPlatform.get(item.platform) ?? { views: 0, engagement: 0, count: 0 };
    platform.count += 1;
    byPlatform.set(item.platform, platform);

    const latest = item.analytics[0];
    if (!latest) {
      continue;
    }

    const engagement = latest.likes + latest.comments;
    summary.totalViews += latest.views;
    summary.totalEngagement += engagement;
    platform.views += latest.views;
    platform.engagement += engagement;
  }

  summary.byPlatform = Object.fromEntries(byPlatform);
  summary.averageEngagementRate =
    summary.totalViews > 0 ? (summary.totalEngagement / summary.totalViews) * 100 : 0;

  return summary;
}
