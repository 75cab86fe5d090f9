/**
 * Default task checklists attached to new workflows, keyed by content type.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { getDataPath } from '@/shared/path-utils.js';
import { ownValue } from '@/shared/utils.js';

const TaskTemplateFileSchema = z.object({
  fallback: z.array(z.string().min(1)).min(1),
  templates: z.record(z.array(z.string().min(1)).min(1)),
});

export type TaskTemplateCatalog = z.infer<typeof TaskTemplateFileSchema>;

let cachedCatalog: TaskTemplateCatalog | null = null;

export function loadTaskTemplates(): TaskTemplateCatalog {
  if (!cachedCatalog) {
    const raw = readFileSync(join(getDataPath(), 'task-templates.json'), 'utf-8');
    cachedCatalog = TaskTemplateFileSchema.parse(JSON.parse(raw));
  }
  return cachedCatalog;
}

export function getContentTypes(): string[] {
  return Object.keys(loadTaskTemplates().templates);
}

/** Task titles for `contentType` in display order; unknown types get the generic checklist. */
export function getDefaultTaskTitles(contentType: string): string[] {
  const catalog = loadTaskTemplates();
  return [...(ownValue(catalog.templates, contentType) ?? catalog.fallback)];
}
