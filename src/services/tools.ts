/**
 * AI tool catalog, loaded from src/data/ai-tools.json
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { getDataPath } from '@/shared/path-utils.js';

const ToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  features: z.array(z.string().min(1)),
  pricing: z.string().min(1),
  bestFor: z.string().min(1),
  website: z.string().url(),
  releaseDate: z.string().date(),
});

const ToolCategorySchema = z.object({
  name: z.string().min(1),
  icon: z.string().min(1),
  tools: z.array(ToolSchema).min(1),
});

const ToolCatalogSchema = z.object({
  categories: z.array(ToolCategorySchema).min(1),
});

export type Tool = z.infer<typeof ToolSchema>;
export type ToolCategory = z.infer<typeof ToolCategorySchema>;

export interface ToolMatch extends Tool {
  category: string;
  categoryIcon: string;
}

let cachedCatalog: ToolCategory[] | null = null;

export function listToolCategories(): ToolCategory[] {
  if (!cachedCatalog) {
    const raw = readFileSync(join(getDataPath(), 'ai-tools.json'), 'utf-8');
    cachedCatalog = ToolCatalogSchema.parse(JSON.parse(raw)).categories;
  }
  return cachedCatalog;
}

function toMatch(category: ToolCategory, tool: Tool): ToolMatch {
  return { ...tool, category: category.name, categoryIcon: category.icon };
}

/**
 * Case-insensitive substring search over name, description and features.
 * An empty query matches every tool; an unknown category matches none.
 */
export function searchTools(query: string, category?: string): ToolMatch[] {
  const needle = query.trim().toLowerCase();
  const categories = listToolCategories().filter(
    (candidate) => category === undefined || candidate.name === category,
  );

  return categories.flatMap((candidate) =>
    candidate.tools
      .filter((tool) =>
        `${tool.name} ${tool.description} ${tool.features.join(' ')}`.toLowerCase().includes(needle),
      )
      .map((tool) => toMatch(candidate, tool)),
  );
}

/** Exact name lookup, first category wins. */
export function findTool(name: string): ToolMatch | undefined {
  for (const category of listToolCategories()) {
    const tool = category.tools.find((candidate) => candidate.name === name);
    if (tool) {
      return toMatch(category, tool);
    }
  }
  return undefined;
}
