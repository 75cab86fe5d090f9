/**
 * Content segments and their audience profiles, loaded from src/data/content-segments.json
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { getDataPath } from '@/shared/path-utils.js';
import { ownValue } from '@/shared/utils.js';

export const CONTENT_SEGMENTS = [
  'ai-education',
  'finance-education',
  'motivational',
  'ai-tool-discovery',
] as const;
export type ContentSegment = (typeof CONTENT_SEGMENTS)[number];

const AudienceProfileSchema = z.object({
  description: z.string().min(1),
  focusAreas: z.array(z.string().min(1)).min(1),
  riskLevel: z.string().min(1),
});

const SegmentDefinitionSchema = z.object({
  label: z.string().min(1),
  description: z.string().min(1),
  audiences: z.record(AudienceProfileSchema),
});

const SegmentCatalogSchema = z.object({
  'ai-education': SegmentDefinitionSchema,
  'finance-education': SegmentDefinitionSchema,
  motivational: SegmentDefinitionSchema,
  'ai-tool-discovery': SegmentDefinitionSchema,
});

export type AudienceProfile = z.infer<typeof AudienceProfileSchema>;
export type SegmentDefinition = z.infer<typeof SegmentDefinitionSchema>;
export type SegmentCatalog = z.infer<typeof SegmentCatalogSchema>;

export interface SegmentSummary {
  id: ContentSegment;
  label: string;
  description: string;
  audiences: Array<AudienceProfile & { name: string }>;
}

let cachedCatalog: SegmentCatalog | null = null;

export function loadSegmentCatalog(): SegmentCatalog {
  if (!cachedCatalog) {
    const raw = readFileSync(join(getDataPath(), 'content-segments.json'), 'utf-8');
    cachedCatalog = SegmentCatalogSchema.parse(JSON.parse(raw));
  }
  return cachedCatalog;
}

export function isContentSegment(value: string): value is ContentSegment {
  return (CONTENT_SEGMENTS as readonly string[]).includes(value);
}

export function getSegment(segment: ContentSegment): SegmentDefinition {
  return loadSegmentCatalog()[segment];
}

export function getAudience(segment: ContentSegment, audience: string): AudienceProfile | undefined {
  return ownValue(getSegment(segment).audiences, audience);
}

export function listSegmentSummaries(): SegmentSummary[] {
  return CONTENT_SEGMENTS.map((id) => {
    const definition = getSegment(id);
    return {
      id,
      label: definition.label,
      description: definition.description,
      audiences: Object.entries(definition.audiences).map(([name, profile]) => ({
        name,
        ...profile,
      })),
    };
  });
}
