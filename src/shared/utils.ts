// -----------------------------------------------------------------------------
// Shared Utilities - Environment-agnostic utility functions
// -----------------------------------------------------------------------------

/**
 * Trim hashtags, drop leading '#', blanks and case-insensitive duplicates,
 * keeping first-seen order.
 */
export function normalizeHashtags(hashtags: string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const raw of hashtags) {
    const cleaned = raw.replace(/^#+/, '').trim();

    if (!cleaned) {
      continue;
    }

    const key = cleaned.toLowerCase();
    if (seen.has(key)) {
      continue;
    }

    seen.add(key);
    normalized.push(cleaned);
  }

  return normalized;
}

export function incrementCount(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/** Own-property lookup, so keys such as `constructor` never reach the prototype. */
export function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Parse a model reply that should contain JSON. Markdown code fences around
 * the payload are tolerated. Throws SyntaxError when no JSON can be read.
 */
export function parseAIResponse(response: string): unknown {
  let cleanedResponse = response.trim();

  // Handle markdown code blocks
  const fenced = cleanedResponse.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  if (fenced && fenced[1] !== undefined) {
    cleanedResponse = fenced[1].trim();
  }

  return JSON.parse(cleanedResponse);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
