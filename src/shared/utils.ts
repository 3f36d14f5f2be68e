// -----------------------------------------------------------------------------
// Shared Utilities - Environment-agnostic utility functions
// -----------------------------------------------------------------------------

import type { AudienceBand } from './types.js';

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9 -]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

const MINOR_WORDS = new Set(['a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'in', 'of', 'on', 'or', 'the', 'to', 'with']);

export function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word, idx) => {
      const lower = word.toLowerCase();
      if (idx > 0 && MINOR_WORDS.has(lower)) return lower;
      return lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join(' ');
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Keep the first `maxWords` words, collapsing whitespace.
 */
export function truncateWords(text: string, maxWords: number): string {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, maxWords)
    .join(' ');
}

export function extensionForMimeType(mimeType: string): string {
  switch (mimeType) {
    case 'image/png':
      return 'png';
    case 'image/webp':
      return 'webp';
    case 'image/jpeg':
    case 'image/jpg':
      return 'jpg';
    case 'application/pdf':
      return 'pdf';
    case 'application/json':
      return 'json';
    default:
      return 'bin';
  }
}

/**
 * Formats target audience for better prompting
 */
export function formatTargetAudience(targetAudience: AudienceBand): string {
  const audienceMap: Record<AudienceBand, string> = {
    'children_0-2': 'babies and toddlers (0-2 years)',
    'children_3-6': 'preschoolers (3-6 years)',
    'children_7-10': 'early elementary children (7-10 years)',
    'children_11-14': 'middle grade children (11-14 years)',
    'young_adult_15-17': 'young adults (15-17 years)',
    'adult_18+': 'adults (18+ years)',
    all_ages: 'readers of all ages',
  };

  return audienceMap[targetAudience];
}

/**
 * Parse a JSON payload returned by a model, tolerating markdown code fences
 * and leading/trailing prose around the object.
 */
export function parseAIResponse(text: string): unknown {
  const trimmed = text.trim();
  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = fenced?.[1]?.trim() ?? trimmed;

  try {
    return JSON.parse(candidate);
  } catch (error) {
    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');
    if (start >= 0 && end > start) {
      return JSON.parse(candidate.slice(start, end + 1));
    }
    throw error;
  }
}
