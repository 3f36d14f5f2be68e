/**
 * Brief vocabulary: the word lists the brief normalizer matches against.
 * Loaded once from src/data/.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { getDataPath } from '@/shared/path-utils.js';
import type { AudienceBand } from '@/shared/types.js';

export interface BriefVocabulary {
  characterNouns: string[];
  /** style phrase -> full descriptor used in prompts */
  artStyles: Record<string, string>;
}

/** Audience keywords, checked in order; the first band with a matching keyword wins */
export const AUDIENCE_KEYWORDS: ReadonlyArray<readonly [AudienceBand, readonly string[]]> = [
  ['children_0-2', ['baby', 'babies', 'toddler', 'toddlers', 'infant', 'infants']],
  ['children_3-6', ['preschool', 'preschooler', 'preschoolers', 'kindergarten', 'bedtime']],
  ['children_7-10', ['early reader', 'early readers', 'elementary', 'second grade', 'third grade']],
  ['children_11-14', ['middle grade', 'tween', 'tweens', 'preteen', 'preteens']],
  ['young_adult_15-17', ['teen', 'teens', 'teenager', 'teenagers', 'young adult', 'ya']],
  ['adult_18+', ['adult', 'adults', 'grown-up', 'grown-ups', 'grownup']],
  ['all_ages', ['all ages', 'whole family', 'family']],
];

let cached: BriefVocabulary | null = null;

export function loadBriefVocabulary(): BriefVocabulary {
  if (cached) return cached;

  const dataPath = getDataPath();
  const characterNouns = z
    .array(z.string().min(1))
    .parse(JSON.parse(readFileSync(join(dataPath, 'character-nouns.json'), 'utf-8')));
  const artStyles = z
    .record(z.string().min(1))
    .parse(JSON.parse(readFileSync(join(dataPath, 'art-styles.json'), 'utf-8')));

  cached = { characterNouns, artStyles };
  return cached;
}
