/**
 * Brief Normalizer
 * Turns a free-form brief plus optional explicit fields into a validated
 * Project skeleton in the `planning` state. No I/O besides the bundled word lists.
 */

import { randomUUID } from 'crypto';
import { InvalidBriefError } from '@/workflows/errors.js';
import type { AudienceBand, Project } from '@/shared/types.js';
import { slugify, titleCase, truncateWords } from '@/shared/utils.js';
import { AUDIENCE_KEYWORDS, loadBriefVocabulary, type BriefVocabulary } from './brief-vocabulary.js';

export interface BriefInput {
  brief: string;
  title?: string | undefined;
  audience?: AudienceBand | undefined;
  pageCount?: number | undefined;
  style?: string | undefined;
  characters?: string[] | undefined;
  continuity?: boolean | undefined;
}

export interface BriefNormalizerConfig {
  minPageCount: number;
  maxPageCount: number;
  defaultPageCount: number;
  defaultStyle: string;
  defaultContinuity: boolean;
}

export const MAX_BRIEF_LENGTH = 2000;
const MAX_TITLE_WORDS = 8;
const DEFAULT_AUDIENCE: AudienceBand = 'children_3-6';
const PAGE_COUNT_PATTERN = /\b(\d{1,4})[\s-]*pages?\b/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(haystack: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'i').test(haystack);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function cleanTopic(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .split(/[,;]/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(', ')
    .replace(/^[\s,.;:!-]+|[\s,.;:!-]+$/g, '');
}

export class BriefNormalizer {
  constructor(
    private readonly config: BriefNormalizerConfig,
    private readonly vocabulary: BriefVocabulary = loadBriefVocabulary(),
  ) {}

  normalize(input: BriefInput, options: { id?: string; now?: Date } = {}): Project {
    const brief = input.brief.trim();
    if (brief.length > MAX_BRIEF_LENGTH) {
      throw new InvalidBriefError('brief', `brief exceeds ${MAX_BRIEF_LENGTH} characters (got ${brief.length})`);
    }

    let remaining = brief;

    // Page count: explicit field, then "N pages" in the text, then the default
    let targetPageCount = this.config.defaultPageCount;
    const pageMatch = brief.match(PAGE_COUNT_PATTERN);
    if (input.pageCount !== undefined) {
      targetPageCount = input.pageCount;
    } else if (pageMatch?.[1]) {
      targetPageCount = parseInt(pageMatch[1], 10);
    }
    if (pageMatch) {
      remaining = remaining.replace(pageMatch[0], ' ');
    }
    if (
      !Number.isInteger(targetPageCount) ||
      targetPageCount < this.config.minPageCount ||
      targetPageCount > this.config.maxPageCount
    ) {
      throw new InvalidBriefError(
        'pageCount',
        `page count ${targetPageCount} is outside the supported range ${this.config.minPageCount}-${this.config.maxPageCount}`,
      );
    }

    // Style: explicit field, then a known style phrase in the text, then the default
    let styleKey: string | undefined = input.style?.trim().toLowerCase() || undefined;
    const styleMatch = this.findStylePhrase(remaining);
    if (styleMatch) {
      remaining = remaining.replace(styleMatch.matched, ' ');
      styleKey ??= styleMatch.key;
    }
    const styleDescriptor = this.describeStyle(styleKey ?? this.config.defaultStyle);

    const topic = cleanTopic(remaining) || input.title?.trim() || '';
    if (!/\p{L}{2,}/u.test(topic)) {
      throw new InvalidBriefError('brief', 'no topic can be inferred from the brief');
    }

    const title = input.title?.trim() || titleCase(truncateWords(topic, MAX_TITLE_WORDS));
    const explicitCast = input.characters?.map((name) => name.trim()).filter((name) => name.length > 0) ?? [];
    const characterRoster = explicitCast.length ? this.dedupe(explicitCast) : this.findCharacterNouns(topic);
    const now = (options.now ?? new Date()).toISOString();

    return {
      id: options.id ?? randomUUID(),
      slug: slugify(title) || 'story',
      title,
      topic,
      brief,
      audience: input.audience ?? this.inferAudience(brief),
      targetPageCount,
      styleDescriptor,
      continuity: input.continuity ?? this.config.defaultContinuity,
      characterRoster,
      rosterConstrained: explicitCast.length > 0,
      characters: [],
      pages: [],
      artSpecs: [],
      renders: [],
      state: 'planning',
      warnings: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  private findStylePhrase(text: string): { key: string; matched: string } | undefined {
    // Longest phrases first so "comic book" wins over a shorter overlapping key
    const keys = Object.keys(this.vocabulary.artStyles).sort((a, b) => b.length - a.length);
    for (const key of keys) {
      const pattern = new RegExp(`\\b(?:in\\s+(?:an?\\s+)?)?${escapeRegExp(key)}(?:[\\s-]+style)?\\b`, 'i');
      const match = text.match(pattern);
      if (match) {
        return { key, matched: match[0] };
      }
    }
    return undefined;
  }

  private describeStyle(styleKey: string): string {
    const descriptor = this.vocabulary.artStyles[styleKey];
    return descriptor ? `${styleKey}: ${descriptor}` : styleKey;
  }

  private inferAudience(brief: string): AudienceBand {
    for (const [band, keywords] of AUDIENCE_KEYWORDS) {
      if (keywords.some((keyword) => containsPhrase(brief, keyword))) {
        return band;
      }
    }
    return DEFAULT_AUDIENCE;
  }

  private findCharacterNouns(topic: string): string[] {
    const found: Array<{ noun: string; position: number }> = [];
    for (const noun of this.vocabulary.characterNouns) {
      const match = new RegExp(`\\b${escapeRegExp(noun)}\\b`, 'i').exec(topic);
      if (match) {
        found.push({ noun, position: match.index });
      }
    }
    return this.dedupe(found.sort((a, b) => a.position - b.position).map((f) => capitalize(f.noun)));
  }

  private dedupe(names: string[]): string[] {
    const seen = new Set<string>();
    return names.filter((name) => {
      const key = name.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }
}
