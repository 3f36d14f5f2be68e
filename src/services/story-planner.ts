/**
 * Story Planner
 * Asks the planning collaborator for an outline and checks it against the
 * project's contract. One corrective follow-up is allowed; a second invalid
 * answer ends planning with PlanningContractViolation.
 */

import { z } from 'zod';
import type { ITextGenerationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import type { Character, PageOutline, Project } from '@/shared/types.js';
import { formatTargetAudience, parseAIResponse } from '@/shared/utils.js';
import { PlanningContractViolation } from '@/workflows/errors.js';
import { PromptService } from './prompt.js';

export interface StoryPlannerConfig {
  maxWordsPerPage: number;
  maxCharactersPerPage: number;
}

export interface StoryOutline {
  characters: Character[];
  pages: PageOutline[];
}

export type OutlineValidation =
  | { ok: true; outline: StoryOutline }
  | { ok: false; violations: string[] };

const rawOutlineSchema = z.object({
  characters: z
    .array(
      z.object({
        name: z.string(),
        visualTag: z.string(),
      }),
    )
    .default([]),
  pages: z.array(
    z.object({
      index: z.number().int(),
      text: z.string(),
      sceneIntent: z.string(),
      characters: z.array(z.string()).default([]),
    }),
  ),
});

const PREVIOUS_RESPONSE_LIMIT = 6000;

export class StoryPlanner {
  constructor(
    private readonly textService: ITextGenerationService,
    private readonly config: StoryPlannerConfig,
  ) {}

  async plan(project: Project, signal?: AbortSignal): Promise<StoryOutline> {
    const [template, jsonSchema] = await Promise.all([
      PromptService.loadPrompt('story-outline'),
      PromptService.loadSchema('story-outline'),
    ]);
    const { systemPrompt, userPrompt } = PromptService.buildPrompt(template, {
      title: project.title,
      topic: project.topic,
      audience: formatTargetAudience(project.audience),
      styleDescriptor: project.styleDescriptor,
      pageCount: project.targetPageCount,
      maxWords: this.config.maxWordsPerPage,
      characterRoster: project.characterRoster.join(', '),
      rosterLimit: project.rosterConstrained ? project.characterRoster.join(', ') : '',
    });

    logger.info('Story planner: requesting outline', {
      projectId: project.id,
      pageCount: project.targetPageCount,
      roster: project.characterRoster,
    });

    const firstResponse = await this.textService.complete(userPrompt, {
      ...(systemPrompt && { systemPrompt }),
      jsonSchema,
      temperature: 0.8,
      ...(signal && { signal }),
    });
    const first = this.validateOutline(firstResponse, project);
    if (first.ok) {
      this.logAccepted(project, first.outline, 0);
      return first.outline;
    }

    logger.warn('Story planner: outline violates the contract, sending corrective prompt', {
      projectId: project.id,
      violations: first.violations,
    });

    const correction = await PromptService.loadPrompt('outline-correction');
    const corrective = PromptService.buildPrompt(correction, {
      violations: first.violations.map((v) => `- ${v}`).join('\n'),
      originalPrompt: userPrompt,
      previousResponse: firstResponse.slice(0, PREVIOUS_RESPONSE_LIMIT),
      pageCount: project.targetPageCount,
    });
    const secondResponse = await this.textService.complete(corrective.userPrompt, {
      ...(corrective.systemPrompt && { systemPrompt: corrective.systemPrompt }),
      jsonSchema,
      temperature: 0.4,
      ...(signal && { signal }),
    });
    const second = this.validateOutline(secondResponse, project);
    if (second.ok) {
      this.logAccepted(project, second.outline, 1);
      return second.outline;
    }

    logger.error('Story planner: corrected outline still invalid', {
      projectId: project.id,
      violations: second.violations,
    });
    throw new PlanningContractViolation(second.violations, 1);
  }

  /**
   * Parse and check a raw collaborator answer. Malformed JSON is reported as a violation.
   */
  validateOutline(responseText: string, project: Project): OutlineValidation {
    let parsed: unknown;
    try {
      parsed = parseAIResponse(responseText);
    } catch (error) {
      return {
        ok: false,
        violations: [`response is not valid JSON (${error instanceof Error ? error.message : String(error)})`],
      };
    }

    const shape = rawOutlineSchema.safeParse(parsed);
    if (!shape.success) {
      return {
        ok: false,
        violations: shape.error.issues.map((issue) => `${issue.path.join('.') || 'outline'}: ${issue.message}`),
      };
    }

    const violations: string[] = [];
    const { pages: rawPages, characters: rawCharacters } = shape.data;
    const expected = project.targetPageCount;

    if (rawPages.length !== expected) {
      violations.push(`expected exactly ${expected} pages, got ${rawPages.length}`);
    }

    const pages = [...rawPages].sort((a, b) => a.index - b.index);
    const contiguous = pages.every((page, i) => page.index === i + 1);
    if (!contiguous) {
      violations.push(
        `page indices must run 1..${pages.length} without gaps or duplicates (got ${pages.map((p) => p.index).join(', ')})`,
      );
    }

    // Declared cast, keyed case-insensitively; the first declaration wins
    const declared = new Map<string, { name: string; visualTag: string }>();
    for (const character of rawCharacters) {
      const name = character.name.trim();
      if (!name) {
        violations.push('a declared character has an empty name');
        continue;
      }
      if (!character.visualTag.trim()) {
        violations.push(`character "${name}" has an empty visualTag`);
      }
      if (!declared.has(name.toLowerCase())) {
        declared.set(name.toLowerCase(), { name, visualTag: character.visualTag.trim() });
      }
    }

    if (project.rosterConstrained) {
      const roster = new Set(project.characterRoster.map((n) => n.toLowerCase()));
      for (const { name } of declared.values()) {
        if (!roster.has(name.toLowerCase())) {
          violations.push(`character "${name}" is not in the required roster (${project.characterRoster.join(', ')})`);
        }
      }
      for (const name of project.characterRoster) {
        if (!declared.has(name.toLowerCase())) {
          violations.push(`required character "${name}" is missing from the outline`);
        }
      }
    }

    for (const page of pages) {
      if (!page.text.trim()) violations.push(`page ${page.index} has empty text`);
      if (!page.sceneIntent.trim()) violations.push(`page ${page.index} has an empty sceneIntent`);
      if (page.characters.length > this.config.maxCharactersPerPage) {
        violations.push(
          `page ${page.index} lists ${page.characters.length} characters, at most ${this.config.maxCharactersPerPage} allowed`,
        );
      }
      for (const name of page.characters) {
        if (!declared.has(name.trim().toLowerCase())) {
          violations.push(`page ${page.index} references undeclared character "${name}"`);
        }
      }
    }

    if (violations.length) {
      return { ok: false, violations };
    }

    const outlinePages: PageOutline[] = pages.map((page) => {
      const names = new Set<string>();
      for (const name of page.characters) {
        const canonical = declared.get(name.trim().toLowerCase());
        if (canonical) names.add(canonical.name);
      }
      return {
        index: page.index,
        text: page.text.trim(),
        sceneIntent: page.sceneIntent.trim(),
        characters: [...names],
      };
    });

    // Only characters that appear on a page get a locked reference
    const appearing = new Set(outlinePages.flatMap((p) => p.characters));
    const characters: Character[] = [...declared.values()]
      .filter((c) => appearing.has(c.name))
      .map((c) => ({ name: c.name, visualTag: c.visualTag }));

    return { ok: true, outline: { characters, pages: outlinePages } };
  }

  private logAccepted(project: Project, outline: StoryOutline, retriesConsumed: number): void {
    logger.info('Story planner: outline accepted', {
      projectId: project.id,
      pageCount: outline.pages.length,
      characters: outline.characters.map((c) => c.name),
      retriesConsumed,
    });
  }
}
