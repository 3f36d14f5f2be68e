/**
 * Page Art Director
 * Deterministic mapping from a page outline and the locked style to an ArtSpec.
 * Also derives the tightened spec used for corrective regenerations.
 */

import type {
  ArtSpec,
  CharacterDirective,
  DriftIssue,
  PageOutline,
  Project,
  ProjectWarning,
} from '@/shared/types.js';
import { countWords, truncateWords } from '@/shared/utils.js';

export interface ArtDirectorConfig {
  maxWordsPerPage: number;
  /** Upper bound on the rendered prompt length accepted by the image service */
  maxPromptLength: number;
}

export type ArtDirectionContext = Pick<Project, 'styleDescriptor' | 'characters' | 'targetPageCount'>;

export interface DirectedPage {
  outline: PageOutline;
  artSpec: ArtSpec;
  warning?: ProjectWarning;
}

const BASE_NEGATIVE_CONSTRAINTS = [
  'no text, letters, captions or watermarks in the image',
  'do not redesign any character; keep them identical to their reference images',
];

const LIGHTING_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(night|moon|moonlit|stars?|starry|dark|midnight)\b/i, 'moonlit night, cool blue ambient light with warm accent lights'],
  [/\b(sunset|evening|dusk|twilight)\b/i, 'warm golden-hour light with long soft shadows'],
  [/\b(morning|dawn|sunrise|breakfast)\b/i, 'fresh soft morning light'],
  [/\b(rain|rainy|storm|stormy|cloudy|fog|foggy|mist)\b/i, 'diffuse overcast light, muted highlights'],
  [/\b(room|house|home|kitchen|library|cave|inside|indoors|burrow|castle hall)\b/i, 'warm interior light from a single soft source'],
];

const CAMERA_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(whisper|whispers|secret|tears?|cries|crying|face|faces|eyes|hug|hugs)\b/i, 'close-up at eye level'],
  [/\b(flies|flying|fly|soar|soars|sky|above|mountain|view|overlook|tower)\b/i, 'high-angle wide shot'],
  [/\b(tiny|small|hides|hiding|under|beneath)\b/i, 'low-angle shot from the characters\' height'],
];

function chooseCamera(outline: PageOutline, pageCount: number): string {
  for (const [pattern, camera] of CAMERA_RULES) {
    if (pattern.test(outline.sceneIntent)) return camera;
  }
  if (outline.index === 1) return 'wide establishing shot';
  if (outline.index === pageCount) return 'wide closing shot, gently pulled back';
  const cast = outline.characters.length;
  if (cast === 0) return 'wide environmental shot';
  if (cast === 1) return 'medium shot at the character\'s eye level';
  if (cast <= 3) return 'medium-wide shot at eye level';
  return 'wide group shot';
}

function chooseComposition(outline: PageOutline): string {
  const [first, second] = outline.characters;
  if (!first) return 'the setting fills the frame with one clear focal point on a rule-of-thirds line';
  if (!second) return `${first} on the left third facing into the scene, open space on the right`;
  if (outline.characters.length === 2) return `${first} and ${second} facing each other, balanced across the frame`;
  return 'characters grouped in a loose triangle, the main action at the center';
}

function chooseLighting(outline: PageOutline): string {
  for (const [pattern, lighting] of LIGHTING_RULES) {
    if (pattern.test(outline.sceneIntent)) return lighting;
  }
  return 'bright soft daylight';
}

function directivesFor(outline: PageOutline, context: ArtDirectionContext): CharacterDirective[] {
  return outline.characters.map((name) => {
    const character = context.characters.find((c) => c.name.toLowerCase() === name.toLowerCase());
    return { name, visualTag: character?.visualTag ?? name };
  });
}

const MAX_ISSUE_DESCRIPTION = 160;

function negativeConstraintsFor(issue: DriftIssue): string {
  const subject = issue.subject ?? 'the characters';
  const description =
    issue.description.length > MAX_ISSUE_DESCRIPTION
      ? `${issue.description.slice(0, MAX_ISSUE_DESCRIPTION - 3)}...`
      : issue.description;
  switch (issue.category) {
    case 'palette':
      return `keep strictly to the style reference palette (${description})`;
    case 'wardrobe':
      return `${subject} must wear exactly the outfit shown in the reference (${description})`;
    case 'appearance':
      return `${subject} must match the reference appearance exactly (${description})`;
    case 'style':
      return `keep the medium and rendering of the style reference (${description})`;
    case 'other':
      return `avoid: ${description}`;
  }
}

export class PageArtDirector {
  constructor(private readonly config: ArtDirectorConfig) {}

  /**
   * Build the ArtSpec of one page. Page text above the word limit is truncated
   * and reported through the returned warning.
   */
  direct(context: ArtDirectionContext, outline: PageOutline): DirectedPage {
    const words = countWords(outline.text);
    let page = outline;
    let warning: ProjectWarning | undefined;
    if (words > this.config.maxWordsPerPage) {
      page = { ...outline, text: truncateWords(outline.text, this.config.maxWordsPerPage) };
      warning = {
        stage: 'drafting_art',
        pageIndex: outline.index,
        message: `Page ${outline.index} text truncated from ${words} to ${this.config.maxWordsPerPage} words`,
      };
    }

    const spec: Omit<ArtSpec, 'prompt'> = {
      pageIndex: page.index,
      composition: chooseComposition(page),
      camera: chooseCamera(page, context.targetPageCount),
      lighting: chooseLighting(page),
      palette: 'exactly the palette of the attached style reference',
      characterDirectives: directivesFor(page, context),
      negativeConstraints: [
        ...BASE_NEGATIVE_CONSTRAINTS,
        ...(page.characters.length ? ['no recurring characters other than those listed'] : []),
      ],
      revision: 0,
    };

    return {
      outline: page,
      artSpec: { ...spec, prompt: this.composePrompt(spec, page, context) },
      ...(warning && { warning }),
    };
  }

  directAll(
    context: ArtDirectionContext,
    outlines: PageOutline[],
  ): { pages: PageOutline[]; artSpecs: ArtSpec[]; warnings: ProjectWarning[] } {
    const directed = outlines.map((outline) => this.direct(context, outline));
    return {
      pages: directed.map((d) => d.outline),
      artSpecs: directed.map((d) => d.artSpec),
      warnings: directed.flatMap((d) => (d.warning ? [d.warning] : [])),
    };
  }

  /**
   * Corrective spec for a drifted page: one negative constraint per issue,
   * appended to the existing ones, revision incremented.
   */
  tighten(spec: ArtSpec, issues: DriftIssue[], outline: PageOutline, context: ArtDirectionContext): ArtSpec {
    const negativeConstraints = [...spec.negativeConstraints];
    for (const issue of issues) {
      const constraint = negativeConstraintsFor(issue);
      if (!negativeConstraints.includes(constraint)) {
        negativeConstraints.push(constraint);
      }
    }
    const tightened: ArtSpec = {
      ...spec,
      negativeConstraints,
      revision: spec.revision + 1,
    };
    return { ...tightened, prompt: this.composePrompt(tightened, outline, context) };
  }

  private composePrompt(spec: Omit<ArtSpec, 'prompt'>, outline: PageOutline, context: ArtDirectionContext): string {
    const castLines = spec.characterDirectives.map(
      (d) => `- ${d.name}: ${d.visualTag}. Match the attached reference image of ${d.name}.`,
    );
    const header = `Picture book illustration for page ${outline.index} of ${context.targetPageCount}.`;
    // Constraints lead so corrections added by QA survive any cut
    const avoid = `Avoid: ${spec.negativeConstraints.join('; ')}.`;
    const fixed = [
      `Art style: ${context.styleDescriptor}. Match the attached style reference exactly.`,
      ...(castLines.length ? ['Characters:', ...castLines] : ['No recurring characters appear on this page.']),
      `Composition: ${spec.composition}.`,
      `Camera: ${spec.camera}.`,
      `Lighting: ${spec.lighting}.`,
      `Palette: ${spec.palette}.`,
    ].join('\n');
    const story = `Story text on this page (context only, do not draw it as text): ${outline.text}`;
    const scene = `Scene: ${outline.sceneIntent}`;

    // The scene and story text give way first when the prompt is too long
    const budget = this.config.maxPromptLength - header.length - avoid.length - fixed.length - 4;
    const sceneText = scene.slice(0, Math.max(0, budget));
    const storyText = story.slice(0, Math.max(0, budget - sceneText.length - 1));
    const prompt = [header, avoid, fixed, sceneText, storyText].filter((part) => part.length > 0).join('\n');
    return prompt.slice(0, this.config.maxPromptLength);
  }
}
