import { describe, it, expect } from '@jest/globals';
import { PageArtDirector } from '@/services/art-director';
import type { PageOutline } from '@/shared/types';
import { FOX, OWL, plannedFoxAndOwlProject } from './helpers/fixtures';

const director = new PageArtDirector({ maxWordsPerPage: 120, maxPromptLength: 5000 });

function page(index: number, overrides: Partial<PageOutline> = {}): PageOutline {
  const project = plannedFoxAndOwlProject();
  const outline = project.pages.find((p) => p.index === index);
  if (!outline) throw new Error(`no page ${index}`);
  return { ...outline, ...overrides };
}

describe('PageArtDirector', () => {
  const context = plannedFoxAndOwlProject();

  it('derives a spec for a two-character page', () => {
    const { artSpec, warning } = director.direct(context, page(2));

    expect(warning).toBeUndefined();
    expect(artSpec).toMatchObject({
      pageIndex: 2,
      composition: 'Fox and Owl facing each other, balanced across the frame',
      camera: 'medium-wide shot at eye level',
      lighting: 'bright soft daylight',
      palette: 'exactly the palette of the attached style reference',
      characterDirectives: [FOX, OWL],
      negativeConstraints: [
        'no text, letters, captions or watermarks in the image',
        'do not redesign any character; keep them identical to their reference images',
        'no recurring characters other than those listed',
      ],
      revision: 0,
    });
    expect(artSpec.prompt).toContain('Picture book illustration for page 2 of 5.');
    expect(artSpec.prompt).toContain('- Fox: small red fox with a green scarf. Match the attached reference image of Fox.');
  });

  it('chooses the camera from page position and cast size', () => {
    expect(director.direct(context, page(1)).artSpec.camera).toBe('wide establishing shot');
    expect(director.direct(context, page(3)).artSpec.camera).toBe("medium shot at the character's eye level");
    expect(director.direct(context, page(5)).artSpec.camera).toBe('wide closing shot, gently pulled back');
  });

  it('describes a page without recurring characters', () => {
    const { artSpec } = director.direct(context, page(4));

    expect(artSpec.camera).toBe('wide environmental shot');
    expect(artSpec.characterDirectives).toEqual([]);
    expect(artSpec.negativeConstraints).toHaveLength(2);
    expect(artSpec.prompt).toContain('No recurring characters appear on this page.');
  });

  it('reads camera and lighting cues from the scene intent', () => {
    const { artSpec } = director.direct(context, page(3, { sceneIntent: 'Owl whispers a secret under the moon' }));

    expect(artSpec.camera).toBe('close-up at eye level');
    expect(artSpec.lighting).toBe('moonlit night, cool blue ambient light with warm accent lights');
  });

  it('is deterministic', () => {
    expect(director.direct(context, page(2))).toEqual(director.direct(context, page(2)));
  });

  it('truncates page text above the word limit and reports it', () => {
    const longText = Array.from({ length: 130 }, (_, i) => `word${i + 1}`).join(' ');

    const { outline, warning } = director.direct(context, page(1, { text: longText }));

    expect(outline.text.split(' ')).toHaveLength(120);
    expect(outline.text.endsWith('word120')).toBe(true);
    expect(warning).toEqual({
      stage: 'drafting_art',
      pageIndex: 1,
      message: 'Page 1 text truncated from 130 to 120 words',
    });
  });

  it('caps the prompt length, shortening the story text first', () => {
    const capped = new PageArtDirector({ maxWordsPerPage: 500, maxPromptLength: 1200 });
    const longText = Array.from({ length: 300 }, () => 'lantern').join(' ');

    const { artSpec } = capped.direct(context, page(2, { text: longText }));

    expect(artSpec.prompt.length).toBeLessThanOrEqual(1200);
    expect(artSpec.prompt).toContain('Palette: exactly the palette of the attached style reference.');
    expect(artSpec.prompt).toContain('Avoid: no text, letters, captions or watermarks in the image;');
  });

  it('tightens a drifted spec with one constraint per issue', () => {
    const { artSpec } = director.direct(context, page(2));
    const issues = [
      { category: 'wardrobe' as const, subject: 'Fox', description: 'scarf is blue instead of green' },
      { category: 'palette' as const, description: 'colors too saturated' },
    ];

    const once = director.tighten(artSpec, issues, page(2), context);
    const twice = director.tighten(once, issues, page(2), context);

    expect(once.revision).toBe(1);
    expect(once.negativeConstraints.slice(3)).toEqual([
      'Fox must wear exactly the outfit shown in the reference (scarf is blue instead of green)',
      'keep strictly to the style reference palette (colors too saturated)',
    ]);
    expect(once.prompt).toContain('Fox must wear exactly the outfit shown in the reference');
    expect(twice.revision).toBe(2);
    expect(twice.negativeConstraints).toEqual(once.negativeConstraints);
    expect(artSpec.negativeConstraints).toHaveLength(3);
  });

  it('keeps the corrective constraints when the fixed description alone exceeds the cap', () => {
    const tight = new PageArtDirector({ maxWordsPerPage: 120, maxPromptLength: 400 });
    const { artSpec } = tight.direct(context, page(2));
    const issues = [{ category: 'wardrobe' as const, subject: 'Fox', description: 'scarf is blue instead of green' }];

    const tightened = tight.tighten(artSpec, issues, page(2), context);

    expect(tightened.prompt.length).toBeLessThanOrEqual(400);
    expect(tightened.prompt.split('\n')[1]).toBe(
      'Avoid: no text, letters, captions or watermarks in the image; ' +
        'do not redesign any character; keep them identical to their reference images; ' +
        'no recurring characters other than those listed; ' +
        'Fox must wear exactly the outfit shown in the reference (scarf is blue instead of green).',
    );
  });

  it('shortens long drift descriptions in the constraints it adds', () => {
    const { artSpec } = director.direct(context, page(2));

    const tightened = director.tighten(artSpec, [{ category: 'palette', description: 'x'.repeat(500) }], page(2), context);

    expect(tightened.negativeConstraints.at(-1)).toBe(
      `keep strictly to the style reference palette (${'x'.repeat(157)}...)`,
    );
  });
});
