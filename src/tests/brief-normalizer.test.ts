import { describe, it, expect } from '@jest/globals';
import { InvalidBriefError } from '@/workflows/errors';
import { MAX_BRIEF_LENGTH } from '@/services/brief-normalizer';
import { createNormalizer, FIXED_NOW, FOX_AND_OWL_BRIEF, PROJECT_ID } from './helpers/fixtures';

const WATERCOLOR =
  'watercolor: soft watercolor illustration, translucent washes, visible paper texture, gentle edges';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('BriefNormalizer', () => {
  const normalizer = createNormalizer();

  it('parses the fox-and-owl brief into a planning project', () => {
    const project = normalizer.normalize({ brief: FOX_AND_OWL_BRIEF }, { id: PROJECT_ID, now: FIXED_NOW });

    expect(project).toMatchObject({
      id: PROJECT_ID,
      topic: 'fox and owl solve mysteries',
      title: 'Fox and Owl Solve Mysteries',
      slug: 'fox-and-owl-solve-mysteries',
      targetPageCount: 5,
      styleDescriptor: WATERCOLOR,
      audience: 'children_3-6',
      continuity: false,
      characterRoster: ['Fox', 'Owl'],
      rosterConstrained: false,
      state: 'planning',
      createdAt: '2026-01-15T10:00:00.000Z',
      updatedAt: '2026-01-15T10:00:00.000Z',
    });
    expect(project.characters).toEqual([]);
    expect(project.pages).toEqual([]);
    expect(project.renders).toEqual([]);
  });

  it('removes an "in ... style" phrase and falls back to the default page count', () => {
    const project = normalizer.normalize({ brief: 'fox and owl solve mysteries in watercolor style' });

    expect(project.topic).toBe('fox and owl solve mysteries');
    expect(project.targetPageCount).toBe(8);
    expect(project.styleDescriptor).toBe(WATERCOLOR);
  });

  it('uses the default style when the brief names none', () => {
    const project = normalizer.normalize({ brief: 'space adventure, 10 pages' });

    expect(project.topic).toBe('space adventure');
    expect(project.title).toBe('Space Adventure');
    expect(project.targetPageCount).toBe(10);
    expect(project.styleDescriptor).toBe(WATERCOLOR);
    expect(project.characterRoster).toEqual([]);
  });

  it('lets explicit fields override what the text implies', () => {
    const project = normalizer.normalize({
      brief: 'a robot learns to paint, 3 pages',
      title: 'Robo Paints',
      pageCount: 6,
      style: 'anime',
      characters: ['Robo', 'Pixel', 'robo'],
      audience: 'children_7-10',
      continuity: true,
    });

    expect(project.topic).toBe('a robot learns to paint');
    expect(project.title).toBe('Robo Paints');
    expect(project.slug).toBe('robo-paints');
    expect(project.targetPageCount).toBe(6);
    expect(project.styleDescriptor).toBe('anime: anime style illustration, clean line art, cel shading, expressive eyes');
    expect(project.characterRoster).toEqual(['Robo', 'Pixel']);
    expect(project.rosterConstrained).toBe(true);
    expect(project.audience).toBe('children_7-10');
    expect(project.continuity).toBe(true);
  });

  it('keeps an unknown explicit style as its own descriptor', () => {
    const project = normalizer.normalize({ brief: 'a lighthouse keeper and the sea', style: 'Ukiyo-e' });

    expect(project.styleDescriptor).toBe('ukiyo-e');
  });

  it('lists character nouns in order of first appearance', () => {
    const project = normalizer.normalize({ brief: 'an owl helps a fox and another owl find the moon' });

    expect(project.characterRoster).toEqual(['Owl', 'Fox']);
  });

  it.each([
    ['a toddler counting book about shapes', 'children_0-2'],
    ['a bedtime story about a sleepy bear', 'children_3-6'],
    ['a teen detective story', 'young_adult_15-17'],
    ['a story for the whole family about a garden', 'all_ages'],
  ] as const)('infers the audience of "%s"', (brief, audience) => {
    expect(normalizer.normalize({ brief }).audience).toBe(audience);
  });

  it('rejects page counts outside the configured range', () => {
    const fromText = captureError(() => normalizer.normalize({ brief: 'a long saga, 200 pages' }));
    const explicit = captureError(() => normalizer.normalize({ brief: 'a short tale', pageCount: 0 }));

    expect(fromText).toBeInstanceOf(InvalidBriefError);
    expect(fromText).toMatchObject({ field: 'pageCount', code: 'INVALID_BRIEF', stage: 'intake' });
    expect(explicit).toMatchObject({
      field: 'pageCount',
      message: 'Invalid brief (pageCount): page count 0 is outside the supported range 1-50',
    });
  });

  it('accepts a brief written in a non-Latin script', () => {
    const project = normalizer.normalize({ brief: 'лиса и сова разгадывают тайны, 5 pages' }, { id: PROJECT_ID, now: FIXED_NOW });

    expect(project).toMatchObject({
      topic: 'лиса и сова разгадывают тайны',
      title: 'Лиса И Сова Разгадывают Тайны',
      slug: 'story',
      targetPageCount: 5,
      characterRoster: [],
    });
  });

  it('rejects a brief with no inferable topic', () => {
    const error = captureError(() => normalizer.normalize({ brief: 'watercolor, 5 pages' }));

    expect(error).toBeInstanceOf(InvalidBriefError);
    expect(error).toMatchObject({
      field: 'brief',
      message: 'Invalid brief (brief): no topic can be inferred from the brief',
    });
  });

  it('rejects briefs longer than the limit', () => {
    const error = captureError(() => normalizer.normalize({ brief: 'a'.repeat(MAX_BRIEF_LENGTH + 1) }));

    expect(error).toMatchObject({ field: 'brief' });
  });
});
