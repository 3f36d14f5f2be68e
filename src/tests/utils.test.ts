import { describe, it, expect } from '@jest/globals';
import {
  countWords,
  extensionForMimeType,
  formatTargetAudience,
  parseAIResponse,
  slugify,
  titleCase,
  truncateWords,
} from '@/shared/utils';

describe('countWords utility', () => {
  it('should correctly count words in a string', () => {
    expect(countWords('Hello world')).toBe(2);
    expect(countWords('  multiple   spaces\nbetween words ')).toBe(4);
    expect(countWords('')).toBe(0);
  });
});

describe('truncateWords', () => {
  it('keeps the first words and collapses whitespace', () => {
    expect(truncateWords('one  two\nthree four', 3)).toBe('one two three');
    expect(truncateWords('short', 10)).toBe('short');
  });
});

describe('slugify and titleCase', () => {
  it('slugifies titles', () => {
    expect(slugify('Fox and Owl Solve Mysteries!')).toBe('fox-and-owl-solve-mysteries');
    expect(slugify('  --Hello   World--  ')).toBe('hello-world');
    expect(slugify('???')).toBe('');
  });

  it('capitalizes all but minor words after the first', () => {
    expect(titleCase('the fox and the owl')).toBe('The Fox and the Owl');
  });
});

describe('extensionForMimeType', () => {
  it('maps known types and falls back to bin', () => {
    expect(extensionForMimeType('image/png')).toBe('png');
    expect(extensionForMimeType('image/jpeg')).toBe('jpg');
    expect(extensionForMimeType('application/pdf')).toBe('pdf');
    expect(extensionForMimeType('image/x-unknown')).toBe('bin');
  });
});

describe('formatTargetAudience', () => {
  it('describes an audience band for prompts', () => {
    expect(formatTargetAudience('children_3-6')).toBe('preschoolers (3-6 years)');
    expect(formatTargetAudience('all_ages')).toBe('readers of all ages');
  });
});

describe('parseAIResponse', () => {
  it('parses plain and fenced JSON', () => {
    expect(parseAIResponse('{"a":1}')).toEqual({ a: 1 });
    expect(parseAIResponse('```json\n{"a":2}\n```')).toEqual({ a: 2 });
  });

  it('extracts the object from surrounding prose', () => {
    expect(parseAIResponse('Here you go: {"verdict":"pass"} Thanks!')).toEqual({ verdict: 'pass' });
  });

  it('throws when there is no JSON at all', () => {
    expect(() => parseAIResponse('no json here')).toThrow(SyntaxError);
  });
});
