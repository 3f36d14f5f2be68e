import { describe, it, expect } from '@jest/globals';
import { CliUsageError, parseCreateStoryArgs } from '@/cli/create-story-args';

describe('parseCreateStoryArgs', () => {
  it('joins the remaining words into the topic', () => {
    expect(parseCreateStoryArgs(['fox', 'and', 'owl', 'solve', 'mysteries'])).toEqual({
      topic: 'fox and owl solve mysteries',
      debug: false,
      verbose: false,
      help: false,
    });
  });

  it('reads flags in short and long form anywhere in the line', () => {
    const args = parseCreateStoryArgs(['-d', 'robot discovers emotions', '--verbose', '-t', '15']);

    expect(args).toEqual({
      topic: 'robot discovers emotions',
      debug: true,
      verbose: true,
      help: false,
      timeoutMinutes: 15,
    });
  });

  it('allows --help without a topic', () => {
    expect(parseCreateStoryArgs(['--help']).help).toBe(true);
  });

  it.each([
    [['--timeout'], '--timeout requires a whole number of minutes'],
    [['--timeout', 'soon', 'a story'], '--timeout requires a whole number of minutes'],
    [['-t', '0', 'a story'], '--timeout requires a whole number of minutes'],
    [['--colour', 'a story'], 'Unknown option --colour'],
    [['--debug'], 'A story topic is required'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCreateStoryArgs(argv)).toThrow(new CliUsageError(message));
  });
});
