import { describe, it, expect, beforeEach, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

jest.mock('fs/promises', () => ({
  readFile: jest.fn(),
}));

jest.mock('@/shared/path-utils', () => ({
  getPromptsPath: jest.fn(() => '/prompts'),
}));

import { readFile } from 'fs/promises';
import { PromptService } from '../services/prompt';
import { logger } from '@/config/logger';

describe('PromptService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('loads a prompt template once and serves it from cache afterwards', async () => {
    (readFile as jest.Mock).mockImplementation(async () => '{"userPrompt":"Hi"}');

    const first = await PromptService.loadPrompt('greeting');
    const second = await PromptService.loadPrompt('greeting');

    expect(first.userPrompt).toBe('Hi');
    expect(second).toBe(first);
    expect(readFile).toHaveBeenCalledTimes(1);
    expect(readFile).toHaveBeenCalledWith('/prompts/greeting.json', 'utf-8');
    expect(logger.debug).toHaveBeenCalled();
  });

  it('throws when the prompt template is missing', async () => {
    (readFile as jest.Mock).mockImplementation(async () => {
      throw new Error('missing');
    });

    await expect(PromptService.loadPrompt('absent')).rejects.toThrow('Failed to load prompt template: absent');
    expect(logger.error).toHaveBeenCalled();
  });

  it('loads a JSON schema from the schemas directory', async () => {
    (readFile as jest.Mock).mockImplementation(async () => '{"type":"object"}');

    const schema = await PromptService.loadSchema('outline-shape');

    expect(schema).toEqual({ type: 'object' });
    expect(readFile).toHaveBeenCalledWith('/prompts/schemas/outline-shape.json', 'utf-8');
  });

  it('processes variables and conditionals', () => {
    const template = 'Hello {{name}} {{#extra}}Extra: {{extra}}{{/extra}}';

    expect(PromptService.processPrompt(template, { name: 'World', extra: '!' })).toBe('Hello World Extra: !');
    expect(PromptService.processPrompt(template, { name: 'World', extra: '' })).toBe('Hello World ');
  });

  it('builds the system prompt only when the template has one', () => {
    expect(PromptService.buildPrompt({ systemPrompt: 'sys {{v}}', userPrompt: 'user {{v}}' }, { v: 'x' })).toEqual({
      systemPrompt: 'sys x',
      userPrompt: 'user x',
    });
    expect(PromptService.buildPrompt({ userPrompt: 'only' }, {})).toEqual({ userPrompt: 'only' });
  });
});
