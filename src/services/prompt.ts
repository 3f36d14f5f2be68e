/**
 * Prompt Service
 * Handles loading and processing of AI prompts from JSON files
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { getPromptsPath } from '../shared/path-utils.js';

const promptTemplateSchema = z.object({
  systemPrompt: z.string().optional(),
  userPrompt: z.string(),
  outputFormat: z.string().optional(),
  templateVariables: z.record(z.string()).optional(),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

export class PromptService {
  private static readonly PROMPTS_BASE_PATH = getPromptsPath();
  private static readonly cache = new Map<string, PromptTemplate>();

  /**
   * Load a prompt template from JSON file
   */
  static async loadPrompt(promptName: string): Promise<PromptTemplate> {
    const cached = this.cache.get(promptName);
    if (cached) return cached;

    const promptPath = join(this.PROMPTS_BASE_PATH, `${promptName}.json`);
    try {
      const promptContent = await readFile(promptPath, 'utf-8');
      const promptTemplate = promptTemplateSchema.parse(JSON.parse(promptContent));
      this.cache.set(promptName, promptTemplate);

      logger.debug('Prompt template loaded successfully', {
        promptName,
        promptPath,
      });

      return promptTemplate;
    } catch (error) {
      logger.error('Failed to load prompt template', {
        error: error instanceof Error ? error.message : String(error),
        promptName,
      });
      throw new Error(`Failed to load prompt template: ${promptName}`, { cause: error });
    }
  }

  /**
   * Load a JSON schema used for structured model output
   */
  static async loadSchema(schemaName: string): Promise<Record<string, unknown>> {
    const schemaPath = join(this.PROMPTS_BASE_PATH, 'schemas', `${schemaName}.json`);
    try {
      const content = await readFile(schemaPath, 'utf-8');
      return z.record(z.unknown()).parse(JSON.parse(content));
    } catch (error) {
      logger.error('Failed to load JSON schema', {
        error: error instanceof Error ? error.message : String(error),
        schemaName,
      });
      throw new Error(`Failed to load JSON schema: ${schemaName}`, { cause: error });
    }
  }

  /**
   * Process a prompt template by replacing variables
   */
  static processPrompt(template: string, variables: Record<string, unknown>): string {
    let processedTemplate = template;

    // Handle conditional sections (e.g., {{#customInstructions}}...{{/customInstructions}})
    for (const [key, value] of Object.entries(variables)) {
      const conditionalPattern = new RegExp(`\\{\\{#${key}\\}\\}(.*?)\\{\\{\\/${key}\\}\\}`, 'gs');

      if (value && String(value).trim() !== '') {
        processedTemplate = processedTemplate.replace(conditionalPattern, '$1');
      } else {
        processedTemplate = processedTemplate.replace(conditionalPattern, '');
      }
    }

    // Replace template variables (e.g., {{variableName}})
    for (const [key, value] of Object.entries(variables)) {
      const placeholder = `{{${key}}}`;
      const replacement = String(value ?? '');
      processedTemplate = processedTemplate.split(placeholder).join(replacement);
    }

    return processedTemplate;
  }

  /**
   * Build the user prompt and the processed system prompt of a template
   */
  static buildPrompt(
    promptTemplate: PromptTemplate,
    variables: Record<string, unknown>,
  ): { systemPrompt?: string; userPrompt: string } {
    const userPrompt = this.processPrompt(promptTemplate.userPrompt, variables);
    if (promptTemplate.systemPrompt) {
      return { systemPrompt: this.processPrompt(promptTemplate.systemPrompt, variables), userPrompt };
    }
    return { userPrompt };
  }
}
