/**
 * OpenAI Text Generation Service
 */

import OpenAI from 'openai';
import type {
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { EmptyProviderResponseError } from '@/ai/errors.js';
import { logger } from '@/config/logger.js';

export interface OpenAITextConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
}

export class OpenAITextService implements ITextGenerationService {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAITextConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL && { baseURL: config.baseURL }),
    });
    this.model = config.model || 'gpt-4.1-mini';

    logger.info('OpenAI Text Service initialized', {
      model: this.model,
    });
  }

  async complete(prompt: string, options?: TextGenerationOptions): Promise<string> {
    const model = options?.model || this.model;
    try {
      const content: ChatCompletionContentPart[] = (options?.mediaParts ?? []).map((media) => ({
        type: 'image_url',
        image_url: { url: `data:${media.mimeType};base64,${media.data.toString('base64')}` },
      }));
      content.push({ type: 'text', text: prompt });

      const messages: ChatCompletionMessageParam[] = [];
      if (options?.systemPrompt) {
        messages.push({ role: 'system', content: options.systemPrompt });
      }
      messages.push({ role: 'user', content });

      const body: ChatCompletionCreateParamsNonStreaming = {
        model,
        messages,
        temperature: options?.temperature ?? 0.7,
        max_tokens: options?.maxTokens || 4096,
      };
      if (options?.jsonSchema) {
        body.response_format = {
          type: 'json_schema',
          json_schema: { name: 'structured_output', schema: options.jsonSchema, strict: false },
        };
      }

      const completion = await this.client.chat.completions.create(
        body,
        options?.signal ? { signal: options.signal } : undefined,
      );
      const text = completion.choices[0]?.message?.content;
      if (!text) {
        throw new EmptyProviderResponseError(
          'openai',
          `No text content in OpenAI response (finish_reason=${completion.choices[0]?.finish_reason ?? 'none'})`,
        );
      }

      logger.info('OpenAI - response received', {
        model,
        responseLength: text.length,
        totalTokens: completion.usage?.total_tokens,
      });

      return text;
    } catch (error) {
      logger.error('OpenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        promptLength: prompt.length,
        model,
      });
      throw error;
    }
  }
}
