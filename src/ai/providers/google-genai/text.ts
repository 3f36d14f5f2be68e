/**
 * Google GenAI Text Generation Service
 */

import { GoogleGenerativeAI, type GenerationConfig, type Part } from '@google/generative-ai';
import type { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { EmptyProviderResponseError } from '@/ai/errors.js';
import { logger } from '@/config/logger.js';

export interface GoogleGenAITextConfig {
  apiKey: string;
  model?: string;
}

export class GoogleGenAITextService implements ITextGenerationService {
  private genAI: GoogleGenerativeAI;
  private model: string;

  constructor(config: GoogleGenAITextConfig) {
    this.genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model || 'gemini-2.5-flash';

    logger.info('Google GenAI Text Service initialized', {
      model: this.model,
    });
  }

  async complete(prompt: string, options?: TextGenerationOptions): Promise<string> {
    const model = options?.model || this.model;
    try {
      const generationConfig: GenerationConfig = {
        maxOutputTokens: options?.maxTokens || 8192,
        temperature: options?.temperature ?? 0.7,
      };

      // The schema travels in the prompt; the caller validates the parsed result
      let fullPrompt = prompt;
      if (options?.jsonSchema) {
        generationConfig.responseMimeType = 'application/json';
        fullPrompt = `${prompt}\n\nRespond only with JSON matching this JSON schema:\n${JSON.stringify(options.jsonSchema)}`;
      }

      const generativeModel = this.genAI.getGenerativeModel({
        model,
        generationConfig,
        ...(options?.systemPrompt && { systemInstruction: options.systemPrompt }),
      });

      const parts: Part[] = (options?.mediaParts ?? []).map((media) => ({
        inlineData: { mimeType: media.mimeType, data: media.data.toString('base64') },
      }));
      parts.push({ text: fullPrompt });

      logger.debug('Google GenAI - generating', {
        model,
        hasJsonSchema: !!options?.jsonSchema,
        mediaPartCount: options?.mediaParts?.length ?? 0,
      });

      const response = await generativeModel.generateContent(
        { contents: [{ role: 'user', parts }] },
        options?.signal ? { signal: options.signal } : undefined,
      );

      const textContent = response.response.candidates?.[0]?.content?.parts
        ?.map((p) => p.text ?? '')
        .join('');
      if (!textContent) {
        throw new EmptyProviderResponseError('google-genai', 'No text content in Google GenAI response');
      }

      logger.info('Google GenAI - response received', {
        model,
        responseLength: textContent.length,
      });

      return textContent;
    } catch (error) {
      logger.error('Google GenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        promptLength: prompt.length,
        model,
      });
      throw error;
    }
  }
}
