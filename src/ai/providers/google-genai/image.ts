/**
 * Google Gemini Image Generation Service
 * Text-only and multi-reference generation through Gemini image models.
 */

import { GoogleGenAI, Modality, type GenerateContentResponse, type Part } from '@google/genai';
import type { GeneratedImage, IImageGenerationService, ImageGenerationOptions } from '../../interfaces.js';
import { logger } from '@/config/logger.js';
import { EmptyProviderResponseError, ImageGenerationBlockedError, type ProviderDiagnostic } from '@/ai/errors.js';

export interface GoogleGenAIImageConfig {
  apiKey: string;
  model?: string;
}

const BLOCKING_FINISH_REASONS = new Set(['PROHIBITED_CONTENT', 'SAFETY', 'IMAGE_SAFETY', 'BLOCKLIST']);

export class GoogleGenAIImageService implements IImageGenerationService {
  private client: GoogleGenAI;
  private model: string;

  /**
   * Normalise Gemini / Google API error surfaces for better logging.
   */
  private static extractGoogleError(err: unknown): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    if (typeof err !== 'object' || err === null) return out;
    if ('status' in err) out.status = err.status;
    if ('code' in err) out.code = err.code;
    if (err instanceof Error) {
      const token = err.message.split(/[ :]/)[0];
      if (token && token === token.toUpperCase() && token.length < 40) {
        out.statusGuess = token;
      }
    }
    return out;
  }

  constructor(config: GoogleGenAIImageConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = config.model || 'gemini-2.5-flash-image';

    logger.info('Google Gemini Image Service initialized', { model: this.model });
  }

  async generate(prompt: string, options?: ImageGenerationOptions): Promise<GeneratedImage> {
    const model = options?.model || this.model;
    const referenceImages = options?.referenceImages ?? [];

    try {
      // Reference images first, then the instruction that explains them, then the prompt
      const parts: Part[] = referenceImages.map((ref) => ({
        inlineData: {
          data: ref.buffer.toString('base64'),
          mimeType: ref.mimeType || 'image/jpeg',
        },
      }));
      if (referenceImages.length) {
        parts.push({
          text: 'The preceding images are reference material. The first image fixes the art style and palette; the following images fix the look of each character. Keep them consistent.',
        });
      }
      const aspectRatio = options?.aspectRatio ?? '2:3';
      parts.push({ text: `${prompt}\n\nAspect ratio: ${aspectRatio}.` });

      logger.debug('Google Gemini Image - request prepared', {
        model,
        imageType: options?.imageType,
        pageIndex: options?.pageIndex,
        referenceSources: referenceImages.map((r) => r.source),
        promptPreview: prompt.slice(0, 120),
      });

      const response = await this.client.models.generateContent({
        model,
        contents: [{ role: 'user', parts }],
        config: {
          responseModalities: [Modality.IMAGE],
          ...(options?.systemPrompt && { systemInstruction: options.systemPrompt }),
          ...(options?.signal && { abortSignal: options.signal }),
        },
      });

      const image = this.extractInlineImage(response, model);
      logger.info('Google Gemini Image: image generated', {
        model,
        size: image.buffer.length,
        imageType: options?.imageType,
        pageIndex: options?.pageIndex,
        referenceImageCount: referenceImages.length,
      });
      return image;
    } catch (error) {
      logger.error('Google Gemini image generation failed', {
        error: error instanceof Error ? error.message : String(error),
        ...GoogleGenAIImageService.extractGoogleError(error),
        promptLength: prompt.length,
        model,
        imageType: options?.imageType,
        pageIndex: options?.pageIndex,
      });
      throw error;
    }
  }

  private extractInlineImage(response: GenerateContentResponse, model: string): GeneratedImage {
    const candidates = response.candidates ?? [];
    for (const candidate of candidates) {
      for (const part of candidate.content?.parts ?? []) {
        if (part.inlineData?.data) {
          return {
            buffer: Buffer.from(part.inlineData.data, 'base64'),
            mimeType: part.inlineData.mimeType || 'image/png',
          };
        }
      }
    }

    const diagnostics: ProviderDiagnostic[] = candidates.map((c, idx) => ({
      idx,
      finishReason: c.finishReason === undefined ? undefined : String(c.finishReason),
      hasContent: !!c.content,
      partCount: c.content?.parts?.length ?? 0,
    }));
    const finishReasons = Array.from(
      new Set(diagnostics.map((d) => d.finishReason).filter((r): r is string => typeof r === 'string')),
    );
    logger.error('Google Gemini Image - no inline image data in response', {
      model,
      candidateCount: candidates.length,
      diagnostics,
      finishReasons,
    });

    if (finishReasons.length && finishReasons.every((r) => BLOCKING_FINISH_REASONS.has(r))) {
      throw new ImageGenerationBlockedError({
        provider: 'google-genai',
        finishReasons,
      });
    }

    throw new EmptyProviderResponseError(
      'google-genai',
      'No image data returned from Gemini image model' +
        (finishReasons.length ? ` (finishReasons=${finishReasons.join(',')})` : ''),
    );
  }
}
