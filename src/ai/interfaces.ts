/**
 * AI Gateway Interfaces
 * Provider-agnostic interfaces for planning text, image generation and drift evaluation
 */

import type { DriftIssue, ImageArtifact } from '@/shared/types.js';

export interface MediaPart {
  mimeType: string;
  data: Buffer;
}

export interface ITextGenerationService {
  /**
   * Complete a text generation request
   * @param prompt The input prompt
   * @param options Additional generation options
   */
  complete(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

export interface TextGenerationOptions {
  maxTokens?: number;
  temperature?: number;
  model?: string;
  systemPrompt?: string;
  jsonSchema?: Record<string, unknown>; // JSON schema for structured output
  mediaParts?: MediaPart[]; // Optional image attachments for multimodal requests
  signal?: AbortSignal;
}

export interface ReferenceImage {
  buffer: Buffer;
  mimeType: string;
  /** Artifact id the bytes were read from */
  source: string;
}

export type ImageType = 'style_reference' | 'character_reference' | 'page';

export interface ImageGenerationOptions {
  model?: string;
  aspectRatio?: '1:1' | '2:3' | '3:4' | '4:3' | '9:16' | '16:9';
  imageType?: ImageType;
  /** Target page for page renders and corrective regenerations */
  pageIndex?: number;
  systemPrompt?: string;
  /**
   * Reference images conditioning the output, in priority order:
   * style plate first, then character plates, then the previous page.
   */
  referenceImages?: ReferenceImage[];
  signal?: AbortSignal;
}

export interface GeneratedImage {
  buffer: Buffer;
  mimeType: string;
}

export interface IImageGenerationService {
  /**
   * Generate an image from a prompt, optionally conditioned on reference images
   */
  generate(prompt: string, options?: ImageGenerationOptions): Promise<GeneratedImage>;
}

export interface DriftEvaluationRequest {
  pageIndex: number;
  candidate: ImageArtifact;
  styleReference: ImageArtifact;
  styleDescriptor: string;
  characterReferences: Array<{ name: string; visualTag: string; image: ImageArtifact }>;
}

export interface DriftReport {
  verdict: 'pass' | 'drift';
  issues: DriftIssue[];
}

export interface IDriftEvaluationService {
  evaluate(request: DriftEvaluationRequest, options?: { signal?: AbortSignal }): Promise<DriftReport>;
}

export type TextProvider = 'openai' | 'google-genai';
export type ImageProvider = 'google-genai';

export interface AIProviderConfig {
  textProvider: TextProvider;
  imageProvider: ImageProvider;
  driftProvider: TextProvider;
  credentials: {
    openaiApiKey?: string | undefined;
    openaiTextModel?: string | undefined;
    googleGenAIApiKey?: string | undefined;
    googleGenAIModel?: string | undefined;
    googleGenAIImageModel?: string | undefined;
    googleGenAIDriftModel?: string | undefined;
  };
}
