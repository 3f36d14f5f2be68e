/**
 * AI Gateway Factory
 * Creates the planning, image and drift-evaluation services from provider configuration
 */

import type { IArtifactStore } from '@/services/storage.js';
import { MultimodalDriftEvaluator } from '@/services/drift-evaluator.js';
import type {
  AIProviderConfig,
  IDriftEvaluationService,
  IImageGenerationService,
  ITextGenerationService,
  TextProvider,
} from './interfaces.js';
import { OpenAITextService } from './providers/openai/text.js';
import { GoogleGenAITextService } from './providers/google-genai/text.js';
import { GoogleGenAIImageService } from './providers/google-genai/image.js';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';

export class AIGateway {
  private textService: ITextGenerationService;
  private imageService: IImageGenerationService;
  private driftTextService: ITextGenerationService;
  private config: AIProviderConfig;

  constructor(config: AIProviderConfig) {
    this.config = config;
    this.textService = this.createTextService(config.textProvider);
    this.imageService = this.createImageService();
    this.driftTextService = this.createTextService(config.driftProvider, true);

    logger.info('AI Gateway initialized', {
      textProvider: config.textProvider,
      imageProvider: config.imageProvider,
      driftProvider: config.driftProvider,
    });
  }

  private createTextService(provider: TextProvider, forDrift = false): ITextGenerationService {
    const { credentials } = this.config;
    switch (provider) {
      case 'openai':
        if (!credentials.openaiApiKey) {
          throw new Error('OpenAI API Key is required for OpenAI text service');
        }
        return new OpenAITextService({
          apiKey: credentials.openaiApiKey,
          model: credentials.openaiTextModel || 'gpt-4.1-mini',
        });

      case 'google-genai': {
        if (!credentials.googleGenAIApiKey) {
          throw new Error('Google GenAI API Key is required for Google GenAI text service');
        }
        const model = forDrift
          ? credentials.googleGenAIDriftModel || credentials.googleGenAIModel
          : credentials.googleGenAIModel;
        return new GoogleGenAITextService({
          apiKey: credentials.googleGenAIApiKey,
          model: model || 'gemini-2.5-flash',
        });
      }

      default:
        throw new Error(`Unsupported text provider: ${String(provider)}`);
    }
  }

  private createImageService(): IImageGenerationService {
    switch (this.config.imageProvider) {
      case 'google-genai': {
        if (!this.config.credentials.googleGenAIApiKey) {
          throw new Error('Google GenAI API Key is required for Google Gemini image service');
        }
        const model = this.config.credentials.googleGenAIImageModel || 'gemini-2.5-flash-image';
        logger.debug('AI Gateway - image model resolved', { model });
        return new GoogleGenAIImageService({
          apiKey: this.config.credentials.googleGenAIApiKey,
          model,
        });
      }

      default:
        throw new Error(`Unsupported image provider: ${String(this.config.imageProvider)}`);
    }
  }

  /**
   * Get the planning text service
   */
  public getTextService(): ITextGenerationService {
    return this.textService;
  }

  /**
   * Get the image generation service
   */
  public getImageService(): IImageGenerationService {
    return this.imageService;
  }

  /**
   * Drift evaluator reading candidate and reference bytes from the given store.
   * The consistency loop memoizes its verdicts per run.
   */
  public createDriftEvaluator(store: IArtifactStore, retryDelayMs?: number): IDriftEvaluationService {
    return new MultimodalDriftEvaluator(this.driftTextService, store, retryDelayMs === undefined ? {} : { retryDelayMs });
  }

  /**
   * Create AI Gateway from environment variables
   */
  public static fromEnvironment(): AIGateway {
    const env = getEnvironment();
    return new AIGateway({
      textProvider: env.TEXT_PROVIDER,
      imageProvider: env.IMAGE_PROVIDER,
      driftProvider: env.DRIFT_PROVIDER ?? env.TEXT_PROVIDER,
      credentials: {
        openaiApiKey: env.OPENAI_API_KEY,
        openaiTextModel: env.OPENAI_TEXT_MODEL,
        googleGenAIApiKey: env.GOOGLE_GENAI_API_KEY,
        googleGenAIModel: env.GOOGLE_GENAI_MODEL,
        googleGenAIImageModel: env.GOOGLE_GENAI_IMAGE_MODEL,
        googleGenAIDriftModel: env.GOOGLE_GENAI_DRIFT_MODEL,
      },
    });
  }
}
