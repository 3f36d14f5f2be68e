/**
 * Drift Evaluation
 * A multimodal text model compares a candidate page with the locked references.
 * The memoizing wrapper makes a verdict a pure function of the stored artifacts:
 * the same candidate against the same references is judged once.
 */

import { z } from 'zod';
import { EmptyProviderResponseError } from '@/ai/errors.js';
import type {
  DriftEvaluationRequest,
  DriftReport,
  IDriftEvaluationService,
  ITextGenerationService,
  MediaPart,
} from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { withRetry } from '@/shared/retry-utils.js';
import { parseAIResponse } from '@/shared/utils.js';
import { PromptService } from './prompt.js';
import type { IArtifactStore } from './storage.js';

const driftReportSchema = z.object({
  verdict: z.enum(['pass', 'drift']),
  issues: z
    .array(
      z.object({
        category: z.enum(['palette', 'wardrobe', 'appearance', 'style', 'other']).catch('other'),
        subject: z.string().optional(),
        description: z.string().min(1),
      }),
    )
    .default([]),
});

export class MultimodalDriftEvaluator implements IDriftEvaluationService {
  constructor(
    private readonly textService: ITextGenerationService,
    private readonly store: IArtifactStore,
    private readonly options: { retryDelayMs?: number } = {},
  ) {}

  async evaluate(request: DriftEvaluationRequest, options: { signal?: AbortSignal } = {}): Promise<DriftReport> {
    const [template, jsonSchema] = await Promise.all([
      PromptService.loadPrompt('drift-evaluation'),
      PromptService.loadSchema('drift-report'),
    ]);
    const characterList = request.characterReferences
      .map((c, i) => `${i + 3}. ${c.name}: ${c.visualTag}`)
      .join('\n');
    const { systemPrompt, userPrompt } = PromptService.buildPrompt(template, {
      pageIndex: request.pageIndex,
      styleDescriptor: request.styleDescriptor,
      characterList,
    });

    // Candidate first, style second, then the characters in listed order
    const images = [request.candidate, request.styleReference, ...request.characterReferences.map((c) => c.image)];
    const mediaParts: MediaPart[] = await Promise.all(
      images.map(async (artifact) => ({ mimeType: artifact.mimeType, data: await this.store.get(artifact.id) })),
    );

    const signal = options.signal;
    const response = await withRetry(
      () =>
        this.textService.complete(userPrompt, {
          ...(systemPrompt && { systemPrompt }),
          jsonSchema,
          mediaParts,
          temperature: 0,
          ...(signal && { signal }),
        }),
      { maxAttempts: 2, baseDelayMs: this.options.retryDelayMs ?? 1000, ...(signal && { signal }) },
    );

    const parsed = driftReportSchema.safeParse(this.parse(response));
    if (!parsed.success) {
      throw new EmptyProviderResponseError('drift-evaluator', `Unusable drift report: ${parsed.error.message}`);
    }

    const { verdict, issues } = parsed.data;
    const report: DriftReport =
      verdict === 'pass'
        ? { verdict: 'pass', issues: [] }
        : {
            verdict: 'drift',
            issues: issues.length
              ? issues.map((issue) => ({
                  category: issue.category,
                  ...(issue.subject && { subject: issue.subject }),
                  description: issue.description,
                }))
              : [{ category: 'other', description: 'evaluator reported drift without details' }],
          };

    logger.info('Drift evaluation complete', {
      pageIndex: request.pageIndex,
      candidate: request.candidate.id,
      verdict: report.verdict,
      issueCount: report.issues.length,
    });
    return report;
  }

  private parse(response: string): unknown {
    try {
      return parseAIResponse(response);
    } catch (error) {
      throw new EmptyProviderResponseError(
        'drift-evaluator',
        `Drift report is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

export function driftEvaluationKey(request: DriftEvaluationRequest): string {
  const characters = request.characterReferences.map((c) => `${c.name.toLowerCase()}=${c.image.id}`).join(',');
  return `${request.candidate.id}|${request.styleReference.id}|${characters}`;
}

export class MemoizedDriftEvaluator implements IDriftEvaluationService {
  private readonly cache = new Map<string, Promise<DriftReport>>();

  constructor(private readonly inner: IDriftEvaluationService) {}

  evaluate(request: DriftEvaluationRequest, options: { signal?: AbortSignal } = {}): Promise<DriftReport> {
    const key = driftEvaluationKey(request);
    const cached = this.cache.get(key);
    if (cached) {
      logger.debug('Drift evaluation served from cache', { pageIndex: request.pageIndex, key });
      return cached;
    }

    const pending = this.inner.evaluate(request, options);
    this.cache.set(key, pending);
    // Failed evaluations are not remembered
    pending.catch(() => this.cache.delete(key));
    return pending;
  }

  get size(): number {
    return this.cache.size;
  }
}
