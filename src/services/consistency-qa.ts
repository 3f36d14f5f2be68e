/**
 * Consistency QA Loop
 *
 *   pending -> (pass | drift) -> pending(retry) -> ... -> (pass | failed)
 *
 * Each page has a budget of render attempts, the initial render included.
 * A drifted page is regenerated alone with a tightened ArtSpec and the same
 * reference set; a page whose render failed is rendered again. Both consume
 * the budget. A render that never reached the provider is not charged, and a
 * page the provider refused on policy grounds fails without another attempt.
 *
 * With continuity, a page that still needs an image waits until its
 * predecessor has settled and renders against that page's final image.
 */

import type { DriftReport, IDriftEvaluationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { MemoizedDriftEvaluator } from './drift-evaluator.js';
import { runWithConcurrency } from '@/shared/concurrency.js';
import type { ArtSpec, Project, RenderResult } from '@/shared/types.js';
import type { PageArtDirector } from './art-director.js';
import type { RenderCoordinator } from './render-coordinator.js';

export interface ConsistencyQAConfig {
  pageAttemptBudget: number;
  qaConcurrency: number;
}

export interface QAListeners {
  onResult: (result: RenderResult) => void;
  onArtSpec: (spec: ArtSpec) => void;
}

interface PageRun {
  listeners: QAListeners;
  /** Verdicts are memoized for the length of one run */
  evaluator: IDriftEvaluationService;
  /** Settled result of page i-1, awaited before a continuity render */
  predecessor?: Promise<RenderResult> | undefined;
  signal?: AbortSignal | undefined;
}

export class ConsistencyQALoop {
  constructor(
    private readonly evaluator: IDriftEvaluationService,
    private readonly coordinator: RenderCoordinator,
    private readonly director: PageArtDirector,
    private readonly config: ConsistencyQAConfig,
  ) {}

  /**
   * Drive every page to a terminal verdict. Pages are independent; a failed
   * page does not stop the others.
   */
  async run(project: Project, listeners: QAListeners, signal?: AbortSignal): Promise<RenderResult[]> {
    const pageIndices = project.pages.map((p) => p.index).sort((a, b) => a - b);
    // Pages start in order, so a predecessor's entry exists before its successor looks it up
    const settled = new Map<number, Promise<RenderResult>>();
    const evaluator = new MemoizedDriftEvaluator(this.evaluator);
    const results = await runWithConcurrency(pageIndices, this.config.qaConcurrency, (pageIndex) => {
      const predecessor = project.continuity ? settled.get(pageIndex - 1) : undefined;
      const processing = this.processPage(project, pageIndex, { listeners, evaluator, predecessor, signal });
      settled.set(pageIndex, processing);
      return processing;
    });

    const failed = results.filter((r) => r.verdict === 'failed').map((r) => r.pageIndex);
    logger.info('Consistency QA complete', {
      projectId: project.id,
      passed: results.length - failed.length,
      failedPages: failed,
      totalRetries: results.reduce((sum, r) => sum + r.retryCount, 0),
    });
    return results;
  }

  /**
   * Judge a rendered page against its references. Pure with respect to the
   * stored artifacts when the evaluator is memoized.
   */
  async evaluatePage(
    project: Project,
    result: RenderResult,
    signal?: AbortSignal,
    evaluator: IDriftEvaluationService = this.evaluator,
  ): Promise<DriftReport> {
    if (!result.image) {
      throw new Error(`Page ${result.pageIndex} has no image to evaluate`);
    }
    if (!project.styleReference) {
      throw new Error('Style reference is not locked');
    }
    const outline = project.pages.find((p) => p.index === result.pageIndex);
    const characterReferences = (outline?.characters ?? []).flatMap((name) => {
      const character = project.characters.find((c) => c.name.toLowerCase() === name.toLowerCase());
      return character?.referenceImage
        ? [{ name: character.name, visualTag: character.visualTag, image: character.referenceImage }]
        : [];
    });

    return evaluator.evaluate(
      {
        pageIndex: result.pageIndex,
        candidate: result.image,
        styleReference: project.styleReference.image,
        styleDescriptor: project.styleReference.descriptor,
        characterReferences,
      },
      signal ? { signal } : {},
    );
  }

  private async processPage(
    project: Project,
    pageIndex: number,
    pageRun: PageRun,
  ): Promise<RenderResult> {
    const { listeners, predecessor, signal } = pageRun;
    const outline = project.pages.find((p) => p.index === pageIndex);
    let spec = project.artSpecs.find((s) => s.pageIndex === pageIndex);
    let result = project.renders.find((r) => r.pageIndex === pageIndex);
    if (!outline || !spec || !result) {
      throw new Error(`Page ${pageIndex} is missing its outline, art spec or render`);
    }

    const budget = this.config.pageAttemptBudget;
    const update = (next: RenderResult): RenderResult => {
      listeners.onResult(next);
      return next;
    };

    while (result.verdict === 'pending' || result.verdict === 'drift') {
      signal?.throwIfAborted();
      const attemptsUsed = result.retryCount + 1;

      if (!result.image) {
        if (result.blocked) {
          logger.warn('Page blocked by provider policy, not retrying', { projectId: project.id, pageIndex });
          return update({ ...result, verdict: 'failed' });
        }

        let previous: RenderResult | undefined;
        if (predecessor) {
          previous = await predecessor;
          if (!previous.image) {
            return update({
              ...result,
              verdict: 'failed',
              lastError: `continuity reference unavailable: page ${previous.pageIndex} failed without an image`,
            });
          }
        }

        const reachedProvider = result.references.length > 0;
        const retryCount = reachedProvider ? result.retryCount + 1 : result.retryCount;
        if (retryCount >= budget) {
          return update({ ...result, verdict: 'failed' });
        }
        result = update(
          await this.coordinator.renderPage(project, spec, {
            retryCount,
            references: reachedProvider ? result.references : undefined,
            previous,
            signal,
          }),
        );
        if (!result.image && !result.references.length) {
          // The reference set still cannot be built; waiting again would not change it
          return update({ ...result, verdict: 'failed' });
        }
        continue;
      }

      const { report, evaluationFailed } = await this.evaluateOrTreatAsDrift(project, result, pageRun.evaluator, signal);
      if (report.verdict === 'pass') {
        return update({ ...result, verdict: 'pass', driftIssues: [], evaluatedImageId: result.image.id });
      }

      result = update({ ...result, verdict: 'drift', driftIssues: report.issues, evaluatedImageId: result.image.id });
      logger.warn('Drift detected', {
        projectId: project.id,
        pageIndex,
        attemptsUsed,
        budget,
        issues: report.issues,
      });

      if (attemptsUsed >= budget) {
        return update({
          ...result,
          verdict: 'failed',
          lastError: evaluationFailed
            ? `Page could not be evaluated after ${attemptsUsed} render attempts`
            : `Drift persisted after ${attemptsUsed} render attempts`,
        });
      }

      // An unjudged page is rendered again as is; real drift tightens the spec
      if (!evaluationFailed) {
        spec = this.director.tighten(spec, report.issues, outline, project);
        listeners.onArtSpec(spec);
      }
      result = update(
        await this.coordinator.renderPage(project, spec, {
          retryCount: result.retryCount + 1,
          references: result.references,
          signal,
        }),
      );
    }

    return result;
  }

  /**
   * An evaluation that keeps failing counts as drift, so the page is retried
   * within its budget rather than passed unchecked.
   */
  private async evaluateOrTreatAsDrift(
    project: Project,
    result: RenderResult,
    evaluator: IDriftEvaluationService,
    signal?: AbortSignal,
  ): Promise<{ report: DriftReport; evaluationFailed: boolean }> {
    try {
      return { report: await this.evaluatePage(project, result, signal, evaluator), evaluationFailed: false };
    } catch (error) {
      if (signal?.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Drift evaluation failed', { projectId: project.id, pageIndex: result.pageIndex, error: message });
      return {
        report: { verdict: 'drift', issues: [{ category: 'other', description: `drift evaluation failed: ${message}` }] },
        evaluationFailed: true,
      };
    }
  }
}
