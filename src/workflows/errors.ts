/**
 * Workflow Error Types
 * Every error that ends a stage carries the stage, the retries already consumed,
 * and the page or character it concerns.
 */

import type { FailureReport } from '@/shared/types.js';

export type WorkflowStage =
  | 'intake'
  | 'planning'
  | 'styling'
  | 'drafting_art'
  | 'rendering'
  | 'qa'
  | 'export';

export abstract class WorkflowError extends Error {
  abstract readonly code: string;
  public readonly stage: WorkflowStage;
  public readonly retriesConsumed: number;
  public readonly pageIndices?: number[];
  public readonly characterName?: string;

  protected constructor(params: {
    message: string;
    stage: WorkflowStage;
    retriesConsumed?: number;
    pageIndices?: number[];
    characterName?: string;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.stage = params.stage;
    this.retriesConsumed = params.retriesConsumed ?? 0;
    if (params.pageIndices) this.pageIndices = params.pageIndices;
    if (params.characterName) this.characterName = params.characterName;
  }

  toReport(): FailureReport {
    return {
      code: this.code,
      stage: this.stage,
      message: this.message,
      retriesConsumed: this.retriesConsumed,
      ...(this.pageIndices && { pageIndices: [...this.pageIndices] }),
      ...(this.characterName && { characterName: this.characterName }),
    };
  }
}

export class InvalidBriefError extends WorkflowError {
  readonly code = 'INVALID_BRIEF';
  public readonly field: string;

  constructor(field: string, reason: string) {
    super({ message: `Invalid brief (${field}): ${reason}`, stage: 'intake' });
    this.name = 'InvalidBriefError';
    this.field = field;
  }
}

export class PlanningContractViolation extends WorkflowError {
  readonly code = 'PLANNING_CONTRACT_VIOLATION';
  public readonly violations: string[];

  constructor(violations: string[], retriesConsumed: number) {
    super({
      message: `Planning collaborator returned an unusable outline after ${retriesConsumed} corrective retr${
        retriesConsumed === 1 ? 'y' : 'ies'
      }: ${violations.join('; ')}`,
      stage: 'planning',
      retriesConsumed,
    });
    this.name = 'PlanningContractViolation';
    this.violations = violations;
  }
}

export class StyleLockFailure extends WorkflowError {
  readonly code = 'STYLE_LOCK_FAILURE';

  constructor(reason: string, cause?: unknown) {
    super({
      message: `Style reference generation failed: ${reason}`,
      stage: 'styling',
      retriesConsumed: 0,
      cause,
    });
    this.name = 'StyleLockFailure';
  }
}

export class CharacterLockFailure extends WorkflowError {
  readonly code = 'CHARACTER_LOCK_FAILURE';

  constructor(characterName: string, retriesConsumed: number, reason: string, cause?: unknown) {
    super({
      message: `Reference generation for character "${characterName}" failed after ${retriesConsumed} retries: ${reason}`,
      stage: 'styling',
      retriesConsumed,
      characterName,
      cause,
    });
    this.name = 'CharacterLockFailure';
  }
}

export class RenderServiceError extends WorkflowError {
  readonly code = 'RENDER_SERVICE_ERROR';
  public readonly pageIndex: number;
  /** True when the provider refused the prompt on policy grounds */
  public readonly blocked: boolean;

  constructor(pageIndex: number, reason: string, options: { blocked?: boolean; retriesConsumed?: number; cause?: unknown } = {}) {
    super({
      message: `Render of page ${pageIndex} failed: ${reason}`,
      stage: 'rendering',
      retriesConsumed: options.retriesConsumed ?? 0,
      pageIndices: [pageIndex],
      cause: options.cause,
    });
    this.name = 'RenderServiceError';
    this.pageIndex = pageIndex;
    this.blocked = options.blocked ?? false;
  }
}

export class IncompleteStoryError extends WorkflowError {
  readonly code = 'INCOMPLETE_STORY';

  constructor(pageIndices: number[], retriesConsumed: number, detail?: string) {
    super({
      message: `Export blocked: page(s) ${pageIndices.join(', ')} did not pass QA${detail ? ` (${detail})` : ''}`,
      stage: 'export',
      retriesConsumed,
      pageIndices,
    });
    this.name = 'IncompleteStoryError';
  }
}

export class DocumentRenderError extends WorkflowError {
  readonly code = 'DOCUMENT_RENDER_ERROR';

  constructor(reason: string, cause?: unknown) {
    super({ message: `Document rendering failed: ${reason}`, stage: 'export', cause });
    this.name = 'DocumentRenderError';
  }
}

export class ProjectCancelledError extends WorkflowError {
  readonly code = 'PROJECT_CANCELLED';

  constructor(stage: WorkflowStage, reason: string) {
    super({ message: `Project cancelled during ${stage}: ${reason}`, stage });
    this.name = 'ProjectCancelledError';
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
