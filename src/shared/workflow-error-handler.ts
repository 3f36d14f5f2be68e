/**
 * Workflow Error Handler
 * Turns anything a stage throws into the project's FailureReport and logs it
 */

import { logger } from '@/config/logger.js';
import type { FailureReport } from '@/shared/types.js';
import { ProjectCancelledError, isWorkflowError, type WorkflowStage } from '@/workflows/errors.js';

function describeAbortReason(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.name === 'TimeoutError' ? 'run timed out' : reason.message;
  }
  return typeof reason === 'string' && reason ? reason : 'aborted';
}

export class WorkflowErrorHandler {
  /**
   * Map a thrown value to a FailureReport. An aborted signal wins over the
   * error it caused, so cancellations always report as PROJECT_CANCELLED.
   */
  toFailureReport(error: unknown, stage: WorkflowStage, signal?: AbortSignal): FailureReport {
    if (signal?.aborted && !(error instanceof ProjectCancelledError)) {
      return new ProjectCancelledError(stage, describeAbortReason(signal.reason)).toReport();
    }
    if (isWorkflowError(error)) {
      return error.toReport();
    }
    return {
      code: 'UNEXPECTED_ERROR',
      stage,
      message: `Unexpected failure during ${stage}: ${error instanceof Error ? error.message : String(error)}`,
      retriesConsumed: 0,
    };
  }

  /**
   * Build the report and log it with the project's context
   */
  handle(projectId: string, error: unknown, stage: WorkflowStage, signal?: AbortSignal): FailureReport {
    const report = this.toFailureReport(error, stage, signal);
    const context = {
      projectId,
      ...report,
      ...(error instanceof Error && error.stack && { stack: error.stack }),
    };

    if (report.code === 'PROJECT_CANCELLED') {
      logger.warn('Project cancelled', context);
    } else {
      logger.error('Project failed', context);
    }
    return report;
  }
}

export const workflowErrorHandler = new WorkflowErrorHandler();
