/**
 * Error taxonomy for the analysis pipeline.
 *
 * Only `EmptyContentError` and `TaskNotFoundError` ever reach callers of the
 * orchestrator; everything else is converted into a Failed task.
 */

import type { AnalyzerKind } from '../analyzers/types.js';
import type { TaskStatus } from './task.js';

export type ErrorKind =
  | 'UnsupportedContentType'
  | 'AnalyzerUnavailable'
  | 'AnalysisFailed'
  | 'EmptyContent'
  | 'TaskNotFound'
  | 'InvalidTaskTransition'
  | 'InternalError';

export abstract class AnalysisError extends Error {
  abstract readonly kind: ErrorKind;
}

export class UnsupportedContentTypeError extends AnalysisError {
  readonly kind = 'UnsupportedContentType' as const;
  readonly attemptedType: string;

  constructor(attemptedType: string, filename?: string) {
    super(
      filename
        ? `Unsupported content type: ${attemptedType} (file: ${filename})`
        : `Unsupported content type: ${attemptedType}`
    );
    this.name = 'UnsupportedContentTypeError';
    this.attemptedType = attemptedType;
  }
}

export class AnalyzerUnavailableError extends AnalysisError {
  readonly kind = 'AnalyzerUnavailable' as const;
  readonly analyzerKind: AnalyzerKind;
  readonly reason: string;

  constructor(analyzerKind: AnalyzerKind, reason: string) {
    super(`Analyzer unavailable: ${analyzerKind} (${reason})`);
    this.name = 'AnalyzerUnavailableError';
    this.analyzerKind = analyzerKind;
    this.reason = reason;
  }
}

export class AnalysisFailedError extends AnalysisError {
  readonly kind = 'AnalysisFailed' as const;
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Analysis failed: ${reason}`, options);
    this.name = 'AnalysisFailedError';
    this.reason = reason;
  }
}

export class EmptyContentError extends AnalysisError {
  readonly kind = 'EmptyContent' as const;

  constructor(message = 'No content provided for analysis') {
    super(message);
    this.name = 'EmptyContentError';
  }
}

export class TaskNotFoundError extends AnalysisError {
  readonly kind = 'TaskNotFound' as const;
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class InvalidTaskTransitionError extends AnalysisError {
  readonly kind = 'InvalidTaskTransition' as const;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTaskTransitionError';
    this.from = from;
    this.to = to;
  }
}

export interface ErrorDescription {
  kind: ErrorKind;
  message: string;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof AnalysisError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'InternalError', message: `Internal error: ${error.message}` };
  }
  return { kind: 'InternalError', message: 'Internal error: unknown failure' };
}

/**
 * Wrap anything thrown inside an analyzer so callers only ever see
 * `AnalysisFailedError`.
 */
export function toAnalysisFailure(error: unknown): AnalysisFailedError {
  if (error instanceof AnalysisFailedError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new AnalysisFailedError(reason, { cause: error });
}
