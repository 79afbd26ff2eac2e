import type { AnalyzerKind, ResultPayload } from '../analyzers/types.js';
import type { ErrorKind } from './errors.js';
import type { AnalysisTask, BatchResult, TaskStatus } from './task.js';

export interface ResponseEnvelope {
  taskId: string;
  status: TaskStatus;
  contentType: string;
  results?: ResultPayload;
  error?: string;
  metadata: {
    analyzerKind?: AnalyzerKind;
    analyzer?: string;
    model?: string;
    filename?: string;
    errorKind?: ErrorKind;
    startedAt?: string;
    completedAt?: string;
  };
  createdAt: string;
  updatedAt: string;
}

export interface BatchEnvelope {
  batchId: string;
  status: BatchResult['status'];
  items: ResponseEnvelope[];
  metadata: BatchResult['metadata'];
  createdAt: string;
  completedAt: string;
}

/** Serializable view of a task, one field per task attribute. */
export function toEnvelope(task: AnalysisTask): ResponseEnvelope {
  const envelope: ResponseEnvelope = {
    taskId: task.id,
    status: task.status,
    contentType: task.contentType,
    metadata: { ...task.metadata },
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };

  if (task.analyzerKind) envelope.metadata.analyzerKind = task.analyzerKind;
  if (task.startedAt) envelope.metadata.startedAt = task.startedAt.toISOString();
  if (task.completedAt) envelope.metadata.completedAt = task.completedAt.toISOString();

  if (task.status === 'completed' && task.result) {
    envelope.results = task.result;
  }
  if (task.status === 'failed') {
    envelope.error = task.error;
    envelope.metadata.errorKind = task.errorKind;
  }

  return envelope;
}

export function toBatchEnvelope(batch: BatchResult): BatchEnvelope {
  return {
    batchId: batch.batchId,
    status: batch.status,
    items: batch.items.map(toEnvelope),
    metadata: { ...batch.metadata },
    createdAt: batch.createdAt.toISOString(),
    completedAt: batch.completedAt.toISOString(),
  };
}
