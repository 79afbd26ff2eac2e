import type { AnalyzerKind, ResultPayload } from '../analyzers/types.js';
import { InvalidTaskTransitionError, TaskNotFoundError, type ErrorKind } from './errors.js';
import { isTerminal, type AnalysisTask, type TaskMetadata, type TaskStatus } from './task.js';

export interface NewTask {
  id: string;
  contentType: string;
  metadata?: TaskMetadata;
  createdAt: Date;
}

export type TaskTransition =
  | { status: 'processing'; analyzerKind: AnalyzerKind; metadata?: TaskMetadata; at: Date }
  | { status: 'completed'; result: ResultPayload; at: Date }
  | { status: 'failed'; error: string; errorKind: ErrorKind; analyzerKind?: AnalyzerKind; at: Date };

export interface TaskFilter {
  status?: TaskStatus;
  analyzerKind?: AnalyzerKind;
}

/**
 * Owner of task records. The orchestrator is the only writer; everyone else
 * reads snapshots by id.
 */
export interface TaskStore {
  create(task: NewTask): AnalysisTask;
  get(id: string): AnalysisTask | undefined;
  transition(id: string, change: TaskTransition): AnalysisTask;
  list(filter?: TaskFilter): AnalysisTask[];
  size(): number;
}

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED[from].includes(to);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Detached, deeply frozen copy of a record. Dates are cloned as well, since
 * freezing a Date does not stop `setTime`.
 */
function snapshot(task: AnalysisTask): AnalysisTask {
  return deepFreeze(structuredClone(task));
}

/**
 * Process-scoped store. Records are replaced, never mutated in place, and
 * readers only ever see copies, so nothing outside the store can alter a
 * stored task or its result.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, AnalysisTask>();

  create(input: NewTask): AnalysisTask {
    if (this.tasks.has(input.id)) {
      throw new Error(`Task ${input.id} already exists`);
    }

    const task = snapshot({
      id: input.id,
      status: 'pending',
      contentType: input.contentType,
      metadata: input.metadata ?? {},
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
    });
    this.tasks.set(task.id, task);
    return snapshot(task);
  }

  get(id: string): AnalysisTask | undefined {
    const task = this.tasks.get(id);
    return task && snapshot(task);
  }

  transition(id: string, change: TaskTransition): AnalysisTask {
    const current = this.tasks.get(id);
    if (!current) {
      throw new TaskNotFoundError(id);
    }
    if (!canTransition(current.status, change.status)) {
      throw new InvalidTaskTransitionError(id, current.status, change.status);
    }

    let next: AnalysisTask;
    switch (change.status) {
      case 'processing':
        next = {
          ...current,
          status: 'processing',
          analyzerKind: current.analyzerKind ?? change.analyzerKind,
          metadata: { ...current.metadata, ...change.metadata },
          startedAt: change.at,
          updatedAt: change.at,
        };
        break;
      case 'completed':
        next = {
          ...current,
          status: 'completed',
          result: change.result,
          completedAt: change.at,
          updatedAt: change.at,
        };
        break;
      case 'failed':
        next = {
          ...current,
          status: 'failed',
          analyzerKind: current.analyzerKind ?? change.analyzerKind,
          error: change.error,
          errorKind: change.errorKind,
          completedAt: change.at,
          updatedAt: change.at,
        };
        break;
    }

    const stored = snapshot(next);
    this.tasks.set(id, stored);
    return snapshot(stored);
  }

  list(filter: TaskFilter = {}): AnalysisTask[] {
    let tasks = [...this.tasks.values()];
    if (filter.status) tasks = tasks.filter(t => t.status === filter.status);
    if (filter.analyzerKind) tasks = tasks.filter(t => t.analyzerKind === filter.analyzerKind);
    return tasks.map(snapshot);
  }

  size(): number {
    return this.tasks.size;
  }

  /** Drop terminal tasks that finished before `cutoff`. Returns how many went. */
  prune(cutoff: Date): number {
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (isTerminal(task.status) && task.completedAt && task.completedAt < cutoff) {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
