import { randomUUID } from 'crypto';
import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type {
  AnalysisContent,
  Analyzer,
  AnalyzerCapabilities,
  AnalyzerKind,
  AnalyzerOptions,
  ContentHints,
} from '../analyzers/types.js';
import type { ExecutionMode } from '../config.js';
import { logger } from '../utils/logger.js';
import { ContentTypeResolver } from '../utils/mime.js';
import {
  AnalysisFailedError,
  EmptyContentError,
  TaskNotFoundError,
  describeError,
} from './errors.js';
import { isTerminal, type AnalysisTask, type BatchItem, type BatchResult } from './task.js';
import type { TaskStore } from './task-store.js';

const log = logger.child('orchestrator');

export interface OrchestratorOptions {
  registry: AnalyzerRegistry;
  store: TaskStore;
  resolver?: ContentTypeResolver;
  /** inline: submit* returns a terminal task. background: returns once Processing. */
  execution?: ExecutionMode;
  maxFileSize?: number;
  idGenerator?: () => string;
  clock?: () => Date;
}

export interface FileSubmission {
  content: Uint8Array;
  filename?: string | null;
  contentType?: string | null;
  options?: AnalyzerOptions;
}

interface PreparedRun {
  taskId: string;
  kind: AnalyzerKind;
  content: AnalysisContent;
  options: AnalyzerOptions;
  hints: ContentHints;
}

const TEXT_CONTENT_TYPE = 'text/plain';

export class AnalysisOrchestrator {
  private readonly registry: AnalyzerRegistry;
  private readonly store: TaskStore;
  private readonly resolver: ContentTypeResolver;
  private readonly execution: ExecutionMode;
  private readonly maxFileSize: number;
  private readonly nextId: () => string;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, Promise<AnalysisTask>>();

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.resolver = options.resolver ?? new ContentTypeResolver();
    this.execution = options.execution ?? 'inline';
    this.maxFileSize = options.maxFileSize ?? 100 * 1024 * 1024;
    this.nextId = options.idGenerator ?? randomUUID;
    this.now = options.clock ?? (() => new Date());
  }

  /**
   * Analyze a string. Always runs to completion before returning.
   * Throws `EmptyContentError` for blank input; every other problem ends up
   * on the returned task.
   */
  async submitText(text: string, options: AnalyzerOptions = {}): Promise<AnalysisTask> {
    if (!text.trim()) {
      throw new EmptyContentError('Empty text provided for analysis');
    }

    const taskId = this.createTask(TEXT_CONTENT_TYPE, {});
    return this.run(taskId, 'inline', () => ({
      taskId,
      kind: 'text',
      content: text,
      options,
      hints: { contentType: TEXT_CONTENT_TYPE },
    }));
  }

  async submitFile(submission: FileSubmission): Promise<AnalysisTask> {
    const { content, filename, contentType, options = {} } = submission;
    if (content.length === 0) {
      throw new EmptyContentError(`Empty file provided for analysis${filename ? `: ${filename}` : ''}`);
    }

    const recordedType = this.resolver.detect(contentType, filename);
    const taskId = this.createTask(recordedType, filename ? { filename } : {});

    return this.run(taskId, this.execution, () => ({
      taskId,
      kind: this.resolver.resolve(contentType, filename),
      content,
      options,
      hints: { filename: filename ?? undefined, contentType: recordedType },
    }));
  }

  /**
   * Submit several items at once. Every item is validated before any task is
   * created, so an empty item rejects the whole batch.
   */
  async submitBatch(items: BatchItem[]): Promise<BatchResult> {
    items.forEach((item, index) => {
      const empty = item.text !== undefined
        ? !item.text.trim()
        : !item.content || item.content.length === 0;
      if (empty) {
        throw new EmptyContentError(`Batch item ${index} has no content`);
      }
    });

    const createdAt = this.now();
    const submitted = await Promise.all(items.map(item =>
      item.text !== undefined
        ? this.submitText(item.text, item.options)
        : this.submitFile({
          content: item.content ?? new Uint8Array(),
          filename: item.filename,
          contentType: item.contentType,
          options: item.options,
        })
    ));
    const tasks = await Promise.all(submitted.map(task => this.waitFor(task.id)));

    const successful = tasks.filter(t => t.status === 'completed').length;
    const failed = tasks.length - successful;

    return {
      batchId: this.nextId(),
      status: tasks.length > 0 && failed === tasks.length ? 'failed' : 'completed',
      items: tasks,
      metadata: { total: tasks.length, successful, failed },
      createdAt,
      completedAt: this.now(),
    };
  }

  /** Latest known state; never blocks on running work. */
  getStatus(taskId: string): AnalysisTask {
    const task = this.store.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  /** Resolves with the task once it is terminal. */
  async waitFor(taskId: string): Promise<AnalysisTask> {
    const task = this.getStatus(taskId);
    if (isTerminal(task.status)) {
      return task;
    }
    const pending = this.inFlight.get(taskId);
    return pending ? pending : this.getStatus(taskId);
  }

  /** Wait for all analysis work started so far. */
  async drain(): Promise<void> {
    await Promise.all(this.inFlight.values());
  }

  listAnalyzers(): Record<AnalyzerKind, AnalyzerCapabilities> {
    return this.registry.allCapabilities();
  }

  private createTask(contentType: string, metadata: AnalysisTask['metadata']): string {
    const task = this.store.create({
      id: this.nextId(),
      contentType,
      metadata,
      createdAt: this.now(),
    });
    log.debug(`Task ${task.id} created (${contentType})`);
    return task.id;
  }

  /**
   * Steps shared by every submission: prepare (resolve the kind), fetch the
   * analyzer, enter Processing, then analyze. Preparation and the move to
   * Processing always happen before this returns. The analysis is tracked in
   * `inFlight` until it settles; in background mode it finishes after this
   * returns.
   */
  private async run(
    taskId: string,
    mode: ExecutionMode,
    prepare: () => PreparedRun
  ): Promise<AnalysisTask> {
    let prepared: PreparedRun;
    let analyzer: Analyzer;
    try {
      prepared = prepare();
    } catch (error) {
      return this.fail(taskId, error);
    }

    if (typeof prepared.content !== 'string' && prepared.content.length > this.maxFileSize) {
      return this.fail(taskId, new AnalysisFailedError(
        `Content size ${prepared.content.length} exceeds the limit of ${this.maxFileSize} bytes`
      ), prepared.kind);
    }

    try {
      analyzer = this.registry.get(prepared.kind);
      this.store.transition(taskId, {
        status: 'processing',
        analyzerKind: prepared.kind,
        metadata: { analyzer: analyzer.name, model: analyzer.capabilities().model },
        at: this.now(),
      });
      log.debug(`Task ${taskId} processing with ${analyzer.name}`);
    } catch (error) {
      return this.fail(taskId, error, prepared.kind);
    }

    // Inline runs are tracked as well so `waitFor` can follow them.
    const completion = this.analyze(analyzer, prepared);
    this.inFlight.set(taskId, completion);
    completion.finally(() => this.inFlight.delete(taskId)).catch(error => {
      log.error(`Task ${taskId} bookkeeping failed`, error);
    });
    return mode === 'inline' ? completion : this.getStatus(taskId);
  }

  /** Never rejects: every failure becomes a Failed task. */
  private async analyze(analyzer: Analyzer, run: PreparedRun): Promise<AnalysisTask> {
    try {
      const result = await analyzer.analyze(run.content, run.options, run.hints);
      const task = this.store.transition(run.taskId, { status: 'completed', result, at: this.now() });
      log.debug(`Task ${run.taskId} completed`);
      return task;
    } catch (error) {
      return this.fail(run.taskId, error, run.kind);
    }
  }

  private fail(taskId: string, error: unknown, kind?: AnalyzerKind): AnalysisTask {
    const { kind: errorKind, message } = describeError(error);
    const current = this.getStatus(taskId);

    if (isTerminal(current.status)) {
      log.error(`Task ${taskId} already ${current.status}; dropping late failure: ${message}`);
      return current;
    }

    if (errorKind === 'AnalyzerUnavailable') {
      log.error(`Configuration problem: ${message}`);
    } else if (errorKind === 'InternalError') {
      log.error(`Task ${taskId} failed unexpectedly: ${message}`);
    } else {
      log.warn(`Task ${taskId} failed: ${message}`);
    }

    return this.store.transition(taskId, {
      status: 'failed',
      error: errorKind === 'InternalError' ? 'Internal error during analysis' : message,
      errorKind,
      analyzerKind: kind,
      at: this.now(),
    });
  }
}
