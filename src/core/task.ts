import type { AnalyzerKind, ResultPayload } from '../analyzers/types.js';
import type { ErrorKind } from './errors.js';

export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed'];

export interface TaskMetadata {
  filename?: string;
  /** Analyzer implementation name, e.g. "TextAnalyzer" */
  analyzer?: string;
  model?: string;
}

export interface AnalysisTask {
  id: string;
  status: TaskStatus;
  /** MIME type recorded at creation */
  contentType: string;
  /** Set once the content type resolves; absent when resolution failed */
  analyzerKind?: AnalyzerKind;
  metadata: TaskMetadata;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  /** Present iff status is completed */
  result?: ResultPayload;
  /** Present iff status is failed */
  error?: string;
  errorKind?: ErrorKind;
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface BatchItem {
  /** Raw text; takes precedence over `content` */
  text?: string;
  content?: Uint8Array;
  filename?: string;
  contentType?: string;
  options?: Record<string, unknown>;
}

export interface BatchResult {
  batchId: string;
  status: Extract<TaskStatus, 'completed' | 'failed'>;
  items: AnalysisTask[];
  metadata: {
    total: number;
    successful: number;
    failed: number;
  };
  createdAt: Date;
  completedAt: Date;
}
