import type { z } from 'zod';
import { AnalysisFailedError } from '../core/errors.js';
import type { TextAnalysisResult } from './text.js';
import type { AudioAnalysisResult } from './audio.js';
import type { VideoAnalysisResult } from './video.js';

export const ANALYZER_KINDS = ['text', 'audio', 'video'] as const;

export type AnalyzerKind = (typeof ANALYZER_KINDS)[number];

export type ResultPayload = TextAnalysisResult | AudioAnalysisResult | VideoAnalysisResult;

export type AnalysisContent = string | Uint8Array;

export type AnalyzerOptions = Record<string, unknown>;

/** What the orchestrator knows about the content besides its bytes. */
export interface ContentHints {
  filename?: string;
  contentType?: string;
}

export interface AnalyzerCapabilities {
  kind: AnalyzerKind;
  analyzer: string;
  model: string;
  contentTypes: readonly string[];
  features: readonly string[];
  supportsBatch: boolean;
  /** False when the backing dependency could not be initialized */
  dependencyAvailable: boolean;
  maxDurationSeconds?: number;
}

export interface AnalyzerHealth {
  status: 'healthy' | 'unavailable';
  analyzer: string;
  model: string;
  modelLoaded: boolean;
  reason?: string;
}

export interface Analyzer<TResult extends ResultPayload = ResultPayload> {
  readonly kind: AnalyzerKind;
  readonly name: string;

  /**
   * Load whatever the analyzer needs. Called once by the registry at startup;
   * a rejection marks the analyzer unavailable.
   */
  init(): Promise<void>;

  /**
   * Stateless per call. Rejects with `AnalysisFailedError` on any internal
   * error and never resolves with a partial result.
   */
  analyze(content: AnalysisContent, options?: AnalyzerOptions, hints?: ContentHints): Promise<TResult>;

  capabilities(): AnalyzerCapabilities;

  healthCheck(): AnalyzerHealth;
}

/**
 * Validate analyzer options against a zod object schema. Unknown keys are
 * stripped; a known key with the wrong type fails the analysis.
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  options: AnalyzerOptions | undefined
): z.output<T> {
  const parsed = schema.safeParse(options ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new AnalysisFailedError(`Invalid options (${details})`);
  }
  return parsed.data;
}

export function toBytes(content: AnalysisContent): Uint8Array {
  return typeof content === 'string' ? new TextEncoder().encode(content) : content;
}

export function toText(content: AnalysisContent): string {
  return typeof content === 'string' ? content : new TextDecoder('utf-8').decode(content);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
