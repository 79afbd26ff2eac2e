/**
 * Analyzer registry
 * Builds one analyzer per kind at startup and hands out the shared instances.
 */

import { AnalyzerUnavailableError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { AudioAnalyzer, AUDIO_CONTENT_TYPES } from './audio.js';
import { TextAnalyzer } from './text.js';
import { VideoAnalyzer, VIDEO_CONTENT_TYPES } from './video.js';
import {
  ANALYZER_KINDS,
  type Analyzer,
  type AnalyzerCapabilities,
  type AnalyzerHealth,
  type AnalyzerKind,
} from './types.js';
import type { Config } from '../config.js';

const log = logger.child('registry');

type AnalyzerEntry =
  | { kind: AnalyzerKind; available: true; analyzer: Analyzer; capabilities: AnalyzerCapabilities }
  | { kind: AnalyzerKind; available: false; reason: string; capabilities: AnalyzerCapabilities };

export type AnalyzerFactory = () => Analyzer | Promise<Analyzer>;

export type AnalyzerFactories = Record<AnalyzerKind, AnalyzerFactory>;

/**
 * Static descriptors used when an analyzer never came up, so capability
 * discovery still lists it.
 */
const FALLBACK_DESCRIPTORS: Record<AnalyzerKind, Omit<AnalyzerCapabilities, 'dependencyAvailable'>> = {
  text: {
    kind: 'text',
    analyzer: 'TextAnalyzer',
    model: 'none',
    contentTypes: ['text/plain', 'text/markdown', 'text/html', 'application/json', 'text/csv'],
    features: [],
    supportsBatch: true,
  },
  audio: {
    kind: 'audio',
    analyzer: 'AudioAnalyzer',
    model: 'none',
    contentTypes: AUDIO_CONTENT_TYPES,
    features: [],
    supportsBatch: true,
  },
  video: {
    kind: 'video',
    analyzer: 'VideoAnalyzer',
    model: 'none',
    contentTypes: VIDEO_CONTENT_TYPES,
    features: [],
    supportsBatch: true,
  },
};

export function defaultFactories(config: Config): AnalyzerFactories {
  const { analyzers, analysis } = config;
  return {
    text: () => new TextAnalyzer({
      model: analyzers.text.model,
      maxLength: analysis.maxTextLength,
    }),
    audio: () => new AudioAnalyzer({
      model: analyzers.audio.model,
      maxDurationSeconds: analyzers.audio.maxDurationSeconds,
    }),
    video: () => new VideoAnalyzer({
      model: analyzers.video.model,
      maxDurationSeconds: analyzers.video.maxDurationSeconds,
      keyFrameCount: analyzers.video.keyFrameCount,
    }),
  };
}

export class AnalyzerRegistry {
  private readonly entries: Map<AnalyzerKind, AnalyzerEntry>;

  private constructor(entries: Map<AnalyzerKind, AnalyzerEntry>) {
    this.entries = entries;
  }

  /**
   * Construct and initialize every analyzer. Failures do not abort startup;
   * they leave the kind unavailable and are logged as configuration problems.
   */
  static async create(
    config: Config,
    overrides: Partial<AnalyzerFactories> = {}
  ): Promise<AnalyzerRegistry> {
    const factories: AnalyzerFactories = { ...defaultFactories(config), ...overrides };
    const entries = new Map<AnalyzerKind, AnalyzerEntry>();

    await Promise.all(ANALYZER_KINDS.map(async kind => {
      entries.set(kind, await AnalyzerRegistry.build(kind, factories[kind], config.analyzers[kind].enabled));
    }));

    return new AnalyzerRegistry(entries);
  }

  /** Registry over already-constructed analyzers; kinds left out are unavailable. */
  static fromAnalyzers(analyzers: Partial<Record<AnalyzerKind, Analyzer>>): AnalyzerRegistry {
    const entries = new Map<AnalyzerKind, AnalyzerEntry>();
    for (const kind of ANALYZER_KINDS) {
      const analyzer = analyzers[kind];
      entries.set(kind, analyzer
        ? { kind, available: true, analyzer, capabilities: Object.freeze(analyzer.capabilities()) }
        : AnalyzerRegistry.unavailable(kind, 'not registered'));
    }
    return new AnalyzerRegistry(entries);
  }

  private static async build(
    kind: AnalyzerKind,
    factory: AnalyzerFactory,
    enabled: boolean
  ): Promise<AnalyzerEntry> {
    if (!enabled) {
      log.info(`${kind} analyzer disabled by configuration`);
      return AnalyzerRegistry.unavailable(kind, 'disabled by configuration');
    }

    try {
      const analyzer = await factory();
      if (analyzer.kind !== kind) {
        throw new Error(`factory for ${kind} produced a ${analyzer.kind} analyzer`);
      }
      await analyzer.init();
      log.debug(`Initialized ${analyzer.name}`);
      return { kind, available: true, analyzer, capabilities: Object.freeze(analyzer.capabilities()) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`Configuration problem: ${kind} analyzer failed to initialize: ${reason}`);
      return AnalyzerRegistry.unavailable(kind, reason);
    }
  }

  private static unavailable(kind: AnalyzerKind, reason: string): AnalyzerEntry {
    return {
      kind,
      available: false,
      reason,
      capabilities: Object.freeze({ ...FALLBACK_DESCRIPTORS[kind], dependencyAvailable: false }),
    };
  }

  private entry(kind: AnalyzerKind): AnalyzerEntry {
    const entry = this.entries.get(kind);
    if (!entry) {
      // Every kind is populated at construction
      throw new AnalyzerUnavailableError(kind, 'not registered');
    }
    return entry;
  }

  get(kind: AnalyzerKind): Analyzer {
    const entry = this.entry(kind);
    if (!entry.available) {
      throw new AnalyzerUnavailableError(kind, entry.reason);
    }
    return entry.analyzer;
  }

  isAvailable(kind: AnalyzerKind): boolean {
    return this.entry(kind).available;
  }

  capabilitiesOf(kind: AnalyzerKind): AnalyzerCapabilities {
    return this.entry(kind).capabilities;
  }

  allCapabilities(): Record<AnalyzerKind, AnalyzerCapabilities> {
    return {
      text: this.capabilitiesOf('text'),
      audio: this.capabilitiesOf('audio'),
      video: this.capabilitiesOf('video'),
    };
  }

  health(): Record<AnalyzerKind, AnalyzerHealth> {
    const report = (kind: AnalyzerKind): AnalyzerHealth => {
      const entry = this.entry(kind);
      if (entry.available) {
        return entry.analyzer.healthCheck();
      }
      return {
        status: 'unavailable',
        analyzer: entry.capabilities.analyzer,
        model: entry.capabilities.model,
        modelLoaded: false,
        reason: entry.reason,
      };
    };

    return {
      text: report('text'),
      audio: report('audio'),
      video: report('video'),
    };
  }
}
