import { z } from 'zod';
import { AnalysisFailedError, toAnalysisFailure } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { StubSpeechBackend, type MediaSegment, type SpeakerTurn, type SpeechBackend } from './backends.js';
import { probeMedia, type MediaProbe } from './media-probe.js';
import { scoreSentiment, tokenize, type SentimentScores } from './text.js';
import {
  parseOptions,
  round2,
  toBytes,
  type Analyzer,
  type AnalyzerCapabilities,
  type AnalyzerHealth,
  type AnalysisContent,
  type AnalyzerOptions,
  type ContentHints,
} from './types.js';

const log = logger.child('audio');

export const AudioOptionsSchema = z.object({
  transcribe: z.boolean().default(true),
  diarize: z.boolean().default(false),
  sentiment: z.boolean().default(false),
  language: z.string().optional(),
});

export type AudioOptions = z.infer<typeof AudioOptionsSchema>;

export interface AudioAnalysisResult {
  /** Processed duration, capped at the analyzer's ceiling */
  duration_seconds: number;
  truncated: boolean;
  sample_rate?: number;
  channels?: number;
  codec?: string;
  bitrate?: number;
  lossless?: boolean;
  transcript?: string;
  speakers?: SpeakerTurn[];
  sentiment?: SentimentScores;
}

export interface AudioAnalyzerConfig {
  model?: string;
  maxDurationSeconds?: number;
  probe?: MediaProbe;
  backend?: SpeechBackend;
}

export const AUDIO_CONTENT_TYPES = [
  'audio/wav',
  'audio/wave',
  'audio/x-wav',
  'audio/mp3',
  'audio/mpeg',
  'audio/ogg',
  'audio/webm',
  'audio/flac',
  'audio/x-m4a',
  'audio/mp4',
] as const;

const MODEL_FEATURES = ['transcription', 'speaker_diarization', 'sentiment_analysis'] as const;

export class AudioAnalyzer implements Analyzer<AudioAnalysisResult> {
  readonly kind = 'audio' as const;
  readonly name = 'AudioAnalyzer';
  private readonly model: string;
  private readonly maxDuration: number;
  private readonly probe: MediaProbe;
  private readonly backend: SpeechBackend;
  private ready = false;

  constructor(config: AudioAnalyzerConfig = {}) {
    this.model = config.model ?? 'default';
    this.maxDuration = config.maxDurationSeconds ?? 600;
    this.probe = config.probe ?? probeMedia;
    this.backend = config.backend ?? new StubSpeechBackend();

    if (this.maxDuration <= 0) {
      throw new Error(`maxDurationSeconds must be positive, got ${this.maxDuration}`);
    }
  }

  async init(): Promise<void> {
    await this.backend.init();
    this.ready = true;
  }

  async analyze(
    content: AnalysisContent,
    options?: AnalyzerOptions,
    hints: ContentHints = {}
  ): Promise<AudioAnalysisResult> {
    const opts = parseOptions(AudioOptionsSchema, options);

    try {
      const bytes = toBytes(content);
      const info = await this.probe(bytes, hints);

      if (info.duration === undefined || !Number.isFinite(info.duration)) {
        throw new AnalysisFailedError('Could not determine audio duration');
      }

      let duration = info.duration;
      const truncated = duration > this.maxDuration;
      if (truncated) {
        log.warn(`Audio duration (${duration.toFixed(1)}s) exceeds ${this.maxDuration}s. Truncating.`);
        duration = this.maxDuration;
      }

      const result: AudioAnalysisResult = {
        duration_seconds: round2(duration),
        truncated,
        sample_rate: info.sampleRate,
        channels: info.channels,
        codec: info.codec,
        bitrate: info.bitrate,
        lossless: info.lossless,
      };

      const segment: MediaSegment = {
        durationSeconds: duration,
        sampleRate: info.sampleRate,
        language: opts.language,
      };

      if (opts.transcribe) {
        result.transcript = await this.backend.transcribe(bytes, segment);
      }

      if (opts.diarize) {
        result.speakers = await this.backend.diarize(bytes, segment);
      }

      if (opts.sentiment && result.transcript) {
        result.sentiment = scoreSentiment(tokenize(result.transcript));
      }

      return result;
    } catch (error) {
      throw toAnalysisFailure(error);
    }
  }

  /** Model features are only listed once the speech backend has a model loaded. */
  capabilities(): AnalyzerCapabilities {
    const modelLoaded = this.backend.modelLoaded;
    return {
      kind: this.kind,
      analyzer: this.name,
      model: this.model,
      contentTypes: AUDIO_CONTENT_TYPES,
      features: modelLoaded ? ['audio_features', ...MODEL_FEATURES] : ['audio_features'],
      supportsBatch: true,
      dependencyAvailable: modelLoaded,
      maxDurationSeconds: this.maxDuration,
    };
  }

  healthCheck(): AnalyzerHealth {
    return {
      status: this.ready ? 'healthy' : 'unavailable',
      analyzer: this.name,
      model: this.model,
      modelLoaded: this.backend.modelLoaded,
    };
  }
}
