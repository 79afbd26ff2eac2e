import { z } from 'zod';
import { AnalysisFailedError, toAnalysisFailure } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import {
  StubVisionBackend,
  type DetectedFace,
  type DetectedObject,
  type MediaSegment,
  type Scene,
  type VisionBackend,
} from './backends.js';
import { probeMedia, type MediaProbe } from './media-probe.js';
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

const log = logger.child('video');

export const VideoOptionsSchema = z.object({
  analyzeScenes: z.boolean().default(true),
  extractFrames: z.boolean().default(false),
  detectObjects: z.boolean().default(false),
  detectFaces: z.boolean().default(false),
});

export type VideoOptions = z.infer<typeof VideoOptionsSchema>;

export interface KeyFrame {
  index: number;
  timestamp: number;
}

export interface VideoAnalysisResult {
  /** Processed duration, capped at the analyzer's ceiling */
  duration_seconds: number;
  truncated: boolean;
  width?: number;
  height?: number;
  fps?: number;
  codec?: string;
  container?: string;
  has_audio: boolean;
  scenes?: Scene[];
  scene_count?: number;
  key_frames?: KeyFrame[];
  detected_objects?: DetectedObject[];
  detected_faces?: DetectedFace[];
}

export interface VideoAnalyzerConfig {
  model?: string;
  maxDurationSeconds?: number;
  keyFrameCount?: number;
  probe?: MediaProbe;
  backend?: VisionBackend;
}

export const VIDEO_CONTENT_TYPES = [
  'video/mp4',
  'video/quicktime',
  'video/x-msvideo',
  'video/x-ms-wmv',
  'video/webm',
  'video/x-matroska',
] as const;

const RESOLUTION_TAGS: Record<string, { width: number; height: number }> = {
  '4k': { width: 3840, height: 2160 },
  '2160p': { width: 3840, height: 2160 },
  '1080p': { width: 1920, height: 1080 },
  '720p': { width: 1280, height: 720 },
  '480p': { width: 854, height: 480 },
};

const MODEL_FEATURES = ['scene_detection', 'object_detection', 'face_detection'] as const;

const CODEC_TAGS = ['h264', 'h265', 'hevc', 'x264', 'x265', 'av1', 'vp9'];

export interface FilenameTags {
  width?: number;
  height?: number;
  codec?: string;
}

/** Resolution and codec conventions found in release-style filenames. */
export function readFilenameTags(filename: string): FilenameTags {
  const lower = filename.toLowerCase();
  const tags: FilenameTags = {};

  for (const [pattern, resolution] of Object.entries(RESOLUTION_TAGS)) {
    if (lower.includes(pattern)) {
      tags.width = resolution.width;
      tags.height = resolution.height;
      break;
    }
  }

  for (const codec of CODEC_TAGS) {
    if (lower.includes(codec)) {
      tags.codec = codec.toUpperCase();
      break;
    }
  }

  return tags;
}

/** Evenly spaced timestamps strictly inside the processed window. */
export function planKeyFrames(durationSeconds: number, count: number): KeyFrame[] {
  if (durationSeconds <= 0 || count <= 0) return [];

  const frames: KeyFrame[] = [];
  for (let i = 1; i <= count; i++) {
    frames.push({ index: i - 1, timestamp: round2((i * durationSeconds) / (count + 1)) });
  }
  return frames;
}

export class VideoAnalyzer implements Analyzer<VideoAnalysisResult> {
  readonly kind = 'video' as const;
  readonly name = 'VideoAnalyzer';
  private readonly model: string;
  private readonly maxDuration: number;
  private readonly keyFrameCount: number;
  private readonly probe: MediaProbe;
  private readonly backend: VisionBackend;
  private ready = false;

  constructor(config: VideoAnalyzerConfig = {}) {
    this.model = config.model ?? 'default';
    this.maxDuration = config.maxDurationSeconds ?? 600;
    this.keyFrameCount = config.keyFrameCount ?? 5;
    this.probe = config.probe ?? probeMedia;
    this.backend = config.backend ?? new StubVisionBackend();

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
  ): Promise<VideoAnalysisResult> {
    const opts = parseOptions(VideoOptionsSchema, options);

    try {
      const bytes = toBytes(content);
      const info = await this.probe(bytes, hints);

      if (info.duration === undefined || !Number.isFinite(info.duration)) {
        throw new AnalysisFailedError('Could not determine video duration');
      }

      let duration = info.duration;
      const truncated = duration > this.maxDuration;
      if (truncated) {
        log.warn(`Video duration (${duration.toFixed(1)}s) exceeds ${this.maxDuration}s. Processing first ${this.maxDuration}s.`);
        duration = this.maxDuration;
      }

      const tags = hints.filename ? readFilenameTags(hints.filename) : {};

      const result: VideoAnalysisResult = {
        duration_seconds: round2(duration),
        truncated,
        width: info.width ?? tags.width,
        height: info.height ?? tags.height,
        fps: info.fps,
        codec: info.codec ?? tags.codec,
        container: info.container,
        has_audio: info.channels !== undefined && info.channels > 0,
      };

      const segment: MediaSegment = { durationSeconds: duration, fps: info.fps };

      if (opts.analyzeScenes) {
        const scenes = await this.backend.detectScenes(bytes, segment);
        result.scenes = scenes;
        result.scene_count = scenes.length;
      }

      if (opts.extractFrames) {
        result.key_frames = planKeyFrames(duration, this.keyFrameCount);
      }

      if (opts.detectObjects) {
        result.detected_objects = await this.backend.detectObjects(bytes, segment);
      }

      if (opts.detectFaces) {
        result.detected_faces = await this.backend.detectFaces(bytes, segment);
      }

      return result;
    } catch (error) {
      throw toAnalysisFailure(error);
    }
  }

  capabilities(): AnalyzerCapabilities {
    const modelLoaded = this.backend.modelLoaded;
    return {
      kind: this.kind,
      analyzer: this.name,
      model: this.model,
      contentTypes: VIDEO_CONTENT_TYPES,
      features: modelLoaded
        ? ['metadata_extraction', 'key_frame_extraction', ...MODEL_FEATURES]
        : ['metadata_extraction', 'key_frame_extraction'],
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
