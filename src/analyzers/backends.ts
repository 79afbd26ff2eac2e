/**
 * Model backends used by the audio and video analyzers.
 *
 * Speech recognition and computer vision are external model integrations.
 * The stub backends below satisfy the contracts without a model so the rest
 * of the pipeline runs end to end; they report `modelLoaded: false`.
 */

export interface MediaSegment {
  /**
   * Processed duration after the ceiling is applied. Backends receive the
   * whole file and must not read media past this point.
   */
  durationSeconds: number;
  sampleRate?: number;
  fps?: number;
  language?: string;
}

export interface SpeakerTurn {
  start: number;
  end: number;
  speaker: string;
  confidence: number;
}

export interface Scene {
  start_time: number;
  end_time: number;
  duration: number;
}

export interface DetectedObject {
  label: string;
  confidence: number;
  timestamps: Array<[number, number]>;
}

export interface DetectedFace {
  confidence: number;
  /** x, y, width, height in pixels */
  bounding_box: [number, number, number, number];
  timestamp: number;
}

/** Implementations stop at `segment.durationSeconds`, whatever the file length. */
export interface SpeechBackend {
  readonly name: string;
  readonly modelLoaded: boolean;
  init(): Promise<void>;
  transcribe(content: Uint8Array, segment: MediaSegment): Promise<string>;
  diarize(content: Uint8Array, segment: MediaSegment): Promise<SpeakerTurn[]>;
}

/** Same window contract as `SpeechBackend`. */
export interface VisionBackend {
  readonly name: string;
  readonly modelLoaded: boolean;
  init(): Promise<void>;
  detectScenes(content: Uint8Array, segment: MediaSegment): Promise<Scene[]>;
  detectObjects(content: Uint8Array, segment: MediaSegment): Promise<DetectedObject[]>;
  detectFaces(content: Uint8Array, segment: MediaSegment): Promise<DetectedFace[]>;
}

export class StubSpeechBackend implements SpeechBackend {
  readonly name = 'stub';
  readonly modelLoaded = false;

  async init(): Promise<void> {}

  async transcribe(): Promise<string> {
    return '';
  }

  // Whole segment attributed to one unlabelled speaker
  async diarize(_content: Uint8Array, segment: MediaSegment): Promise<SpeakerTurn[]> {
    return [{ start: 0, end: segment.durationSeconds, speaker: 'SPEAKER_00', confidence: 0 }];
  }
}

export class StubVisionBackend implements VisionBackend {
  readonly name = 'stub';
  readonly modelLoaded = false;

  async init(): Promise<void> {}

  async detectScenes(_content: Uint8Array, segment: MediaSegment): Promise<Scene[]> {
    if (segment.durationSeconds <= 0) return [];
    return [{ start_time: 0, end_time: segment.durationSeconds, duration: segment.durationSeconds }];
  }

  async detectObjects(): Promise<DetectedObject[]> {
    return [];
  }

  async detectFaces(): Promise<DetectedFace[]> {
    return [];
  }
}
