import type { MediaInfo, MediaProbe } from '../src/analyzers/media-probe.js';
import type { Analyzer, AnalyzerCapabilities, AnalyzerHealth } from '../src/analyzers/types.js';
import type { TextAnalysisResult } from '../src/analyzers/text.js';

export interface WavOptions {
  sampleRate?: number;
  channels?: number;
  seconds?: number;
}

/** 16-bit PCM WAV of silence. */
export function buildWav({ sampleRate = 8000, channels = 1, seconds = 1 }: WavOptions = {}): Uint8Array {
  const bitsPerSample = 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const dataSize = Math.round(seconds * sampleRate) * blockAlign;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * blockAlign, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bitsPerSample, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);

  return new Uint8Array(buffer);
}

export function bytesOf(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function fixedProbe(info: MediaInfo): MediaProbe {
  return async () => info;
}

export const SAMPLE_TEXT_RESULT: TextAnalysisResult = {
  char_count: 5,
  word_count: 1,
  sentence_count: 1,
  avg_word_length: 5,
  avg_sentence_length: 1,
  vocab_size: 1,
  reading_time_minutes: 0.01,
};

/** Text analyzer whose analyses stay open until `release()` is called. */
export class GatedAnalyzer implements Analyzer<TextAnalysisResult> {
  readonly kind = 'text' as const;
  readonly name = 'GatedAnalyzer';
  calls = 0;
  private open: () => void = () => {};
  private readonly gate = new Promise<void>(resolve => {
    this.open = resolve;
  });

  release(): void {
    this.open();
  }

  async init(): Promise<void> {}

  async analyze(): Promise<TextAnalysisResult> {
    this.calls++;
    await this.gate;
    return SAMPLE_TEXT_RESULT;
  }

  capabilities(): AnalyzerCapabilities {
    return {
      kind: 'text',
      analyzer: this.name,
      model: 'gated',
      contentTypes: ['text/plain'],
      features: [],
      supportsBatch: true,
      dependencyAvailable: true,
    };
  }

  healthCheck(): AnalyzerHealth {
    return { status: 'healthy', analyzer: this.name, model: 'gated', modelLoaded: true };
  }
}

/** Text analyzer that always rejects with the given error. */
export class ThrowingAnalyzer implements Analyzer<TextAnalysisResult> {
  readonly kind = 'text' as const;
  readonly name = 'ThrowingAnalyzer';

  constructor(private readonly error: unknown) {}

  async init(): Promise<void> {}

  async analyze(): Promise<TextAnalysisResult> {
    throw this.error;
  }

  capabilities(): AnalyzerCapabilities {
    return {
      kind: 'text',
      analyzer: this.name,
      model: 'broken',
      contentTypes: ['text/plain'],
      features: [],
      supportsBatch: true,
      dependencyAvailable: true,
    };
  }

  healthCheck(): AnalyzerHealth {
    return { status: 'healthy', analyzer: this.name, model: 'broken', modelLoaded: true };
  }
}
