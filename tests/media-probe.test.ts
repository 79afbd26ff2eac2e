import { describe, it, expect } from 'vitest';
import { probeMedia } from '../src/analyzers/media-probe.js';
import { buildWav } from './helpers.js';

describe('probeMedia', () => {
  it('should read audio stream details from a buffer', async () => {
    const info = await probeMedia(buildWav({ sampleRate: 8000, channels: 1, seconds: 1 }), {
      contentType: 'audio/wav',
    });

    expect(info.duration).toBe(1);
    expect(info.sampleRate).toBe(8000);
    expect(info.channels).toBe(1);
  });

  it('should leave video stream fields to custom probes', async () => {
    const info = await probeMedia(buildWav(), { contentType: 'audio/wav', filename: 'tone.wav' });

    expect(info.width).toBeUndefined();
    expect(info.height).toBeUndefined();
    expect(info.fps).toBeUndefined();
  });
});
