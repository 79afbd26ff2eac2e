import { describe, it, expect } from 'vitest';
import { AnalyzerRegistry } from '../src/analyzers/registry.js';
import { TextAnalyzer } from '../src/analyzers/text.js';
import { AudioAnalyzer } from '../src/analyzers/audio.js';
import { VideoAnalyzer } from '../src/analyzers/video.js';
import { StubVisionBackend } from '../src/analyzers/backends.js';
import { AnalyzerUnavailableError } from '../src/core/errors.js';
import { DEFAULT_CONFIG, parseConfig } from '../src/config.js';

class UnreachableVisionBackend extends StubVisionBackend {
  async init(): Promise<void> {
    throw new Error('vision model not found');
  }
}

describe('AnalyzerRegistry', () => {
  it('should build every analyzer from the default configuration', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG);

    expect(registry.get('text')).toBeInstanceOf(TextAnalyzer);
    expect(registry.get('audio')).toBeInstanceOf(AudioAnalyzer);
    expect(registry.get('video')).toBeInstanceOf(VideoAnalyzer);
    expect(registry.health().text.status).toBe('healthy');
  });

  it('should not advertise model features for stub-backed analyzers', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG);
    const all = registry.allCapabilities();

    expect(all.audio.dependencyAvailable).toBe(false);
    expect(all.audio.features).not.toContain('transcription');
    expect(all.video.dependencyAvailable).toBe(false);
    expect(all.video.features).not.toContain('object_detection');
    expect(registry.health().audio.modelLoaded).toBe(false);
  });

  it('should hand out the same instance on every lookup', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG);
    expect(registry.get('audio')).toBe(registry.get('audio'));
  });

  it('should pass configuration to the analyzers', async () => {
    const config = parseConfig({ analyzers: { audio: { model: 'whisper-small', maxDurationSeconds: 90 } } });
    const registry = await AnalyzerRegistry.create(config);

    const caps = registry.capabilitiesOf('audio');
    expect(caps.model).toBe('whisper-small');
    expect(caps.maxDurationSeconds).toBe(90);
  });

  it('should leave disabled analyzers unavailable', async () => {
    const config = parseConfig({ analyzers: { audio: { enabled: false } } });
    const registry = await AnalyzerRegistry.create(config);

    expect(registry.isAvailable('audio')).toBe(false);
    expect(registry.isAvailable('text')).toBe(true);
    expect(() => registry.get('audio')).toThrow(AnalyzerUnavailableError);
    expect(() => registry.get('audio')).toThrow('Analyzer unavailable: audio (disabled by configuration)');
    expect(registry.health().audio).toEqual({
      status: 'unavailable',
      analyzer: 'AudioAnalyzer',
      model: 'none',
      modelLoaded: false,
      reason: 'disabled by configuration',
    });
  });

  it('should still describe unavailable analyzers', async () => {
    const config = parseConfig({ analyzers: { video: { enabled: false } } });
    const registry = await AnalyzerRegistry.create(config);

    const caps = registry.capabilitiesOf('video');
    expect(caps.dependencyAvailable).toBe(false);
    expect(caps.features).toEqual([]);
    expect(caps.contentTypes).toContain('video/mp4');
  });

  it('should survive a factory that throws', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG, {
      video: () => {
        throw new Error('codec library missing');
      },
    });

    expect(registry.isAvailable('video')).toBe(false);
    expect(registry.health().video.reason).toBe('codec library missing');
    expect(registry.isAvailable('audio')).toBe(true);
  });

  it('should survive an analyzer whose init rejects', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG, {
      video: () => new VideoAnalyzer({ backend: new UnreachableVisionBackend() }),
    });

    expect(registry.isAvailable('video')).toBe(false);
    expect(registry.health().video.reason).toBe('vision model not found');
  });

  it('should refuse a factory that builds the wrong kind', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG, {
      audio: () => new TextAnalyzer(),
    });

    expect(registry.isAvailable('audio')).toBe(false);
    expect(registry.health().audio.reason).toBe('factory for audio produced a text analyzer');
  });

  it('should mark kinds missing from fromAnalyzers as not registered', () => {
    const text = new TextAnalyzer();
    const registry = AnalyzerRegistry.fromAnalyzers({ text });

    expect(registry.get('text')).toBe(text);
    expect(() => registry.get('video')).toThrow('Analyzer unavailable: video (not registered)');
  });

  it('should list capabilities for every kind', async () => {
    const registry = await AnalyzerRegistry.create(DEFAULT_CONFIG);
    const all = registry.allCapabilities();

    expect(Object.keys(all)).toEqual(['text', 'audio', 'video']);
    expect(all.text.features).toContain('sentiment_analysis');
    expect(all.video.maxDurationSeconds).toBe(600);
    expect(Object.isFrozen(all.audio)).toBe(true);
  });
});
