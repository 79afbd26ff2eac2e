import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  applyEnvOverrides,
  loadConfig,
  parseConfig,
  saveConfig,
} from '../src/config.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'contentlens-config-'));
    vi.stubEnv('CONTENTLENS_LOG_LEVEL', '');
    vi.stubEnv('CONTENTLENS_EXECUTION', '');
    vi.stubEnv('CONTENTLENS_MAX_DURATION', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fill in defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      version: 1,
      logging: { level: 'info' },
      analysis: { execution: 'inline', maxTextLength: 1_000_000, maxFileSize: 104_857_600 },
      analyzers: {
        text: { enabled: true, model: 'heuristic' },
        audio: { enabled: true, model: 'default', maxDurationSeconds: 600 },
        video: { enabled: true, model: 'default', maxDurationSeconds: 600, keyFrameCount: 5 },
      },
    });
    expect(parseConfig(null)).toEqual(DEFAULT_CONFIG);
  });

  it('should use defaults when the file is missing', () => {
    expect(loadConfig(join(dir, 'missing.yaml'))).toEqual(DEFAULT_CONFIG);
  });

  it('should merge a YAML file over the defaults', () => {
    const file = join(dir, 'config.yaml');
    writeFileSync(file, [
      'analysis:',
      '  execution: background',
      'analyzers:',
      '  audio:',
      '    maxDurationSeconds: 120',
      '',
    ].join('\n'));

    const config = loadConfig(file);
    expect(config.analysis.execution).toBe('background');
    expect(config.analysis.maxTextLength).toBe(1_000_000);
    expect(config.analyzers.audio.maxDurationSeconds).toBe(120);
    expect(config.analyzers.video.maxDurationSeconds).toBe(600);
  });

  it('should reject invalid values', () => {
    const file = join(dir, 'config.yaml');
    writeFileSync(file, 'analysis:\n  execution: sometimes\n');
    expect(() => loadConfig(file)).toThrow();
  });

  it('should apply environment overrides when loading', () => {
    vi.stubEnv('CONTENTLENS_EXECUTION', 'background');
    expect(loadConfig(join(dir, 'missing.yaml')).analysis.execution).toBe('background');
  });

  it('should round-trip through saveConfig', () => {
    const file = join(dir, 'nested', 'config.yaml');
    const config = parseConfig({ logging: { level: 'warn' }, analyzers: { video: { keyFrameCount: 8 } } });

    saveConfig(config, file);
    expect(loadConfig(file)).toEqual(config);
  });

  describe('applyEnvOverrides', () => {
    it('should override level, execution and duration ceilings', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        CONTENTLENS_LOG_LEVEL: 'DEBUG',
        CONTENTLENS_EXECUTION: 'background',
        CONTENTLENS_MAX_DURATION: '30',
      });

      expect(config.logging.level).toBe('debug');
      expect(config.analysis.execution).toBe('background');
      expect(config.analyzers.audio.maxDurationSeconds).toBe(30);
      expect(config.analyzers.video.maxDurationSeconds).toBe(30);
    });

    it('should leave the input untouched', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { CONTENTLENS_LOG_LEVEL: 'error', CONTENTLENS_MAX_DURATION: '10' });
      expect(DEFAULT_CONFIG.logging.level).toBe('info');
      expect(DEFAULT_CONFIG.analyzers.audio.maxDurationSeconds).toBe(600);
    });

    it('should reject invalid values', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { CONTENTLENS_EXECUTION: 'sometimes' }))
        .toThrow('Invalid CONTENTLENS_EXECUTION: sometimes');
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { CONTENTLENS_MAX_DURATION: '-5' }))
        .toThrow('Invalid CONTENTLENS_MAX_DURATION: -5');
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { CONTENTLENS_LOG_LEVEL: 'loud' }))
        .toThrow('Invalid CONTENTLENS_LOG_LEVEL: loud');
    });
  });
});
