import { describe, it, expect } from 'vitest';
import { VideoAnalyzer, planKeyFrames, readFilenameTags } from '../src/analyzers/video.js';
import {
  StubVisionBackend,
  type DetectedFace,
  type DetectedObject,
  type Scene,
  type VisionBackend,
} from '../src/analyzers/backends.js';
import { AnalysisFailedError } from '../src/core/errors.js';
import type { MediaProbe } from '../src/analyzers/media-probe.js';
import { bytesOf, fixedProbe } from './helpers.js';

const HD_PROBE = fixedProbe({
  duration: 1200,
  width: 1280,
  height: 720,
  fps: 30,
  codec: 'h264',
  container: 'MPEG-4',
  channels: 2,
});

class PeopleVisionBackend extends StubVisionBackend {
  async detectObjects(): Promise<DetectedObject[]> {
    return [{ label: 'person', confidence: 0.9, timestamps: [[0, 4.5]] }];
  }
}

class LoadedVisionBackend implements VisionBackend {
  readonly name = 'loaded';
  readonly modelLoaded = true;

  async init(): Promise<void> {}

  async detectScenes(): Promise<Scene[]> {
    return [];
  }

  async detectObjects(): Promise<DetectedObject[]> {
    return [];
  }

  async detectFaces(): Promise<DetectedFace[]> {
    return [];
  }
}

describe('planKeyFrames', () => {
  it('should space frames evenly inside the window', () => {
    expect(planKeyFrames(10, 3)).toEqual([
      { index: 0, timestamp: 2.5 },
      { index: 1, timestamp: 5 },
      { index: 2, timestamp: 7.5 },
    ]);
  });

  it('should return nothing for an empty window', () => {
    expect(planKeyFrames(0, 5)).toEqual([]);
    expect(planKeyFrames(10, 0)).toEqual([]);
  });
});

describe('readFilenameTags', () => {
  it('should read resolution and codec tags', () => {
    expect(readFilenameTags('movie_4K_HEVC.mkv')).toEqual({ width: 3840, height: 2160, codec: 'HEVC' });
    expect(readFilenameTags('talk.720p.mp4')).toEqual({ width: 1280, height: 720 });
  });

  it('should return no tags for plain names', () => {
    expect(readFilenameTags('lecture.mp4')).toEqual({});
  });
});

describe('VideoAnalyzer', () => {
  it('should cap long videos and detect scenes by default', async () => {
    const analyzer = new VideoAnalyzer({ probe: HD_PROBE });
    const result = await analyzer.analyze(bytesOf('video'));

    expect(result).toEqual({
      duration_seconds: 600,
      truncated: true,
      width: 1280,
      height: 720,
      fps: 30,
      codec: 'h264',
      container: 'MPEG-4',
      has_audio: true,
      scenes: [{ start_time: 0, end_time: 600, duration: 600 }],
      scene_count: 1,
    });
  });

  it('should plan key frames over the processed window', async () => {
    const analyzer = new VideoAnalyzer({ probe: HD_PROBE });
    const result = await analyzer.analyze(bytesOf('video'), { extractFrames: true, analyzeScenes: false });

    expect(result.scenes).toBeUndefined();
    expect(result.key_frames?.map(frame => frame.timestamp)).toEqual([100, 200, 300, 400, 500]);
  });

  it('should honour the configured key frame count', async () => {
    const analyzer = new VideoAnalyzer({ probe: fixedProbe({ duration: 8 }), keyFrameCount: 3 });
    const result = await analyzer.analyze(bytesOf('video'), { extractFrames: true });
    expect(result.key_frames).toEqual([
      { index: 0, timestamp: 2 },
      { index: 1, timestamp: 4 },
      { index: 2, timestamp: 6 },
    ]);
  });

  it('should fill missing stream details from the filename', async () => {
    const analyzer = new VideoAnalyzer({ probe: fixedProbe({ duration: 30 }) });
    const result = await analyzer.analyze(bytesOf('video'), {}, { filename: 'talk.1080p.x264.mp4' });

    expect(result.width).toBe(1920);
    expect(result.height).toBe(1080);
    expect(result.codec).toBe('X264');
    expect(result.has_audio).toBe(false);
    expect(result.truncated).toBe(false);
  });

  it('should run object and face detection when asked', async () => {
    const analyzer = new VideoAnalyzer({ probe: HD_PROBE, backend: new PeopleVisionBackend() });
    const result = await analyzer.analyze(bytesOf('video'), { detectObjects: true, detectFaces: true });

    expect(result.detected_objects).toEqual([{ label: 'person', confidence: 0.9, timestamps: [[0, 4.5]] }]);
    expect(result.detected_faces).toEqual([]);
  });

  it('should wrap probe failures', async () => {
    const broken: MediaProbe = async () => {
      throw new Error('Unsupported container');
    };
    const attempt = new VideoAnalyzer({ probe: broken }).analyze(bytesOf('video'));
    await expect(attempt).rejects.toBeInstanceOf(AnalysisFailedError);
    await expect(attempt).rejects.toThrow('Analysis failed: Unsupported container');
  });

  it('should fail when the duration is unknown', async () => {
    const analyzer = new VideoAnalyzer({ probe: fixedProbe({ width: 640 }) });
    await expect(analyzer.analyze(bytesOf('video'))).rejects.toThrow(
      'Analysis failed: Could not determine video duration'
    );
  });

  it('should describe its capabilities', () => {
    const caps = new VideoAnalyzer().capabilities();
    expect(caps.kind).toBe('video');
    expect(caps.maxDurationSeconds).toBe(600);
    expect(caps.dependencyAvailable).toBe(false);
    expect(caps.features).toEqual(['metadata_extraction', 'key_frame_extraction']);
  });

  it('should advertise detection features once the backend has a model', async () => {
    const analyzer = new VideoAnalyzer({ backend: new LoadedVisionBackend() });
    await analyzer.init();

    const caps = analyzer.capabilities();
    expect(caps.dependencyAvailable).toBe(true);
    expect(caps.features).toEqual([
      'metadata_extraction',
      'key_frame_extraction',
      'scene_detection',
      'object_detection',
      'face_detection',
    ]);
  });
});
