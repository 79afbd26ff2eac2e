export {
  ANALYZER_KINDS,
  parseOptions,
  type Analyzer,
  type AnalyzerKind,
  type AnalyzerCapabilities,
  type AnalyzerHealth,
  type AnalyzerOptions,
  type AnalysisContent,
  type ContentHints,
  type ResultPayload,
} from './types.js';
export {
  TextAnalyzer,
  TextOptionsSchema,
  type TextAnalysisResult,
  type TextAnalyzerConfig,
  type KeyPhrase,
  type SentimentScores,
} from './text.js';
export {
  AudioAnalyzer,
  AudioOptionsSchema,
  type AudioAnalysisResult,
  type AudioAnalyzerConfig,
} from './audio.js';
export {
  VideoAnalyzer,
  VideoOptionsSchema,
  type VideoAnalysisResult,
  type VideoAnalyzerConfig,
  type KeyFrame,
} from './video.js';
export {
  StubSpeechBackend,
  StubVisionBackend,
  type SpeechBackend,
  type VisionBackend,
  type MediaSegment,
  type SpeakerTurn,
  type Scene,
  type DetectedObject,
  type DetectedFace,
} from './backends.js';
export { probeMedia, type MediaProbe, type MediaInfo } from './media-probe.js';
export { AnalyzerRegistry, defaultFactories, type AnalyzerFactory, type AnalyzerFactories } from './registry.js';
