import { z } from 'zod';
import { AnalysisFailedError, toAnalysisFailure } from '../core/errors.js';
import {
  parseOptions,
  round2,
  toText,
  type Analyzer,
  type AnalyzerCapabilities,
  type AnalyzerHealth,
  type AnalysisContent,
  type AnalyzerOptions,
} from './types.js';

export const TextOptionsSchema = z.object({
  extractKeyPhrases: z.boolean().default(true),
  analyzeSentiment: z.boolean().default(false),
  detectLanguage: z.boolean().default(true),
});

export type TextOptions = z.infer<typeof TextOptionsSchema>;

export interface KeyPhrase {
  phrase: string;
  count: number;
  importance: number;
}

export interface SentimentScores {
  positive: number;
  negative: number;
  neutral: number;
}

export interface TextAnalysisResult {
  char_count: number;
  word_count: number;
  sentence_count: number;
  avg_word_length: number;
  avg_sentence_length: number;
  vocab_size: number;
  reading_time_minutes: number;
  key_phrases?: KeyPhrase[];
  sentiment?: SentimentScores;
  language?: string;
}

export interface TextAnalyzerConfig {
  model?: string;
  /** Longest input accepted, in characters */
  maxLength?: number;
}

const WORDS_PER_MINUTE = 200;
const MAX_KEY_PHRASES = 10;

const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'if', 'of', 'to', 'in', 'on', 'at',
  'by', 'for', 'with', 'from', 'as', 'is', 'are', 'was', 'were', 'be', 'been',
  'it', 'its', 'this', 'that', 'these', 'those', 'i', 'you', 'he', 'she', 'we',
  'they', 'not', 'no', 'so', 'than', 'then', 'very', 'can', 'will', 'do', 'has',
  'have', 'had',
]);

const POSITIVE_WORDS = new Set([
  'good', 'great', 'excellent', 'amazing', 'wonderful', 'clear', 'helpful',
  'useful', 'love', 'best',
]);

const NEGATIVE_WORDS = new Set([
  'bad', 'terrible', 'awful', 'poor', 'worst', 'confusing', 'boring', 'hate',
  'wrong', 'useless',
]);

const LANGUAGE_MARKERS: Record<string, Set<string>> = {
  en: new Set(['the', 'be', 'to', 'of', 'and', 'a', 'in', 'that', 'have', 'i']),
  es: new Set(['el', 'la', 'de', 'que', 'y', 'a', 'en', 'un', 'ser', 'se']),
};

/** Length in Unicode code points, so an emoji counts once. */
export function charLength(text: string): number {
  return [...text].length;
}

export function tokenize(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map(s => s.trim())
    .filter(s => tokenize(s).length > 0);
}

export function extractKeyPhrases(sentences: string[], limit = MAX_KEY_PHRASES): KeyPhrase[] {
  const counts = new Map<string, number>();

  for (const sentence of sentences) {
    let run: string[] = [];
    const flush = () => {
      if (run.length >= 2) {
        const phrase = run.join(' ');
        counts.set(phrase, (counts.get(phrase) ?? 0) + 1);
      }
      run = [];
    };

    for (const word of tokenize(sentence.toLowerCase())) {
      if (STOPWORDS.has(word)) {
        flush();
      } else {
        run.push(word);
      }
    }
    flush();
  }

  const total = [...counts.values()].reduce((sum, n) => sum + n, 0);

  return [...counts.entries()]
    .map(([phrase, count]) => ({ phrase, count, importance: round2(count / total) }))
    .sort((a, b) =>
      b.phrase.length - a.phrase.length ||
      b.count - a.count ||
      a.phrase.localeCompare(b.phrase)
    )
    .slice(0, limit);
}

export function scoreSentiment(words: string[]): SentimentScores {
  const total = words.length;
  if (total === 0) {
    return { positive: 0, negative: 0, neutral: 1 };
  }

  let positive = 0;
  let negative = 0;
  for (const word of words) {
    const lower = word.toLowerCase();
    if (POSITIVE_WORDS.has(lower)) positive++;
    else if (NEGATIVE_WORDS.has(lower)) negative++;
  }

  return {
    positive: round2(positive / total),
    negative: round2(negative / total),
    neutral: round2(1 - (positive + negative) / total),
  };
}

export function detectLanguage(words: string[], fallback = 'en'): string {
  const present = new Set(words.map(w => w.toLowerCase()));
  let best = fallback;
  let bestScore = 1; // a single marker word is not evidence
  let tied = false;

  for (const [language, markers] of Object.entries(LANGUAGE_MARKERS)) {
    let score = 0;
    for (const marker of markers) {
      if (present.has(marker)) score++;
    }
    if (score > bestScore) {
      best = language;
      bestScore = score;
      tied = false;
    } else if (score === bestScore && score > 1) {
      tied = true;
    }
  }

  return tied ? fallback : best;
}

export class TextAnalyzer implements Analyzer<TextAnalysisResult> {
  readonly kind = 'text' as const;
  readonly name = 'TextAnalyzer';
  private readonly model: string;
  private readonly maxLength: number;
  private ready = false;

  constructor(config: TextAnalyzerConfig = {}) {
    this.model = config.model ?? 'heuristic';
    this.maxLength = config.maxLength ?? 1_000_000;
  }

  async init(): Promise<void> {
    this.ready = true;
  }

  async analyze(content: AnalysisContent, options?: AnalyzerOptions): Promise<TextAnalysisResult> {
    const opts = parseOptions(TextOptionsSchema, options);

    try {
      const text = toText(content);
      if (!text.trim()) {
        throw new AnalysisFailedError('Empty text provided for analysis');
      }
      const charCount = charLength(text);
      if (charCount > this.maxLength) {
        throw new AnalysisFailedError(
          `Text length ${charCount} exceeds the limit of ${this.maxLength} characters`
        );
      }

      const words = tokenize(text);
      const sentences = splitSentences(text);
      const totalWordLength = words.reduce((sum, w) => sum + charLength(w), 0);

      const result: TextAnalysisResult = {
        char_count: charCount,
        word_count: words.length,
        sentence_count: sentences.length,
        avg_word_length: words.length ? round2(totalWordLength / words.length) : 0,
        avg_sentence_length: sentences.length ? round2(words.length / sentences.length) : 0,
        vocab_size: new Set(words.map(w => w.toLowerCase())).size,
        reading_time_minutes: round2(words.length / WORDS_PER_MINUTE),
      };

      if (opts.extractKeyPhrases) {
        result.key_phrases = extractKeyPhrases(sentences);
      }
      if (opts.analyzeSentiment) {
        result.sentiment = scoreSentiment(words);
      }
      if (opts.detectLanguage) {
        result.language = detectLanguage(words);
      }

      return result;
    } catch (error) {
      throw toAnalysisFailure(error);
    }
  }

  capabilities(): AnalyzerCapabilities {
    return {
      kind: this.kind,
      analyzer: this.name,
      model: this.model,
      contentTypes: ['text/plain', 'text/markdown', 'text/html', 'application/json', 'text/csv'],
      features: ['basic_stats', 'key_phrase_extraction', 'sentiment_analysis', 'language_detection'],
      supportsBatch: true,
      dependencyAvailable: true,
    };
  }

  healthCheck(): AnalyzerHealth {
    return {
      status: this.ready ? 'healthy' : 'unavailable',
      analyzer: this.name,
      model: this.model,
      modelLoaded: this.ready,
    };
  }
}
