import { describe, it, expect } from 'vitest';
import {
  AnalysisFailedError,
  AnalyzerUnavailableError,
  EmptyContentError,
  InvalidTaskTransitionError,
  UnsupportedContentTypeError,
  describeError,
  toAnalysisFailure,
} from '../src/core/errors.js';

describe('describeError', () => {
  it('should pass taxonomy errors through', () => {
    expect(describeError(new UnsupportedContentTypeError('image/png'))).toEqual({
      kind: 'UnsupportedContentType',
      message: 'Unsupported content type: image/png',
    });
    expect(describeError(new AnalyzerUnavailableError('audio', 'disabled by configuration'))).toEqual({
      kind: 'AnalyzerUnavailable',
      message: 'Analyzer unavailable: audio (disabled by configuration)',
    });
    expect(describeError(new EmptyContentError())).toEqual({
      kind: 'EmptyContent',
      message: 'No content provided for analysis',
    });
    expect(describeError(new InvalidTaskTransitionError('t', 'completed', 'failed')).kind)
      .toBe('InvalidTaskTransition');
  });

  it('should treat anything else as internal', () => {
    expect(describeError(new RangeError('bad index'))).toEqual({
      kind: 'InternalError',
      message: 'Internal error: bad index',
    });
    expect(describeError('string thrown')).toEqual({
      kind: 'InternalError',
      message: 'Internal error: unknown failure',
    });
  });
});

describe('toAnalysisFailure', () => {
  it('should keep analysis failures as they are', () => {
    const error = new AnalysisFailedError('already wrapped');
    expect(toAnalysisFailure(error)).toBe(error);
  });

  it('should wrap other errors and keep the cause', () => {
    const cause = new Error('decoder crashed');
    const wrapped = toAnalysisFailure(cause);

    expect(wrapped.message).toBe('Analysis failed: decoder crashed');
    expect(wrapped.reason).toBe('decoder crashed');
    expect(wrapped.cause).toBe(cause);
  });

  it('should stringify non-errors', () => {
    expect(toAnalysisFailure(42).message).toBe('Analysis failed: 42');
  });
});
