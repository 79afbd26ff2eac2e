import mimeTypes from 'mime-types';
import { extname } from 'path';
import type { AnalyzerKind } from '../analyzers/types.js';
import { UnsupportedContentTypeError } from '../core/errors.js';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const kindByMimeType: Record<string, AnalyzerKind> = {
  // Text
  'text/plain': 'text',
  'text/markdown': 'text',
  'text/html': 'text',
  'text/csv': 'text',
  'application/json': 'text',

  // Audio
  'audio/wav': 'audio',
  'audio/wave': 'audio',
  'audio/x-wav': 'audio',
  'audio/mp3': 'audio',
  'audio/mpeg': 'audio',
  'audio/ogg': 'audio',
  'audio/webm': 'audio',
  'audio/flac': 'audio',
  'audio/x-flac': 'audio',
  'audio/x-m4a': 'audio',
  'audio/mp4': 'audio',

  // Video
  'video/mp4': 'video',
  'video/quicktime': 'video',
  'video/x-msvideo': 'video',
  'video/x-ms-wmv': 'video',
  'video/webm': 'video',
  'video/x-matroska': 'video',
};

// Consulted last, for extensions whose registered MIME type is missing above
const kindByExtension: Record<string, AnalyzerKind> = {
  txt: 'text',
  md: 'text',
  html: 'text',
  json: 'text',

  wav: 'audio',
  mp3: 'audio',
  ogg: 'audio',
  flac: 'audio',
  m4a: 'audio',

  mp4: 'video',
  mov: 'video',
  avi: 'video',
  wmv: 'video',
  webm: 'video',
  mkv: 'video',
};

/** `Text/Plain; charset=UTF-8` -> `text/plain` */
export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export function getMimeType(filename: string): string | null {
  const mime = mimeTypes.lookup(filename);
  return mime || null;
}

export function getExtension(filename: string): string | null {
  const ext = extname(filename).toLowerCase().slice(1);
  return ext || null;
}

export function kindForMimeType(contentType: string): AnalyzerKind | null {
  return kindByMimeType[normalizeContentType(contentType)] ?? null;
}

/**
 * The MIME type a task records: the provided one, else the one implied by
 * the filename, else `application/octet-stream`.
 */
export function detectContentType(contentType?: string | null, filename?: string | null): string {
  if (contentType && normalizeContentType(contentType)) {
    return normalizeContentType(contentType);
  }
  if (filename) {
    const derived = getMimeType(filename);
    if (derived) return derived;
  }
  return DEFAULT_CONTENT_TYPE;
}

/**
 * Map a MIME type and/or filename to an analyzer kind.
 *
 * Order: provided MIME type, MIME type derived from the filename, then the
 * filename extension on its own.
 */
export function resolveAnalyzerKind(contentType?: string | null, filename?: string | null): AnalyzerKind {
  let attempted: string | null = null;

  // A blank type counts as absent, so the filename can supply one.
  const provided = contentType ? normalizeContentType(contentType) : '';
  if (provided) {
    attempted = provided;
    const kind = kindForMimeType(provided);
    if (kind) return kind;
  }

  if (filename) {
    const derived = getMimeType(filename);
    if (derived) {
      attempted = attempted ?? derived;
      const kind = kindForMimeType(derived);
      if (kind) return kind;
    }

    const ext = getExtension(filename);
    if (ext && kindByExtension[ext]) {
      return kindByExtension[ext];
    }
  }

  throw new UnsupportedContentTypeError(attempted || DEFAULT_CONTENT_TYPE, filename ?? undefined);
}

export function supportedContentTypes(kind?: AnalyzerKind): string[] {
  return Object.entries(kindByMimeType)
    .filter(([, k]) => kind === undefined || k === kind)
    .map(([mime]) => mime);
}

/** Injectable wrapper around the resolution tables. */
export class ContentTypeResolver {
  resolve(contentType?: string | null, filename?: string | null): AnalyzerKind {
    return resolveAnalyzerKind(contentType, filename);
  }

  detect(contentType?: string | null, filename?: string | null): string {
    return detectContentType(contentType, filename);
  }
}
