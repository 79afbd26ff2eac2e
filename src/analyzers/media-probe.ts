import * as musicMetadata from 'music-metadata';
import type { ContentHints } from './types.js';

export interface MediaInfo {
  /** Seconds; undefined when the container does not declare it */
  duration?: number;
  sampleRate?: number;
  channels?: number;
  codec?: string;
  container?: string;
  bitrate?: number;
  lossless?: boolean;
  // Video stream fields. `probeMedia` reads container-level audio metadata
  // only and leaves these unset; a custom probe can fill them.
  width?: number;
  height?: number;
  fps?: number;
}

/**
 * Reads stream metadata from an in-memory buffer. Swappable so analyzers can
 * be exercised without real media files.
 */
export type MediaProbe = (content: Uint8Array, hints: ContentHints) => Promise<MediaInfo>;

export const probeMedia: MediaProbe = async (content, hints) => {
  const result = await musicMetadata.parseBuffer(content, {
    mimeType: hints.contentType,
    path: hints.filename,
    size: content.length,
  }, { duration: true, skipCovers: true });

  const { format } = result;

  return {
    duration: format.duration,
    sampleRate: format.sampleRate,
    channels: format.numberOfChannels,
    codec: format.codec,
    container: format.container,
    bitrate: format.bitrate,
    lossless: format.lossless,
  };
};
