/**
 * Job Types
 */

import type { SourceDescriptor } from './source.js';

export type AudioQuality = 'mp3' | 'flac';

export type MediaType = 'audio' | 'video';

/**
 * Output format requested for a job.
 * `default` is used for sources that need no choice (MP3 320k).
 */
export type FormatChoice =
  | { kind: 'default' }
  | { kind: 'audio'; quality: AudioQuality }
  | { kind: 'video'; height: number };

export interface DownloadJob {
  id: string;
  userId: number;
  chatId: number;
  source: SourceDescriptor;
  format: FormatChoice;
  /** Job root, removed on every terminal outcome */
  workingDirectory: string;
  /** Where the download tools write their files (inside workingDirectory) */
  outputDirectory: string;
  startedAt: Date;
}

export function describeFormat(format: FormatChoice): string {
  switch (format.kind) {
    case 'default':
      return 'MP3 320k';
    case 'audio':
      return format.quality === 'flac' ? 'FLAC' : 'MP3 320k';
    case 'video':
      return `${format.height}p MP4`;
  }
}
