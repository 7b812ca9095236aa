/**
 * spotdl Client
 *
 * Resolves Spotify tracks, albums, playlists and artists to audio files.
 * Docs: https://spotdl.readthedocs.io/
 *
 * Only builds invocations and parses metadata; running the binary is
 * left to a ToolRunner so tests can replay output.
 */

import { probeBinaryVersion } from '@trackdrop/utils';
import type { ToolInvocation, ToolRunner } from '../runner.js';

export interface SpotdlConfig {
  binaryPath: string;
  ffmpegPath?: string;
  /** Wall-clock limit for the primary download */
  timeoutSeconds: number;
  /** Wall-clock limit for the metadata lookup */
  metadataTimeoutSeconds: number;
  threads: number;
  maxRetries: number;
}

const TRACK_LINE_PATTERN = /^(.+?) - (.+)$/;

export class SpotdlClient {
  private config: SpotdlConfig;

  constructor(config?: Partial<SpotdlConfig>) {
    this.config = {
      binaryPath: config?.binaryPath ?? 'spotdl',
      ffmpegPath: config?.ffmpegPath,
      timeoutSeconds: config?.timeoutSeconds ?? 120,
      metadataTimeoutSeconds: config?.metadataTimeoutSeconds ?? 60,
      threads: config?.threads ?? 2,
      maxRetries: config?.maxRetries ?? 2,
    };
  }

  get timeoutSeconds(): number {
    return this.config.timeoutSeconds;
  }

  /**
   * Build the download command for a Spotify link
   */
  buildDownloadInvocation(url: string, outputDir: string): ToolInvocation {
    const args = [
      'download', url,
      '--output', outputDir,
      '--format', 'mp3',
      '--bitrate', '320k',
      '--threads', String(this.config.threads),
      '--max-retries', String(this.config.maxRetries),
      '--print-errors',
      '--no-cache',
    ];

    if (this.config.ffmpegPath) {
      args.push('--ffmpeg', this.config.ffmpegPath);
    }

    return {
      tool: this.config.binaryPath,
      args,
      cwd: outputDir,
      timeoutMs: this.config.timeoutSeconds * 1000,
    };
  }

  /**
   * Look up "Artist - Title" for a track link. Null when the lookup
   * fails or prints nothing usable.
   */
  async extractSearchTerm(
    url: string,
    runner: ToolRunner,
    cwd: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    const result = await runner.capture(
      {
        tool: this.config.binaryPath,
        args: ['list', url],
        cwd,
        timeoutMs: this.config.metadataTimeoutSeconds * 1000,
      },
      signal
    );

    if (result.exitCode !== 0) {
      return null;
    }

    return parseTrackListing(result.stdout);
  }

  async getVersion(): Promise<string | null> {
    return probeBinaryVersion(this.config.binaryPath);
  }
}

/**
 * First "Artist - Title" line of a listing
 */
export function parseTrackListing(stdout: string): string | null {
  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    const match = line.match(TRACK_LINE_PATTERN);
    if (match?.[1] && match[2] && !line.startsWith('Processing')) {
      return `${match[1].trim()} - ${match[2].trim()}`;
    }
  }
  return null;
}
