/**
 * yt-dlp Client
 *
 * Handles YouTube downloads and searches via the yt-dlp CLI.
 * Docs: https://github.com/yt-dlp/yt-dlp#usage-and-options
 *
 * Features:
 * - Audio extraction (MP3 320k or FLAC)
 * - Video downloads capped at a chosen height
 * - Single-result searches under a configurable client identity
 * - Resolution, title and playlist-size probes
 */

import { isNumber, isObject, isString, probeBinaryVersion } from '@trackdrop/utils';
import type { FormatChoice } from '@trackdrop/core';
import type { ToolInvocation, ToolRunner } from '../runner.js';

export interface YtDlpConfig {
  binaryPath: string;
  ffmpegPath?: string;
  /** Wall-clock limit for direct downloads */
  downloadTimeoutSeconds: number;
  /** Wall-clock limit for probes */
  probeTimeoutSeconds: number;
}

/**
 * How yt-dlp presents itself to the site
 */
export interface ClientIdentity {
  userAgent: string;
  /** Value for youtube:player_client */
  playerClient: string;
  sleepRequestsSeconds?: number;
  sleepIntervalSeconds?: number;
}

export const DEFAULT_IDENTITY: ClientIdentity = {
  userAgent: 'Mozilla/5.0 (Linux; Android 13) AppleWebKit/537.36',
  playerClient: 'android,web',
};

const OUTPUT_TEMPLATE = '%(title)s.%(ext)s';

export class YtDlpClient {
  private config: YtDlpConfig;

  constructor(config?: Partial<YtDlpConfig>) {
    this.config = {
      binaryPath: config?.binaryPath ?? 'yt-dlp',
      ffmpegPath: config?.ffmpegPath,
      downloadTimeoutSeconds: config?.downloadTimeoutSeconds ?? 3600,
      probeTimeoutSeconds: config?.probeTimeoutSeconds ?? 60,
    };
  }

  /**
   * Search and download the first matching result as MP3
   */
  buildSearchInvocation(
    query: string,
    outputDir: string,
    identity: ClientIdentity,
    timeoutSeconds: number
  ): ToolInvocation {
    return {
      tool: this.config.binaryPath,
      args: [
        ...this.identityArgs(identity),
        ...this.formatArgs({ kind: 'default' }),
        '--no-playlist',
        '-o', `${outputDir}/${OUTPUT_TEMPLATE}`,
        `ytsearch1:${query}`,
      ],
      cwd: outputDir,
      timeoutMs: timeoutSeconds * 1000,
    };
  }

  /**
   * Download a YouTube link in the chosen format
   */
  buildDownloadInvocation(
    url: string,
    outputDir: string,
    format: FormatChoice,
    isCollection: boolean
  ): ToolInvocation {
    return {
      tool: this.config.binaryPath,
      args: [
        ...this.identityArgs(DEFAULT_IDENTITY),
        ...this.formatArgs(format),
        isCollection ? '--yes-playlist' : '--no-playlist',
        '--newline',
        '-o', `${outputDir}/${OUTPUT_TEMPLATE}`,
        url,
      ],
      cwd: outputDir,
      timeoutMs: this.config.downloadTimeoutSeconds * 1000,
    };
  }

  /**
   * Heights offered for a video, ascending. Empty when the probe fails.
   */
  async probeResolutions(url: string, runner: ToolRunner, cwd: string, signal?: AbortSignal): Promise<number[]> {
    const result = await runner.capture(this.probe(['-j', '--no-playlist', url], cwd), signal);
    if (result.exitCode !== 0) {
      return [];
    }
    return extractResolutions(parseFirstJsonLine(result.stdout));
  }

  async fetchTitle(url: string, runner: ToolRunner, cwd: string, signal?: AbortSignal): Promise<string | null> {
    const result = await runner.capture(
      this.probe(['--dump-single-json', '--yes-playlist', '--flat-playlist', url], cwd),
      signal
    );
    if (result.exitCode !== 0) {
      return null;
    }
    const info = parseFirstJsonLine(result.stdout);
    return isObject(info) && isString(info['title']) ? info['title'] : null;
  }

  async countPlaylistItems(url: string, runner: ToolRunner, cwd: string, signal?: AbortSignal): Promise<number | null> {
    const result = await runner.capture(
      this.probe(['--flat-playlist', '--print', '%(id)s', url], cwd),
      signal
    );
    if (result.exitCode !== 0) {
      return null;
    }
    const count = result.stdout.split('\n').filter(line => line.trim().length > 0).length;
    return count > 0 ? count : null;
  }

  async getVersion(): Promise<string | null> {
    return probeBinaryVersion(this.config.binaryPath);
  }

  private probe(args: string[], cwd: string): ToolInvocation {
    return {
      tool: this.config.binaryPath,
      args: ['--user-agent', DEFAULT_IDENTITY.userAgent, ...args],
      cwd,
      timeoutMs: this.config.probeTimeoutSeconds * 1000,
    };
  }

  private identityArgs(identity: ClientIdentity): string[] {
    const args = [
      '--user-agent', identity.userAgent,
      '--extractor-args', `youtube:player_client=${identity.playerClient}`,
    ];
    if (identity.sleepRequestsSeconds !== undefined) {
      args.push('--sleep-requests', String(identity.sleepRequestsSeconds));
    }
    if (identity.sleepIntervalSeconds !== undefined) {
      args.push('--sleep-interval', String(identity.sleepIntervalSeconds));
    }
    if (this.config.ffmpegPath) {
      args.push('--ffmpeg-location', this.config.ffmpegPath);
    }
    return args;
  }

  private formatArgs(format: FormatChoice): string[] {
    switch (format.kind) {
      case 'default':
        return mp3Args();
      case 'audio':
        return format.quality === 'flac'
          ? ['-f', 'bestaudio/best', '--extract-audio', '--audio-format', 'flac', '--audio-quality', '0']
          : mp3Args();
      case 'video':
        return [
          '-f', `bestvideo[height<=${format.height}][ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best`,
          '--merge-output-format', 'mp4',
        ];
    }
  }
}

function mp3Args(): string[] {
  return ['-f', 'bestaudio[ext=m4a]/bestaudio/best', '--extract-audio', '--audio-format', 'mp3', '--audio-quality', '320K'];
}

function parseFirstJsonLine(stdout: string): unknown {
  const line = stdout.split('\n').find(candidate => candidate.trim().startsWith('{'));
  if (!line) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Distinct MP4 video heights, ascending. Falls back to any video height
 * when no MP4 stream is offered.
 */
export function extractResolutions(info: unknown): number[] {
  const formats = isObject(info) ? info['formats'] : undefined;
  if (!Array.isArray(formats)) {
    return [];
  }
  const entries: unknown[] = formats;

  const mp4Heights = new Set<number>();
  const anyHeights = new Set<number>();

  for (const format of entries) {
    if (!isObject(format) || !isNumber(format['height']) || format['vcodec'] === 'none') {
      continue;
    }
    anyHeights.add(format['height']);
    if (format['ext'] === 'mp4') {
      mp4Heights.add(format['height']);
    }
  }

  const heights = mp4Heights.size > 0 ? mp4Heights : anyHeights;
  return Array.from(heights).sort((a, b) => a - b);
}
