/**
 * yt-dlp Output Parser
 */

import { basename, extname } from 'node:path';

export type YtDlpEvent =
  | { type: 'item-started'; index: number; total: number }
  | { type: 'item-completed'; label: string }
  | { type: 'destination'; label: string }
  | { type: 'percentage'; value: number }
  | { type: 'automation-blocked'; message: string }
  | { type: 'content-unavailable'; message: string }
  | { type: 'error'; message: string };

const ITEM_STARTED_PATTERN = /Downloading item (\d+) of (\d+)/;
const EXTRACT_AUDIO_PATTERN = /\[ExtractAudio\] Destination: (.+)/;
const MERGER_PATTERN = /\[Merger\] Merging formats into "(.+)"/;
const DESTINATION_PATTERN = /\[download\] Destination: (.+)/;
const PERCENT_PATTERN = /\[download\]\s+(\d+(?:\.\d+)?)%/;
const BLOCKED_PATTERN = /Sign in to confirm you.re not a bot|confirm you.re not a bot/i;
const UNAVAILABLE_PATTERN = /ERROR:.*(Video unavailable|Private video|This video is not available|has been removed|copyright|members-only|not available in your country)/i;

export function parseYtDlpLine(line: string): YtDlpEvent | null {
  if (BLOCKED_PATTERN.test(line)) {
    return { type: 'automation-blocked', message: line };
  }

  if (UNAVAILABLE_PATTERN.test(line)) {
    return { type: 'content-unavailable', message: line };
  }

  if (line.startsWith('ERROR:')) {
    return { type: 'error', message: line };
  }

  const started = line.match(ITEM_STARTED_PATTERN);
  if (started?.[1] && started[2]) {
    return {
      type: 'item-started',
      index: parseInt(started[1], 10),
      total: parseInt(started[2], 10),
    };
  }

  const extracted = line.match(EXTRACT_AUDIO_PATTERN) ?? line.match(MERGER_PATTERN);
  if (extracted?.[1]) {
    return { type: 'item-completed', label: fileLabel(extracted[1]) };
  }

  const destination = line.match(DESTINATION_PATTERN);
  if (destination?.[1]) {
    return { type: 'destination', label: fileLabel(destination[1]) };
  }

  const percent = line.match(PERCENT_PATTERN);
  if (percent?.[1]) {
    return { type: 'percentage', value: parseFloat(percent[1]) };
  }

  return null;
}

function fileLabel(filePath: string): string {
  const name = basename(filePath.trim());
  return basename(name, extname(name));
}
