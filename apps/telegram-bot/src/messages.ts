/**
 * Message Formatting
 *
 * Every text the bot sends, rendered for Telegram's legacy Markdown.
 * User-supplied and tool-supplied strings go through escapeMarkdown.
 */

import {
  describeFormat,
  encodeCallback,
  type ButtonGrid,
  type FailureReason,
  type FormatChoice,
  type ProgressState,
  type SourceDescriptor,
  type SourceVariant,
} from '@trackdrop/core';
import type { MediaMetadata } from './services/metadata.js';

export const PROGRESS_BAR_LENGTH = 20;

export const MESSAGES = {
  welcome:
    `🎧 *Music Downloader Bot*\n\n` +
    `Send me a Spotify or YouTube link and I'll download it for you! 🎵`,
  help:
    `*How it works*\n\n` +
    `Send a link:\n` +
    `- Spotify track, album, playlist or artist\n` +
    `- YouTube video, short or playlist\n\n` +
    `YouTube links ask for audio (MP3/FLAC) or video (MP4) first.\n` +
    `Single small files are sent directly. Collections and large files arrive as a ` +
    `password-protected ZIP link.\n\n` +
    `*Commands:*\n` +
    `/start - Welcome message\n` +
    `/help - This message\n` +
    `/stop - Stop everything running for you (alias /cancel)`,
  invalidLink: '❌ Please send a valid Spotify or YouTube link.',
  spotifyDetected: '🎵 *Spotify link detected!*\n\n_Starting download..._',
  chooseMediaType: 'Choose a format:',
  audioSelected: '🎵 Audio selected. Choose your quality:',
  videoChecking: '🎬 Video selected. Checking available formats...',
  videoSelected: '🎬 Video selected. Choose your resolution:',
  noFormats: '❌ Could not find any downloadable formats for that video.',
  notForYou: '❌ This button is not for you.',
  sessionExpired: '❌ This session has expired. Please send the link again.',
  sessionExpiredEdit: 'This session has expired.',
  staleButtons: '⚠️ That choice is no longer available. Please use the latest buttons.',
  activeJob: '⏳ You already have a download in progress. Send /stop to cancel it.',
  stopped: '🛑 All tasks stopped for you.',
  somethingWrong: '❌ An error occurred. Please try again.',
  processingFailed: '❌ An error occurred during processing. Please try again.',
  archiveFailed: '❌ Could not create the archive. Please try again.',
  uploadFailed: '❌ Upload failed. Your files could not be uploaded, please try again later.',
  partialNotice: '⚠️ Some tracks failed, but the rest were downloaded.',
} as const;

/**
 * Escape the characters legacy Markdown treats as entities
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function providerLabel(source: SourceDescriptor): string {
  return source.provider === 'spotify' ? 'Spotify' : 'YouTube';
}

function collectionLabel(variant: SourceVariant): string {
  switch (variant) {
    case 'album':
      return 'Album';
    case 'artist':
      return 'Artist';
    default:
      return 'Playlist';
  }
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function renderBar(percentage: number, fill: string, empty: string, length = PROGRESS_BAR_LENGTH): string {
  const bounded = Math.min(100, Math.max(0, percentage));
  const filled = Math.floor((length * bounded) / 100);
  return fill.repeat(filled) + empty.repeat(length - filled);
}

/**
 * Progress message: the download bar, or the upload bar once an upload status exists
 */
export function renderProgress(state: Readonly<ProgressState>): string {
  if (state.uploadStatusLabel) {
    const done = state.status === 'uploading' && state.uploadPercentage >= 100;
    return (
      `🎵 *Download Complete*\n\n` +
      `📦 *Upload Progress:*\n` +
      `[${renderBar(state.uploadPercentage, '=', '-')}] ${state.uploadPercentage}%\n\n` +
      `📤 *Status:* ${escapeMarkdown(state.uploadStatusLabel)}\n\n` +
      (done ? `✅ *Upload completed!*` : `⏱️ *Please wait...*`)
    );
  }

  const header = state.collectionName
    ? `🎶 *${escapeMarkdown(state.collectionName)}*\n\n`
    : '';

  return (
    header +
    `🎵 *Download Progress*\n\n` +
    `📊 *Progress:* Downloaded ${state.completedCount} of ${state.totalCount} tracks\n` +
    `${renderBar(state.percentage, '█', '-')} ${state.percentage}%\n\n` +
    `🎼 *Current:* ${escapeMarkdown(state.currentLabel)}\n\n` +
    `📱 *Status:* ${titleCase(state.status)}`
  );
}

export function startingDownload(source: SourceDescriptor): string {
  return (
    `🚀 Starting download...\n\n` +
    `📺 *Platform:* ${providerLabel(source)}\n` +
    `📁 *Type:* ${titleCase(source.variant)}`
  );
}

export function dispatchConfirmation(format: FormatChoice): string {
  return `✅ Got it! Starting download for ${describeFormat(format)}...`;
}

export function metadataCard(metadata: MediaMetadata): string {
  let text = `🎬 *${escapeMarkdown(metadata.title)}*\n`;
  text += `📺 Channel: ${escapeMarkdown(metadata.channel)}\n`;
  if (metadata.views !== undefined) {
    text += `👁️ Views: ${metadata.views.toLocaleString('en-US')}\n`;
  }
  if (metadata.itemCount !== undefined) {
    text += `📊 Videos: ${metadata.itemCount}\n`;
  }
  return text.trimEnd();
}

export function collectionAnnouncement(name: string, count: number, variant: SourceVariant): string {
  return (
    `🎶 *${collectionLabel(variant)}:* ${escapeMarkdown(name)}\n` +
    `📀 *Total Songs:* ${count}`
  );
}

export interface ArchiveSummary {
  source: SourceDescriptor;
  name: string;
  itemCount: number;
  size: number;
  link: string;
  password: string;
  partial: boolean;
}

export function archiveReady(summary: ArchiveSummary): string {
  const itemLabel = summary.source.provider === 'youtube' && summary.source.variant !== 'playlist'
    ? 'Files'
    : 'Tracks';
  const text =
    `✅ *${providerLabel(summary.source)} ${titleCase(summary.source.variant)} Download Complete!*\n\n` +
    `📁 *Name:* ${escapeMarkdown(summary.name)}\n` +
    `🎵 *${itemLabel}:* ${summary.itemCount}\n` +
    `📊 *Size:* ${formatMegabytes(summary.size)}\n` +
    `🔗 *Download Link:* ${escapeMarkdown(summary.link)}\n\n` +
    `🔑 *ZIP Password:* \`${summary.password}\``;
  return summary.partial ? `${text}\n\n${MESSAGES.partialNotice}` : text;
}

export function directDelivered(fileName: string, size: number, partial: boolean): string {
  const text =
    `✅ *Download Complete!*\n\n` +
    `📁 *File:* ${escapeMarkdown(fileName)}\n` +
    `📊 *Size:* ${formatMegabytes(size)}`;
  return partial ? `${text}\n\n${MESSAGES.partialNotice}` : text;
}

export function failureMessage(reason: FailureReason, source: SourceDescriptor): string {
  switch (reason) {
    case 'automation-blocked':
      return (
        `❌ No tracks could be downloaded.\n\n` +
        `YouTube is asking to confirm this is not a bot, so downloads are blocked for now. ` +
        `Please try again later.`
      );
    case 'content-unavailable':
      return (
        `❌ No tracks could be downloaded.\n\n` +
        `The content is not available for download. It may be private, removed or region-locked.`
      );
    case 'generic':
      if (source.provider === 'spotify') {
        return (
          `❌ No tracks could be downloaded.\n\n` +
          `*Possible reasons:*\n` +
          `- The Spotify track/playlist may not be available\n` +
          `- No matching songs were found on YouTube\n` +
          `- The link might be broken or private\n\n` +
          `*Try:*\n` +
          `- Check if the Spotify link works in the Spotify app\n` +
          `- Try a different track or playlist\n` +
          `- Make sure the playlist is public`
        );
      }
      return `❌ No tracks could be downloaded.\n\nPlease check the ${providerLabel(source)} link or try again later.`;
  }
}

export function mediaTypeButtons(userId: number): ButtonGrid {
  return [[
    { text: '🎵 Audio (MP3/FLAC)', payload: encodeCallback({ type: 'SelectMediaType', userId, mediaType: 'audio' }) },
    { text: '🎬 Video (MP4)', payload: encodeCallback({ type: 'SelectMediaType', userId, mediaType: 'video' }) },
  ]];
}

export function audioQualityButtons(userId: number): ButtonGrid {
  return [[
    { text: '🎵 MP3 (320kbps)', payload: encodeCallback({ type: 'SelectAudioQuality', userId, quality: 'mp3' }) },
    { text: '💎 FLAC (Lossless)', payload: encodeCallback({ type: 'SelectAudioQuality', userId, quality: 'flac' }) },
  ]];
}

/**
 * Highest resolution first, two buttons per row
 */
export function videoQualityButtons(userId: number, resolutions: readonly number[]): ButtonGrid {
  const ordered = Array.from(new Set(resolutions)).sort((a, b) => b - a);
  const rows: ButtonGrid = [];
  for (let i = 0; i < ordered.length; i += 2) {
    rows.push(
      ordered.slice(i, i + 2).map(height => ({
        text: `🎬 ${height}p (MP4)`,
        payload: encodeCallback({ type: 'SelectVideoQuality', userId, height }),
      }))
    );
  }
  return rows;
}
