/**
 * Link Detector
 *
 * Classifies free text into a source descriptor. The first recognizable
 * link wins; anything else is not a link.
 */

import {
  createSourceDescriptor,
  type SourceDescriptor,
  type SourceVariant,
} from '@trackdrop/core';

const SPOTIFY_PATTERN =
  /https?:\/\/open\.spotify\.com\/(?:intl-[a-z]{2}(?:-[a-z]{2})?\/)?(track|album|playlist|artist)\/([A-Za-z0-9]+)\S*/i;

const YOUTUBE_PLAYLIST_PATTERN =
  /(?:https?:\/\/)?(?:www\.|m\.|music\.)?youtube\.com\/playlist\?(?:\S*?&)?list=([\w-]+)\S*/i;

const YOUTUBE_WATCH_PATTERN =
  /(?:https?:\/\/)?(?:www\.|m\.|music\.)?youtube\.com\/watch\?(?:\S*?&)?v=([\w-]+)\S*/i;

const YOUTUBE_SHORT_PATTERN = /(?:https?:\/\/)?youtu\.be\/([\w-]+)\S*/i;

const YOUTUBE_SHORTS_PATTERN =
  /(?:https?:\/\/)?(?:www\.|m\.)?youtube\.com\/shorts\/([\w-]+)\S*/i;

const SPOTIFY_VARIANTS: Record<string, SourceVariant> = {
  track: 'track',
  album: 'album',
  playlist: 'playlist',
  artist: 'artist',
};

export class LinkDetector {
  /**
   * Detect a supported link in the text
   */
  detect(text: string): SourceDescriptor | null {
    const trimmed = text.trim();

    if (!trimmed) {
      return null;
    }

    return this.parseSpotify(trimmed) ?? this.parseYoutube(trimmed);
  }

  private parseSpotify(text: string): SourceDescriptor | null {
    const match = text.match(SPOTIFY_PATTERN);
    const variant = match?.[1] ? SPOTIFY_VARIANTS[match[1].toLowerCase()] : undefined;
    if (!match || !variant || !match[2]) {
      return null;
    }
    return createSourceDescriptor('spotify', variant, match[2], match[0]);
  }

  private parseYoutube(text: string): SourceDescriptor | null {
    const playlist = text.match(YOUTUBE_PLAYLIST_PATTERN);
    if (playlist?.[1]) {
      return createSourceDescriptor('youtube', 'playlist', playlist[1], withScheme(playlist[0]));
    }

    const video =
      text.match(YOUTUBE_WATCH_PATTERN) ??
      text.match(YOUTUBE_SHORT_PATTERN) ??
      text.match(YOUTUBE_SHORTS_PATTERN);
    if (video?.[1]) {
      return createSourceDescriptor('youtube', 'video', video[1], withScheme(video[0]));
    }

    return null;
  }
}

function withScheme(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

export const linkDetector = new LinkDetector();

/**
 * Classify text. Returns null for NotALink.
 */
export function classifyLink(text: string): SourceDescriptor | null {
  return linkDetector.detect(text);
}
