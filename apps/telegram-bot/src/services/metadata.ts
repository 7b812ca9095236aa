/**
 * YouTube Metadata Service
 *
 * Title, channel and counts shown before the format choice.
 * Docs: https://developers.google.com/youtube/v3/docs
 *
 * Lookups never throw: any failure is logged and reported as null.
 */

import { request, type Dispatcher } from 'undici';
import { createLogger, isNumber, isObject, isString, type Logger } from '@trackdrop/utils';

export interface MediaMetadata {
  title: string;
  channel: string;
  /** Videos only */
  views?: number;
  /** Playlists only */
  itemCount?: number;
}

export interface MetadataServiceConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class YouTubeMetadataService {
  private config: MetadataServiceConfig;
  private logger: Logger;

  constructor(config: Partial<MetadataServiceConfig> & { apiKey: string }, logger?: Logger) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl ?? 'https://www.googleapis.com/youtube/v3',
      timeoutMs: config.timeoutMs ?? 10_000,
      dispatcher: config.dispatcher,
    };
    this.logger = logger ?? createLogger({ component: 'youtube-metadata' });
  }

  get enabled(): boolean {
    return this.config.apiKey.length > 0;
  }

  async getVideoInfo(videoId: string): Promise<MediaMetadata | null> {
    const item = await this.fetchFirstItem('videos', 'snippet,statistics', videoId);
    if (!item) {
      return null;
    }

    const snippet = readSnippet(item);
    if (!snippet) {
      return null;
    }
    const statistics = item['statistics'];
    const views = isObject(statistics) ? toCount(statistics['viewCount']) : undefined;
    return views === undefined ? snippet : { ...snippet, views };
  }

  async getPlaylistInfo(playlistId: string): Promise<MediaMetadata | null> {
    const item = await this.fetchFirstItem('playlists', 'snippet,contentDetails', playlistId);
    if (!item) {
      return null;
    }

    const snippet = readSnippet(item);
    if (!snippet) {
      return null;
    }
    const details = item['contentDetails'];
    const itemCount = isObject(details) ? toCount(details['itemCount']) : undefined;
    return itemCount === undefined ? snippet : { ...snippet, itemCount };
  }

  private async fetchFirstItem(
    resource: 'videos' | 'playlists',
    part: string,
    id: string
  ): Promise<Record<string, unknown> | null> {
    if (!this.enabled) {
      return null;
    }

    const query = new URLSearchParams({ part, id, key: this.config.apiKey });
    try {
      const { statusCode, body } = await request(`${this.config.baseUrl}/${resource}?${query.toString()}`, {
        method: 'GET',
        dispatcher: this.config.dispatcher,
        headersTimeout: this.config.timeoutMs,
        bodyTimeout: this.config.timeoutMs,
      });
      const payload: unknown = await body.json();

      if (statusCode !== 200) {
        this.logger.warn({ resource, id, statusCode }, 'YouTube API returned an error status');
        return null;
      }

      const items = isObject(payload) ? payload['items'] : undefined;
      if (!Array.isArray(items)) {
        return null;
      }
      const entries: unknown[] = items;
      const first = entries[0];
      return isObject(first) ? first : null;
    } catch (error) {
      this.logger.error({ resource, id, error: error instanceof Error ? error.message : String(error) }, 'Error fetching YouTube metadata');
      return null;
    }
  }
}

function readSnippet(item: Record<string, unknown>): MediaMetadata | null {
  const snippet = item['snippet'];
  if (!isObject(snippet) || !isString(snippet['title'])) {
    return null;
  }
  const channel = snippet['channelTitle'];
  return {
    title: snippet['title'],
    channel: isString(channel) ? channel : 'Unknown',
  };
}

// The API sends statistics as strings and itemCount as a number
function toCount(value: unknown): number | undefined {
  if (isNumber(value)) {
    return value;
  }
  if (isString(value) && /^\d+$/.test(value)) {
    return Number(value);
  }
  return undefined;
}
