import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { YouTubeMetadataService } from './metadata.js';

const ORIGIN = 'https://www.googleapis.com';

describe('YouTubeMetadataService', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('reads title, channel and views for a video', async () => {
    agent.get(ORIGIN)
      .intercept({ path: path => path.startsWith('/youtube/v3/videos?') && path.includes('id=vid123'), method: 'GET' })
      .reply(200, {
        items: [{ snippet: { title: 'Night Drive', channelTitle: 'Synth Channel' }, statistics: { viewCount: '98765' } }],
      });

    const service = new YouTubeMetadataService({ apiKey: 'test-key', dispatcher: agent });

    expect(await service.getVideoInfo('vid123')).toEqual({
      title: 'Night Drive',
      channel: 'Synth Channel',
      views: 98765,
    });
  });

  it('reads the item count for a playlist', async () => {
    agent.get(ORIGIN)
      .intercept({ path: path => path.startsWith('/youtube/v3/playlists?'), method: 'GET' })
      .reply(200, {
        items: [{ snippet: { title: 'Road Trip' }, contentDetails: { itemCount: 12 } }],
      });

    const service = new YouTubeMetadataService({ apiKey: 'test-key', dispatcher: agent });

    expect(await service.getPlaylistInfo('PL1')).toEqual({
      title: 'Road Trip',
      channel: 'Unknown',
      itemCount: 12,
    });
  });

  it('returns null for an unknown id', async () => {
    agent.get(ORIGIN)
      .intercept({ path: path => path.startsWith('/youtube/v3/videos?'), method: 'GET' })
      .reply(200, { items: [] });

    const service = new YouTubeMetadataService({ apiKey: 'test-key', dispatcher: agent });

    expect(await service.getVideoInfo('missing')).toBeNull();
  });

  it('swallows error statuses into null', async () => {
    agent.get(ORIGIN)
      .intercept({ path: path => path.startsWith('/youtube/v3/videos?'), method: 'GET' })
      .reply(403, { error: { message: 'quota exceeded' } });

    const service = new YouTubeMetadataService({ apiKey: 'test-key', dispatcher: agent });

    expect(await service.getVideoInfo('vid123')).toBeNull();
  });

  it('swallows transport errors into null', async () => {
    agent.get(ORIGIN)
      .intercept({ path: path => path.startsWith('/youtube/v3/videos?'), method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const service = new YouTubeMetadataService({ apiKey: 'test-key', dispatcher: agent });

    expect(await service.getVideoInfo('vid123')).toBeNull();
  });

  it('makes no request without an API key', async () => {
    const service = new YouTubeMetadataService({ apiKey: '', dispatcher: agent });

    expect(service.enabled).toBe(false);
    expect(await service.getPlaylistInfo('PL1')).toBeNull();
  });
});
