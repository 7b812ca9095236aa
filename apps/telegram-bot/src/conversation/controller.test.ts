import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { DownloadJob } from '@trackdrop/core';
import { FakeTransport } from '../testing/fakes.js';
import { MESSAGES, audioQualityButtons, mediaTypeButtons, videoQualityButtons } from '../messages.js';
import type { JobLauncher, JobRequest, LaunchedJob } from '../processors/downloadProcessor.js';
import type { MediaMetadata } from '../services/metadata.js';
import { ConversationController, type ResolutionProbe } from './controller.js';

const VIDEO_LINK = 'https://youtu.be/abcDEF12345';
const PLAYLIST_LINK = 'https://www.youtube.com/playlist?list=PL123';
const TRACK_LINK = 'https://open.spotify.com/track/4uLU6hMCjMI75M1A2tKUQC';

class FakeLauncher implements JobLauncher {
  readonly requests: JobRequest[] = [];
  readonly busy = new Set<number>();
  readonly cancelled: number[] = [];

  isBusy(userId: number): boolean {
    return this.busy.has(userId);
  }

  start(request: JobRequest): LaunchedJob | null {
    if (this.busy.has(request.userId)) {
      return null;
    }
    this.busy.add(request.userId);
    this.requests.push(request);
    const job: DownloadJob = {
      id: `job-${this.requests.length}`,
      ...request,
      workingDirectory: '/tmp/job',
      outputDirectory: '/tmp/job/downloads',
      startedAt: new Date(0),
    };
    return { job, completion: Promise.resolve() };
  }

  cancel(userId: number): boolean {
    this.cancelled.push(userId);
    return this.busy.delete(userId);
  }
}

describe('ConversationController', () => {
  let transport: FakeTransport;
  let launcher: FakeLauncher;
  let probe: Mock<Parameters<ResolutionProbe>, ReturnType<ResolutionProbe>>;
  let clock: number;
  let videoInfo: MediaMetadata | null;
  let controller: ConversationController;

  beforeEach(() => {
    transport = new FakeTransport();
    launcher = new FakeLauncher();
    probe = vi.fn<Parameters<ResolutionProbe>, ReturnType<ResolutionProbe>>(async () => [360, 1080, 720]);
    clock = 0;
    videoInfo = null;
    controller = new ConversationController({
      transport,
      launcher,
      metadata: {
        getVideoInfo: async () => videoInfo,
        getPlaylistInfo: async () => ({ title: 'Road Trip', channel: 'DJ', itemCount: 12 }),
      },
      probeResolutions: probe,
      ttlMs: 1000,
      now: () => clock,
    });
  });

  function click(payload: string, messageId = 100, userId = 7) {
    return controller.handleCallback({ userId, chatId: 70, messageId, payload });
  }

  it('asks for a valid link when nothing is recognized', async () => {
    await controller.handleText(7, 70, 'hello there');

    expect(transport.sent.map(message => message.text)).toEqual([MESSAGES.invalidLink]);
    expect(launcher.requests).toEqual([]);
  });

  it('dispatches Spotify links immediately with the default format', async () => {
    await controller.handleText(7, 70, `check this ${TRACK_LINK}`);

    expect(transport.sent[0]?.text).toBe(MESSAGES.spotifyDetected);
    expect(launcher.requests).toHaveLength(1);
    expect(launcher.requests[0]?.format).toEqual({ kind: 'default' });
    expect(launcher.requests[0]?.source.variant).toBe('track');
    expect(controller.getConversation(7)).toBeUndefined();
  });

  it('refuses a second link while a job is running', async () => {
    launcher.busy.add(7);

    await controller.handleText(7, 70, VIDEO_LINK);

    expect(transport.sent.map(message => message.text)).toEqual([MESSAGES.activeJob]);
  });

  it('shows the metadata card and the media type question for YouTube', async () => {
    await controller.handleText(7, 70, PLAYLIST_LINK);

    expect(transport.sent.map(message => message.text)).toEqual([
      '🎬 *Road Trip*\n📺 Channel: DJ\n📊 Videos: 12',
      MESSAGES.chooseMediaType,
    ]);
    expect(transport.sent[1]?.options?.buttons).toEqual(mediaTypeButtons(7));

    const conversation = controller.getConversation(7);
    expect(conversation?.getStage()).toBe('AWAITING_MEDIA_TYPE');
    expect(conversation?.messageId).toBe(101);
  });

  it('walks the audio path to a dispatched job', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);
    const conversation = controller.getConversation(7);

    expect(await click('mt|audio|7')).toBeUndefined();
    expect(conversation?.getStage()).toBe('AWAITING_QUALITY');
    expect(transport.lastEdit()?.text).toBe(MESSAGES.audioSelected);
    expect(transport.buttonEdits[0]?.buttons).toEqual(audioQualityButtons(7));

    expect(await click('aq|flac|7')).toBeUndefined();
    expect(launcher.requests[0]?.format).toEqual({ kind: 'audio', quality: 'flac' });
    expect(transport.lastEdit()?.text).toBe('✅ Got it! Starting download for FLAC...');
    expect(conversation?.getStage()).toBe('DISPATCHED');
    expect(controller.getConversation(7)).toBeUndefined();
  });

  it('probes resolutions for video and offers them highest first', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);

    await click('mt|video|7');

    expect(probe).toHaveBeenCalledWith(VIDEO_LINK);
    expect(transport.edits.map(edit => edit.text)).toEqual([MESSAGES.videoChecking, MESSAGES.videoSelected]);
    expect(transport.buttonEdits[0]?.buttons).toEqual(videoQualityButtons(7, [1080, 720, 360]));

    await click('vq|720|7');
    expect(launcher.requests[0]?.format).toEqual({ kind: 'video', height: 720 });
    expect(transport.lastEdit()?.text).toBe('✅ Got it! Starting download for 720p MP4...');
  });

  it('cancels the conversation when no resolution is available', async () => {
    probe.mockResolvedValue([]);
    await controller.handleText(7, 70, VIDEO_LINK);
    const conversation = controller.getConversation(7);

    await click('mt|video|7');

    expect(transport.lastEdit()?.text).toBe(MESSAGES.noFormats);
    expect(conversation?.getStage()).toBe('CANCELLED');
    expect(controller.getConversation(7)).toBeUndefined();
  });

  it('treats a failed probe like no resolutions', async () => {
    probe.mockRejectedValue(new Error('yt-dlp missing'));
    await controller.handleText(7, 70, VIDEO_LINK);

    await click('mt|video|7');

    expect(transport.lastEdit()?.text).toBe(MESSAGES.noFormats);
  });

  it('rejects buttons pressed by another user without touching state', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);

    expect(await click('mt|audio|7', 100, 8)).toBe(MESSAGES.notForYou);
    expect(controller.getConversation(7)?.getStage()).toBe('AWAITING_MEDIA_TYPE');
    expect(transport.edits).toEqual([]);
  });

  it('rejects payloads that do not decode', async () => {
    expect(await click('yt_type|mp3')).toBe(MESSAGES.notForYou);
  });

  it('answers a click without a conversation as an expired session', async () => {
    expect(await click('aq|mp3|7', 55)).toBeUndefined();

    expect(transport.sent.map(message => message.text)).toEqual([MESSAGES.sessionExpired]);
    expect(transport.edits).toEqual([{ chatId: 70, messageId: 55, text: MESSAGES.sessionExpiredEdit }]);
  });

  it('expires conversations older than the TTL', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);
    const conversation = controller.getConversation(7);

    clock = 1000;
    await click('mt|audio|7');

    expect(conversation?.getStage()).toBe('EXPIRED');
    expect(transport.sent.map(message => message.text)).toContain(MESSAGES.sessionExpired);
    expect(launcher.requests).toEqual([]);
  });

  it('rejects a choice that does not fit the current stage', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);

    expect(await click('aq|mp3|7')).toBe(MESSAGES.staleButtons);
    expect(controller.getConversation(7)?.getStage()).toBe('AWAITING_MEDIA_TYPE');

    await click('mt|audio|7');
    expect(await click('mt|video|7')).toBe(MESSAGES.staleButtons);
    expect(await click('vq|720|7')).toBe(MESSAGES.staleButtons);
    expect(launcher.requests).toEqual([]);
  });

  it('rejects buttons from an earlier message', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);

    expect(await click('mt|audio|7', 42)).toBe(MESSAGES.staleButtons);
  });

  it('replaces a pending conversation when a new link arrives', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);
    const first = controller.getConversation(7);

    await controller.handleText(7, 70, PLAYLIST_LINK);

    expect(first?.getStage()).toBe('CANCELLED');
    expect(controller.getConversation(7)?.source.variant).toBe('playlist');
  });

  it('keeps the conversation when the job slot is taken at dispatch', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);
    await click('mt|audio|7');
    launcher.busy.add(7);

    expect(await click('aq|mp3|7')).toBe(MESSAGES.activeJob);
    expect(controller.getConversation(7)?.getStage()).toBe('AWAITING_QUALITY');
  });

  it('stops both the conversation and the running job', async () => {
    await controller.handleText(7, 70, VIDEO_LINK);
    const conversation = controller.getConversation(7);
    launcher.busy.add(7);

    expect(await controller.cancel(7, 70)).toBe(true);

    expect(conversation?.getStage()).toBe('CANCELLED');
    expect(launcher.cancelled).toEqual([7]);
    expect(launcher.isBusy(7)).toBe(false);
    expect(transport.sent[transport.sent.length - 1]?.text).toBe(MESSAGES.stopped);
  });

  it('reports when there was nothing to stop', async () => {
    expect(await controller.cancel(7, 70)).toBe(false);
  });
});
