/**
 * Conversation Controller
 *
 * Turns inbound text and button clicks into conversation transitions and
 * dispatched jobs. Spotify links dispatch at once; YouTube links go
 * through the media type and quality questions first.
 *
 * Pending conversations live in a session registry with a TTL. A click
 * for a user without one is answered as an expired session.
 */

import {
  ActiveJobError,
  ConversationStateMachine,
  ForeignCallbackError,
  InvalidCallbackError,
  SessionExpiredError,
  SessionRegistry,
  StateTransitionError,
  decodeCallback,
  type ChatTransport,
  type ChoiceCallback,
  type FormatChoice,
  type SourceDescriptor,
} from '@trackdrop/core';
import { classifyLink } from '@trackdrop/acquisition';
import { createLogger, type Logger } from '@trackdrop/utils';
import {
  MESSAGES,
  audioQualityButtons,
  dispatchConfirmation,
  mediaTypeButtons,
  metadataCard,
  videoQualityButtons,
} from '../messages.js';
import type { JobLauncher } from '../processors/downloadProcessor.js';
import type { MediaMetadata } from '../services/metadata.js';

export interface MetadataLookup {
  getVideoInfo(videoId: string): Promise<MediaMetadata | null>;
  getPlaylistInfo(playlistId: string): Promise<MediaMetadata | null>;
}

/** Available video heights for a link, fetched on every video choice */
export type ResolutionProbe = (url: string) => Promise<number[]>;

export interface ConversationControllerOptions {
  transport: ChatTransport;
  launcher: JobLauncher;
  metadata: MetadataLookup;
  probeResolutions: ResolutionProbe;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface CallbackContext {
  userId: number;
  chatId: number;
  /** Message carrying the clicked button */
  messageId: number;
  payload: string;
}

export class ConversationController {
  private readonly conversations: SessionRegistry<ConversationStateMachine>;
  private readonly transport: ChatTransport;
  private readonly launcher: JobLauncher;
  private readonly metadata: MetadataLookup;
  private readonly probeResolutions: ResolutionProbe;
  private readonly logger: Logger;

  constructor(options: ConversationControllerOptions) {
    this.transport = options.transport;
    this.launcher = options.launcher;
    this.metadata = options.metadata;
    this.probeResolutions = options.probeResolutions;
    this.logger = options.logger ?? createLogger({ component: 'conversation' });
    this.conversations = new SessionRegistry<ConversationStateMachine>({
      ttlMs: options.ttlMs ?? 10 * 60_000,
      now: options.now,
      onEvict: (userId, machine, cause) => {
        if (cause === 'expired') {
          machine.expire('session ttl');
        } else {
          machine.cancel(cause);
        }
        this.logger.debug({ userId, cause, stage: machine.getStage() }, 'Conversation closed');
      },
    });
  }

  /**
   * Pending conversation for the user, if any (expired ones are dropped)
   */
  getConversation(userId: number): ConversationStateMachine | undefined {
    return this.conversations.lookup(userId);
  }

  async handleText(userId: number, chatId: number, text: string): Promise<void> {
    const source = classifyLink(text);
    if (!source) {
      await this.transport.sendText(chatId, MESSAGES.invalidLink);
      return;
    }

    // A new link replaces whatever the user was choosing before
    this.conversations.evict(userId);

    if (this.launcher.isBusy(userId)) {
      this.logBusy(userId);
      await this.transport.sendText(chatId, MESSAGES.activeJob);
      return;
    }

    if (source.provider === 'spotify') {
      await this.transport.sendText(chatId, MESSAGES.spotifyDetected, { markdown: true });
      if (!this.dispatch(userId, chatId, source, { kind: 'default' })) {
        await this.transport.sendText(chatId, MESSAGES.activeJob);
      }
      return;
    }

    await this.beginChoice(userId, chatId, source);
  }

  /**
   * Returns a short notice for the clicking user, if there is one
   */
  async handleCallback(context: CallbackContext): Promise<string | undefined> {
    const { userId, chatId, messageId } = context;

    let callback: ChoiceCallback;
    try {
      callback = decodeCallback(context.payload);
    } catch (error) {
      if (error instanceof InvalidCallbackError) {
        this.logger.warn({ userId, payload: context.payload }, error.message);
        return MESSAGES.notForYou;
      }
      throw error;
    }

    if (callback.userId !== userId) {
      const error = new ForeignCallbackError(callback.userId, userId);
      this.logger.warn({ ownerId: callback.userId, senderId: userId }, error.message);
      return MESSAGES.notForYou;
    }

    const machine = this.conversations.lookup(userId);
    if (!machine) {
      this.logger.info({ userId }, new SessionExpiredError(userId).message);
      await this.transport.sendText(chatId, MESSAGES.sessionExpired);
      await this.transport.editText(chatId, messageId, MESSAGES.sessionExpiredEdit);
      return undefined;
    }

    if (machine.messageId !== undefined && machine.messageId !== messageId) {
      return MESSAGES.staleButtons;
    }

    try {
      switch (callback.type) {
        case 'SelectMediaType':
          if (callback.mediaType === 'audio') {
            await this.chooseAudio(machine, messageId);
          } else {
            await this.chooseVideo(machine, messageId);
          }
          return undefined;
        case 'SelectAudioQuality':
          return await this.chooseFormat(machine, messageId, 'audio', { kind: 'audio', quality: callback.quality });
        case 'SelectVideoQuality':
          return await this.chooseFormat(machine, messageId, 'video', { kind: 'video', height: callback.height });
      }
    } catch (error) {
      if (error instanceof StateTransitionError) {
        this.logger.debug({ userId, details: error.details }, 'Choice does not fit the conversation stage');
        return MESSAGES.staleButtons;
      }
      throw error;
    }
  }

  /**
   * Discard the conversation and stop the user's job. Returns true when
   * anything was running.
   */
  async cancel(userId: number, chatId: number): Promise<boolean> {
    const hadConversation = this.conversations.evict(userId) !== undefined;
    const hadJob = this.launcher.cancel(userId);
    await this.transport.sendText(chatId, MESSAGES.stopped, { markdown: true });
    return hadConversation || hadJob;
  }

  private async beginChoice(userId: number, chatId: number, source: SourceDescriptor): Promise<void> {
    const metadata = source.variant === 'playlist'
      ? await this.metadata.getPlaylistInfo(source.identifier)
      : await this.metadata.getVideoInfo(source.identifier);
    if (metadata) {
      await this.transport.sendText(chatId, metadataCard(metadata), { markdown: true });
    }

    const machine = new ConversationStateMachine(userId, chatId, source);
    machine.begin();
    this.conversations.create(userId, machine);

    machine.messageId = await this.transport.sendText(chatId, MESSAGES.chooseMediaType, {
      buttons: mediaTypeButtons(userId),
    });
  }

  private async chooseAudio(machine: ConversationStateMachine, messageId: number): Promise<void> {
    machine.chooseMediaType('audio');
    await this.transport.editText(machine.chatId, messageId, MESSAGES.audioSelected);
    await this.transport.editButtons(machine.chatId, messageId, audioQualityButtons(machine.userId));
  }

  private async chooseVideo(machine: ConversationStateMachine, messageId: number): Promise<void> {
    machine.chooseMediaType('video');
    await this.transport.editText(machine.chatId, messageId, MESSAGES.videoChecking);

    const resolutions = await this.probeResolutions(machine.source.originalLocator).catch((error: unknown) => {
      this.logger.error({ userId: machine.userId, error }, 'Resolution probe failed');
      return [];
    });

    // The user may have stopped or replaced the conversation while probing
    if (this.conversations.lookup(machine.userId) !== machine) {
      return;
    }

    if (resolutions.length === 0) {
      this.conversations.evictIf(machine.userId, machine);
      await this.transport.editText(machine.chatId, messageId, MESSAGES.noFormats);
      return;
    }

    await this.transport.editText(machine.chatId, messageId, MESSAGES.videoSelected);
    await this.transport.editButtons(machine.chatId, messageId, videoQualityButtons(machine.userId, resolutions));
  }

  private async chooseFormat(
    machine: ConversationStateMachine,
    messageId: number,
    expected: 'audio' | 'video',
    format: FormatChoice
  ): Promise<string | undefined> {
    if (machine.getStage() !== 'AWAITING_QUALITY' || machine.getMediaType() !== expected) {
      return MESSAGES.staleButtons;
    }

    if (!this.dispatch(machine.userId, machine.chatId, machine.source, format)) {
      return MESSAGES.activeJob;
    }

    machine.dispatch(`format ${format.kind}`);
    this.conversations.evictIf(machine.userId, machine);
    await this.transport.editText(machine.chatId, messageId, dispatchConfirmation(format));
    return undefined;
  }

  private dispatch(userId: number, chatId: number, source: SourceDescriptor, format: FormatChoice): boolean {
    const launched = this.launcher.start({ userId, chatId, source, format });
    if (!launched) {
      this.logBusy(userId);
      return false;
    }
    this.logger.info({ userId, jobId: launched.job.id, source: source.originalLocator, format }, 'Job dispatched');
    return true;
  }

  private logBusy(userId: number): void {
    this.logger.info({ userId }, new ActiveJobError(userId).message);
  }
}
