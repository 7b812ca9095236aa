/**
 * grammY Chat Transport
 *
 * Adapts the bot API to the ChatTransport contract used by the pipeline.
 */

import { GrammyError, InputFile, type Api } from 'grammy';
import { retry, createLogger, type Logger } from '@trackdrop/utils';
import type { ButtonGrid, ChatTransport, SendTextOptions, SentFileKind } from '@trackdrop/core';

export type TelegramApi = Pick<
  Api,
  'sendMessage' | 'editMessageText' | 'editMessageReplyMarkup' | 'sendAudio' | 'sendVideo' | 'sendDocument'
>;

export interface GrammyTransportOptions {
  /** Attempts per edit, first try included */
  editAttempts?: number;
  editRetryDelayMs?: number;
  logger?: Logger;
}

function toInlineKeyboard(buttons: ButtonGrid) {
  return {
    inline_keyboard: buttons.map(row => row.map(button => ({ text: button.text, callback_data: button.payload }))),
  };
}

function isNotModified(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes('message is not modified');
}

export class GrammyTransport implements ChatTransport {
  private readonly editAttempts: number;
  private readonly editRetryDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly api: TelegramApi, options: GrammyTransportOptions = {}) {
    this.editAttempts = options.editAttempts ?? 3;
    this.editRetryDelayMs = options.editRetryDelayMs ?? 2000;
    this.logger = options.logger ?? createLogger({ component: 'transport' });
  }

  async sendText(chatId: number, text: string, options: SendTextOptions = {}): Promise<number> {
    const message = await this.api.sendMessage(chatId, text, {
      parse_mode: options.markdown ? 'Markdown' : undefined,
      reply_markup: options.buttons ? toInlineKeyboard(options.buttons) : undefined,
    });
    return message.message_id;
  }

  async editText(chatId: number, messageId: number, text: string, options: { markdown?: boolean } = {}): Promise<boolean> {
    try {
      return await retry(
        async () => {
          try {
            await this.api.editMessageText(chatId, messageId, text, {
              parse_mode: options.markdown ? 'Markdown' : undefined,
            });
          } catch (error) {
            if (isNotModified(error)) {
              return true;
            }
            throw error;
          }
          return true;
        },
        {
          maxAttempts: this.editAttempts,
          delayMs: this.editRetryDelayMs,
          onRetry: (error, attempt) => {
            this.logger.debug({ chatId, messageId, attempt, error: String(error) }, 'Retrying message edit');
          },
        }
      );
    } catch (error) {
      this.logger.warn({ chatId, messageId, error: String(error) }, 'Message edit failed');
      return false;
    }
  }

  async editButtons(chatId: number, messageId: number, buttons: ButtonGrid): Promise<boolean> {
    try {
      await this.api.editMessageReplyMarkup(chatId, messageId, { reply_markup: toInlineKeyboard(buttons) });
      return true;
    } catch (error) {
      if (isNotModified(error)) {
        return true;
      }
      this.logger.warn({ chatId, messageId, error: String(error) }, 'Button edit failed');
      return false;
    }
  }

  async sendFile(chatId: number, filePath: string, kind: SentFileKind, caption?: string): Promise<boolean> {
    const file = new InputFile(filePath);
    try {
      switch (kind) {
        case 'audio':
          await this.api.sendAudio(chatId, file, { caption });
          break;
        case 'video':
          await this.api.sendVideo(chatId, file, { caption, supports_streaming: true });
          break;
        case 'document':
          await this.api.sendDocument(chatId, file, { caption });
          break;
      }
      return true;
    } catch (error) {
      this.logger.error({ chatId, filePath, kind, error: String(error) }, 'Sending file failed');
      return false;
    }
  }
}
