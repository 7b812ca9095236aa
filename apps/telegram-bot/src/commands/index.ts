/**
 * Telegram Bot Commands
 *
 * Command, text and button handlers. Conversation work runs outside the
 * update loop so one user's probe or dispatch never holds up another's.
 */

import type { Bot } from 'grammy';
import type { Logger } from '@trackdrop/utils';
import type { CallbackContext, ConversationController } from '../conversation/controller.js';
import { MESSAGES } from '../messages.js';

export interface CommandDependencies {
  controller: ConversationController;
  logger: Logger;
}

/**
 * Run a handler after the current update returns
 */
function runInBackground(logger: Logger, task: () => Promise<void>, onFailure: () => Promise<unknown>): void {
  setImmediate(() => {
    task().catch((error: unknown) => {
      logger.error({ error }, 'Error handling update');
      onFailure().catch((replyError: unknown) => {
        logger.error({ error: replyError }, 'Could not report the error to the user');
      });
    });
  });
}

export function registerCommands(bot: Bot, { controller, logger }: CommandDependencies): void {
  // /start - Welcome message
  bot.command('start', async (ctx) => {
    await ctx.reply(MESSAGES.welcome, { parse_mode: 'Markdown' });
  });

  // /help - Usage
  bot.command('help', async (ctx) => {
    await ctx.reply(MESSAGES.help, { parse_mode: 'Markdown' });
  });

  // /stop, /cancel - Drop the conversation and abort the running job
  bot.command(['stop', 'cancel'], async (ctx) => {
    const userId = ctx.from?.id;
    if (userId === undefined) {
      return;
    }
    const stopped = await controller.cancel(userId, ctx.chat.id);
    logger.info({ userId, stopped }, 'Stop requested');
  });

  // Links
  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text.trim();
    const userId = ctx.from?.id;
    if (userId === undefined || text.startsWith('/')) {
      return;
    }
    const chatId = ctx.chat.id;

    runInBackground(
      logger.child({ userId, chatId }),
      () => controller.handleText(userId, chatId, text),
      () => ctx.reply(MESSAGES.somethingWrong)
    );
  });

  // Choice buttons
  bot.on('callback_query:data', async (ctx) => {
    const message = ctx.callbackQuery.message;
    if (!message) {
      await ctx.answerCallbackQuery();
      return;
    }

    await handleChoiceButton(
      {
        userId: ctx.callbackQuery.from.id,
        chatId: message.chat.id,
        messageId: message.message_id,
        payload: ctx.callbackQuery.data,
        answer: () => ctx.answerCallbackQuery(),
        reply: (text) => ctx.reply(text),
      },
      { controller, logger }
    );
  });
}

export interface ButtonPress extends CallbackContext {
  answer: () => Promise<unknown>;
  reply: (text: string) => Promise<unknown>;
}

/**
 * Answer the button press at once, then handle it in the background.
 * Notices arrive as a chat reply, since the answer is already spent.
 */
export async function handleChoiceButton(
  press: ButtonPress,
  { controller, logger }: { controller: Pick<ConversationController, 'handleCallback'>; logger: Logger }
): Promise<void> {
  // Telegram rejects answers that come late, and a resolution probe takes a while
  await press.answer();

  const { userId, chatId, messageId, payload } = press;
  runInBackground(
    logger.child({ userId, chatId }),
    async () => {
      const notice = await controller.handleCallback({ userId, chatId, messageId, payload });
      if (notice) {
        await press.reply(notice);
      }
    },
    () => press.reply(MESSAGES.somethingWrong)
  );
}
