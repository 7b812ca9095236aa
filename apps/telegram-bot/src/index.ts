/**
 * Telegram Bot Entry Point
 *
 * Wires the transport, conversation controller and download pipeline
 * together and starts long polling.
 * Works in multiple groups and private chats.
 */

import { Bot, GrammyError, HttpError } from 'grammy';
import {
  DownloadOrchestrator,
  ProcessToolRunner,
  ProgressAggregator,
  SpotdlClient,
  YtDlpClient,
} from '@trackdrop/acquisition';
import { Packager } from '@trackdrop/packaging';
import { GofileUploader } from '@trackdrop/upload';
import { createLogger, ensureDir, setLogLevel } from '@trackdrop/utils';
import { config } from './config/index.js';
import { checkAccess } from './access.js';
import { registerCommands } from './commands/index.js';
import { ConversationController } from './conversation/controller.js';
import { renderProgress } from './messages.js';
import { DownloadProcessor } from './processors/downloadProcessor.js';
import { YouTubeMetadataService } from './services/metadata.js';
import { GrammyTransport } from './transport.js';

setLogLevel(config.logLevel);
const logger = createLogger({ component: 'telegram-bot' });

async function logBinaryVersions(spotdl: SpotdlClient, ytdlp: YtDlpClient): Promise<void> {
  const [spotdlVersion, ytdlpVersion] = await Promise.all([spotdl.getVersion(), ytdlp.getVersion()]);
  for (const [name, version] of [['spotdl', spotdlVersion], ['yt-dlp', ytdlpVersion]] as const) {
    if (version) {
      logger.info({ binary: name, version }, 'Binary available');
    } else {
      logger.warn({ binary: name }, 'Binary not found or not runnable');
    }
  }
}

async function main(): Promise<void> {
  logger.info('Starting Telegram bot...');

  await ensureDir(config.storage.working);

  const bot = new Bot(config.botToken);
  const transport = new GrammyTransport(bot.api, { logger: createLogger({ component: 'transport' }) });

  const spotdl = new SpotdlClient({
    binaryPath: config.binaries.spotdl,
    ffmpegPath: config.binaries.ffmpeg,
    timeoutSeconds: config.pipeline.primaryTimeoutSeconds,
  });
  const ytdlp = new YtDlpClient({
    binaryPath: config.binaries.ytdlp,
    ffmpegPath: config.binaries.ffmpeg,
  });
  const runner = new ProcessToolRunner();

  const progress = new ProgressAggregator({
    publisher: async (snapshot) => {
      await transport.editText(snapshot.chatId, snapshot.messageId, renderProgress(snapshot), { markdown: true });
    },
    publishIntervalMs: config.pipeline.publishIntervalMs,
    recountIntervalMs: config.pipeline.recountIntervalMs,
  });

  const processor = new DownloadProcessor({
    transport,
    orchestrator: new DownloadOrchestrator({ runner, spotdl, ytdlp }),
    progress,
    packager: new Packager({ directSendLimitBytes: config.pipeline.directSendLimitBytes }),
    uploader: new GofileUploader({ token: config.gofileToken }),
    storageDir: config.storage.working,
    cleanupGraceMs: config.pipeline.cleanupGraceMs,
  });

  const controller = new ConversationController({
    transport,
    launcher: processor,
    metadata: new YouTubeMetadataService({ apiKey: config.youtubeApiKey }),
    probeResolutions: (url) => ytdlp.probeResolutions(url, runner, config.storage.working),
    ttlMs: config.pipeline.conversationTtlMs,
  });

  // Access control middleware
  bot.use(async (ctx, next) => {
    const chat = ctx.chat;
    if (!chat) {
      await next();
      return;
    }

    const decision = checkAccess(chat, config);
    if (decision === 'allow') {
      await next();
    } else if (decision === 'deny-private') {
      logger.warn({ userId: ctx.from?.id }, 'Private chat not allowed');
      await ctx.reply('This bot only works in group chats.');
    } else {
      // Don't reply in unauthorized groups to avoid spam
      logger.warn({ chatId: chat.id, chatType: chat.type }, 'Group not in allowed list');
    }
  });

  registerCommands(bot, { controller, logger });

  // Error handling
  bot.catch((err) => {
    const ctx = err.ctx;
    logger.error({ err: err.error }, `Error handling update ${ctx.update.update_id}`);

    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e }, 'Unknown error');
    }
  });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal, activeJobs: processor.activeCount }, 'Shutting down bot...');
      bot.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Bot did not stop cleanly');
          process.exit(1);
        }
      );
    });
  }

  await logBinaryVersions(spotdl, ytdlp);

  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        allowedGroups: config.allowedGroups.length > 0 ? config.allowedGroups : 'all groups allowed',
        allowPrivate: config.allowPrivate,
        storage: config.storage.working,
      }, 'Bot started');
    },
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
