import { Bot, GrammyError, HttpError } from 'grammy';
import { TransientNetworkError } from '../bridge/errors.js';
import type { InboundEvent } from '../bridge/types.js';
import type { PendingEvent } from '../bus/chat-dispatcher.js';
import { abortable, retryWithBackoff, type RetryOptions } from '../utils/retry.js';
import * as log from '../utils/logger.js';
import {
  extractAttachment,
  isBotCommand,
  toInboundEvent,
  unsupportedContent,
  type FileLinker,
  type TelegramMessage,
} from './telegram-normalize.js';

const START_MAX_RETRIES = 3;
const START_RETRY_DELAY_MS = 5000;

export interface EventSink {
  dispatch(event: InboundEvent): Promise<void>;
  /** Events with an attachment are resolved on the chat's lane, off the polling path. */
  defer(pending: PendingEvent): Promise<void>;
}

/** The part of grammy's Context used to answer a message. */
export interface Replier {
  reply(text: string, other?: { reply_parameters?: { message_id: number }; disable_notification?: boolean }): Promise<unknown>;
}

export interface TelegramChannelOptions {
  token: string;
  /** Empty: every chat the bot is a member of. */
  allowedChatIds: string[];
  retry?: Partial<Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>>;
  /** Bounds each getFile attempt. */
  requestTimeoutMs?: number;
  /** Injected for tests; defaults to a bot built from `token`. */
  bot?: Bot;
}

/**
 * Telegram Channel: long-polls the Bot API with grammy and turns new and
 * edited group messages into bridge events.
 */
export class TelegramChannel {
  name = 'telegram';
  private bot: Bot;
  private opts: TelegramChannelOptions;

  constructor(opts: TelegramChannelOptions) {
    this.opts = opts;
    this.bot = opts.bot ?? new Bot(opts.token);
  }

  async start(sink: EventSink, signal: AbortSignal): Promise<void> {
    const bot = this.bot;

    // Global error handler
    bot.catch((err) => {
      log.error(`Telegram bot error: ${err.message}`);
    });

    bot.command('start', async (ctx) => {
      await ctx.reply(`Hi ${ctx.from?.first_name ?? 'there'}! Messages in this chat are forwarded to Zulip.`);
    });

    bot.command('help', async (ctx) => {
      await ctx.reply('New messages, replies, mentions, files and edits made within 60 minutes are forwarded to Zulip.');
    });

    // /whoami: chat and user ids for telegram.allowedChatIds
    bot.command('whoami', async (ctx) => {
      const username = ctx.from?.username ?? '(none)';
      await ctx.reply(`chatId: ${ctx.chat.id}\nuserId: ${ctx.from?.id ?? '(none)'}\nusername: ${username}\ntype: ${ctx.chat.type}`);
    });

    bot.on('message', async (ctx) => {
      await this.handle(ctx, ctx.message, 'new', sink);
    });

    bot.on('edited_message', async (ctx) => {
      await this.handle(ctx, ctx.editedMessage, 'edit', sink);
    });

    const started = await this.startWithRetry(bot, signal);
    if (!started) return;

    // Wait for abort, or for polling to die on its own
    const aborted = new Promise<void>((resolve) => {
      if (signal.aborted) resolve();
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
    const stopped = started.polling.then(
      () => {
        if (!signal.aborted) throw new Error('Telegram: polling stopped unexpectedly');
      },
      (err: unknown) => {
        if (signal.aborted) {
          log.debug(`Telegram: polling ended during shutdown: ${log.describeError(err)}`);
          return;
        }
        throw new Error(`Telegram: polling stopped: ${log.describeError(err)}`, { cause: err });
      },
    );

    try {
      await Promise.race([aborted, stopped]);
    } finally {
      try {
        await bot.stop();
      } catch (err) {
        log.warn(`Telegram: error during bot.stop(): ${log.describeError(err)}`);
      }
    }
  }

  /** Public for tests: the same path a polled update takes. */
  async handle(ctx: Replier, msg: TelegramMessage, kind: InboundEvent['kind'], sink: EventSink): Promise<void> {
    const chatId = String(msg.chat.id);

    // Allowlist check first
    if (this.opts.allowedChatIds.length > 0 && !this.opts.allowedChatIds.includes(chatId)) {
      log.debug(`Telegram: ignoring message ${msg.message_id} from chat ${chatId}, not in allowlist`);
      return;
    }

    if (isBotCommand(msg)) return;

    const unsupported = unsupportedContent(msg);
    if (unsupported) {
      log.warn(`Telegram: ${msg.from?.username ?? msg.from?.id ?? 'unknown'} sent unsupported content (${unsupported})`);
      if (kind === 'new') {
        await ctx.reply(`Sorry ${msg.from?.first_name ?? 'there'}, I cannot forward a message with this content to Zulip 😞`, {
          reply_parameters: { message_id: msg.message_id },
          disable_notification: true,
        });
      }
      return;
    }

    if (extractAttachment(msg)) {
      const label = `${chatId}/${msg.message_id}`;
      await sink.defer({
        chatId,
        label,
        resolve: async (signal) => {
          try {
            return await toInboundEvent(msg, kind, this.fileLinker(signal));
          } catch (err) {
            throw new Error(`Telegram: could not resolve the attachment of ${label}: ${log.describeError(err)}`, { cause: err });
          }
        },
      });
      return;
    }

    const event = await toInboundEvent(msg, kind, this.fileLinker());
    if (!event) {
      log.debug(`Telegram: nothing to forward in ${chatId}/${msg.message_id}`);
      return;
    }

    await sink.dispatch(event);
  }

  /** Download URLs embed the bot token and expire after about an hour. */
  private fileLinker(signal?: AbortSignal): FileLinker {
    return (fileId) => retryWithBackoff(async (attempt) => {
      try {
        const file = await abortable(this.bot.api.getFile(fileId, attempt), attempt);
        if (!file.file_path) throw new Error(`Telegram returned no path for file ${fileId}`);
        return `https://api.telegram.org/file/bot${this.opts.token}/${file.file_path}`;
      } catch (err) {
        throw toTransient(err);
      }
    }, {
      ...this.opts.retry,
      attemptTimeoutMs: this.opts.requestTimeoutMs,
      signal,
      label: 'Telegram: getFile',
    });
  }

  /** Hands back the background polling promise, or undefined when aborted first. */
  private async startWithRetry(bot: Bot, signal: AbortSignal): Promise<{ polling: Promise<void> } | undefined> {
    for (let attempt = 1; attempt <= START_MAX_RETRIES; attempt++) {
      if (signal.aborted) return undefined;

      try {
        log.info(`Telegram: starting bot (attempt ${attempt}/${START_MAX_RETRIES})...`);
        // Polling runs in the background; init() surfaces a bad token here
        await bot.init();
        const polling = bot.start({
          allowed_updates: ['message', 'edited_message'],
          onStart: (info) => {
            log.info(`Telegram: connected as @${info.username}`);
          },
        });
        return { polling };
      } catch (err) {
        log.error(`Telegram: start failed (attempt ${attempt}/${START_MAX_RETRIES}): ${log.describeError(err)}`);

        if (attempt < START_MAX_RETRIES) {
          log.info(`Telegram: retrying in ${START_RETRY_DELAY_MS / 1000}s...`);
          await delay(START_RETRY_DELAY_MS);
        } else {
          throw new Error(`Telegram: failed to start after ${START_MAX_RETRIES} attempts`);
        }
      }
    }
    return undefined;
  }
}

/** Network failures, rate limits and server errors are worth retrying. */
export function toTransient(err: unknown): unknown {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return new TransientNetworkError(`Telegram request timed out: ${err.message}`);
  }
  if (err instanceof HttpError) {
    return new TransientNetworkError(`Telegram unreachable: ${err.message}`);
  }
  if (err instanceof GrammyError && (err.error_code === 429 || err.error_code >= 500)) {
    const retryAfter = err.parameters.retry_after;
    return new TransientNetworkError(`Telegram API ${err.error_code}: ${err.description}`, retryAfter !== undefined ? retryAfter * 1000 : undefined);
  }
  return err;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
