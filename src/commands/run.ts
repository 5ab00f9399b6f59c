/**
 * Run command, headless: poll Telegram and forward to Zulip until SIGINT/SIGTERM.
 */

import { loadConfig, missingCredentials } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import { TelegramChannel } from '../channels/telegram-channel.js';
import * as log from '../utils/logger.js';

export interface RunOptions {
  config?: string;
  debug?: boolean;
}

export async function runBridge(opts: RunOptions = {}): Promise<void> {
  const config = await loadConfig(opts.config);
  log.setLogLevel(opts.debug ? 'debug' : config.log.level);

  const missing = missingCredentials(config);
  const keys = [...missing.telegram, ...missing.zulip];
  if (keys.length > 0) {
    throw new Error(`Missing configuration: ${keys.join(', ')}`);
  }
  const token = config.telegram.token ?? '';
  log.registerSecret(token);
  log.registerSecret(config.zulip.apiKey);

  const app = await createApp(config);

  // Graceful shutdown
  const ac = new AbortController();
  const { signal } = ac;

  process.on('SIGINT', () => {
    log.info('Shutting down bridge...');
    ac.abort();
  });
  process.on('SIGTERM', () => ac.abort());

  const telegram = new TelegramChannel({
    token,
    allowedChatIds: config.telegram.allowedChatIds,
    retry: config.bridge.retry,
    requestTimeoutMs: config.bridge.requestTimeoutMs,
  });

  const topic = config.zulip.topic || '(message date)';
  log.info(`Bridge: forwarding to ${config.zulip.stream} > ${topic}. Press Ctrl+C to stop.`);

  try {
    // Blocks until abort; rejects when polling dies
    await telegram.start(app.dispatcher, signal);
  } finally {
    ac.abort();
    await app.dispatcher.close(config.bridge.shutdownGraceMs);
    app.store.close();
  }
}
