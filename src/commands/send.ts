/**
 * Send command: post a message straight to the configured stream.
 * Checks Zulip credentials and stream permissions without Telegram.
 */

import { loadConfig } from '../config/config.js';
import { createZulipClient } from '../bootstrap.js';
import * as log from '../utils/logger.js';

export interface SendOptions {
  config?: string;
  topic?: string;
}

export async function runSend(text: string, opts: SendOptions = {}): Promise<number> {
  const config = await loadConfig(opts.config);
  log.setLogLevel(config.log.level);
  log.registerSecret(config.zulip.apiKey);

  const zulip = createZulipClient(config);
  const target = { stream: config.zulip.stream, topic: opts.topic || config.zulip.topic || 'Test' };
  const id = await zulip.create(target, text, AbortSignal.timeout(config.bridge.requestTimeoutMs));

  console.log(`Sent Zulip message ${id} to ${target.stream} > ${target.topic}`);
  return id;
}
