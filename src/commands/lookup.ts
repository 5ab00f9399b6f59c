/**
 * Lookup command: show which Zulip message a Telegram message was forwarded as.
 */

import { loadConfig } from '../config/config.js';
import { createStore } from '../bootstrap.js';
import { EDIT_WINDOW_MS } from '../bridge/edit-policy.js';
import type { CorrelationRecord } from '../bridge/types.js';
import { plainName } from '../users/identity-resolver.js';
import * as log from '../utils/logger.js';

export async function runLookup(chatId: string, messageId: string, opts: { config?: string } = {}): Promise<CorrelationRecord | undefined> {
  const id = Number(messageId);
  if (!Number.isInteger(id)) {
    throw new Error(`Invalid message id: ${messageId}`);
  }

  const config = await loadConfig(opts.config);
  log.setLogLevel(config.log.level);
  const store = createStore(config);
  try {
    const record = await store.get({ chatId, messageId: id });
    if (!record) {
      console.log(`No correlation for ${chatId}/${id}`);
      return undefined;
    }

    const editableUntil = new Date(record.sourceSentAt.getTime() + EDIT_WINDOW_MS);
    console.log(`Telegram ${chatId}/${id} → Zulip ${record.destination}`);
    console.log(`  sender:         ${plainName(record.sender)}${record.sender.handle ? ` (@${record.sender.handle})` : ''}`);
    console.log(`  sent at:        ${record.sourceSentAt.toISOString()}`);
    console.log(`  editable until: ${editableUntil.toISOString()}`);
    return record;
  } finally {
    store.close();
  }
}
