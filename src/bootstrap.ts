/**
 * Shared bootstrap: creates the bridge's dependencies and wires them together.
 * Used by the `run`, `send` and `lookup` commands.
 */

import { resolve } from 'node:path';
import type { BridgeConfig } from './config/schema.js';
import { Database } from './db/database.js';
import { InMemoryCorrelationStore, SQLiteCorrelationStore, type CorrelationStore } from './store/correlation-store.js';
import { loadIdentityMap } from './users/identity-map.js';
import { IdentityResolver } from './users/identity-resolver.js';
import { ContentFormatter } from './format/formatter.js';
import { ZulipClient } from './zulip/zulip-client.js';
import { BridgeOrchestrator, createTargetSelector } from './bridge/orchestrator.js';
import type { DestinationClient } from './bridge/types.js';
import { ChatDispatcher } from './bus/chat-dispatcher.js';
import * as log from './utils/logger.js';

export interface AppDeps {
  config: BridgeConfig;
  store: CorrelationStore;
  resolver: IdentityResolver;
  formatter: ContentFormatter;
  zulip: DestinationClient;
  orchestrator: BridgeOrchestrator;
  dispatcher: ChatDispatcher;
}

export interface AppOverrides {
  zulip?: DestinationClient;
  store?: CorrelationStore;
}

export function createStore(config: BridgeConfig): CorrelationStore {
  if (!config.database.enabled) {
    log.warn('Database disabled: correlations live in memory, edits are lost on restart');
    return new InMemoryCorrelationStore();
  }
  return new SQLiteCorrelationStore(new Database(resolve(config.database.path)));
}

export function createZulipClient(config: BridgeConfig): ZulipClient {
  const { site, email, apiKey } = config.zulip;
  if (!site || !email || !apiKey) {
    throw new Error('Zulip API: site, email and apiKey are required');
  }
  return new ZulipClient({ site, email, apiKey });
}

export async function createApp(config: BridgeConfig, overrides: AppOverrides = {}): Promise<AppDeps> {
  // 1. Identity map (missing file is fine)
  const identities = await loadIdentityMap(resolve(config.bridge.usersFile));
  const resolver = new IdentityResolver(identities, { notifyMentions: config.bridge.notifyMentions });
  const formatter = new ContentFormatter(resolver, { timeZone: config.bridge.timeZone });

  // 2. Destination + correlation store
  const zulip = overrides.zulip ?? createZulipClient(config);
  const store = overrides.store ?? createStore(config);

  // 3. Pipeline
  const orchestrator = new BridgeOrchestrator({
    destination: zulip,
    store,
    formatter,
    resolver,
    target: createTargetSelector(config.zulip.stream, config.zulip.topic, config.bridge.timeZone),
    retry: config.bridge.retry,
    requestTimeoutMs: config.bridge.requestTimeoutMs,
  });
  const dispatcher = new ChatDispatcher((event, signal) => orchestrator.handle(event, signal));

  return { config, store, resolver, formatter, zulip, orchestrator, dispatcher };
}
