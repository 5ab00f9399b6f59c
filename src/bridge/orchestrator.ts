import { DuplicateKeyError } from './errors.js';
import { evaluateEdit, EDIT_WINDOW_MS } from './edit-policy.js';
import {
  formatKey,
  type BridgeOutcome,
  type DestinationClient,
  type InboundEvent,
  type InboundMessage,
  type StreamTarget,
} from './types.js';
import type { CorrelationStore } from '../store/correlation-store.js';
import { isReplyContextUsable, type ContentFormatter } from '../format/formatter.js';
import { zonedStamp } from '../format/time.js';
import { plainName, type IdentityResolver } from '../users/identity-resolver.js';
import { retryWithBackoff, type RetryOptions } from '../utils/retry.js';
import * as log from '../utils/logger.js';

export type TargetSelector = (msg: InboundMessage) => StreamTarget;

export interface OrchestratorDeps {
  destination: DestinationClient;
  store: CorrelationStore;
  formatter: ContentFormatter;
  resolver: IdentityResolver;
  target: TargetSelector;
  retry?: Partial<Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>>;
  /** Upper bound for a single Zulip request. */
  requestTimeoutMs?: number;
}

/**
 * Fixed topic, or the message date (`05 March 2024`) in `timeZone` when `topic` is empty.
 */
export function createTargetSelector(stream: string, topic: string, timeZone: string): TargetSelector {
  return (msg) => ({
    stream,
    topic: topic || zonedStamp(msg.sentAt, timeZone).date,
  });
}

/**
 * BridgeOrchestrator: turns one inbound Telegram event into at most one Zulip call.
 *
 * New messages are rendered, sent, then correlated. Edits are looked up,
 * checked against the edit window and applied to the recorded Zulip message.
 * Never throws: every failure ends in a BridgeOutcome so the caller keeps consuming.
 */
export class BridgeOrchestrator {
  private deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async handle(event: InboundEvent, signal?: AbortSignal): Promise<BridgeOutcome> {
    const { message } = event;
    const id = formatKey(message.key);

    if (message.reply && !isReplyContextUsable(message.reply)) {
      log.info(`Bridge: reply context of ${id} is incomplete, forwarding as a plain message`);
    }

    try {
      return event.kind === 'new'
        ? await this.forward(message, signal)
        : await this.applyEdit(message, event.editedAt, signal);
    } catch (err) {
      if (signal?.aborted) {
        log.warn(`Bridge: ${event.kind} ${id} cancelled before Zulip acknowledged it`);
        return { status: 'dropped', reason: 'cancelled' };
      }
      const reason = log.describeError(err);
      log.error(`Bridge: dropping ${event.kind} ${id}: ${reason}`);
      return { status: 'dropped', reason: 'delivery_failed', error: reason };
    }
  }

  private async forward(message: InboundMessage, signal?: AbortSignal): Promise<BridgeOutcome> {
    const { destination: zulip, store, formatter, target } = this.deps;
    const id = formatKey(message.key);

    if (await store.get(message.key)) {
      log.debug(`Bridge: ${id} already forwarded, ignoring replay`);
      return { status: 'duplicate' };
    }

    const markup = formatter.render(message);
    const destination = await this.call(`send ${id}`, (s) => zulip.create(target(message), markup, s), signal);

    // Zulip has the message now; record it even if shutdown started meanwhile.
    try {
      await store.put({
        source: message.key,
        destination,
        sourceSentAt: message.sentAt,
        sender: message.sender,
      });
    } catch (err) {
      if (err instanceof DuplicateKeyError) {
        log.debug(`Bridge: ${id} was correlated concurrently, keeping the existing record`);
        return { status: 'duplicate' };
      }
      log.error(`Bridge: ${id} sent as Zulip message ${destination} but not recorded, later edits will be lost: ${log.describeError(err)}`);
      return { status: 'forwarded', destination };
    }

    log.info(`Bridge: forwarded ${id} as Zulip message ${destination}`);
    return { status: 'forwarded', destination };
  }

  private async applyEdit(message: InboundMessage, editedAt: Date, signal?: AbortSignal): Promise<BridgeOutcome> {
    const { destination: zulip, store, formatter, resolver } = this.deps;
    const id = formatKey(message.key);
    const decision = evaluateEdit(await store.get(message.key), editedAt);

    switch (decision.verdict) {
      case 'unknown':
        log.debug(`Bridge: edit of ${id} ignored, original was never forwarded`);
        return { status: 'dropped', reason: 'unknown_correlation' };

      case 'window_exceeded': {
        const minutes = Math.floor(decision.elapsedMs / 60_000);
        log.info(
          `Bridge: ${plainName(message.sender)} edited ${id} after ${minutes} min, ` +
          `Zulip only accepts edits within ${EDIT_WINDOW_MS / 60_000} min`,
        );
        return { status: 'dropped', reason: 'edit_window_exceeded' };
      }

      case 'approved': {
        const { record } = decision;
        const markup = formatter.renderEdit(message, resolver.display(record.sender), record.sourceSentAt);
        await this.call(`edit ${id}`, (s) => zulip.edit(record.destination, markup, s), signal);
        log.info(`Bridge: applied edit of ${id} to Zulip message ${record.destination}`);
        return { status: 'edited', destination: record.destination };
      }
    }
  }

  private call<T>(label: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.deps.retry,
      attemptTimeoutMs: this.deps.requestTimeoutMs,
      signal,
      label: `Bridge: ${label}`,
    });
  }
}
