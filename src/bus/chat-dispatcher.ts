import { AsyncQueue } from './async-queue.js';
import type { InboundEvent } from '../bridge/types.js';
import { isAbortError } from '../bridge/errors.js';
import { sleep } from '../utils/retry.js';
import * as log from '../utils/logger.js';

export type EventHandler = (event: InboundEvent, signal: AbortSignal) => Promise<unknown>;

/**
 * An event that still needs a network round trip (an attachment lookup)
 * before it can be handled. It is built inside its chat's lane, so a slow
 * lookup holds back that chat only.
 */
export interface PendingEvent {
  chatId: string;
  /** Names the source message in log lines. */
  label: string;
  /** Undefined means there is nothing to forward. */
  resolve(signal: AbortSignal): Promise<InboundEvent | undefined>;
}

type LaneItem = InboundEvent | PendingEvent;

interface Lane {
  queue: AsyncQueue<LaneItem>;
  worker: Promise<void>;
}

/**
 * ChatDispatcher: one ordered lane per source chat.
 *
 * Events of a chat are handled strictly one after another, so a message is
 * correlated before any of its edits is looked up. Lanes of different chats
 * run concurrently and share nothing but the handler.
 */
export class ChatDispatcher {
  private lanes = new Map<string, Lane>();
  private handler: EventHandler;
  private maxQueued: number;
  /** Wakes idle workers when intake stops. */
  private stopIntake = new AbortController();
  /** Aborts in-flight handlers once the drain grace period is over. */
  private cancel = new AbortController();
  private closing = false;

  constructor(handler: EventHandler, maxQueued = 100) {
    this.handler = handler;
    this.maxQueued = maxQueued;
  }

  /** Queue an event on its chat's lane. Resolves once queued (waits when the lane is full). */
  async dispatch(event: InboundEvent): Promise<void> {
    await this.enqueue(event.message.key.chatId, event);
  }

  /** Queue an event that is resolved once its lane reaches it. */
  async defer(pending: PendingEvent): Promise<void> {
    await this.enqueue(pending.chatId, pending);
  }

  get chatCount(): number {
    return this.lanes.size;
  }

  /**
   * Stop intake, let every lane finish what it has queued for up to `graceMs`,
   * then abort whatever is still in flight.
   */
  async close(graceMs = 5000): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    this.stopIntake.abort();

    const workers = Promise.allSettled([...this.lanes.values()].map(l => l.worker));
    const grace = new AbortController();
    const drained = await Promise.race([
      workers.then(() => true),
      sleep(graceMs, grace.signal).then(() => false, () => true),
    ]);
    grace.abort();

    if (!drained) {
      let dropped = 0;
      for (const lane of this.lanes.values()) dropped += lane.queue.drain().length;
      log.warn(`Dispatcher: lanes did not drain within ${graceMs}ms, cancelling in-flight events and dropping ${dropped} queued`);
    }
    this.cancel.abort();
    await workers;
    this.lanes.clear();
  }

  private async enqueue(chatId: string, item: LaneItem): Promise<void> {
    if (this.closing) {
      throw new Error('ChatDispatcher is closed');
    }
    await this.laneFor(chatId).queue.publish(item, this.cancel.signal);
  }

  private laneFor(chatId: string): Lane {
    let lane = this.lanes.get(chatId);
    if (!lane) {
      const queue = new AsyncQueue<LaneItem>(this.maxQueued);
      lane = { queue, worker: this.runLane(chatId, queue) };
      this.lanes.set(chatId, lane);
      log.debug(`Dispatcher: opened lane for chat ${chatId}`);
    }
    return lane;
  }

  private async runLane(chatId: string, queue: AsyncQueue<LaneItem>): Promise<void> {
    while (!this.cancel.signal.aborted) {
      // Once intake stops, keep taking what is already queued, then exit
      if (this.closing && queue.size === 0) break;

      let item: LaneItem;
      try {
        item = await queue.consume(queue.size > 0 ? undefined : this.stopIntake.signal);
      } catch (err) {
        // Intake stopped while idle; the loop head decides whether to exit
        if (isAbortError(err)) continue;
        throw err;
      }

      try {
        const event = 'resolve' in item ? await this.resolvePending(item) : item;
        if (event) await this.handler(event, this.cancel.signal);
      } catch (err) {
        log.error(`Dispatcher: handler failed in chat ${chatId}: ${log.describeError(err)}`);
      }
    }
    log.debug(`Dispatcher: lane for chat ${chatId} stopped`);
  }

  private async resolvePending(pending: PendingEvent): Promise<InboundEvent | undefined> {
    const event = await pending.resolve(this.cancel.signal);
    if (!event) log.debug(`Dispatcher: nothing to forward in ${pending.label}`);
    return event;
  }
}
