/**
 * In-process stand-in for the Zulip destination.
 * Queue errors in `failures` to make the next calls fail before succeeding.
 */

import type { DestinationClient, DestinationMessageKey, StreamTarget } from '../../src/bridge/types.js';

export class FakeZulip implements DestinationClient {
  created: Array<{ target: StreamTarget; markup: string }> = [];
  edits: Array<{ id: DestinationMessageKey; markup: string }> = [];
  failures: Error[] = [];
  attempts = 0;
  private nextId: number;

  constructor(firstId = 1000) {
    this.nextId = firstId;
  }

  async create(target: StreamTarget, markup: string): Promise<DestinationMessageKey> {
    this.attempts++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.created.push({ target, markup });
    return this.nextId++;
  }

  async edit(id: DestinationMessageKey, markup: string): Promise<void> {
    this.attempts++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.edits.push({ id, markup });
  }
}
