/**
 * Zulip REST client: the two calls the bridge needs.
 *
 *   POST  /api/v1/messages        send to stream/topic, returns the message id
 *   PATCH /api/v1/messages/{id}   replace the content of an existing message
 *
 * Authentication is HTTP Basic with the bot's email and API key.
 */

import { z } from 'zod';
import { DestinationApiError, TransientNetworkError, isAbortError } from '../bridge/errors.js';
import type { DestinationClient, DestinationMessageKey, StreamTarget } from '../bridge/types.js';
import * as log from '../utils/logger.js';

export interface ZulipClientConfig {
  /** Organisation URL, e.g. https://chat.example.org */
  site: string;
  email: string;
  apiKey: string;
  /** Injected for tests. */
  fetch?: typeof fetch;
}

const ZulipResponseSchema = z.object({
  result: z.enum(['success', 'error']),
  msg: z.string().default(''),
  code: z.string().optional(),
  id: z.number().int().optional(),
  'retry-after': z.number().optional(),
});

type ZulipResponse = z.infer<typeof ZulipResponseSchema>;

export class ZulipClient implements DestinationClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ZulipClientConfig) {
    this.baseUrl = config.site.replace(/\/+$/, '');
    this.authHeader = `Basic ${Buffer.from(`${config.email}:${config.apiKey}`).toString('base64')}`;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async create(target: StreamTarget, markup: string, signal?: AbortSignal): Promise<DestinationMessageKey> {
    const res = await this.request('POST', '/api/v1/messages', {
      type: 'stream',
      to: target.stream,
      topic: target.topic,
      content: markup,
    }, signal);

    if (res.id === undefined) {
      throw new DestinationApiError('Zulip accepted the message but returned no id', 'NO_ID');
    }
    log.debug(`Zulip: sent message ${res.id} to ${target.stream} > ${target.topic}`);
    return res.id;
  }

  async edit(id: DestinationMessageKey, markup: string, signal?: AbortSignal): Promise<void> {
    await this.request('PATCH', `/api/v1/messages/${id}`, { content: markup }, signal);
    log.debug(`Zulip: updated message ${id}`);
  }

  private async request(
    method: 'POST' | 'PATCH',
    path: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<ZulipResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: this.authHeader,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(params).toString(),
        signal,
      });
    } catch (err) {
      throw networkError(err, `Zulip ${method} ${path}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw networkError(err, `Zulip ${method} ${path} response`);
    }
    const body = parseBody(text);

    if (response.status === 429) {
      throw new TransientNetworkError(
        `Zulip rate limit hit (${body?.msg || 'HTTP 429'})`,
        retryAfterMs(response.headers.get('retry-after'), body),
      );
    }
    if (response.status >= 500) {
      throw new TransientNetworkError(`Zulip server error (HTTP ${response.status})`);
    }
    if (!body) {
      throw new DestinationApiError(`Zulip returned an unreadable response (HTTP ${response.status})`, 'BAD_RESPONSE', response.status);
    }
    if (body.result !== 'success') {
      const code = body.code ?? 'BAD_REQUEST';
      throw new DestinationApiError(`Zulip API returned '${code}': ${body.msg}`, code, response.status);
    }
    return body;
  }
}

/** Aborts pass through untouched; timeouts and connection failures are retryable. */
function networkError(err: unknown, what: string): Error {
  if (isAbortError(err)) return err;
  if (err instanceof Error && err.name === 'TimeoutError') {
    return new TransientNetworkError(`${what} timed out`);
  }
  return new TransientNetworkError(`${what} failed: ${log.describeError(err)}`);
}

function parseBody(text: string): ZulipResponse | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ZulipResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function retryAfterMs(header: string | null, body: ZulipResponse | undefined): number | undefined {
  const seconds = header !== null ? Number(header) : body?.['retry-after'];
  return seconds !== undefined && Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
}
