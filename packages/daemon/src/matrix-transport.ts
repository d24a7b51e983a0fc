/**
 * Matrix Transport
 *
 * ChannelTransport over the Matrix client-server API (v3): password login,
 * room join, incremental /sync, and m.text messages. The sync token is kept
 * between calls so every poll only returns events newer than the last one.
 */

import { z } from 'zod';
import { AuthenticationError, ConnectionError, TimeoutError } from '@hostwarden/utils/errors';
import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { ChannelSession, ChannelTransport, InboundMessage, SyncResult } from './types.js';

const LoginResponseSchema = z.object({
  access_token: z.string(),
  user_id: z.string(),
  device_id: z.string().optional(),
});

const RoomEventSchema = z.object({
  type: z.string(),
  event_id: z.string().optional(),
  sender: z.string().optional(),
  origin_server_ts: z.number(),
  content: z.record(z.unknown()).optional(),
});

const SyncResponseSchema = z.object({
  next_batch: z.string(),
  rooms: z
    .object({
      join: z
        .record(
          z.object({
            timeline: z
              .object({
                events: z.array(RoomEventSchema).default([]),
                limited: z.boolean().optional(),
              })
              .optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

const ErrorBodySchema = z.object({
  errcode: z.string().optional(),
  error: z.string().optional(),
});

const SendResponseSchema = z.object({ event_id: z.string() });

const AnyResponseSchema = z.unknown();

type RoomEvent = z.infer<typeof RoomEventSchema>;
export type MatrixSyncResponse = z.infer<typeof SyncResponseSchema>;

/** Only message events reach the timeline; presence and account data are dropped. */
export const SYNC_FILTER = {
  room: {
    timeline: { limit: 50, types: ['m.room.message'] },
    state: { lazy_load_members: true },
    ephemeral: { types: [] },
    account_data: { types: [] },
  },
  presence: { types: [] },
  account_data: { types: [] },
};

/** The HTTP Date header only carries whole seconds */
const DATE_HEADER_RESOLUTION_MS = 999;

/**
 * Latest server time a Date header can stand for: the end of its second.
 * Messages stamped inside that second are then never newer than the clock.
 */
export function serverClockFromDate(header: string | null): number | undefined {
  if (!header) return undefined;
  const start = Date.parse(header);
  return Number.isFinite(start) ? start + DATE_HEADER_RESOLUTION_MS : undefined;
}

/** Rooms whose timeline was cut short by the sync limit. */
export function truncatedRooms(sync: MatrixSyncResponse): string[] {
  return Object.entries(sync.rooms?.join ?? {})
    .filter(([, room]) => room.timeline?.limited === true)
    .map(([roomId]) => roomId);
}

export interface MatrixTransportConfig {
  /** e.g. https://matrix.example.org */
  homeserver: string;
  /** Timeout for non-sync requests (ms) */
  requestTimeoutMs?: number;
  /** Added to the long-poll timeout for the HTTP deadline (ms) */
  requestSlackMs?: number;
  /** Device name shown in the user's session list */
  deviceName?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

interface RequestOptions {
  body?: unknown;
  timeoutMs?: number;
  authenticated?: boolean;
}

interface MatrixResponse<T> {
  data: T;
  headers: Headers;
}

/**
 * Convert a sync response into inbound text messages, oldest first per room.
 */
export function extractMessages(sync: MatrixSyncResponse): InboundMessage[] {
  const messages: InboundMessage[] = [];
  const joined = sync.rooms?.join ?? {};

  for (const [roomId, room] of Object.entries(joined)) {
    for (const event of room.timeline?.events ?? []) {
      const message = toInboundMessage(roomId, event);
      if (message) messages.push(message);
    }
  }
  return messages;
}

function toInboundMessage(roomId: string, event: RoomEvent): InboundMessage | null {
  if (event.type !== 'm.room.message') return null;
  const body = event.content?.body;
  if (event.content?.msgtype !== 'm.text' || typeof body !== 'string') return null;

  return {
    body,
    serverTimestamp: event.origin_server_ts,
    channelId: roomId,
    eventId: event.event_id,
    sender: event.sender,
  };
}

export class MatrixTransport implements ChannelTransport {
  private baseUrl: string;
  private requestTimeoutMs: number;
  private requestSlackMs: number;
  private deviceName: string;
  private fetchFn: typeof fetch;
  private log: Logger;
  private accessToken?: string;
  private userId?: string;
  private nextBatch?: string;
  private txnCounter = 0;
  private inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: MatrixTransportConfig) {
    this.baseUrl = config.homeserver.replace(/\/+$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.requestSlackMs = config.requestSlackMs ?? 10_000;
    this.deviceName = config.deviceName ?? 'hostwarden';
    this.fetchFn = config.fetch ?? fetch;
    this.log = config.logger ?? createLogger('matrix');
  }

  get syncToken(): string | undefined {
    return this.nextBatch;
  }

  async authenticate(user: string, secret: string): Promise<ChannelSession> {
    try {
      const { data } = await this.request('POST', '/login', LoginResponseSchema, {
        authenticated: false,
        body: {
          type: 'm.login.password',
          identifier: { type: 'm.id.user', user },
          password: secret,
          initial_device_display_name: this.deviceName,
        },
      });
      this.accessToken = data.access_token;
      this.userId = data.user_id;
      this.log.info('Logged in', { user: data.user_id, device: data.device_id });
      return { userId: data.user_id, deviceId: data.device_id };
    } catch (err) {
      if (err instanceof ConnectionError && (err.status === 401 || err.status === 403)) {
        throw new AuthenticationError(user, err.message);
      }
      throw err;
    }
  }

  async join(channelId: string): Promise<void> {
    await this.request('POST', `/join/${encodeURIComponent(channelId)}`, AnyResponseSchema, { body: {} });
  }

  async sync(timeoutMs: number): Promise<SyncResult> {
    const params = new URLSearchParams({
      timeout: String(timeoutMs),
      filter: JSON.stringify(SYNC_FILTER),
    });
    if (this.nextBatch) params.set('since', this.nextBatch);

    const { data, headers } = await this.request('GET', `/sync?${params.toString()}`, SyncResponseSchema, {
      timeoutMs: timeoutMs + this.requestSlackMs,
    });
    this.nextBatch = data.next_batch;

    for (const room of truncatedRooms(data)) {
      this.log.warn('Sync timeline truncated; older messages were skipped', {
        room,
        limit: SYNC_FILTER.room.timeline.limit,
      });
    }

    return {
      events: extractMessages(data),
      serverClock: serverClockFromDate(headers.get('date')),
    };
  }

  async poll(timeoutMs: number): Promise<InboundMessage[]> {
    const { events } = await this.sync(timeoutMs);
    return events;
  }

  async send(channelId: string, text: string): Promise<void> {
    const txnId = `hw${Date.now()}.${++this.txnCounter}`;
    await this.request(
      'PUT',
      `/rooms/${encodeURIComponent(channelId)}/send/m.room.message/${encodeURIComponent(txnId)}`,
      SendResponseSchema,
      { body: { msgtype: 'm.text', body: text } }
    );
  }

  /**
   * Abort in-flight requests and log the session out. Logout failure is
   * reported, not thrown.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();

    if (!this.accessToken) return;
    try {
      await this.request('POST', '/logout', AnyResponseSchema, { body: {}, allowClosed: true });
      this.log.info('Logged out', { user: this.userId });
    } catch (err) {
      this.log.warn('Logout failed', { error: errorMessage(err) });
    } finally {
      this.accessToken = undefined;
    }
  }

  private async request<T>(
    method: 'GET' | 'POST' | 'PUT',
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions & { allowClosed?: boolean } = {}
  ): Promise<MatrixResponse<T>> {
    const operation = `${method} ${endpoint.split('?')[0]}`;
    if (this.closed && !options.allowClosed) {
      throw new ConnectionError(`transport closed (${operation})`);
    }

    const authenticated = options.authenticated ?? true;
    if (authenticated && !this.accessToken) {
      throw new ConnectionError(`not logged in (${operation})`);
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';
    if (authenticated && this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;

    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    this.inFlight.add(controller);

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}/_matrix/client/v3${endpoint}`, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      if (timedOut) throw new TimeoutError(operation, timeoutMs);
      throw new ConnectionError(`${operation}: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ConnectionError(`${operation} returned invalid JSON: ${errorMessage(err)}`, response.status);
    }

    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(payload);
      const detail = parsed.success
        ? [parsed.data.errcode, parsed.data.error].filter(Boolean).join(': ')
        : '';
      throw new ConnectionError(
        `${operation} returned ${response.status}${detail ? ` (${detail})` : ''}`,
        response.status
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ConnectionError(`${operation} returned an unexpected body: ${parsed.error.message}`, response.status);
    }
    return { data: parsed.data, headers: response.headers };
  }
}
