/**
 * In-process ChannelTransport for tests. Sync and poll results are queued;
 * marker messages sent to the channel are echoed back on the next sync.
 */

import { EPOCH_MARKER_PREFIX } from '../epoch-gate.js';
import type { ChannelSession, ChannelTransport, InboundMessage, SyncResult } from '../types.js';

export interface FakeTransportOptions {
  /** Server timestamp given to echoed markers; no echo when undefined */
  markerTimestamp?: number;
  authError?: Error;
  joinError?: Error;
  markerSendError?: Error;
  /** Called whenever poll runs out of queued batches */
  onIdle?: () => void;
}

export class FakeTransport implements ChannelTransport {
  readonly calls: string[] = [];
  readonly sent: Array<{ channelId: string; text: string }> = [];
  readonly syncQueue: Array<SyncResult | Error> = [];
  readonly pollQueue: Array<InboundMessage[] | Error> = [];
  sendError?: Error;
  private options: FakeTransportOptions;
  private pendingEcho: InboundMessage[] = [];

  constructor(options: FakeTransportOptions = {}) {
    this.options = options;
  }

  async authenticate(user: string): Promise<ChannelSession> {
    this.calls.push('authenticate');
    if (this.options.authError) throw this.options.authError;
    return { userId: user };
  }

  async join(channelId: string): Promise<void> {
    this.calls.push(`join ${channelId}`);
    if (this.options.joinError) throw this.options.joinError;
  }

  async sync(): Promise<SyncResult> {
    this.calls.push('sync');
    const next = this.syncQueue.shift() ?? { events: [] };
    if (next instanceof Error) throw next;

    const echoed = this.pendingEcho;
    this.pendingEcho = [];
    return { ...next, events: [...next.events, ...echoed] };
  }

  async send(channelId: string, text: string): Promise<void> {
    this.calls.push('send');
    if (text.startsWith(EPOCH_MARKER_PREFIX)) {
      if (this.options.markerSendError) throw this.options.markerSendError;
      if (this.options.markerTimestamp !== undefined) {
        this.pendingEcho.push({ body: text, serverTimestamp: this.options.markerTimestamp, channelId });
      }
      return;
    }
    if (this.sendError) throw this.sendError;
    this.sent.push({ channelId, text });
  }

  async poll(): Promise<InboundMessage[]> {
    this.calls.push('poll');
    const next = this.pollQueue.shift();
    if (next === undefined) {
      this.options.onIdle?.();
      return [];
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async close(): Promise<void> {
    this.calls.push('close');
  }
}

export function message(body: string, serverTimestamp: number, channelId = '!ops:example.org'): InboundMessage {
  return { body, serverTimestamp, channelId, sender: '@operator:example.org' };
}
