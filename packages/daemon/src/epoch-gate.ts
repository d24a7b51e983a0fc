/**
 * Epoch Gate
 *
 * Fixes the connection epoch against the channel's own clock and decides
 * which inbound messages are live commands. Anything at or before the epoch
 * is backlog and never dispatched.
 */

import { randomBytes } from 'node:crypto';
import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { ChannelTransport, InboundMessage } from './types.js';

/** Prefix shared by every agent's epoch marker. */
export const EPOCH_MARKER_PREFIX = '__EPOCH_SYNC__';

/**
 * Where the epoch came from, best first:
 * - marker: server timestamp of our own marker message
 * - server-clock: server clock reported during sync
 * - local-clock: local wall clock; subject to skew
 */
export type EpochTier = 'marker' | 'server-clock' | 'local-clock';

export type Classification = 'accepted' | 'discarded';

export interface EpochResult {
  epoch: number;
  tier: EpochTier;
  /** Messages consumed while establishing; run them through classify() */
  backlog: InboundMessage[];
}

export interface EpochGateConfig {
  identity: string;
  channelId: string;
  syncTimeoutMs: number;
  markerDelayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function isEpochMarker(body: string): boolean {
  return body.startsWith(EPOCH_MARKER_PREFIX);
}

/**
 * Accept iff the epoch is set, the body is not an epoch marker, and the
 * message is strictly newer than the epoch.
 */
export function classify(message: InboundMessage, epoch: number | null): Classification {
  if (epoch === null) return 'discarded';
  if (isEpochMarker(message.body)) return 'discarded';
  return message.serverTimestamp > epoch ? 'accepted' : 'discarded';
}

export class EpochGate {
  private config: EpochGateConfig;
  private log: Logger;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;
  private established: { epoch: number; tier: EpochTier } | null = null;

  constructor(config: EpochGateConfig) {
    this.config = config;
    this.log = config.logger ?? createLogger('epoch');
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
  }

  get epoch(): number | null {
    return this.established?.epoch ?? null;
  }

  get tier(): EpochTier | null {
    return this.established?.tier ?? null;
  }

  get isReady(): boolean {
    return this.established !== null;
  }

  classify(message: InboundMessage): Classification {
    return classify(message, this.epoch);
  }

  /** Unique marker body for this agent and attempt. */
  createMarker(): string {
    return `${EPOCH_MARKER_PREFIX}${this.config.identity}:${this.now()}:${randomBytes(4).toString('hex')}`;
  }

  /**
   * Establish the epoch. Never throws; falls back tier by tier. Once set, the
   * epoch is immutable and later calls return it unchanged with no backlog.
   */
  async establish(transport: ChannelTransport): Promise<EpochResult> {
    if (this.established) {
      return { ...this.established, backlog: [] };
    }

    const backlog: InboundMessage[] = [];
    let serverClock: number | undefined;

    const trackClock = (clock: number | undefined) => {
      if (clock !== undefined && (serverClock === undefined || clock > serverClock)) {
        serverClock = clock;
      }
    };

    try {
      const initial = await transport.sync(this.config.syncTimeoutMs);
      backlog.push(...initial.events);
      trackClock(initial.serverClock);

      const markerTimestamp = await this.roundTripMarker(transport, backlog, trackClock);
      if (markerTimestamp !== null) {
        return this.fix(markerTimestamp, 'marker', backlog);
      }
    } catch (err) {
      this.log.warn('Epoch sync failed', { error: errorMessage(err) });
    }

    if (serverClock !== undefined) {
      return this.fix(serverClock, 'server-clock', backlog);
    }
    return this.fix(this.now(), 'local-clock', backlog);
  }

  private async roundTripMarker(
    transport: ChannelTransport,
    backlog: InboundMessage[],
    trackClock: (clock: number | undefined) => void
  ): Promise<number | null> {
    const marker = this.createMarker();

    try {
      await transport.send(this.config.channelId, marker);
      await this.sleep(this.config.markerDelayMs);

      const echo = await transport.sync(this.config.syncTimeoutMs);
      backlog.push(...echo.events);
      trackClock(echo.serverClock);

      for (let i = echo.events.length - 1; i >= 0; i--) {
        const event = echo.events[i];
        if (event.channelId === this.config.channelId && event.body === marker) {
          return event.serverTimestamp;
        }
      }
      this.log.warn('Epoch marker not observed in sync', { marker });
    } catch (err) {
      this.log.warn('Epoch marker round-trip failed', { error: errorMessage(err) });
    }
    return null;
  }

  private fix(epoch: number, tier: EpochTier, backlog: InboundMessage[]): EpochResult {
    this.established = { epoch, tier };
    if (tier === 'marker') {
      this.log.info('Connection epoch established', { epoch, tier });
    } else {
      this.log.warn('Connection epoch established from fallback; clock skew may misclassify messages', {
        epoch,
        tier,
      });
    }
    return { epoch, tier, backlog };
  }
}
