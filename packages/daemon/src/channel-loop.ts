/**
 * Channel Loop
 *
 * disconnected -> authenticated -> joined -> ready -> polling -> stopping -> stopped
 *
 * Messages are handled strictly one at a time: classify, interpret, reply.
 * Authentication failure is the only fatal error; join and poll failures are
 * logged and the loop carries on.
 */

import { EventEmitter } from 'node:events';
import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { RunFlag } from '@hostwarden/utils';
import type { EpochGate, EpochTier } from './epoch-gate.js';
import type { CommandInterpreter } from './command-interpreter.js';
import type { ChannelTransport, CommandOutcome, InboundMessage } from './types.js';

export type ChannelLoopState =
  | 'disconnected'
  | 'authenticated'
  | 'joined'
  | 'ready'
  | 'polling'
  | 'stopping'
  | 'stopped';

export interface ChannelLoopConfig {
  user: string;
  secret: string;
  channelId: string;
  /** Long-poll timeout handed to the transport (ms) */
  pollTimeoutMs: number;
  /** Pause between polls (ms) */
  pollDelayMs: number;
  /** Pause after a failed poll (ms) */
  errorBackoffMs: number;
  logger?: Logger;
}

export interface ChannelLoopStats {
  received: number;
  accepted: number;
  discarded: number;
  replies: number;
  handlerErrors: number;
  pollErrors: number;
}

export interface ChannelLoopReadyEvent {
  epoch: number;
  tier: EpochTier;
}

export interface ChannelLoopOutcomeEvent {
  message: InboundMessage;
  outcome: CommandOutcome;
}

/**
 * Emits `state` (ChannelLoopState), `ready` (ChannelLoopReadyEvent) and
 * `outcome` (ChannelLoopOutcomeEvent).
 */
export class ChannelLoop extends EventEmitter {
  private transport: ChannelTransport;
  private gate: EpochGate;
  private interpreter: Pick<CommandInterpreter, 'interpret'>;
  private runFlag: RunFlag;
  private config: ChannelLoopConfig;
  private log: Logger;
  private currentState: ChannelLoopState = 'disconnected';
  private started = false;
  private stats: ChannelLoopStats = {
    received: 0,
    accepted: 0,
    discarded: 0,
    replies: 0,
    handlerErrors: 0,
    pollErrors: 0,
  };

  constructor(
    transport: ChannelTransport,
    gate: EpochGate,
    interpreter: Pick<CommandInterpreter, 'interpret'>,
    runFlag: RunFlag,
    config: ChannelLoopConfig
  ) {
    super();
    this.transport = transport;
    this.gate = gate;
    this.interpreter = interpreter;
    this.runFlag = runFlag;
    this.config = config;
    this.log = config.logger ?? createLogger('channel');
  }

  get state(): ChannelLoopState {
    return this.currentState;
  }

  getStats(): ChannelLoopStats {
    return { ...this.stats };
  }

  /**
   * Run until the run flag is cleared. Rejects only when authentication fails.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error('Channel loop already started');
    }
    this.started = true;

    try {
      await this.authenticate();

      try {
        await this.transport.join(this.config.channelId);
        this.log.info('Joined channel', { channel: this.config.channelId });
      } catch (err) {
        this.log.warn('Could not join channel (may already be joined)', {
          channel: this.config.channelId,
          error: errorMessage(err),
        });
      }
      this.setState('joined');

      const { epoch, tier, backlog } = await this.gate.establish(this.transport);
      this.setState('ready');
      const ready: ChannelLoopReadyEvent = { epoch, tier };
      this.emit('ready', ready);
      this.log.info('Agent is online and ready', { epoch, tier });

      await this.dispatch(backlog);

      if (this.runFlag.isRunning) {
        this.setState('polling');
      }
      while (this.runFlag.isRunning) {
        let events: InboundMessage[];
        try {
          events = await this.transport.poll(this.config.pollTimeoutMs);
        } catch (err) {
          this.stats.pollErrors++;
          this.log.warn('Poll failed, backing off', {
            error: errorMessage(err),
            backoffMs: this.config.errorBackoffMs,
          });
          await this.runFlag.sleep(this.config.errorBackoffMs);
          continue;
        }

        await this.dispatch(events);
        await this.runFlag.sleep(this.config.pollDelayMs);
      }
    } finally {
      this.runFlag.stop('channel loop exited');
      await this.shutdown();
    }
  }

  private async authenticate(): Promise<void> {
    try {
      const session = await this.transport.authenticate(this.config.user, this.config.secret);
      this.log.info('Authenticated', { user: session.userId });
      this.setState('authenticated');
    } catch (err) {
      this.log.error('Authentication failed; not retrying', { error: errorMessage(err) });
      this.runFlag.stop('authentication failed');
      throw err;
    }
  }

  private async dispatch(messages: InboundMessage[]): Promise<void> {
    for (const message of messages) {
      // A stop command earlier in the batch ends dispatch
      if (!this.runFlag.isRunning) return;
      await this.handleMessage(message);
    }
  }

  private async handleMessage(message: InboundMessage): Promise<void> {
    this.stats.received++;

    if (message.channelId !== this.config.channelId) {
      this.stats.discarded++;
      this.log.debug('Dropping message from another channel', { channel: message.channelId });
      return;
    }

    if (this.gate.classify(message) === 'discarded') {
      this.stats.discarded++;
      this.log.debug('Discarding message', {
        ts: message.serverTimestamp,
        epoch: this.gate.epoch,
      });
      return;
    }

    this.stats.accepted++;
    try {
      const outcome = await this.interpreter.interpret(message.body);
      const event: ChannelLoopOutcomeEvent = { message, outcome };
      this.emit('outcome', event);

      if (outcome.stopRequested) {
        this.runFlag.stop(`stop command from ${message.sender ?? 'channel'}`);
      }
      if (outcome.reply !== null) {
        await this.transport.send(message.channelId, outcome.reply);
        this.stats.replies++;
      }
    } catch (err) {
      this.stats.handlerErrors++;
      this.log.error('Error processing message', {
        eventId: message.eventId,
        error: errorMessage(err),
      });
    }
  }

  private async shutdown(): Promise<void> {
    this.setState('stopping');
    try {
      await this.transport.close();
    } catch (err) {
      this.log.warn('Error closing transport', { error: errorMessage(err) });
    }
    this.setState('stopped');
    this.log.info('Channel loop stopped', { reason: this.runFlag.stopReason });
  }

  private setState(state: ChannelLoopState): void {
    this.currentState = state;
    this.emit('state', state);
  }
}
