/**
 * Host Agent
 *
 * Wires the two concurrent tasks: the channel loop (epoch gate, command
 * interpreter, replies) and the liveness reporter. They share nothing but the
 * run flag.
 */

import type { AgentConfig } from '@hostwarden/config';
import { LivenessReporter } from '@hostwarden/resiliency';
import { RunFlag } from '@hostwarden/utils';
import { createLogger, type Logger } from '@hostwarden/utils/logger';
import { ChannelLoop, type ChannelLoopState } from './channel-loop.js';
import { CommandInterpreter } from './command-interpreter.js';
import { EpochGate } from './epoch-gate.js';
import { FsPersistenceArtifact, NodeProcessCapability, ShellHostPower } from './host/index.js';
import { MatrixTransport } from './matrix-transport.js';
import { ProcessTerminator } from './process-terminator.js';
import type { ChannelTransport, HostPower, PersistenceArtifact, ProcessCapability } from './types.js';

/** Collaborators; defaults talk to Matrix and the local OS. */
export interface HostAgentDeps {
  transport?: ChannelTransport;
  processes?: ProcessCapability;
  artifact?: PersistenceArtifact;
  power?: HostPower;
  runFlag?: RunFlag;
  /** Shared by every component; each creates its own when omitted */
  logger?: Logger;
}

export class HostAgent {
  readonly runFlag: RunFlag;
  readonly gate: EpochGate;
  readonly interpreter: CommandInterpreter;
  readonly loop: ChannelLoop;
  readonly liveness: LivenessReporter;
  private config: AgentConfig;
  private log: Logger;

  constructor(config: AgentConfig, deps: HostAgentDeps = {}) {
    this.config = config;
    this.log = deps.logger ?? createLogger('agent', { agent: config.agentName });
    this.runFlag = deps.runFlag ?? new RunFlag();

    const { timing } = config;
    const logger = deps.logger;
    const transport = deps.transport ?? new MatrixTransport({ homeserver: config.matrix.homeserver, logger });

    this.liveness = new LivenessReporter(this.runFlag, {
      filePath: config.livenessFile,
      intervalMs: timing.livenessIntervalMs,
      logger,
    });

    this.gate = new EpochGate({
      identity: config.agentName,
      channelId: config.matrix.roomId,
      syncTimeoutMs: timing.syncTimeoutMs,
      markerDelayMs: timing.markerDelayMs,
      logger,
    });

    this.interpreter = new CommandInterpreter({
      identity: config.agentName,
      terminator: new ProcessTerminator(deps.processes ?? new NodeProcessCapability(), {
        entryPoints: config.entryPoints,
        graceMs: timing.terminateGraceMs,
        logger,
      }),
      artifact: deps.artifact ?? new FsPersistenceArtifact(config.persistenceArtifact, { logger }),
      power: deps.power ?? new ShellHostPower({ logger }),
      powerDelaySeconds: timing.powerDelaySeconds,
      logger,
    });

    this.loop = new ChannelLoop(transport, this.gate, this.interpreter, this.runFlag, {
      user: config.matrix.user,
      secret: config.matrix.password,
      channelId: config.matrix.roomId,
      pollTimeoutMs: timing.pollTimeoutMs,
      pollDelayMs: timing.pollDelayMs,
      errorBackoffMs: timing.errorBackoffMs,
      logger,
    });
  }

  get state(): ChannelLoopState {
    return this.loop.state;
  }

  /**
   * Run both tasks until the run flag is cleared. Rejects when the channel
   * loop hits a fatal error; the liveness task has exited by then.
   */
  async run(): Promise<void> {
    this.log.info('Starting agent', {
      agent: this.config.agentName,
      room: this.config.matrix.roomId,
      liveness: this.config.livenessFile,
    });

    const liveness = this.liveness.run();
    try {
      await this.loop.run();
    } finally {
      this.runFlag.stop('agent exiting');
      await liveness;
      this.log.info('Agent stopped', { reason: this.runFlag.stopReason });
    }
  }

  /** Request a cooperative stop; idempotent. */
  stop(reason = 'stop requested'): void {
    this.runFlag.stop(reason);
  }
}
