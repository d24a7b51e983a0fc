/**
 * Command Interpreter
 *
 * Parses a message body into an AgentCommand and runs its side effects.
 * Terminating commands only request a stop when every step succeeded, so a
 * failed attempt leaves the agent up and the operator can retry.
 */

import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import { parseCommand, type AgentCommand, type TerminateLevel } from './command-parser.js';
import type { ProcessTerminator, TerminationReport } from './process-terminator.js';
import type { CommandOutcome, HostPower, PersistenceArtifact } from './types.js';

export interface CommandInterpreterDeps {
  identity: string;
  terminator: Pick<ProcessTerminator, 'terminateSiblings'>;
  artifact: PersistenceArtifact;
  power: HostPower;
  /** Delay passed to shutdown/restart (seconds) */
  powerDelaySeconds: number;
  logger?: Logger;
}

const SILENT: CommandOutcome = { reply: null, stopRequested: false };

export class CommandInterpreter {
  private deps: CommandInterpreterDeps;
  private log: Logger;

  constructor(deps: CommandInterpreterDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('commands');
  }

  get identity(): string {
    return this.deps.identity;
  }

  parse(body: string): AgentCommand {
    return parseCommand(body, this.deps.identity);
  }

  /**
   * Interpret a message body. Never throws: capability failures become
   * error replies.
   */
  async interpret(body: string): Promise<CommandOutcome> {
    const command = this.parse(body);
    if (command.kind === 'unknown') {
      this.log.debug('Ignoring unrecognized message', { body });
      return SILENT;
    }

    this.log.info('Executing command', { kind: command.kind });
    return this.execute(command);
  }

  async execute(command: AgentCommand): Promise<CommandOutcome> {
    const id = this.deps.identity;

    switch (command.kind) {
      case 'terminate':
        return this.terminate(command.level, command.label);
      case 'ping':
        return { reply: `Yes ${id} is online`, stopRequested: false };
      case 'poweroff':
        return (await this.attemptPower('shutdown'))
          ? { reply: `shutdown confirmed for ${id}`, stopRequested: false }
          : { reply: `Error from ${id}: Failed to initiate shutdown`, stopRequested: false };
      case 'reboot':
        return (await this.attemptPower('restart'))
          ? { reply: `restart confirmed for ${id}`, stopRequested: false }
          : { reply: `Error from ${id}: Failed to initiate restart`, stopRequested: false };
      case 'unknown':
        return SILENT;
    }
  }

  private async terminate(level: TerminateLevel, label: string): Promise<CommandOutcome> {
    const id = this.deps.identity;
    const failure = (detail: string): CommandOutcome => ({
      reply: `Error from ${id} on ${label}: ${detail}`,
      stopRequested: false,
    });

    let report: TerminationReport;
    try {
      report = await this.deps.terminator.terminateSiblings();
    } catch (err) {
      return failure(errorMessage(err));
    }
    if (report.errors.length > 0) {
      this.log.warn('Termination reported errors', { label, errors: report.errors.join('; ') });
      return failure(report.errors.join('; '));
    }

    if (level === 'hide' && !(await this.attemptArtifact('hide'))) {
      return failure('Failed to hide persistence artifact');
    }
    if (level === 'purge' && !(await this.attemptArtifact('delete'))) {
      return failure('Failed to delete persistence artifact');
    }

    return { reply: `Success from ${id} on ${label}`, stopRequested: true };
  }

  private async attemptArtifact(action: 'hide' | 'delete'): Promise<boolean> {
    const { artifact } = this.deps;
    try {
      const ok = action === 'hide' ? await artifact.hide() : await artifact.delete();
      if (!ok) {
        this.log.warn(`Could not ${action} persistence artifact`, { path: artifact.path });
      }
      return ok;
    } catch (err) {
      this.log.error(`Error during persistence artifact ${action}`, {
        path: artifact.path,
        error: errorMessage(err),
      });
      return false;
    }
  }

  private async attemptPower(action: 'shutdown' | 'restart'): Promise<boolean> {
    const { power, powerDelaySeconds } = this.deps;
    try {
      return action === 'shutdown'
        ? await power.shutdown(powerDelaySeconds)
        : await power.restart(powerDelaySeconds);
    } catch (err) {
      this.log.error(`Host ${action} failed`, { error: errorMessage(err) });
      return false;
    }
  }
}
