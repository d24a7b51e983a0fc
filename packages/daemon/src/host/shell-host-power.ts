/**
 * Host shutdown/restart through the platform `shutdown` command.
 */

import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { HostPower } from '../types.js';
import { execCommand, type CommandRunner } from './command-runner.js';

export type PowerAction = 'shutdown' | 'restart';

export interface ShellHostPowerOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  logger?: Logger;
}

/**
 * Arguments for `shutdown`. Windows takes seconds; POSIX takes whole minutes,
 * so anything under a minute becomes `now`.
 */
export function shutdownArgs(action: PowerAction, delaySeconds: number, platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return [action === 'shutdown' ? '/s' : '/r', '/t', String(delaySeconds)];
  }
  const when = delaySeconds < 60 ? 'now' : `+${Math.ceil(delaySeconds / 60)}`;
  return [action === 'shutdown' ? '-h' : '-r', when];
}

export class ShellHostPower implements HostPower {
  private platform: NodeJS.Platform;
  private run: CommandRunner;
  private log: Logger;

  constructor(options: ShellHostPowerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? execCommand;
    this.log = options.logger ?? createLogger('host');
  }

  shutdown(delaySeconds: number): Promise<boolean> {
    return this.invoke('shutdown', delaySeconds);
  }

  restart(delaySeconds: number): Promise<boolean> {
    return this.invoke('restart', delaySeconds);
  }

  private async invoke(action: PowerAction, delaySeconds: number): Promise<boolean> {
    const args = shutdownArgs(action, delaySeconds, this.platform);
    try {
      await this.run('shutdown', args);
      this.log.info(`Host ${action} scheduled`, { delaySeconds });
      return true;
    } catch (err) {
      this.log.error(`Error initiating host ${action}`, { error: errorMessage(err) });
      return false;
    }
  }
}
