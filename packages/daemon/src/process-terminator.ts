/**
 * Stops sibling agent processes: everything whose command line mentions one of
 * the configured entry points, except this process. Terminate first, wait a
 * grace period, then force-kill whatever is still listed.
 */

import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { ProcessCapability, ProcessInfo } from './types.js';

export interface TerminationReport {
  terminated: string[];
  errors: string[];
}

export interface ProcessTerminatorConfig {
  entryPoints: string[];
  graceMs: number;
  /** Never signalled; the agent stops itself through the run flag */
  selfPid?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

// Processes that exited meanwhile or belong to someone else are skipped
const SKIPPED_SIGNAL_ERRORS = new Set(['ESRCH', 'EPERM']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function matchesEntryPoint(proc: ProcessInfo, entryPoints: string[]): boolean {
  return entryPoints.some((entry) => proc.commandLine.includes(entry));
}

export class ProcessTerminator {
  private capability: ProcessCapability;
  private config: ProcessTerminatorConfig;
  private selfPid: number;
  private sleep: (ms: number) => Promise<void>;
  private log: Logger;

  constructor(capability: ProcessCapability, config: ProcessTerminatorConfig) {
    this.capability = capability;
    this.config = config;
    this.selfPid = config.selfPid ?? process.pid;
    this.sleep = config.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
    this.log = config.logger ?? createLogger('host');
  }

  async terminateSiblings(): Promise<TerminationReport> {
    const report: TerminationReport = { terminated: [], errors: [] };

    try {
      const targets = await this.findSiblings();
      if (targets.length === 0) {
        this.log.info('No sibling processes to terminate');
        return report;
      }

      for (const proc of targets) {
        await this.signal(proc, 'terminate', report);
      }

      await this.sleep(this.config.graceMs);

      for (const proc of await this.findSiblings()) {
        await this.signal(proc, 'kill', report);
      }
    } catch (err) {
      report.errors.push(errorMessage(err));
    }

    this.log.info('Sibling termination finished', {
      terminated: report.terminated.length,
      errors: report.errors.length,
    });
    return report;
  }

  private async findSiblings(): Promise<ProcessInfo[]> {
    const processes = await this.capability.listProcesses();
    return processes.filter(
      (proc) => proc.pid !== this.selfPid && matchesEntryPoint(proc, this.config.entryPoints)
    );
  }

  private async signal(proc: ProcessInfo, mode: 'terminate' | 'kill', report: TerminationReport): Promise<void> {
    try {
      if (mode === 'terminate') {
        await this.capability.terminate(proc.pid);
        report.terminated.push(`${proc.name} (PID: ${proc.pid})`);
      } else {
        await this.capability.kill(proc.pid);
        report.terminated.push(`${proc.name} (PID: ${proc.pid}) - force killed`);
      }
    } catch (err) {
      const code = errorCode(err);
      if (code !== undefined && SKIPPED_SIGNAL_ERRORS.has(code)) {
        this.log.debug('Skipping process', { pid: proc.pid, mode, code });
        return;
      }
      report.errors.push(`${mode} ${proc.name} (PID: ${proc.pid}): ${errorMessage(err)}`);
    }
  }
}
