/**
 * Process enumeration and signalling for the local host.
 *
 * POSIX hosts are listed with `ps`, Windows hosts through CIM; both are
 * signalled with process.kill (Node maps SIGTERM/SIGKILL to TerminateProcess
 * on Windows).
 */

import path from 'node:path';
import { z } from 'zod';
import type { ProcessCapability, ProcessInfo } from '../types.js';
import { execCommand, type CommandRunner } from './command-runner.js';

const WindowsProcessSchema = z.object({
  ProcessId: z.number().int(),
  Name: z.string().nullable().optional(),
  CommandLine: z.string().nullable().optional(),
});

const WindowsProcessListSchema = z.union([z.array(WindowsProcessSchema), WindowsProcessSchema]);

const WINDOWS_LIST_SCRIPT =
  'Get-CimInstance Win32_Process | Select-Object ProcessId,Name,CommandLine | ConvertTo-Json -Compress';

export type SignalFn = (pid: number, signal: NodeJS.Signals) => void;

export interface NodeProcessCapabilityOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  signal?: SignalFn;
}

/**
 * Parse `ps -axo pid=,args=` output. The process name is the basename of the
 * first command-line token.
 */
export function parsePsOutput(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    const commandLine = match[2];
    const executable = commandLine.split(/\s+/)[0];
    processes.push({
      pid: Number(match[1]),
      name: path.posix.basename(executable),
      commandLine,
    });
  }
  return processes;
}

export function parseWindowsProcessJson(stdout: string): ProcessInfo[] {
  const trimmed = stdout.trim();
  if (trimmed === '') return [];

  const parsed = WindowsProcessListSchema.parse(JSON.parse(trimmed));
  const list = Array.isArray(parsed) ? parsed : [parsed];
  return list.map((proc) => ({
    pid: proc.ProcessId,
    name: proc.Name ?? '',
    commandLine: proc.CommandLine ?? '',
  }));
}

export class NodeProcessCapability implements ProcessCapability {
  private platform: NodeJS.Platform;
  private run: CommandRunner;
  private signal: SignalFn;

  constructor(options: NodeProcessCapabilityOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? execCommand;
    this.signal = options.signal ?? ((pid, signal) => {
      process.kill(pid, signal);
    });
  }

  async listProcesses(): Promise<ProcessInfo[]> {
    if (this.platform === 'win32') {
      const { stdout } = await this.run('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', WINDOWS_LIST_SCRIPT]);
      return parseWindowsProcessJson(stdout);
    }
    const { stdout } = await this.run('ps', ['-axo', 'pid=,args=']);
    return parsePsOutput(stdout);
  }

  async terminate(pid: number): Promise<void> {
    this.signal(pid, 'SIGTERM');
  }

  async kill(pid: number): Promise<void> {
    this.signal(pid, 'SIGKILL');
  }
}
