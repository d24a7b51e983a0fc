/**
 * hostwarden CLI
 *
 * `start` runs the agent in the foreground; `status` reports whether the
 * liveness token is fresh.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  CONFIG_ENV,
  DEFAULT_TIMING_CONFIG,
  defaultLivenessFile,
  loadAgentConfig,
  type AgentConfig,
  type ConfigEnv,
} from '@hostwarden/config';
import { HostAgent } from '@hostwarden/daemon';
import { readLiveness } from '@hostwarden/resiliency';
import { errorMessage } from '@hostwarden/utils/logger';

export const VERSION = '0.1.0';

export type RunnableAgent = Pick<HostAgent, 'run' | 'stop'>;

export interface CliIo {
  env: ConfigEnv;
  out: (line: string) => void;
  err: (line: string) => void;
  now: () => number;
  setExitCode: (code: number) => void;
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  createAgent: (config: AgentConfig) => RunnableAgent;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return parsed;
}

function defaultIo(): CliIo {
  return {
    env: process.env,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    now: Date.now,
    setExitCode: (code) => {
      process.exitCode = code;
    },
    onSignal: (signal, handler) => {
      process.on(signal, handler);
    },
    createAgent: (config) => new HostAgent(config),
  };
}

export function createProgram(overrides: Partial<CliIo> = {}): Command {
  const io: CliIo = { ...defaultIo(), ...overrides };
  const program = new Command();

  program
    .name('hostwarden')
    .description('Remote-control agent listening on a Matrix room')
    .version(VERSION);

  program
    .command('start')
    .description('Run the agent in the foreground')
    .option('-c, --config <path>', 'JSON configuration file')
    .action(async (options: { config?: string }) => {
      let config: AgentConfig;
      try {
        config = loadAgentConfig({ configPath: options.config, env: io.env });
      } catch (err) {
        io.err(errorMessage(err));
        io.setExitCode(1);
        return;
      }

      const agent = io.createAgent(config);
      for (const signal of SHUTDOWN_SIGNALS) {
        io.onSignal(signal, () => agent.stop(`received ${signal}`));
      }

      try {
        await agent.run();
      } catch (err) {
        io.err(`Agent stopped on a fatal error: ${errorMessage(err)}`);
        io.setExitCode(1);
      }
    });

  program
    .command('status')
    .description('Check the liveness token written by a running agent')
    .option('-l, --liveness <path>', 'Liveness token file')
    .option(
      '--stale-after <ms>',
      'Age after which the token counts as stale',
      parseMilliseconds,
      DEFAULT_TIMING_CONFIG.livenessIntervalMs * 3
    )
    .action(async (options: { liveness?: string; staleAfter: number }) => {
      const filePath = options.liveness ?? (io.env[CONFIG_ENV.livenessFile] || defaultLivenessFile(io.env));
      const lastWrite = await readLiveness(filePath);
      if (lastWrite === null) {
        io.out(`missing: no liveness token at ${filePath}`);
        io.setExitCode(1);
        return;
      }

      const ageMs = Math.max(0, io.now() - lastWrite);
      const stale = ageMs > options.staleAfter;
      io.out(`${stale ? 'stale' : 'fresh'}: last update ${(ageMs / 1000).toFixed(1)}s ago (${filePath})`);
      if (stale) io.setExitCode(1);
    });

  return program;
}
