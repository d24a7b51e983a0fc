import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@hostwarden/utils';
import { ProcessTerminator, matchesEntryPoint } from './process-terminator.js';
import type { ProcessCapability, ProcessInfo } from './types.js';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function signalError(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

const SELF = 100;
const sibling = (pid: number, commandLine = 'node /opt/hostwarden/dist/src/cli/index.js hostwarden start'): ProcessInfo => ({
  pid,
  name: 'node',
  commandLine,
});

/** Process table where terminated pids disappear unless listed in `stubborn`. */
function createCapability(table: ProcessInfo[], stubborn: number[] = []) {
  let live = [...table];
  const capability = {
    listProcesses: vi.fn(async () => [...live]),
    terminate: vi.fn(async (pid: number) => {
      if (!stubborn.includes(pid)) live = live.filter((p) => p.pid !== pid);
    }),
    kill: vi.fn(async (pid: number) => {
      live = live.filter((p) => p.pid !== pid);
    }),
  } satisfies ProcessCapability;
  return capability;
}

function createTerminator(capability: ProcessCapability, sleep = vi.fn(async (_ms: number) => {})) {
  const terminator = new ProcessTerminator(capability, {
    entryPoints: ['hostwarden start'],
    graceMs: 2000,
    selfPid: SELF,
    sleep,
    logger: silentLogger(),
  });
  return { terminator, sleep };
}

describe('matchesEntryPoint', () => {
  it('matches on a command-line substring', () => {
    expect(matchesEntryPoint(sibling(1), ['hostwarden start'])).toBe(true);
    expect(matchesEntryPoint(sibling(1, 'vim notes.txt'), ['hostwarden start'])).toBe(false);
    expect(matchesEntryPoint(sibling(1, 'agent.exe'), ['hostwarden start', 'agent.exe'])).toBe(true);
  });
});

describe('ProcessTerminator', () => {
  it('returns an empty report without waiting when nothing matches', async () => {
    const capability = createCapability([sibling(SELF), sibling(5, 'bash')]);
    const { terminator, sleep } = createTerminator(capability);

    expect(await terminator.terminateSiblings()).toEqual({ terminated: [], errors: [] });
    expect(sleep).not.toHaveBeenCalled();
    expect(capability.terminate).not.toHaveBeenCalled();
  });

  it('never signals its own process', async () => {
    const capability = createCapability([sibling(SELF), sibling(200)]);
    const { terminator } = createTerminator(capability);

    const report = await terminator.terminateSiblings();

    expect(report).toEqual({ terminated: ['node (PID: 200)'], errors: [] });
    expect(capability.terminate).toHaveBeenCalledTimes(1);
    expect(capability.terminate).toHaveBeenCalledWith(200);
  });

  it('waits the grace period and force-kills survivors', async () => {
    const capability = createCapability([sibling(200), sibling(300)], [300]);
    const { terminator, sleep } = createTerminator(capability);

    const report = await terminator.terminateSiblings();

    expect(sleep).toHaveBeenCalledWith(2000);
    expect(capability.kill).toHaveBeenCalledTimes(1);
    expect(capability.kill).toHaveBeenCalledWith(300);
    expect(report).toEqual({
      terminated: ['node (PID: 200)', 'node (PID: 300)', 'node (PID: 300) - force killed'],
      errors: [],
    });
  });

  it('skips processes that vanished or belong to someone else', async () => {
    const capability = createCapability([sibling(200), sibling(300)]);
    capability.terminate.mockRejectedValueOnce(signalError('ESRCH')).mockRejectedValueOnce(signalError('EPERM'));
    capability.listProcesses.mockResolvedValueOnce([sibling(200), sibling(300)]).mockResolvedValueOnce([]);
    const { terminator } = createTerminator(capability);

    expect(await terminator.terminateSiblings()).toEqual({ terminated: [], errors: [] });
  });

  it('reports other signal failures', async () => {
    const capability = createCapability([sibling(200)]);
    capability.terminate.mockRejectedValueOnce(signalError('EINVAL'));
    capability.kill.mockRejectedValueOnce(signalError('EINVAL'));
    const { terminator } = createTerminator(capability);

    const report = await terminator.terminateSiblings();

    expect(report).toEqual({
      terminated: [],
      errors: ['terminate node (PID: 200): kill EINVAL', 'kill node (PID: 200): kill EINVAL'],
    });
  });

  it('reports a failure to list processes', async () => {
    const capability = createCapability([]);
    capability.listProcesses.mockRejectedValueOnce(new Error('spawn ps ENOENT'));
    const { terminator } = createTerminator(capability);

    expect(await terminator.terminateSiblings()).toEqual({ terminated: [], errors: ['spawn ps ENOENT'] });
  });
});
