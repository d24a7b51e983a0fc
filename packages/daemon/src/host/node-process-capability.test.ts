import { describe, it, expect, vi } from 'vitest';
import { NodeProcessCapability, parsePsOutput, parseWindowsProcessJson } from './node-process-capability.js';
import type { CommandRunner } from './command-runner.js';

describe('parsePsOutput', () => {
  it('splits pid and command line', () => {
    const stdout = [
      '    1 /sbin/init splash',
      '  812 /usr/bin/node /opt/hostwarden/dist/src/cli/index.js hostwarden start',
      '',
      ' 9001 bash',
    ].join('\n');

    expect(parsePsOutput(stdout)).toEqual([
      { pid: 1, name: 'init', commandLine: '/sbin/init splash' },
      { pid: 812, name: 'node', commandLine: '/usr/bin/node /opt/hostwarden/dist/src/cli/index.js hostwarden start' },
      { pid: 9001, name: 'bash', commandLine: 'bash' },
    ]);
  });

  it('skips lines without a pid', () => {
    expect(parsePsOutput('  PID COMMAND\nnoise\n')).toEqual([]);
  });
});

describe('parseWindowsProcessJson', () => {
  it('reads a process array', () => {
    const stdout = JSON.stringify([
      { ProcessId: 4, Name: 'System', CommandLine: null },
      { ProcessId: 7040, Name: 'node.exe', CommandLine: 'node.exe cli.js hostwarden start' },
    ]);

    expect(parseWindowsProcessJson(stdout)).toEqual([
      { pid: 4, name: 'System', commandLine: '' },
      { pid: 7040, name: 'node.exe', commandLine: 'node.exe cli.js hostwarden start' },
    ]);
  });

  it('reads a single process object', () => {
    expect(parseWindowsProcessJson('{"ProcessId":12,"Name":"a.exe"}')).toEqual([
      { pid: 12, name: 'a.exe', commandLine: '' },
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseWindowsProcessJson('  \r\n')).toEqual([]);
  });

  it('rejects unexpected shapes', () => {
    expect(() => parseWindowsProcessJson('[{"Name":"x"}]')).toThrow();
  });
});

describe('NodeProcessCapability', () => {
  it('lists POSIX processes with ps', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: ' 42 node app.js\n', stderr: '' }));
    const capability = new NodeProcessCapability({ platform: 'linux', run });

    expect(await capability.listProcesses()).toEqual([{ pid: 42, name: 'node', commandLine: 'node app.js' }]);
    expect(run).toHaveBeenCalledWith('ps', ['-axo', 'pid=,args=']);
  });

  it('lists Windows processes through PowerShell', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '{"ProcessId":5,"Name":"x.exe","CommandLine":"x.exe"}', stderr: '' }));
    const capability = new NodeProcessCapability({ platform: 'win32', run });

    expect(await capability.listProcesses()).toEqual([{ pid: 5, name: 'x.exe', commandLine: 'x.exe' }]);
    expect(run.mock.calls[0][0]).toBe('powershell.exe');
  });

  it('terminates with SIGTERM and kills with SIGKILL', async () => {
    const signal = vi.fn();
    const capability = new NodeProcessCapability({ platform: 'linux', signal });

    await capability.terminate(10);
    await capability.kill(11);

    expect(signal.mock.calls).toEqual([
      [10, 'SIGTERM'],
      [11, 'SIGKILL'],
    ]);
  });

  it('propagates signal errors', async () => {
    const signal = vi.fn(() => {
      throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
    });
    const capability = new NodeProcessCapability({ platform: 'linux', signal });

    await expect(capability.terminate(10)).rejects.toMatchObject({ code: 'ESRCH' });
  });
});
