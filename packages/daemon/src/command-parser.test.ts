import { describe, it, expect } from 'vitest';
import { parseCommand } from './command-parser.js';

describe('parseCommand', () => {
  it('parses the terminate levels in both forms', () => {
    expect(parseCommand('DEFCON 5 PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'hard', scope: 'self', label: 'DEFCON 5' });
    expect(parseCommand('STOP-HARD PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'hard', scope: 'self', label: 'STOP-HARD' });
    expect(parseCommand('DEFCON 4 PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'hide', scope: 'self', label: 'DEFCON 4' });
    expect(parseCommand('STOP-HIDE PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'hide', scope: 'self', label: 'STOP-HIDE' });
    expect(parseCommand('DEFCON 3 PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'purge', scope: 'self', label: 'DEFCON 3' });
    expect(parseCommand('STOP-PURGE PC1', 'PC1')).toEqual({ kind: 'terminate', level: 'purge', scope: 'self', label: 'STOP-PURGE' });
  });

  it('parses the unscoped broadcast purge', () => {
    expect(parseCommand('DEFCON 2', 'PC1')).toEqual({ kind: 'terminate', level: 'purge', scope: 'all', label: 'DEFCON 2' });
    expect(parseCommand('STOP-PURGE-ALL', 'anything')).toEqual({ kind: 'terminate', level: 'purge', scope: 'all', label: 'STOP-PURGE-ALL' });
  });

  it('parses ping, poweroff and reboot', () => {
    expect(parseCommand('PING PC1', 'PC1')).toEqual({ kind: 'ping' });
    expect(parseCommand('Are you online PC1', 'PC1')).toEqual({ kind: 'ping' });
    expect(parseCommand('POWEROFF PC1', 'PC1')).toEqual({ kind: 'poweroff' });
    expect(parseCommand('PC Shutdown PC1', 'PC1')).toEqual({ kind: 'poweroff' });
    expect(parseCommand('REBOOT PC1', 'PC1')).toEqual({ kind: 'reboot' });
    expect(parseCommand('PC Restart PC1', 'PC1')).toEqual({ kind: 'reboot' });
  });

  it('trims surrounding whitespace', () => {
    expect(parseCommand('  PING PC1\n', 'PC1')).toEqual({ kind: 'ping' });
  });

  it('is case-sensitive and exact', () => {
    expect(parseCommand('ping PC1', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('PING pc1', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('PING PC1 please', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('PING  PC1', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('DEFCON 2 PC1', 'PC1')).toEqual({ kind: 'unknown' });
  });

  it('ignores commands addressed to another identity', () => {
    const bodies = ['DEFCON 5 PC2', 'STOP-HIDE PC2', 'DEFCON 3 PC2', 'PING PC2', 'POWEROFF PC2', 'PC Restart PC2'];
    for (const body of bodies) {
      expect(parseCommand(body, 'PC1')).toEqual({ kind: 'unknown' });
    }
  });

  it('does not let one identity prefix-match another', () => {
    expect(parseCommand('PING PC10', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('PING PC1', 'PC10')).toEqual({ kind: 'unknown' });
  });

  it('treats empty and unrelated text as unknown', () => {
    expect(parseCommand('', 'PC1')).toEqual({ kind: 'unknown' });
    expect(parseCommand('DEFCON 1 PC1', 'PC1')).toEqual({ kind: 'unknown' });
  });
});
