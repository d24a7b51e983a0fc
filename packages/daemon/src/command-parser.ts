/**
 * Command vocabulary.
 *
 * Matching is exact and case-sensitive on the trimmed body. Scoped commands
 * must end with the agent's identity, so several agents can share a channel;
 * the broadcast purge is the only unscoped form.
 */

export type TerminateLevel = 'hard' | 'hide' | 'purge';
export type TerminateScope = 'self' | 'all';

export type AgentCommand =
  | { kind: 'terminate'; level: TerminateLevel; scope: TerminateScope; label: string }
  | { kind: 'ping' }
  | { kind: 'poweroff' }
  | { kind: 'reboot' }
  | { kind: 'unknown' };

export type CommandKind = AgentCommand['kind'];

type KnownCommand = Exclude<AgentCommand, { kind: 'unknown' }>;

interface CommandForm {
  keyword: string;
  /** Scoped forms are `<keyword> <identity>`; unscoped forms are the bare keyword */
  scoped: boolean;
  command: (keyword: string) => KnownCommand;
}

const terminate =
  (level: TerminateLevel, scope: TerminateScope) =>
  (label: string): KnownCommand => ({ kind: 'terminate', level, scope, label });

export const COMMAND_FORMS: readonly CommandForm[] = [
  { keyword: 'DEFCON 5', scoped: true, command: terminate('hard', 'self') },
  { keyword: 'STOP-HARD', scoped: true, command: terminate('hard', 'self') },
  { keyword: 'DEFCON 4', scoped: true, command: terminate('hide', 'self') },
  { keyword: 'STOP-HIDE', scoped: true, command: terminate('hide', 'self') },
  { keyword: 'DEFCON 3', scoped: true, command: terminate('purge', 'self') },
  { keyword: 'STOP-PURGE', scoped: true, command: terminate('purge', 'self') },
  { keyword: 'DEFCON 2', scoped: false, command: terminate('purge', 'all') },
  { keyword: 'STOP-PURGE-ALL', scoped: false, command: terminate('purge', 'all') },
  { keyword: 'Are you online', scoped: true, command: () => ({ kind: 'ping' }) },
  { keyword: 'PING', scoped: true, command: () => ({ kind: 'ping' }) },
  { keyword: 'PC Shutdown', scoped: true, command: () => ({ kind: 'poweroff' }) },
  { keyword: 'POWEROFF', scoped: true, command: () => ({ kind: 'poweroff' }) },
  { keyword: 'PC Restart', scoped: true, command: () => ({ kind: 'reboot' }) },
  { keyword: 'REBOOT', scoped: true, command: () => ({ kind: 'reboot' }) },
];

export function parseCommand(body: string, identity: string): AgentCommand {
  const text = body.trim();

  for (const form of COMMAND_FORMS) {
    const expected = form.scoped ? `${form.keyword} ${identity}` : form.keyword;
    if (text === expected) {
      return form.command(form.keyword);
    }
  }

  return { kind: 'unknown' };
}
