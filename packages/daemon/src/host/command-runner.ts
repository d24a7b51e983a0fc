import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an executable without a shell; rejects on non-zero exit. */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export const execCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: 'utf8',
    windowsHide: true,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};
