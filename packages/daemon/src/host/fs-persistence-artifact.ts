/**
 * File-backed auto-start artifact (a Startup-folder script on Windows, an
 * autostart entry elsewhere).
 *
 * Hiding sets the Windows hidden attribute; on other platforms the file is
 * renamed to a dot-file beside it. Delete removes whichever form exists.
 */

import fs from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { PersistenceArtifact } from '../types.js';
import { execCommand, type CommandRunner } from './command-runner.js';

export interface FsPersistenceArtifactOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  logger?: Logger;
}

export class FsPersistenceArtifact implements PersistenceArtifact {
  readonly path: string;
  private platform: NodeJS.Platform;
  private run: CommandRunner;
  private log: Logger;

  constructor(artifactPath: string, options: FsPersistenceArtifactOptions = {}) {
    this.path = artifactPath;
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? execCommand;
    this.log = options.logger ?? createLogger('host');
  }

  /** Where the artifact lives once hidden on non-Windows hosts. */
  get hiddenPath(): string {
    const base = path.basename(this.path);
    return base.startsWith('.') ? this.path : path.join(path.dirname(this.path), `.${base}`);
  }

  private get isWindows(): boolean {
    return this.platform === 'win32';
  }

  async exists(): Promise<boolean> {
    return (await this.locate()) !== null;
  }

  async hide(): Promise<boolean> {
    try {
      if (!fs.existsSync(this.path)) {
        this.log.warn('Persistence artifact not found', { path: this.path });
        return false;
      }
      if (this.isWindows) {
        await this.run('attrib', ['+H', this.path]);
      } else {
        await fs.promises.rename(this.path, this.hiddenPath);
      }
      this.log.info('Persistence artifact hidden', { path: this.path });
      return true;
    } catch (err) {
      this.log.error('Error hiding persistence artifact', { path: this.path, error: errorMessage(err) });
      return false;
    }
  }

  async delete(): Promise<boolean> {
    try {
      const target = await this.locate();
      if (target === null) {
        this.log.warn('Persistence artifact not found', { path: this.path });
        return false;
      }
      if (this.isWindows) {
        await this.clearHiddenAttribute(target);
      }
      await fs.promises.unlink(target);
      this.log.info('Persistence artifact deleted', { path: target });
      return true;
    } catch (err) {
      this.log.error('Error deleting persistence artifact', { path: this.path, error: errorMessage(err) });
      return false;
    }
  }

  private async locate(): Promise<string | null> {
    if (fs.existsSync(this.path)) return this.path;
    if (!this.isWindows && fs.existsSync(this.hiddenPath)) return this.hiddenPath;
    return null;
  }

  private async clearHiddenAttribute(target: string): Promise<void> {
    try {
      await this.run('attrib', ['-H', target]);
    } catch (err) {
      // unlink still works on most hidden files; report only
      this.log.debug('Could not clear hidden attribute', { path: target, error: errorMessage(err) });
    }
  }
}
