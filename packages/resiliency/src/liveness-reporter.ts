/**
 * Liveness Reporter
 *
 * Rewrites a liveness token (Unix seconds with a fractional part) on a fixed
 * interval while the run flag is set. External monitors treat a stale token
 * as "agent down".
 */

import fs from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage, type Logger } from '@hostwarden/utils/logger';
import type { RunFlag } from '@hostwarden/utils';

export interface LivenessReporterConfig {
  /** Token file path; parent directories are created on every tick */
  filePath: string;
  /** Interval between writes (ms) */
  intervalMs: number;
  /** Clock override for tests (epoch ms) */
  now?: () => number;
  logger?: Logger;
}

export interface LivenessStats {
  writes: number;
  failures: number;
  lastWriteAt?: number;
  lastError?: string;
}

export function formatLivenessToken(epochMs: number): string {
  return (epochMs / 1000).toFixed(3);
}

export class LivenessReporter {
  private config: LivenessReporterConfig;
  private runFlag: RunFlag;
  private log: Logger;
  private now: () => number;
  private stats: LivenessStats = { writes: 0, failures: 0 };
  private active?: Promise<void>;

  constructor(runFlag: RunFlag, config: LivenessReporterConfig) {
    this.runFlag = runFlag;
    this.config = config;
    this.log = config.logger ?? createLogger('liveness');
    this.now = config.now ?? Date.now;
  }

  getStats(): LivenessStats {
    return { ...this.stats };
  }

  /**
   * Write the token until the run flag is cleared. Never rejects; write
   * failures are logged and retried on the next tick.
   */
  run(): Promise<void> {
    if (!this.active) {
      this.active = this.loop();
    }
    return this.active;
  }

  private async loop(): Promise<void> {
    this.log.info('Liveness reporter started', {
      file: this.config.filePath,
      intervalMs: this.config.intervalMs,
    });

    while (this.runFlag.isRunning) {
      await this.tick();
      await this.runFlag.sleep(this.config.intervalMs);
    }

    this.log.info('Liveness reporter stopped', { writes: this.stats.writes });
  }

  private async tick(): Promise<void> {
    const timestamp = this.now();
    try {
      await this.writeToken(timestamp);
      this.stats.writes++;
      this.stats.lastWriteAt = timestamp;
      this.log.debug('Liveness token updated', { file: this.config.filePath });
    } catch (err) {
      this.stats.failures++;
      this.stats.lastError = errorMessage(err);
      this.log.error('Failed to update liveness token', {
        file: this.config.filePath,
        error: this.stats.lastError,
      });
    }
  }

  private async writeToken(timestamp: number): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.config.filePath), { recursive: true });
    await fs.promises.writeFile(this.config.filePath, formatLivenessToken(timestamp), 'utf-8');
  }
}

/**
 * Read the last liveness token as epoch ms. Returns null when the file is
 * missing or does not hold a timestamp.
 */
export async function readLiveness(filePath: string): Promise<number | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }

  const seconds = Number.parseFloat(content.trim());
  if (!Number.isFinite(seconds)) return null;
  return Math.round(seconds * 1000);
}

export async function isLivenessStale(
  filePath: string,
  staleThresholdMs: number,
  now: number = Date.now()
): Promise<boolean> {
  const lastWrite = await readLiveness(filePath);
  if (lastWrite === null) return true;
  return now - lastWrite > staleThresholdMs;
}
