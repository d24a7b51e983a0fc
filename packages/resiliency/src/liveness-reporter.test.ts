import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RunFlag, type Logger } from '@hostwarden/utils';
import {
  LivenessReporter,
  formatLivenessToken,
  readLiveness,
  isLivenessStale,
} from './liveness-reporter.js';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('LivenessReporter', () => {
  let testDir: string;
  let runFlag: RunFlag;

  beforeEach(async () => {
    testDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'hostwarden-liveness-test-'));
    runFlag = new RunFlag();
  });

  afterEach(async () => {
    runFlag.stop('test cleanup');
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  it('creates the directory and writes the token immediately', async () => {
    const filePath = path.join(testDir, 'nested', 'agent.lock');
    const reporter = new LivenessReporter(runFlag, {
      filePath,
      intervalMs: 60_000,
      now: () => 1_760_900_000_123,
      logger: silentLogger(),
    });

    const done = reporter.run();
    await vi.waitFor(() => expect(reporter.getStats().writes).toBe(1));

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('1760900000.123');

    runFlag.stop();
    await done;
  });

  it('keeps rewriting while running and exits once the flag is cleared', async () => {
    const filePath = path.join(testDir, 'agent.lock');
    let clock = 1000;
    const reporter = new LivenessReporter(runFlag, {
      filePath,
      intervalMs: 5,
      now: () => (clock += 1000),
      logger: silentLogger(),
    });

    const done = reporter.run();
    await vi.waitFor(() => expect(reporter.getStats().writes).toBeGreaterThanOrEqual(3));

    runFlag.stop();
    await done;

    const writes = reporter.getStats().writes;
    await new Promise((r) => setTimeout(r, 20));
    expect(reporter.getStats().writes).toBe(writes);
    expect(await readLiveness(filePath)).toBe(reporter.getStats().lastWriteAt);
  });

  it('logs write failures and keeps retrying', async () => {
    const blocker = path.join(testDir, 'not-a-dir');
    fs.writeFileSync(blocker, 'file in the way');
    const logger = silentLogger();
    const reporter = new LivenessReporter(runFlag, {
      filePath: path.join(blocker, 'agent.lock'),
      intervalMs: 5,
      logger,
    });

    const done = reporter.run();
    await vi.waitFor(() => expect(reporter.getStats().failures).toBeGreaterThanOrEqual(2));

    runFlag.stop();
    await expect(done).resolves.toBeUndefined();
    expect(reporter.getStats().writes).toBe(0);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to update liveness token',
      expect.objectContaining({ file: path.join(blocker, 'agent.lock') })
    );
  });

  it('returns the same task when run twice', () => {
    const reporter = new LivenessReporter(runFlag, {
      filePath: path.join(testDir, 'agent.lock'),
      intervalMs: 60_000,
      logger: silentLogger(),
    });
    expect(reporter.run()).toBe(reporter.run());
  });

  it('does not write when the flag is already cleared', async () => {
    runFlag.stop();
    const filePath = path.join(testDir, 'agent.lock');
    const reporter = new LivenessReporter(runFlag, { filePath, intervalMs: 5, logger: silentLogger() });
    await reporter.run();
    expect(fs.existsSync(filePath)).toBe(false);
  });
});

describe('liveness readers', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'hostwarden-liveness-read-'));
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  it('formats tokens as seconds with millisecond precision', () => {
    expect(formatLivenessToken(1_500)).toBe('1.500');
  });

  it('reads a token back as epoch ms', async () => {
    const filePath = path.join(testDir, 'agent.lock');
    fs.writeFileSync(filePath, '1760900000.5\n');
    expect(await readLiveness(filePath)).toBe(1_760_900_000_500);
  });

  it('returns null for missing or garbage tokens', async () => {
    expect(await readLiveness(path.join(testDir, 'missing.lock'))).toBeNull();
    const filePath = path.join(testDir, 'garbage.lock');
    fs.writeFileSync(filePath, 'not a timestamp');
    expect(await readLiveness(filePath)).toBeNull();
  });

  it('judges staleness against the threshold', async () => {
    const filePath = path.join(testDir, 'agent.lock');
    fs.writeFileSync(filePath, '100.000');
    expect(await isLivenessStale(filePath, 30_000, 130_000)).toBe(false);
    expect(await isLivenessStale(filePath, 30_000, 130_001)).toBe(true);
    expect(await isLivenessStale(path.join(testDir, 'missing.lock'), 30_000)).toBe(true);
  });
});
