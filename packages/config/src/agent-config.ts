/**
 * Agent configuration loading.
 *
 * Sources, lowest precedence first: built-in defaults, an optional JSON file,
 * then HOSTWARDEN_* environment variables. The merged result is validated
 * against AgentConfigSchema.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '@hostwarden/utils/errors';
import { errorMessage } from '@hostwarden/utils/logger';
import { AgentConfigSchema, type AgentConfig, type TimingConfig } from './schemas.js';

export const DEFAULT_TIMING_CONFIG: TimingConfig = {
  syncTimeoutMs: 5000,
  markerDelayMs: 1000,
  pollTimeoutMs: 30_000,
  pollDelayMs: 1000,
  errorBackoffMs: 5000,
  livenessIntervalMs: 10_000,
  terminateGraceMs: 2000,
  powerDelaySeconds: 5,
};

export const DEFAULT_ENTRY_POINTS = ['hostwarden start'];

/** Environment variables read by loadAgentConfig */
export const CONFIG_ENV = {
  agentName: 'HOSTWARDEN_AGENT_NAME',
  homeserver: 'HOSTWARDEN_HOMESERVER',
  user: 'HOSTWARDEN_USER',
  password: 'HOSTWARDEN_PASSWORD',
  roomId: 'HOSTWARDEN_ROOM_ID',
  livenessFile: 'HOSTWARDEN_LIVENESS_FILE',
  persistenceArtifact: 'HOSTWARDEN_ARTIFACT_PATH',
} as const;

export type ConfigEnv = Record<string, string | undefined>;

export interface LoadAgentConfigOptions {
  /** JSON config file; missing file is an error when given explicitly */
  configPath?: string;
  env?: ConfigEnv;
  platform?: NodeJS.Platform;
}

export function defaultLivenessFile(env: ConfigEnv = process.env): string {
  const tempDir = env.TEMP || env.TMPDIR || os.tmpdir();
  return path.join(tempDir, 'hostwarden', 'agent.lock');
}

/**
 * Where the auto-start artifact lives by default: the per-user Startup folder
 * on Windows, the XDG autostart directory elsewhere.
 */
export function defaultPersistenceArtifact(
  platform: NodeJS.Platform = process.platform,
  env: ConfigEnv = process.env
): string {
  if (platform === 'win32') {
    const appData = env.APPDATA || path.win32.join(os.homedir(), 'AppData', 'Roaming');
    return path.win32.join(appData, 'Microsoft', 'Windows', 'Start Menu', 'Programs', 'Startup', 'hostwarden.vbs');
  }
  const configHome = env.XDG_CONFIG_HOME || path.posix.join(os.homedir(), '.config');
  return path.posix.join(configHome, 'autostart', 'hostwarden.desktop');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(configPath, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, [`invalid JSON: ${errorMessage(err)}`]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(configPath, ['top-level value must be an object']);
  }
  return parsed;
}

function definedOnly(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load and validate the agent configuration.
 * @throws ConfigError when the merged configuration is invalid
 */
export function loadAgentConfig(options: LoadAgentConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const file: Record<string, unknown> = options.configPath ? readConfigFile(options.configPath) : {};
  const fileMatrix = isRecord(file.matrix) ? file.matrix : {};
  const fileTiming = isRecord(file.timing) ? file.timing : {};

  const fromEnv = definedOnly({
    agentName: env[CONFIG_ENV.agentName],
    livenessFile: env[CONFIG_ENV.livenessFile],
    persistenceArtifact: env[CONFIG_ENV.persistenceArtifact],
  });

  const merged = {
    agentName: file.agentName,
    livenessFile: file.livenessFile ?? defaultLivenessFile(env),
    persistenceArtifact: file.persistenceArtifact ?? defaultPersistenceArtifact(platform, env),
    entryPoints: file.entryPoints ?? DEFAULT_ENTRY_POINTS,
    ...fromEnv,
    matrix: {
      ...fileMatrix,
      ...definedOnly({
        homeserver: env[CONFIG_ENV.homeserver],
        user: env[CONFIG_ENV.user],
        password: env[CONFIG_ENV.password],
        roomId: env[CONFIG_ENV.roomId],
      }),
    },
    timing: { ...DEFAULT_TIMING_CONFIG, ...fileTiming },
  };

  const result = AgentConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(options.configPath ?? 'environment', issues);
  }
  return result.data;
}
