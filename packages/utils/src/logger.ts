/**
 * Component logger for hostwarden
 *
 * Settings come from the environment on every call, so the CLI can change
 * them after modules load:
 *   HOSTWARDEN_LOG_LEVEL  DEBUG | INFO | WARN | ERROR (default INFO)
 *   HOSTWARDEN_LOG_JSON   1 or true for one JSON object per line
 *   HOSTWARDEN_LOG_FILE   append here instead of writing to the console
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
}

export interface Logger {
  debug(msg: string, extra?: LogFields): void;
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
}

export interface LogSettings {
  level: LogLevel;
  json: boolean;
  file?: string;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const wanted = raw?.trim().toUpperCase();
  return LEVELS.find((level) => level === wanted) ?? 'INFO';
}

export function readLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const json = env.HOSTWARDEN_LOG_JSON;
  return {
    level: parseLogLevel(env.HOSTWARDEN_LOG_LEVEL),
    json: json === '1' || json === 'true',
    file: env.HOSTWARDEN_LOG_FILE || undefined,
  };
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s|"/.test(value) ? JSON.stringify(value) : value;
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...fields } = entry;
  const suffix = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${renderValue(value)}`)
    .join('');
  return `${ts} [${level}] [${component}] ${msg}${suffix}`;
}

const preparedDirs = new Set<string>();

function appendToFile(file: string, line: string): void {
  const dir = path.dirname(file);
  if (!preparedDirs.has(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    preparedDirs.add(dir);
  }
  fs.appendFileSync(file, `${line}\n`);
}

/**
 * Create a logger for one component. `bindings` are added to every entry;
 * per-call fields win on conflict.
 */
export function createLogger(component: string, bindings: LogFields = {}): Logger {
  const write = (level: LogLevel, msg: string, extra?: LogFields): void => {
    const settings = readLogSettings();
    if (!isLevelEnabled(level, settings.level)) return;

    const entry: LogEntry = { ts: new Date().toISOString(), level, component, msg };
    for (const [key, value] of Object.entries({ ...bindings, ...extra })) {
      if (!(key in entry)) entry[key] = value;
    }
    const line = formatEntry(entry, settings.json);

    if (settings.file) {
      appendToFile(settings.file, line);
    } else if (level === 'WARN' || level === 'ERROR') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (msg, extra) => write('DEBUG', msg, extra),
    info: (msg, extra) => write('INFO', msg, extra),
    warn: (msg, extra) => write('WARN', msg, extra),
    error: (msg, extra) => write('ERROR', msg, extra),
  };
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default createLogger;
