/**
 * Error types for hostwarden.
 *
 * AuthenticationError and ConfigError are fatal at startup; ConnectionError and
 * TimeoutError are transient and retried by the channel loop.
 */

export class HostwardenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostwardenError';
  }
}

export class AuthenticationError extends HostwardenError {
  constructor(user: string, reason: string) {
    super(`Authentication failed for ${user}: ${reason}`);
    this.name = 'AuthenticationError';
  }
}

export class ConnectionError extends HostwardenError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
    this.status = status;
  }
}

export class TimeoutError extends HostwardenError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class ConfigError extends HostwardenError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration (${source}): ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
