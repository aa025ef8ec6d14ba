/**
 * Custom error classes
 */

export class PentadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PentadError';
  }
}

export class ConfigurationError extends PentadError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConnectivityError extends PentadError {
  constructor(
    message: string,
    public readonly host?: string
  ) {
    super(message);
    this.name = 'ConnectivityError';
  }
}

export class GoalParseError extends PentadError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = 'GoalParseError';
  }
}

export class ProcessError extends PentadError {
  constructor(
    message: string,
    public readonly role?: string,
    public readonly pid?: number
  ) {
    super(message);
    this.name = 'ProcessError';
  }
}

export class PermissionViolation extends PentadError {
  constructor(
    message: string,
    public readonly role?: string,
    public readonly exchange?: string
  ) {
    super(message);
    this.name = 'PermissionViolation';
  }
}

export class TimeoutError extends PentadError {
  constructor(
    message: string,
    public readonly timeoutMs?: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Render an unknown thrown value for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
