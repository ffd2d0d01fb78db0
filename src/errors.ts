export type ErrorCode = 'ConfigError' | 'LaunchError';

export interface RunpickErrorOptions {
  cause?: unknown;
}

/**
 * Base class for errors the CLI reports to the user.
 * Detection code never throws these; only configuration loading and task launch do.
 */
export class RunpickError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: RunpickErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = options.cause;
  }
}

export class ConfigError extends RunpickError {
  constructor(message: string, options: RunpickErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

export class TaskLaunchError extends RunpickError {
  constructor(message: string, options: RunpickErrorOptions = {}) {
    super('LaunchError', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
