export type LaunchErrorKind = 'SpawnFailure' | 'EarlyExit' | 'NotReady';

/**
 * The isolated runtime could not be created. Aborts the run.
 */
export class ProvisionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProvisionError';
  }
}

/**
 * Dependency installation or toolchain environment failed. Recorded, never thrown past the provisioner.
 */
export class ProvisionWarning extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProvisionWarning';
  }
}

/**
 * Candidate processes could not be enumerated at all.
 */
export class ReconciliationFailure extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ReconciliationFailure';
  }
}

export interface LaunchErrorDetails {
  code?: number | null;
  signal?: NodeJS.Signals | null;
  outputTail?: string[];
  cause?: unknown;
}

export class LaunchError extends Error {
  public readonly code?: number | null;
  public readonly signal?: NodeJS.Signals | null;
  public readonly outputTail: string[];

  constructor(
    public readonly kind: LaunchErrorKind,
    public readonly service: string,
    message: string,
    details: LaunchErrorDetails = {},
  ) {
    super(message, { cause: details.cause });
    this.name = 'LaunchError';
    this.code = details.code;
    this.signal = details.signal;
    this.outputTail = details.outputTail ?? [];
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
