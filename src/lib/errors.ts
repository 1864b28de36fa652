export interface ConvergenceProgress {
  current: number;
  total: number;
}

// The control plane has not reached the awaited state yet. Retried by `retry`.
export class ConvergenceError extends Error {
  readonly progress?: ConvergenceProgress;

  constructor(message: string, progress?: ConvergenceProgress) {
    super(message);
    this.name = 'ConvergenceError';
    this.progress = progress;
  }
}

export interface ControlPlaneRequestErrorDetails {
  method: string;
  path: string;
  status?: number;
  body?: string;
  transient: boolean;
  cause?: unknown;
}

export class ControlPlaneRequestError extends Error {
  readonly method: string;
  readonly path: string;
  readonly status?: number;
  readonly body?: string;
  readonly transient: boolean;

  constructor(message: string, details: ControlPlaneRequestErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'ControlPlaneRequestError';
    this.method = details.method;
    this.path = details.path;
    this.status = details.status;
    this.body = details.body;
    this.transient = details.transient;
  }
}

// The control plane reported a terminal failure (parcel errors, failed inspection, ...).
export class RemoteStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RemoteStateError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SetupStageError extends Error {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`Stage "${stage}" failed: ${errorMessage(cause)}`, { cause });
    this.name = 'SetupStageError';
    this.stage = stage;
  }
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof ConvergenceError) {
    return true;
  }
  return err instanceof ControlPlaneRequestError && err.transient;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
