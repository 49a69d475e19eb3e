export type Stage = 'file' | 'backend' | 'extraction' | 'configuration';

export type BackendErrorKind = 'auth' | 'rate-limit' | 'transport' | 'timeout' | 'request' | 'response';

export abstract class DebloatError extends Error {
  abstract readonly stage: Stage;
  abstract readonly code: string;
}

export class FileError extends DebloatError {
  readonly stage = 'file';
  readonly code: string;

  constructor(message: string, readonly path: string, code = 'FILE_ERROR') {
    super(message);
    this.name = 'FileError';
    this.code = code;
  }
}

export class BackendError extends DebloatError {
  readonly stage = 'backend';
  readonly code = 'BACKEND_ERROR';

  constructor(message: string, readonly kind: BackendErrorKind, readonly provider?: string) {
    super(message);
    this.name = 'BackendError';
  }

  // Auth, request and envelope failures repeat identically on retry.
  get transient(): boolean {
    return this.kind === 'transport' || this.kind === 'rate-limit' || this.kind === 'timeout';
  }
}

export class ExtractionError extends DebloatError {
  readonly stage = 'extraction';
  readonly code = 'NO_CODE_BLOCK';

  constructor(message: string, readonly response: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class ConfigurationError extends DebloatError {
  readonly stage = 'configuration';
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Converts unknown errors to readable text.
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function nameOf(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name} ${error.constructor.name}`;
  }
  return '';
}

/**
 * Maps an SDK failure onto a BackendError. The vendor SDKs share no error
 * hierarchy, so the classification looks only at the HTTP status and the
 * error's class name.
 */
export function toBackendError(provider: string, error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  const message = `${provider}: ${errorMessage(error)}`;
  const name = nameOf(error);
  if (/Abort|Timeout/.test(name)) {
    return new BackendError(message, 'timeout', provider);
  }
  const status = statusOf(error);
  if (status === undefined) {
    return new BackendError(message, 'transport', provider);
  }
  if (status === 401 || status === 403) {
    return new BackendError(message, 'auth', provider);
  }
  if (status === 429) {
    return new BackendError(message, 'rate-limit', provider);
  }
  if (status === 408 || status >= 500) {
    return new BackendError(message, 'transport', provider);
  }
  return new BackendError(message, 'request', provider);
}
