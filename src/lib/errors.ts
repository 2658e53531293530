/**
 * Error taxonomy shared by every engine backend.
 *
 * Callers branch on `kind`; the concrete class only adds context. Direct and
 * remote backends must raise the same kind for the same underlying condition.
 */

export type EngineErrorKind = 'not_found' | 'conflict' | 'unsupported' | 'transport' | 'internal';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends EngineError {
  readonly kind = 'not_found';

  constructor(
    public resource: string,
    public id: string,
    detail?: string
  ) {
    super(detail ?? `${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends EngineError {
  readonly kind = 'conflict';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConflictError';
  }
}

/**
 * The operation has no implementation for the active engine mode.
 * The message is fixed so remote and direct callers can match on it.
 */
export class UnsupportedOperationError extends EngineError {
  readonly kind = 'unsupported';

  constructor(
    public operation: string,
    public mode: string
  ) {
    super('not implemented');
    this.name = 'UnsupportedOperationError';
  }
}

export class UnsupportedModeError extends EngineError {
  readonly kind = 'unsupported';

  constructor(public mode: string) {
    super(`runtime mode '${mode}' is not supported`);
    this.name = 'UnsupportedModeError';
  }
}

export class TransportError extends EngineError {
  readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class MachineNotRunningError extends TransportError {
  constructor(
    public machineName: string,
    public state: string
  ) {
    super(`machine ${machineName} is not running (state: ${state})`);
    this.name = 'MachineNotRunningError';
  }
}

export class ConnectionArtifactError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionArtifactError';
  }
}

export class InternalError extends EngineError {
  readonly kind = 'internal';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalError';
  }
}

export class ValidationError extends InternalError {
  constructor(
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RegistryAuthError extends InternalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryAuthError';
  }
}

/**
 * A followed event stream was closed by the runtime or the server,
 * not by the caller.
 */
export class StreamClosedError extends InternalError {
  constructor(message = 'event stream closed') {
    super(message);
    this.name = 'StreamClosedError';
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Pass engine errors through, wrap everything else as internal
 */
export function classifyError(error: unknown): EngineError {
  if (isEngineError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error });
  }
  return new InternalError(String(error), { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Match Node system errors (ENOENT, ECONNREFUSED, ...) by code
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}
