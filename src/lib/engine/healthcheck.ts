import { ConflictError, InternalError, NotFoundError, type EngineError } from '@/lib/errors';

/**
 * Outcome of running a container's health check
 */
export enum HealthCheckStatus {
  Success = 'Success',
  Failure = 'Failure',
  ContainerStopped = 'ContainerStopped',
  ContainerNotFound = 'ContainerNotFound',
  NotDefined = 'NotDefined',
  InternalError = 'InternalError',
  Defined = 'Defined',
  Startup = 'Startup',
}

const STATUS_STRINGS: Record<HealthCheckStatus, string> = {
  [HealthCheckStatus.Success]: 'healthy',
  [HealthCheckStatus.Failure]: 'unhealthy',
  [HealthCheckStatus.ContainerStopped]: 'stopped',
  [HealthCheckStatus.ContainerNotFound]: 'not found',
  [HealthCheckStatus.NotDefined]: 'not defined',
  [HealthCheckStatus.InternalError]: 'internal error',
  [HealthCheckStatus.Defined]: 'defined',
  [HealthCheckStatus.Startup]: 'starting',
};

/**
 * The value carried in the `Status` field of a health check report
 */
export function healthCheckStatusString(status: HealthCheckStatus): string {
  return STATUS_STRINGS[status];
}

/**
 * Classify a failed health check by the status the runtime reported with it.
 * Remote callers get the same classes from the HTTP status the server maps these to.
 */
export function classifyHealthCheckFailure(nameOrId: string, status: HealthCheckStatus, cause: Error): EngineError {
  switch (status) {
    case HealthCheckStatus.ContainerNotFound:
      return new NotFoundError('container', nameOrId, `no container with name or ID "${nameOrId}" found`);
    case HealthCheckStatus.NotDefined:
      return new ConflictError(`container ${nameOrId} has no defined healthcheck`, { cause });
    case HealthCheckStatus.ContainerStopped:
      return new ConflictError(`container ${nameOrId} is not running`, { cause });
    default:
      return new InternalError(`healthcheck of ${nameOrId} failed: ${cause.message}`, { cause });
  }
}
