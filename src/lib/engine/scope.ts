import { TransportError } from '@/lib/errors';

/**
 * Cancellation scope for one call. Aborted when any parent aborts;
 * aborting it never reaches the parents.
 */
export interface CallScope {
  readonly signal: AbortSignal;
  abort(reason?: unknown): void;
  release(): void;
}

export function deriveScope(...parents: Array<AbortSignal | undefined>): CallScope {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detach.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    abort: (reason?: unknown) => controller.abort(reason),
    release: () => {
      for (const fn of detach.splice(0)) {
        fn();
      }
    },
  };
}

/**
 * Resolves when the signal aborts. `dispose` drops the listener.
 */
export function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let dispose = () => {};
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    dispose = () => signal.removeEventListener('abort', onAbort);
  });
  return { promise, dispose };
}

export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new TransportError(`${operation} cancelled`, { cause: signal.reason });
  }
}
