import { StreamClosedError, ValidationError, classifyError } from '@/lib/errors';
import { whenAborted } from './scope';
import type { EngineEvent, EventHandler } from '@/types/engine';

/**
 * Parse `key=value` filters into a map of values per key.
 * Repeated keys accumulate.
 */
export function parseEventFilters(filters: string[] = []): Record<string, string[]> {
  const parsed: Record<string, string[]> = {};
  for (const filter of filters) {
    const idx = filter.indexOf('=');
    if (idx <= 0) {
      throw new ValidationError(`invalid filter "${filter}": must be in the format "key=value"`);
    }
    const key = filter.slice(0, idx);
    const value = filter.slice(idx + 1);
    (parsed[key] ??= []).push(value);
  }
  return parsed;
}

/**
 * Deliver events from `source` until it ends or `signal` aborts.
 *
 * Abort resolves. The source ending resolves for a bounded read and rejects
 * with StreamClosedError when the caller asked to follow the stream.
 */
export async function consumeEventStream(
  source: AsyncIterable<EngineEvent>,
  onEvent: EventHandler,
  signal: AbortSignal,
  follow: boolean
): Promise<void> {
  const iterator = source[Symbol.asyncIterator]();
  const aborted = whenAborted(signal);
  const abortMarker = aborted.promise.then(() => null);

  try {
    for (;;) {
      const next = await Promise.race([iterator.next(), abortMarker]);
      if (next === null || signal.aborted) {
        return;
      }
      if (next.done) {
        break;
      }
      onEvent(next.value);
    }
  } catch (error) {
    if (signal.aborted) {
      return;
    }
    throw classifyError(error);
  } finally {
    aborted.dispose();
  }

  if (follow) {
    throw new StreamClosedError();
  }
}
