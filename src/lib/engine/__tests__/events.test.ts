import { describe, it, expect } from 'vitest';
import { consumeEventStream, parseEventFilters } from '../events';
import { deriveScope } from '../scope';
import { InternalError, StreamClosedError, ValidationError } from '@/lib/errors';
import { sampleEvent } from './fakes';
import type { EngineEvent } from '@/types/engine';

async function* failing(): AsyncGenerator<EngineEvent> {
  yield sampleEvent('start');
  throw new Error('journal rotated');
}

function never(): AsyncIterable<EngineEvent> {
  return {
    [Symbol.asyncIterator]: () => ({
      next: () => new Promise<IteratorResult<EngineEvent>>(() => {}),
    }),
  };
}

describe('parseEventFilters', () => {
  it('groups values by key', () => {
    expect(parseEventFilters(['type=container', 'event=start', 'event=stop', 'label=a=b'])).toEqual({
      type: ['container'],
      event: ['start', 'stop'],
      label: ['a=b'],
    });
  });

  it('accepts no filters', () => {
    expect(parseEventFilters()).toEqual({});
  });

  it('rejects entries without a key', () => {
    expect(() => parseEventFilters(['=start'])).toThrow(ValidationError);
  });
});

describe('consumeEventStream', () => {
  it('returns promptly on abort even when the source never yields', async () => {
    const controller = new AbortController();
    const done = consumeEventStream(never(), () => {}, controller.signal, true);
    controller.abort();
    await expect(done).resolves.toBeUndefined();
  });

  it('classifies source failures', async () => {
    const controller = new AbortController();
    const received: string[] = [];
    await expect(consumeEventStream(failing(), (e) => received.push(e.Action), controller.signal, true)).rejects.toThrow(
      InternalError
    );
    expect(received).toEqual(['start']);
  });

  it('reports a closed followed stream', async () => {
    const controller = new AbortController();
    await expect(consumeEventStream((async function* () {})(), () => {}, controller.signal, true)).rejects.toBeInstanceOf(
      StreamClosedError
    );
  });
});

describe('deriveScope', () => {
  it('follows any parent but never aborts them', () => {
    const a = new AbortController();
    const b = new AbortController();
    const scope = deriveScope(a.signal, b.signal);

    scope.abort();
    expect(a.signal.aborted).toBe(false);

    const second = deriveScope(a.signal, b.signal);
    b.abort();
    expect(second.signal.aborted).toBe(true);
  });

  it('stops following parents once released', () => {
    const parent = new AbortController();
    const scope = deriveScope(parent.signal);
    scope.release();
    parent.abort();
    expect(scope.signal.aborted).toBe(false);
  });

  it('starts aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort();
    expect(deriveScope(parent.signal).signal.aborted).toBe(true);
  });
});
