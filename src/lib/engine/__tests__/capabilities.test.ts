import { describe, it, expect } from 'vitest';
import {
  DIRECT_CAPABILITIES,
  ENGINE_OPERATIONS,
  REMOTE_CAPABILITIES,
  assertSupported,
  capabilitiesFor,
  unsupportedOperations,
} from '../capabilities';
import { UnsupportedOperationError } from '@/lib/errors';

describe('capability tables', () => {
  it('declares every operation in both tables', () => {
    expect(Object.keys(DIRECT_CAPABILITIES).sort()).toEqual([...ENGINE_OPERATIONS].sort());
    expect(Object.keys(REMOTE_CAPABILITIES).sort()).toEqual([...ENGINE_OPERATIONS].sort());
  });

  it('supports everything in direct mode', () => {
    expect(unsupportedOperations(DIRECT_CAPABILITIES)).toEqual([]);
  });

  it('lists the operations missing from the remote protocol', () => {
    expect(unsupportedOperations(REMOTE_CAPABILITIES)).toEqual(['autoUpdate', 'showTrust', 'setTrust']);
  });

  it('selects the table by mode', () => {
    expect(capabilitiesFor('remote')).toBe(REMOTE_CAPABILITIES);
    expect(capabilitiesFor('direct')).toBe(DIRECT_CAPABILITIES);
  });

  it('raises a labelled error for unsupported operations', () => {
    expect(() => assertSupported(REMOTE_CAPABILITIES, 'setTrust', 'remote')).toThrow(UnsupportedOperationError);
    expect(() => assertSupported(REMOTE_CAPABILITIES, 'info', 'remote')).not.toThrow();
  });

  it('cannot be changed at run time', () => {
    expect(Object.isFrozen(REMOTE_CAPABILITIES)).toBe(true);
  });
});
