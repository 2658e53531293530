import { UnsupportedOperationError } from '@/lib/errors';
import type { EngineMode } from './interfaces';

/**
 * Every operation of the engine facade
 */
export const ENGINE_OPERATIONS = [
  'healthCheckRun',
  'autoUpdate',
  'events',
  'info',
  'networkUpdate',
  'imageInspect',
  'untag',
  'artifactPull',
  'showTrust',
  'setTrust',
] as const;

export type EngineOperation = (typeof ENGINE_OPERATIONS)[number];

export type CapabilityTable = Readonly<Record<EngineOperation, boolean>>;

export const DIRECT_CAPABILITIES: CapabilityTable = Object.freeze({
  healthCheckRun: true,
  autoUpdate: true,
  events: true,
  info: true,
  networkUpdate: true,
  imageInspect: true,
  untag: true,
  artifactPull: true,
  showTrust: true,
  setTrust: true,
});

// The REST API has no endpoints for auto-update or trust management.
// Flip an entry once the server exposes one and the remote backend implements it.
export const REMOTE_CAPABILITIES: CapabilityTable = Object.freeze({
  healthCheckRun: true,
  autoUpdate: false,
  events: true,
  info: true,
  networkUpdate: true,
  imageInspect: true,
  untag: true,
  artifactPull: true,
  showTrust: false,
  setTrust: false,
});

export function capabilitiesFor(mode: EngineMode): CapabilityTable {
  return mode === 'remote' ? REMOTE_CAPABILITIES : DIRECT_CAPABILITIES;
}

export function isSupported(table: CapabilityTable, operation: EngineOperation): boolean {
  return table[operation];
}

/**
 * Throw the "not implemented" error for operations the table marks unsupported
 */
export function assertSupported(table: CapabilityTable, operation: EngineOperation, mode: EngineMode): void {
  if (!table[operation]) {
    throw new UnsupportedOperationError(operation, mode);
  }
}

export function unsupportedOperations(table: CapabilityTable): EngineOperation[] {
  return ENGINE_OPERATIONS.filter((op) => !table[op]);
}
