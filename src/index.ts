// Container engine facade: one API over an in-process runtime or a remote engine

export * from './lib/engine';
export * from './lib/errors';
export type * from './types/engine';
export type {
  MachineConfig,
  MachineState,
  MachineStateReport,
  MachineRemoval,
  TransportAddress,
  VMType,
} from './types/machine';
export {
  getMachineStubber,
  resolveVMType,
  resolveTransportAddress,
  machineTransportAddress,
  loadMachineConfig,
} from './lib/machine';
export type { MachineStubber } from './lib/machine';
export { getConfig, parseConfig, resetConfig, config } from './lib/config';
export type { Env } from './lib/config';
export { initLogger, getLogger, closeLogger } from './lib/logger';
