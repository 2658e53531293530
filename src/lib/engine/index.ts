export type {
  EngineMode,
  ConnectionDescriptor,
  IContainerEngine,
  LocalRuntime,
  LocalRuntimeOptions,
  LocalRuntimeProvider,
  RuntimeHealthCheck,
  RuntimeEventQuery,
  AutoUpdater,
  AutoUpdateUnit,
  ArtifactPullRequest,
  RegistryCredentials,
  ImageStore,
  StoredImage,
  StorageConfig,
  TrustPolicyStore,
} from './interfaces';
export { ENGINE_MODES, isEngineMode, createConnectionDescriptor } from './interfaces';

export {
  createContainerEngine,
  engineOptionsFromConfig,
  initializeEngine,
  getContainerEngine,
  shutdownEngine,
} from './engine-factory';
export type { EngineOptions, EngineDeps } from './engine-factory';

export {
  ENGINE_OPERATIONS,
  DIRECT_CAPABILITIES,
  REMOTE_CAPABILITIES,
  capabilitiesFor,
  isSupported,
  assertSupported,
  unsupportedOperations,
} from './capabilities';
export type { CapabilityTable, EngineOperation } from './capabilities';

export { HealthCheckStatus, healthCheckStatusString } from './healthcheck';
export { parseEventFilters } from './events';
export { getClientInfo } from './client-info';
export { VERSION } from './version';

export { DirectEngine } from './backends/direct-engine';
export type { RuntimeHandle } from './backends/direct-engine';
export { RemoteEngine } from './backends/remote-engine';
export { PolicyTrustStore } from './trust/policy';

export { ClientContext, negotiateConnection, defaultConnectionDeps } from './remote/connection';
export type { ConnectionDeps, ResolvedMachine } from './remote/connection';
export { ModemTransport } from './remote/transport';
export type { Transport, TransportRequest } from './remote/transport';
export { parseEndpoint } from './remote/endpoint';
export type { TransportEndpoint } from './remote/endpoint';
export { encodeParams } from './remote/params';
export { buildRegistryAuthHeader } from './remote/registry-auth';
export { classifyStatus } from './remote/response';
