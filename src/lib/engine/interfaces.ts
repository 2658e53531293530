import type {
  ArtifactPullOptions,
  ArtifactPullReport,
  AutoUpdateOptions,
  AutoUpdateReport,
  AutoUpdateResult,
  EngineEvent,
  EventHandler,
  EventsOptions,
  HealthCheckOptions,
  HealthCheckResults,
  ImageInspectResult,
  NetworkUpdateOptions,
  SetTrustOptions,
  ShowTrustOptions,
  ShowTrustReport,
  SystemInfo,
} from '@/types/engine';
import type { CapabilityTable } from './capabilities';
import type { HealthCheckStatus } from './healthcheck';

/**
 * Which backend realizes the engine facade
 */
export type EngineMode = 'direct' | 'remote';

export const ENGINE_MODES: readonly EngineMode[] = ['direct', 'remote'];

export function isEngineMode(value: string): value is EngineMode {
  return ENGINE_MODES.some((mode) => mode === value);
}

/**
 * How to reach a remote engine
 */
export interface ConnectionDescriptor {
  readonly uri: string;
  readonly identity?: string;
  readonly tlsCertFile?: string;
  readonly tlsKeyFile?: string;
  readonly tlsCAFile?: string;
  // Endpoint sits behind a managed virtual machine
  readonly machine: boolean;
  readonly machineName?: string;
}

export function createConnectionDescriptor(fields: ConnectionDescriptor): Readonly<ConnectionDescriptor> {
  return Object.freeze({ ...fields });
}

/**
 * Engine facade: one logical API over the direct and remote backends.
 * Exactly one backend is bound per instance.
 */
export interface IContainerEngine {
  readonly mode: EngineMode;

  readonly capabilities: CapabilityTable;

  /**
   * Run a container's health check once
   * @throws NotFoundError when the container does not exist
   * @throws ConflictError when no health check is defined or the container is not running
   */
  healthCheckRun(nameOrId: string, options?: HealthCheckOptions, signal?: AbortSignal): Promise<HealthCheckResults>;

  /**
   * Update every container that carries an auto-update policy.
   * Unit failures are reported individually, never thrown.
   */
  autoUpdate(options: AutoUpdateOptions, signal?: AbortSignal): Promise<AutoUpdateResult>;

  /**
   * Stream events to `onEvent` until the signal aborts or the stream ends.
   * Aborting resolves; a followed stream closed by the other side rejects with StreamClosedError.
   */
  events(options: EventsOptions, onEvent: EventHandler, signal?: AbortSignal): Promise<void>;

  info(signal?: AbortSignal): Promise<SystemInfo>;

  networkUpdate(name: string, options: NetworkUpdateOptions, signal?: AbortSignal): Promise<void>;

  imageInspect(namesOrIds: string[], signal?: AbortSignal): Promise<ImageInspectResult>;

  /**
   * Remove tags from an image. No tags removes every name.
   */
  untag(nameOrId: string, tags: string[], signal?: AbortSignal): Promise<void>;

  artifactPull(name: string, options: ArtifactPullOptions, signal?: AbortSignal): Promise<ArtifactPullReport>;

  showTrust(args: string[], options: ShowTrustOptions, signal?: AbortSignal): Promise<ShowTrustReport>;

  setTrust(args: string[], options: SetTrustOptions, signal?: AbortSignal): Promise<void>;

  /**
   * Release the runtime handle or the client connection
   */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Local collaborators (direct mode). Implemented by the storage/runtime layer.
// ---------------------------------------------------------------------------

export interface StorageConfig {
  root: string;
  runRoot?: string;
  driver: string;
}

export interface LocalRuntimeOptions {
  root: string;
  runRoot?: string;
  storageDriver: string;
  policyPath: string;
}

/**
 * Result of the runtime's health check primitive. `error` is set when the
 * check could not produce a healthy/unhealthy answer; `status` says why.
 */
export interface RuntimeHealthCheck {
  status: HealthCheckStatus;
  error?: Error;
}

export interface RuntimeEventQuery {
  filters: Record<string, string[]>;
  since?: string;
  until?: string;
  follow: boolean;
  fromStart: boolean;
}

export interface AutoUpdateUnit {
  containerId: string;
  containerName: string;
  imageName: string;
  policy: string;
  systemdUnit: string;
}

export interface AutoUpdater {
  candidates(options: AutoUpdateOptions): Promise<AutoUpdateUnit[]>;
  update(unit: AutoUpdateUnit, options: AutoUpdateOptions): Promise<AutoUpdateReport>;
}

export interface RegistryCredentials {
  username: string;
  password: string;
}

export interface ArtifactPullRequest {
  authfile?: string;
  credentials?: RegistryCredentials;
  quiet?: boolean;
  retry?: number;
  retryDelay?: string;
  tlsVerify?: boolean;
  certDir?: string;
}

export interface LocalRuntime {
  healthCheck(nameOrId: string): Promise<RuntimeHealthCheck>;

  /**
   * Event subscription. The iterator finishing means the runtime closed the stream.
   */
  events(query: RuntimeEventQuery, signal: AbortSignal): AsyncIterable<EngineEvent>;

  info(): Promise<SystemInfo>;

  updateNetwork(name: string, options: NetworkUpdateOptions): Promise<void>;

  pullArtifact(name: string, request: ArtifactPullRequest): Promise<ArtifactPullReport>;

  readonly autoUpdater: AutoUpdater;

  storageConfig(): StorageConfig;

  shutdown(force: boolean): Promise<void>;
}

export interface StoredImage {
  id: string;
  digest: string;
  names: string[];
  repoDigests: string[];
  created: Date;
  size: number;
  architecture: string;
  os: string;
  labels: Record<string, string>;
}

export interface ImageStore {
  lookupImage(nameOrId: string): Promise<StoredImage | null>;
  removeNames(id: string, names: string[]): Promise<void>;
  shutdown(force: boolean): Promise<void>;
}

/**
 * Builds the runtime and opens its storage for direct mode
 */
export interface LocalRuntimeProvider {
  createRuntime(options: LocalRuntimeOptions): Promise<LocalRuntime>;
  openStore(storage: StorageConfig): Promise<ImageStore>;
}

export interface TrustPolicyStore {
  show(options: ShowTrustOptions): Promise<ShowTrustReport>;
  set(scope: string, options: SetTrustOptions): Promise<void>;
}
