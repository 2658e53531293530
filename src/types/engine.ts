// Options use camelCase; reports keep the field names of the engine's REST protocol
// so a decoded remote body and a direct result are the same object shape.

// The run endpoint takes no parameters yet
export type HealthCheckOptions = Record<string, never>;

export interface HealthCheckResults {
  Status: string;
}

export interface AutoUpdateOptions {
  authfile?: string;
  dryRun?: boolean;
  rollback?: boolean;
  insecureSkipTLSVerify?: boolean;
}

export type AutoUpdateOutcome = 'true' | 'false' | 'pending' | 'failed' | 'rolled back';

export interface AutoUpdateReport {
  ContainerID: string;
  ContainerName: string;
  ImageName: string;
  Policy: string;
  SystemdUnit: string;
  Updated: AutoUpdateOutcome;
}

/**
 * Per-unit outcome of an auto-update run. Failures never collapse into one error.
 */
export interface AutoUpdateResult {
  reports: AutoUpdateReport[];
  errors: Error[];
}

export interface EventsOptions {
  filter?: string[];
  since?: string;
  until?: string;
  stream?: boolean;
  fromStart?: boolean;
}

export type EventType = 'container' | 'image' | 'network' | 'pod' | 'system' | 'volume' | 'secret' | 'machine';

export interface EngineEvent {
  Type: EventType;
  Action: string;
  Actor: {
    ID: string;
    Attributes: Record<string, string>;
  };
  time: number;
  // Nanoseconds since the epoch; exceeds the safe integer range
  timeNano: bigint;
}

export type EventHandler = (event: EngineEvent) => void;

export interface SystemInfo {
  host: {
    arch: string;
    os: string;
    hostname: string;
    kernel: string;
    remoteSocket?: {
      path: string;
      exists: boolean;
    };
  };
  store: {
    graphDriverName: string;
    graphRoot: string;
    runRoot: string;
    containerStore: { number: number };
    imageStore: { number: number };
  };
  version: {
    APIVersion: string;
    Version: string;
    OsArch: string;
  };
}

export interface NetworkUpdateOptions {
  addDNSServers?: string[];
  removeDNSServers?: string[];
}

export interface ImageData {
  Id: string;
  Digest: string;
  RepoTags: string[];
  RepoDigests: string[];
  Created: string;
  Size: number;
  Architecture: string;
  Os: string;
  Labels: Record<string, string>;
}

export interface ImageInspectResult {
  reports: ImageData[];
  errors: Error[];
}

export interface ArtifactPullOptions {
  authfile?: string;
  username?: string;
  password?: string;
  quiet?: boolean;
  retry?: number;
  retryDelay?: string;
  tlsVerify?: boolean;
  certDir?: string;
}

export interface ArtifactPullReport {
  ArtifactDigest: string;
}

export interface ShowTrustOptions {
  policyPath?: string;
  raw?: boolean;
}

export type TrustType = 'accept' | 'reject' | 'signed' | 'sigstoreSigned';

export interface TrustPolicy {
  transport: string;
  name: string;
  repo_name: string;
  // One of TrustType for requirements this store knows, the raw requirement type otherwise
  type: string;
  keys?: string[];
}

export interface ShowTrustReport {
  Raw?: string;
  Policies: TrustPolicy[];
}

export type SetTrustType = 'accept' | 'reject' | 'signedBy' | 'sigstoreSigned';

export interface SetTrustOptions {
  policyPath?: string;
  type: SetTrustType;
  pubKeysFile?: string[];
}

export interface ClientInfo {
  OS: string;
  provider: string;
  version: string;
  buildOrigin?: string;
}
