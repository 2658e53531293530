/**
 * Hypervisor families a machine can run under
 */
export type VMType = 'qemu' | 'applehv' | 'libkrun' | 'wsl';

export const VM_TYPES: readonly VMType[] = ['qemu', 'applehv', 'libkrun', 'wsl'];

export type MachineState = 'running' | 'starting' | 'stopped' | 'unknown';

/**
 * A file the machine provisions on the host (socket, pipe, pid file)
 */
export interface VMFile {
  path: string;
}

export interface MachineConfig {
  name: string;
  vmType: VMType;
  sshIdentityPath?: string;
  connection: {
    socket?: VMFile;
    pipe?: VMFile;
  };
  qemu?: {
    qmpSocket: VMFile;
    pidFile?: VMFile;
  };
  vfkit?: {
    endpoint: string;
  };
  wsl?: {
    distribution: string;
  };
  files: string[];
}

export interface MachineStateReport {
  state: MachineState;
  messages: string[];
}

export interface MachineRemoval {
  files: string[];
  messages: string[];
  cleanup: () => Promise<string[]>;
}

/**
 * Resolved endpoint for a machine-mediated connection
 */
export interface TransportAddress {
  kind: 'pipe' | 'socket';
  path: string;
  uri: string;
}
