import { InternalError, TransportError, errorMessage, hasErrorCode } from '@/lib/errors';
import { VfkitClient } from '../vfkit/client';
import { removeFiles } from '../files';
import type { MachineStubber, StopOptions } from '../interfaces';
import type { MachineConfig, MachineRemoval, MachineState, MachineStateReport, VMType } from '@/types/machine';

const NOT_LISTENING = ['ENOENT', 'ECONNREFUSED'];

export function mapVfkitState(state: string): MachineState {
  switch (state) {
    case 'VirtualMachineStateRunning':
      return 'running';
    case 'VirtualMachineStateStarting':
    case 'VirtualMachineStateResuming':
      return 'starting';
    case 'VirtualMachineStateStopped':
    case 'VirtualMachineStateError':
      return 'stopped';
    default:
      return 'unknown';
  }
}

export type VfkitClientFactory = (endpoint: string) => VfkitClient;

/**
 * Machines run by vfkit (Apple Hypervisor) or krunkit (libkrun).
 * Both expose the same REST control endpoint.
 */
export class VfkitStubber implements MachineStubber {
  constructor(
    readonly vmType: Extract<VMType, 'applehv' | 'libkrun'>,
    private createClient: VfkitClientFactory = (endpoint) => new VfkitClient(endpoint)
  ) {}

  async state(mc: MachineConfig): Promise<MachineStateReport> {
    const client = this.client(mc);
    try {
      const vm = await client.getState();
      return { state: mapVfkitState(vm.state), messages: [] };
    } catch (error) {
      if (hasErrorCode(error, ...NOT_LISTENING)) {
        return { state: 'stopped', messages: [] };
      }
      throw error instanceof TransportError
        ? error
        : new TransportError(`Cannot query ${mc.name}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async stopVM(mc: MachineConfig, options: StopOptions): Promise<string[]> {
    const client = this.client(mc);
    try {
      await client.setState(options.force ? 'HardStop' : 'Stop');
      return [];
    } catch (error) {
      if (hasErrorCode(error, ...NOT_LISTENING)) {
        return [`machine ${mc.name} is already stopped`];
      }
      throw error instanceof TransportError
        ? error
        : new TransportError(`Cannot stop ${mc.name}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async remove(mc: MachineConfig): Promise<MachineRemoval> {
    // vfkit keeps no state outside the machine's own files
    const files = [mc.connection.socket?.path, ...mc.files].filter((f): f is string => Boolean(f));
    return {
      files,
      messages: [],
      cleanup: () => removeFiles(files),
    };
  }

  private client(mc: MachineConfig): VfkitClient {
    if (!mc.vfkit) {
      throw new InternalError(`Machine ${mc.name} has no vfkit endpoint configured`);
    }
    return this.createClient(mc.vfkit.endpoint);
  }
}
