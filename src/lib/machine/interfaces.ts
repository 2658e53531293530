import type { MachineConfig, MachineRemoval, MachineStateReport, VMType } from '@/types/machine';

export interface StopOptions {
  force: boolean;
}

/**
 * Lifecycle contract every hypervisor family implements.
 * Only what connection negotiation and machine teardown need is exposed;
 * starting and provisioning belong to the hypervisor driver.
 */
export interface MachineStubber {
  readonly vmType: VMType;

  /**
   * Current VM state. An unreachable control channel means stopped, not an error.
   */
  state(mc: MachineConfig): Promise<MachineStateReport>;

  /**
   * Stop the VM. Returns non-fatal messages collected while stopping.
   */
  stopVM(mc: MachineConfig, options: StopOptions): Promise<string[]>;

  /**
   * Plan removal of the VM. Removing an absent VM is not an error.
   */
  remove(mc: MachineConfig): Promise<MachineRemoval>;
}
