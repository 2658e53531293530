import { z } from 'zod';
import { InternalError, TransportError, classifyError, errorMessage, hasErrorCode } from '@/lib/errors';
import { removeFiles } from '../files';
import { QmpClient } from '../qemu/qmp-client';
import type { MachineStubber, StopOptions } from '../interfaces';
import type { MachineConfig, MachineRemoval, MachineState, MachineStateReport, VMType } from '@/types/machine';

const queryStatusSchema = z.object({
  status: z.string(),
  running: z.boolean(),
});

// Errors meaning nothing is listening on the QMP socket
const NOT_LISTENING = ['ENOENT', 'ECONNREFUSED'];

/**
 * Map a QEMU run state to the machine state set
 */
export function mapQemuStatus(status: string): MachineState {
  switch (status) {
    case 'running':
      return 'running';
    case 'prelaunch':
    case 'inmigrate':
    case 'restore-vm':
      return 'starting';
    case 'shutdown':
    case 'paused':
    case 'suspended':
    case 'guest-panicked':
    case 'io-error':
    case 'internal-error':
      return 'stopped';
    default:
      return 'unknown';
  }
}

export type QmpConnector = (socketPath: string) => Promise<QmpClient>;

/**
 * QEMU machines, controlled through their QMP monitor socket
 */
export class QemuStubber implements MachineStubber {
  readonly vmType: VMType = 'qemu';

  constructor(private connect: QmpConnector = (socketPath) => QmpClient.connect(socketPath)) {}

  async state(mc: MachineConfig): Promise<MachineStateReport> {
    const qmpSocket = this.qmpSocket(mc);

    let client: QmpClient;
    try {
      client = await this.connect(qmpSocket);
    } catch (error) {
      if (hasErrorCode(error, ...NOT_LISTENING)) {
        return { state: 'stopped', messages: [] };
      }
      throw new TransportError(`Cannot reach QMP monitor of ${mc.name}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const status = queryStatusSchema.safeParse(await client.execute('query-status'));
      if (!status.success) {
        return { state: 'unknown', messages: [`unexpected query-status reply from ${mc.name}`] };
      }
      return { state: mapQemuStatus(status.data.status), messages: [] };
    } finally {
      client.close();
    }
  }

  async stopVM(mc: MachineConfig, options: StopOptions): Promise<string[]> {
    const qmpSocket = this.qmpSocket(mc);

    let client: QmpClient;
    try {
      client = await this.connect(qmpSocket);
    } catch (error) {
      if (hasErrorCode(error, ...NOT_LISTENING)) {
        return [`machine ${mc.name} is already stopped`];
      }
      throw new TransportError(`Cannot reach QMP monitor of ${mc.name}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await client.execute(options.force ? 'quit' : 'system_powerdown');
      return [];
    } catch (error) {
      // quit may drop the monitor before the reply is written
      if (options.force && error instanceof TransportError) {
        return [];
      }
      throw classifyError(error);
    } finally {
      client.close();
    }
  }

  async remove(mc: MachineConfig): Promise<MachineRemoval> {
    const files = [
      mc.qemu?.qmpSocket.path,
      mc.qemu?.pidFile?.path,
      mc.connection.socket?.path,
      ...mc.files,
    ].filter((f): f is string => Boolean(f));

    return {
      files,
      messages: [],
      cleanup: () => removeFiles(files),
    };
  }

  private qmpSocket(mc: MachineConfig): string {
    if (!mc.qemu) {
      throw new InternalError(`Machine ${mc.name} has no QMP monitor configured`);
    }
    return mc.qemu.qmpSocket.path;
  }
}
