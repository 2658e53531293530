import { ConnectionArtifactError } from '@/lib/errors';
import type { MachineConfig, TransportAddress, VMFile } from '@/types/machine';

/**
 * Platforms whose machines are reached through named pipes
 */
export function usesNamedPipes(platform: NodeJS.Platform): boolean {
  return platform === 'win32';
}

/**
 * Build the connection address for a machine's provisioned artifact.
 * The artifact of the other platform family is never used as a fallback.
 */
export function resolveTransportAddress(
  platform: NodeJS.Platform,
  socket: VMFile | undefined,
  pipe: VMFile | undefined
): TransportAddress {
  if (usesNamedPipes(platform)) {
    if (!pipe) {
      throw new ConnectionArtifactError('pipe of machine is not set');
    }
    return { kind: 'pipe', path: pipe.path, uri: `npipe://${pipe.path.replace(/\\/g, '/')}` };
  }

  if (!socket) {
    throw new ConnectionArtifactError('socket of machine is not set');
  }
  return { kind: 'socket', path: socket.path, uri: `unix://${socket.path}` };
}

export function machineTransportAddress(platform: NodeJS.Platform, mc: MachineConfig): TransportAddress {
  return resolveTransportAddress(platform, mc.connection.socket, mc.connection.pipe);
}
