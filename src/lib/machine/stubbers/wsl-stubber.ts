import { execFile } from 'child_process';
import { promisify } from 'util';
import { InternalError, TransportError, errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import { removeFiles } from '../files';
import type { MachineStubber } from '../interfaces';
import type { MachineConfig, MachineRemoval, MachineStateReport, VMType } from '@/types/machine';

const execFileAsync = promisify(execFile);

export type WslRunner = (args: string[]) => Promise<Buffer>;

async function runWsl(args: string[]): Promise<Buffer> {
  const { stdout } = await execFileAsync('wsl.exe', args, { encoding: 'buffer', timeout: 30000 });
  return stdout;
}

/**
 * wsl.exe writes UTF-16LE when its output is not a console
 */
export function decodeWslOutput(output: Buffer): string {
  const text = output.includes(0) ? output.toString('utf16le') : output.toString('utf8');
  return text.replace(/^\uFEFF/, '');
}

function listedDistributions(output: Buffer): string[] {
  return decodeWslOutput(output)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

function isUnknownDistribution(error: unknown): boolean {
  if (error instanceof Error && 'stdout' in error && Buffer.isBuffer(error.stdout)) {
    return /not found|WSL_E_DISTRO_NOT_FOUND/i.test(decodeWslOutput(error.stdout));
  }
  return false;
}

/**
 * Machines running as WSL distributions
 */
export class WslStubber implements MachineStubber {
  readonly vmType: VMType = 'wsl';

  constructor(private run: WslRunner = runWsl) {}

  async state(mc: MachineConfig): Promise<MachineStateReport> {
    const distribution = this.distribution(mc);
    let output: Buffer;
    try {
      output = await this.run(['--list', '--running', '--quiet']);
    } catch (error) {
      throw new TransportError(`Cannot list WSL distributions: ${errorMessage(error)}`, { cause: error });
    }
    const running = listedDistributions(output).some((name) => name.toLowerCase() === distribution.toLowerCase());
    return { state: running ? 'running' : 'stopped', messages: [] };
  }

  async stopVM(mc: MachineConfig): Promise<string[]> {
    const distribution = this.distribution(mc);
    const { state } = await this.state(mc);
    if (state !== 'running') {
      return [`machine ${mc.name} is already stopped`];
    }
    // --terminate has no graceful variant
    try {
      await this.run(['--terminate', distribution]);
    } catch (error) {
      throw new TransportError(`Cannot terminate ${distribution}: ${errorMessage(error)}`, { cause: error });
    }
    return [];
  }

  async remove(mc: MachineConfig): Promise<MachineRemoval> {
    const distribution = this.distribution(mc);
    return {
      files: [...mc.files],
      messages: [],
      cleanup: async () => {
        const messages: string[] = [];
        try {
          await this.run(['--unregister', distribution]);
        } catch (error) {
          if (!isUnknownDistribution(error)) {
            getLogger('machine').warn({ distribution, err: error }, 'Failed to unregister distribution');
            messages.push(`could not unregister ${distribution}: ${errorMessage(error)}`);
          }
        }
        messages.push(...(await removeFiles(mc.files)));
        return messages;
      },
    };
  }

  private distribution(mc: MachineConfig): string {
    if (!mc.wsl) {
      throw new InternalError(`Machine ${mc.name} has no WSL distribution configured`);
    }
    return mc.wsl.distribution;
  }
}
