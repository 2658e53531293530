import { config } from '@/lib/config';
import { isEngineError } from '@/lib/errors';
import { resolveVMType } from '@/lib/machine/provider';
import { VERSION } from './version';
import type { ClientInfo } from '@/types/engine';

/**
 * Describe this client: platform, machine provider and library version.
 * Hosts without machine support report an empty provider.
 */
export function getClientInfo(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
  provider: string | undefined = config.machine.provider
): ClientInfo {
  let vmType = '';
  try {
    vmType = resolveVMType(platform, provider);
  } catch (error) {
    if (!isEngineError(error)) {
      throw error;
    }
  }
  return {
    OS: `${platform}/${arch}`,
    provider: vmType,
    version: VERSION,
  };
}
