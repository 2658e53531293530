import { ValidationError } from '@/lib/errors';
import { isVMType } from './machine-config';
import { QemuStubber } from './stubbers/qemu-stubber';
import { VfkitStubber } from './stubbers/vfkit-stubber';
import { WslStubber } from './stubbers/wsl-stubber';
import type { MachineStubber } from './interfaces';
import type { VMType } from '@/types/machine';

const PLATFORM_DEFAULTS: Partial<Record<NodeJS.Platform, VMType>> = {
  linux: 'qemu',
  darwin: 'applehv',
  win32: 'wsl',
};

const PLATFORM_PROVIDERS: Partial<Record<NodeJS.Platform, readonly VMType[]>> = {
  linux: ['qemu'],
  darwin: ['applehv', 'libkrun'],
  win32: ['wsl'],
};

/**
 * Pick the hypervisor family for this host.
 * CONTAINERS_MACHINE_PROVIDER overrides the platform default.
 */
export function resolveVMType(platform: NodeJS.Platform, provider?: string): VMType {
  const supported = PLATFORM_PROVIDERS[platform];
  if (!supported) {
    throw new ValidationError(`machines are not supported on ${platform}`);
  }

  if (provider) {
    const requested = provider.trim().toLowerCase();
    if (!isVMType(requested) || !supported.includes(requested)) {
      throw new ValidationError(`unsupported machine provider '${provider}' on ${platform}`);
    }
    return requested;
  }

  const fallback = PLATFORM_DEFAULTS[platform];
  if (!fallback) {
    throw new ValidationError(`no default machine provider for ${platform}`);
  }
  return fallback;
}

export function getMachineStubber(vmType: VMType): MachineStubber {
  switch (vmType) {
    case 'qemu':
      return new QemuStubber();
    case 'applehv':
    case 'libkrun':
      return new VfkitStubber(vmType);
    case 'wsl':
      return new WslStubber();
  }
}
