import { describe, it, expect } from 'vitest';
import { getMachineStubber, resolveVMType } from '../provider';
import { QemuStubber } from '../stubbers/qemu-stubber';
import { VfkitStubber } from '../stubbers/vfkit-stubber';
import { WslStubber } from '../stubbers/wsl-stubber';
import { ValidationError } from '@/lib/errors';

describe('resolveVMType', () => {
  it('picks the platform default', () => {
    expect(resolveVMType('linux')).toBe('qemu');
    expect(resolveVMType('darwin')).toBe('applehv');
    expect(resolveVMType('win32')).toBe('wsl');
  });

  it('honours a provider override supported by the platform', () => {
    expect(resolveVMType('darwin', 'libkrun')).toBe('libkrun');
    expect(resolveVMType('darwin', ' AppleHV ')).toBe('applehv');
  });

  it('rejects providers the platform cannot run', () => {
    expect(() => resolveVMType('linux', 'wsl')).toThrow("unsupported machine provider 'wsl' on linux");
    expect(() => resolveVMType('linux', 'hyperv')).toThrow(ValidationError);
  });

  it('rejects platforms without machine support', () => {
    expect(() => resolveVMType('freebsd')).toThrow('machines are not supported on freebsd');
  });
});

describe('getMachineStubber', () => {
  it('selects one implementation per hypervisor family', () => {
    expect(getMachineStubber('qemu')).toBeInstanceOf(QemuStubber);
    expect(getMachineStubber('applehv')).toBeInstanceOf(VfkitStubber);
    expect(getMachineStubber('libkrun').vmType).toBe('libkrun');
    expect(getMachineStubber('wsl')).toBeInstanceOf(WslStubber);
  });
});
