export type { MachineStubber, StopOptions } from './interfaces';
export { resolveTransportAddress, machineTransportAddress, usesNamedPipes } from './address';
export { loadMachineConfig, parseMachineConfig, machineConfigPath, isVMType } from './machine-config';
export { getRuntimeDir, getMachineSocket, getMachinePipe, getSSHIdentityPath, withEnginePrefix } from './env';
export { resolveVMType, getMachineStubber } from './provider';
export { QemuStubber, mapQemuStatus } from './stubbers/qemu-stubber';
export { VfkitStubber, mapVfkitState } from './stubbers/vfkit-stubber';
export { WslStubber, decodeWslOutput } from './stubbers/wsl-stubber';
export { removeFiles } from './files';
