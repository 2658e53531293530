import * as os from 'os';
import * as path from 'path';
import type { VMFile } from '@/types/machine';

export const MACHINE_PREFIX = 'engine';

export function withEnginePrefix(name: string): string {
  return `${MACHINE_PREFIX}-${name}`;
}

/**
 * Directory for sockets and other runtime files.
 * Root uses /run; rootless users get XDG_RUNTIME_DIR or /run/user/<uid>.
 */
export function getRuntimeDir(env: NodeJS.ProcessEnv = process.env, uid = currentUid()): string {
  if (uid === 0) {
    return '/run';
  }
  if (env.XDG_RUNTIME_DIR) {
    return env.XDG_RUNTIME_DIR;
  }
  if (uid !== undefined) {
    return `/run/user/${uid}`;
  }
  return os.tmpdir();
}

function currentUid(): number | undefined {
  return typeof process.getuid === 'function' ? process.getuid() : undefined;
}

/**
 * Default API socket a machine exposes on the host
 */
export function getMachineSocket(name: string, runtimeDir = getRuntimeDir()): VMFile {
  return { path: path.join(runtimeDir, MACHINE_PREFIX, 'machine', `${name}-api.sock`) };
}

/**
 * Named pipe a machine exposes on Windows hosts
 */
export function getMachinePipe(name: string): VMFile {
  return { path: `\\\\.\\pipe\\${withEnginePrefix(name)}` };
}

export function getSSHIdentityPath(name: string, globalDataDir: string): string {
  return path.join(globalDataDir, name);
}
