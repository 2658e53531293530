import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import { ValidationError } from '@/lib/errors';
import { DEFAULT_API_VERSION } from '@/lib/engine/version';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // Engine mode is validated by the engine factory so the offending value can be reported
  ENGINE_MODE: z.string().default('direct'),

  // Remote connection
  CONTAINER_HOST: z.string().optional(),
  CONTAINER_SSHKEY: z.string().optional(),
  CONTAINER_TLS_CERT: z.string().optional(),
  CONTAINER_TLS_KEY: z.string().optional(),
  CONTAINER_TLS_CA: z.string().optional(),
  CONTAINER_MACHINE: booleanFlag,
  ENGINE_API_VERSION: z.string().regex(/^v\d+(\.\d+)*$/).default(DEFAULT_API_VERSION),

  // Machine
  MACHINE_NAME: z.string().min(1).default('engine-machine-default'),
  CONTAINERS_MACHINE_PROVIDER: z.string().optional(),
  ENGINE_CONFIG_DIR: z.string().optional(),
  ENGINE_DATA_DIR: z.string().optional(),

  // Local runtime (direct mode)
  ENGINE_ROOT: z.string().optional(),
  ENGINE_RUNROOT: z.string().optional(),
  ENGINE_STORAGE_DRIVER: z.string().default('overlay'),
  ENGINE_POLICY_PATH: z.string().default('/etc/containers/policy.json'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // XDG locations used to derive defaults
  HOME: z.string().optional(),
  XDG_CONFIG_HOME: z.string().optional(),
  XDG_DATA_HOME: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Exposed separately so callers can build
 * a configuration without touching process.env.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ValidationError('Invalid environment configuration', result.error.format());
  }

  return result.data;
}

// Lazy-loaded config singleton
let _config: Env | null = null;

export function getConfig(): Env {
  if (!_config) {
    _config = parseConfig(process.env);
  }
  return _config;
}

/**
 * Drop the cached configuration so the next read re-parses process.env
 */
export function resetConfig(): void {
  _config = null;
}

function homeDir(cfg: Env): string {
  return cfg.HOME || os.homedir();
}

export function configDir(cfg: Env): string {
  if (cfg.ENGINE_CONFIG_DIR) {
    return cfg.ENGINE_CONFIG_DIR;
  }
  const base = cfg.XDG_CONFIG_HOME || path.join(homeDir(cfg), '.config');
  return path.join(base, 'containers', 'engine');
}

export function dataDir(cfg: Env): string {
  if (cfg.ENGINE_DATA_DIR) {
    return cfg.ENGINE_DATA_DIR;
  }
  const base = cfg.XDG_DATA_HOME || path.join(homeDir(cfg), '.local', 'share');
  return path.join(base, 'containers', 'engine');
}

export const config = {
  get engine() {
    return {
      mode: getConfig().ENGINE_MODE,
    };
  },

  get connection() {
    const cfg = getConfig();
    return {
      uri: cfg.CONTAINER_HOST ?? '',
      identity: cfg.CONTAINER_SSHKEY,
      tlsCertFile: cfg.CONTAINER_TLS_CERT,
      tlsKeyFile: cfg.CONTAINER_TLS_KEY,
      tlsCAFile: cfg.CONTAINER_TLS_CA,
      machine: cfg.CONTAINER_MACHINE,
      machineName: cfg.MACHINE_NAME,
      apiVersion: cfg.ENGINE_API_VERSION,
    };
  },

  get machine() {
    const cfg = getConfig();
    return {
      name: cfg.MACHINE_NAME,
      provider: cfg.CONTAINERS_MACHINE_PROVIDER,
      configDir: path.join(configDir(cfg), 'machine'),
      dataDir: path.join(dataDir(cfg), 'machine'),
    };
  },

  get local() {
    const cfg = getConfig();
    return {
      root: cfg.ENGINE_ROOT ?? path.join(dataDir(cfg), 'storage'),
      runRoot: cfg.ENGINE_RUNROOT,
      storageDriver: cfg.ENGINE_STORAGE_DRIVER,
      policyPath: cfg.ENGINE_POLICY_PATH,
    };
  },

  get logging() {
    return {
      level: getConfig().LOG_LEVEL,
    };
  },
};
