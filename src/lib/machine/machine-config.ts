import { z } from 'zod';
import * as fs from 'fs/promises';
import * as path from 'path';
import { NotFoundError, ValidationError, errorMessage, hasErrorCode } from '@/lib/errors';
import { VM_TYPES, type MachineConfig, type VMType } from '@/types/machine';

const vmFileSchema = z.object({ path: z.string().min(1) });

const vmTypeSchema = z.enum(['qemu', 'applehv', 'libkrun', 'wsl']);

const machineConfigSchema = z.object({
  name: z.string().min(1),
  vmType: vmTypeSchema,
  sshIdentityPath: z.string().optional(),
  connection: z
    .object({
      socket: vmFileSchema.optional(),
      pipe: vmFileSchema.optional(),
    })
    .default({}),
  qemu: z
    .object({
      qmpSocket: vmFileSchema,
      pidFile: vmFileSchema.optional(),
    })
    .optional(),
  vfkit: z.object({ endpoint: z.string().min(1) }).optional(),
  wsl: z.object({ distribution: z.string().min(1) }).optional(),
  files: z.array(z.string()).default([]),
});

export function isVMType(value: string): value is VMType {
  return VM_TYPES.some((t) => t === value);
}

export function machineConfigPath(configDir: string, vmType: VMType, name: string): string {
  return path.join(configDir, vmType, `${name}.json`);
}

/**
 * Validate a machine configuration document
 */
export function parseMachineConfig(raw: unknown, source = 'machine config'): MachineConfig {
  const result = machineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${source}`, result.error.format());
  }
  return result.data;
}

/**
 * Load <configDir>/<vmType>/<name>.json
 */
export async function loadMachineConfig(configDir: string, vmType: VMType, name: string): Promise<MachineConfig> {
  const file = machineConfigPath(configDir, vmType, name);

  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError('machine', name);
    }
    throw new ValidationError(`Cannot read machine config ${file}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Machine config ${file} is not valid JSON: ${errorMessage(error)}`);
  }

  const mc = parseMachineConfig(raw, `machine config ${file}`);
  if (mc.vmType !== vmType) {
    throw new ValidationError(`Machine ${name} is configured for ${mc.vmType}, not ${vmType}`);
  }
  return mc;
}
