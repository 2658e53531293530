import * as fs from 'fs/promises';
import { z } from 'zod';
import { RegistryAuthError, errorMessage, hasErrorCode } from '@/lib/errors';

const authFileSchema = z.object({
  auths: z
    .record(
      z.object({
        auth: z.string().optional(),
        identitytoken: z.string().optional(),
      })
    )
    .default({}),
});

interface DockerAuthConfig {
  username?: string;
  password?: string;
  identitytoken?: string;
}

export interface RegistryAuthContext {
  authFilePath?: string;
}

// URL-safe alphabet, padding kept
function encodeHeader(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

function decodeAuthEntry(registry: string, auth: string): { username: string; password: string } {
  const decoded = Buffer.from(auth, 'base64').toString('utf8');
  const idx = decoded.indexOf(':');
  if (idx < 0) {
    throw new RegistryAuthError(`invalid auth entry for ${registry}: missing ':' separator`);
  }
  return { username: decoded.slice(0, idx), password: decoded.slice(idx + 1) };
}

async function readAuthFile(authFilePath: string): Promise<Record<string, DockerAuthConfig>> {
  let text: string;
  try {
    text = await fs.readFile(authFilePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new RegistryAuthError(`credential file is not accessible: ${authFilePath}`, { cause: error });
    }
    throw new RegistryAuthError(`reading ${authFilePath}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RegistryAuthError(`unmarshaling JSON at ${authFilePath}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = authFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryAuthError(`invalid credential file ${authFilePath}`);
  }

  const configs: Record<string, DockerAuthConfig> = {};
  for (const [registry, entry] of Object.entries(parsed.data.auths)) {
    const conf: DockerAuthConfig = entry.auth ? decodeAuthEntry(registry, entry.auth) : {};
    if (entry.identitytoken) {
      conf.identitytoken = entry.identitytoken;
    }
    configs[registry] = conf;
  }
  return configs;
}

/**
 * Build the X-Registry-Auth header value.
 *
 * Explicit credentials win over the auth file. Returns undefined when there
 * is nothing to send.
 */
export async function buildRegistryAuthHeader(
  context: RegistryAuthContext,
  username?: string,
  password?: string
): Promise<string | undefined> {
  if (username) {
    return encodeHeader({ username, password: password ?? '' });
  }

  if (!context.authFilePath) {
    return undefined;
  }

  const configs = await readAuthFile(context.authFilePath);
  if (Object.keys(configs).length === 0) {
    return undefined;
  }
  return encodeHeader(configs);
}
