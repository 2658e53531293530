import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildRegistryAuthHeader } from '../registry-auth';
import { RegistryAuthError } from '@/lib/errors';

function decode(header: string | undefined): unknown {
  if (header === undefined) {
    return undefined;
  }
  return JSON.parse(Buffer.from(header.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf8'));
}

describe('buildRegistryAuthHeader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-auth-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns nothing without credentials or auth file', async () => {
    await expect(buildRegistryAuthHeader({})).resolves.toBeUndefined();
  });

  it('encodes explicit credentials', async () => {
    const header = await buildRegistryAuthHeader({}, 'tester', 'test-secret');
    expect(decode(header)).toEqual({ username: 'tester', password: 'test-secret' });
    expect(header).not.toMatch(/[+/]/);
  });

  it('prefers explicit credentials over the auth file', async () => {
    const header = await buildRegistryAuthHeader({ authFilePath: path.join(dir, 'missing.json') }, 'tester', 'test-secret');
    expect(decode(header)).toEqual({ username: 'tester', password: 'test-secret' });
  });

  it('encodes every registry of the auth file', async () => {
    const authFile = path.join(dir, 'auth.json');
    await fs.writeFile(
      authFile,
      JSON.stringify({
        auths: {
          'quay.io': { auth: Buffer.from('tester:test-secret').toString('base64') },
          'registry.test': { auth: Buffer.from('robot:pa:ss').toString('base64') },
        },
      })
    );

    const header = await buildRegistryAuthHeader({ authFilePath: authFile });
    expect(decode(header)).toEqual({
      'quay.io': { username: 'tester', password: 'test-secret' },
      'registry.test': { username: 'robot', password: 'pa:ss' },
    });
  });

  it('returns nothing for an empty auth file', async () => {
    const authFile = path.join(dir, 'auth.json');
    await fs.writeFile(authFile, '{"auths":{}}');
    await expect(buildRegistryAuthHeader({ authFilePath: authFile })).resolves.toBeUndefined();
  });

  it('fails on a missing auth file', async () => {
    await expect(buildRegistryAuthHeader({ authFilePath: path.join(dir, 'missing.json') })).rejects.toBeInstanceOf(
      RegistryAuthError
    );
  });

  it('fails on malformed auth entries', async () => {
    const authFile = path.join(dir, 'auth.json');
    await fs.writeFile(authFile, JSON.stringify({ auths: { 'quay.io': { auth: Buffer.from('nocolon').toString('base64') } } }));
    await expect(buildRegistryAuthHeader({ authFilePath: authFile })).rejects.toThrow(
      "invalid auth entry for quay.io: missing ':' separator"
    );
  });
});
