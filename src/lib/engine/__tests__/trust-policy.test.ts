import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PolicyTrustStore } from '../trust/policy';
import { ValidationError } from '@/lib/errors';

describe('PolicyTrustStore', () => {
  let dir: string;
  let policyPath: string;
  let store: PolicyTrustStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-trust-'));
    policyPath = path.join(dir, 'policy.json');
    store = new PolicyTrustStore(policyPath);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function readPolicy(): Promise<unknown> {
    return JSON.parse(await fs.readFile(policyPath, 'utf8'));
  }

  it('shows the implicit default when no policy exists', async () => {
    await expect(store.show({})).resolves.toEqual({
      Policies: [{ transport: 'all', name: '* (default)', repo_name: 'default', type: 'accept' }],
    });
  });

  it('writes signedBy requirements per key file', async () => {
    await store.set('quay.io/test', { type: 'signedBy', pubKeysFile: ['/keys/a.gpg', '/keys/b.gpg'] });

    expect(await readPolicy()).toEqual({
      default: [{ type: 'insecureAcceptAnything' }],
      transports: {
        docker: {
          'quay.io/test': [
            { type: 'signedBy', keyType: 'GPGKeys', keyPath: '/keys/a.gpg' },
            { type: 'signedBy', keyType: 'GPGKeys', keyPath: '/keys/b.gpg' },
          ],
        },
      },
    });
  });

  it('replaces the default requirement', async () => {
    await store.set('default', { type: 'reject' });
    expect(await readPolicy()).toEqual({ default: [{ type: 'reject' }] });
  });

  it('lists default and repository scopes', async () => {
    await store.set('registry.test', { type: 'sigstoreSigned', pubKeysFile: ['/keys/cosign.pub'] });
    await store.set('docker.io', { type: 'reject' });

    const report = await store.show({});
    expect(report.Policies).toEqual([
      { transport: 'all', name: '* (default)', repo_name: 'default', type: 'accept' },
      { transport: 'repository', name: 'docker.io', repo_name: 'docker.io', type: 'reject' },
      {
        transport: 'repository',
        name: 'registry.test',
        repo_name: 'registry.test',
        type: 'sigstoreSigned',
        keys: ['/keys/cosign.pub'],
      },
    ]);
  });

  it('keeps fields it does not manage', async () => {
    await fs.writeFile(
      policyPath,
      JSON.stringify({
        default: [{ type: 'insecureAcceptAnything' }],
        transports: { 'docker-daemon': { '': [{ type: 'insecureAcceptAnything' }] } },
      })
    );

    await store.set('quay.io', { type: 'accept' });

    expect(await readPolicy()).toEqual({
      default: [{ type: 'insecureAcceptAnything' }],
      transports: {
        'docker-daemon': { '': [{ type: 'insecureAcceptAnything' }] },
        docker: { 'quay.io': [{ type: 'insecureAcceptAnything' }] },
      },
    });
  });

  it('returns the raw file on request', async () => {
    await fs.writeFile(policyPath, '{"default":[{"type":"reject"}]}');
    await expect(store.show({ raw: true })).resolves.toEqual({
      Raw: '{"default":[{"type":"reject"}]}',
      Policies: [],
    });
  });

  it('requires keys for signed types', async () => {
    await expect(store.set('quay.io', { type: 'signedBy' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('refuses keys for accept', async () => {
    await expect(store.set('quay.io', { type: 'accept', pubKeysFile: ['/keys/a.gpg'] })).rejects.toThrow(
      'public keys are not supported for type "accept"'
    );
  });

  it('honours an explicit policy path', async () => {
    const other = path.join(dir, 'nested', 'other.json');
    await store.set('default', { type: 'reject', policyPath: other });
    await expect(fs.readFile(other, 'utf8')).resolves.toContain('"reject"');
    await expect(fs.access(policyPath)).rejects.toThrow();
  });

  it('rejects malformed policies', async () => {
    await fs.writeFile(policyPath, 'not json');
    await expect(store.show({})).rejects.toBeInstanceOf(ValidationError);
  });
});
