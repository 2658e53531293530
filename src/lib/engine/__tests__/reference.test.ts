import { describe, it, expect } from 'vitest';
import { normalizeTag, splitTag } from '../reference';
import { getClientInfo } from '../client-info';
import { VERSION } from '../version';

describe('normalizeTag', () => {
  it('appends latest to bare repositories', () => {
    expect(normalizeTag('quay.io/test/app')).toBe('quay.io/test/app:latest');
    expect(normalizeTag('localhost:5000/app')).toBe('localhost:5000/app:latest');
  });

  it('keeps explicit tags and digests', () => {
    expect(normalizeTag('localhost:5000/app:2.0')).toBe('localhost:5000/app:2.0');
    expect(normalizeTag('app@sha256:f00d')).toBe('app@sha256:f00d');
  });

  it('rejects empty references', () => {
    expect(() => normalizeTag('  ')).toThrow('image reference must not be empty');
  });
});

describe('splitTag', () => {
  it('splits on the tag or digest separator', () => {
    expect(splitTag('localhost:5000/app')).toEqual({ repo: 'localhost:5000/app', tag: 'latest' });
    expect(splitTag('app@sha256:f00d')).toEqual({ repo: 'app', tag: 'sha256:f00d' });
  });
});

describe('getClientInfo', () => {
  it('reports the platform provider', () => {
    expect(getClientInfo('darwin', 'arm64', 'libkrun')).toEqual({ OS: 'darwin/arm64', provider: 'libkrun', version: VERSION });
  });

  it('reports an empty provider where machines are unsupported', () => {
    expect(getClientInfo('freebsd', 'x64', undefined)).toEqual({ OS: 'freebsd/x64', provider: '', version: VERSION });
  });
});
