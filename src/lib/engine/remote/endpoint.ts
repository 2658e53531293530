import * as os from 'os';
import { TransportError } from '@/lib/errors';

export interface TlsMaterial {
  cert?: Buffer;
  key?: Buffer;
  ca?: Buffer;
}

export type TransportEndpoint =
  | { kind: 'unix'; path: string }
  | { kind: 'npipe'; path: string }
  | { kind: 'tcp'; host: string; port: number; tls?: TlsMaterial }
  | { kind: 'ssh'; host: string; port: number; user: string; socketPath: string; privateKey?: Buffer };

export type EndpointKind = TransportEndpoint['kind'];

const SCHEMES: Record<string, EndpointKind> = {
  unix: 'unix',
  npipe: 'npipe',
  tcp: 'tcp',
  ssh: 'ssh',
};

function schemeOf(uri: string): string {
  const idx = uri.indexOf('://');
  if (idx <= 0) {
    throw new TransportError(`unable to create connection: "${uri}" is not a valid URI`);
  }
  return uri.slice(0, idx).toLowerCase();
}

function parsePort(url: URL, uri: string, fallback?: number): number {
  if (!url.port) {
    if (fallback === undefined) {
      throw new TransportError(`unable to create connection: "${uri}" is missing a port`);
    }
    return fallback;
  }
  return Number(url.port);
}

function localUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'root';
  }
}

/**
 * Resolve a connection URI into the endpoint the transport dials.
 * TLS material and identity keys are attached by the caller.
 */
export function parseEndpoint(uri: string): TransportEndpoint {
  const scheme = schemeOf(uri);
  const kind = SCHEMES[scheme];
  if (!kind) {
    throw new TransportError(`unable to create connection. "${scheme}" is not a supported schema`);
  }

  // Pipe names are not URL paths; take everything after the scheme
  if (kind === 'npipe') {
    const path = uri.slice('npipe://'.length);
    if (!path) {
      throw new TransportError(`unable to create connection: "${uri}" has no pipe name`);
    }
    return { kind, path };
  }

  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new TransportError(`unable to create connection: "${uri}" is not a valid URI`);
  }

  switch (kind) {
    case 'unix':
      if (!url.pathname || url.pathname === '/') {
        throw new TransportError(`unable to create connection: "${uri}" has no socket path`);
      }
      return { kind, path: decodeURIComponent(url.pathname) };
    case 'tcp':
      return { kind, host: url.hostname, port: parsePort(url, uri) };
    case 'ssh':
      if (!url.pathname || url.pathname === '/') {
        throw new TransportError(`unable to create connection: "${uri}" has no socket path`);
      }
      return {
        kind,
        host: url.hostname,
        port: parsePort(url, uri, 22),
        user: url.username ? decodeURIComponent(url.username) : localUser(),
        socketPath: decodeURIComponent(url.pathname),
      };
  }
}
