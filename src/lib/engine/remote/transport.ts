import Docker from 'dockerode';
import type { Readable } from 'stream';
import { TransportError, errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import { deriveScope } from '../scope';
import { HttpStatusError } from './response';
import { SshTunnel, type StreamDialer } from './ssh-tunnel';
import type { TransportEndpoint } from './endpoint';
import type { QueryParams } from './params';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  // Path below the API version prefix, e.g. /libpod/info
  path: string;
  query?: QueryParams;
  body?: unknown;
  registryAuth?: string;
  signal: AbortSignal;
}

/**
 * Request/response exchange with a remote engine.
 * Non-success statuses reject with HttpStatusError; everything else that
 * goes wrong on the wire rejects with TransportError.
 */
export interface Transport {
  readonly endpoint: TransportEndpoint;

  /**
   * Issue a request and return the decoded JSON body (or text)
   */
  request(req: TransportRequest): Promise<unknown>;

  /**
   * Issue a request and hand back the open response body
   */
  stream(req: TransportRequest): Promise<Readable>;

  ping(signal: AbortSignal): Promise<void>;

  close(): Promise<void>;
}

const SUCCESS_CODES: Record<number, boolean> = {
  200: true,
  201: true,
  204: true,
};

function isReadable(value: unknown): value is Readable {
  return typeof value === 'object' && value !== null && 'pipe' in value && 'destroy' in value;
}

function toDockerOptions(endpoint: TransportEndpoint, apiVersion: string, tunnel: SshTunnel | null): Docker.DockerOptions {
  switch (endpoint.kind) {
    case 'unix':
    case 'npipe':
      return { socketPath: endpoint.path, version: apiVersion };
    case 'tcp':
      return {
        host: endpoint.host,
        port: endpoint.port,
        protocol: endpoint.tls ? 'https' : 'http',
        ca: endpoint.tls?.ca,
        cert: endpoint.tls?.cert,
        key: endpoint.tls?.key,
        version: apiVersion,
      };
    case 'ssh': {
      if (!tunnel) {
        throw new TransportError(`ssh endpoint ${endpoint.host} has no tunnel`);
      }
      // Plain HTTP over sockets the tunnel agent forwards to the engine socket
      const options = {
        host: endpoint.host,
        port: endpoint.port,
        protocol: 'http' as const,
        agent: tunnel.agent,
        version: apiVersion,
      };
      return options;
    }
  }
}

function cancelled(req: TransportRequest, signal: AbortSignal): TransportError {
  return new TransportError(`${req.method} ${req.path} cancelled`, { cause: signal.reason });
}

function dialError(error: unknown, req: TransportRequest): Error {
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode > 0
  ) {
    const body = 'json' in error ? error.json : undefined;
    return new HttpStatusError(error.statusCode, Buffer.isBuffer(body) ? body.toString('utf8') : body);
  }
  return new TransportError(`${req.method} ${req.path}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Transport over dockerode's modem, speaking the libpod REST API.
 * Covers unix sockets, named pipes, tcp with optional TLS, and ssh.
 * Aborting a request's signal, or closing the transport, tears down the
 * exchange on the wire.
 */
export class ModemTransport implements Transport {
  private docker: Docker;
  private tunnel: SshTunnel | null;
  private shutdown = new AbortController();
  private closed = false;

  constructor(
    readonly endpoint: TransportEndpoint,
    apiVersion: string,
    sshDialer?: StreamDialer
  ) {
    this.tunnel = endpoint.kind === 'ssh' ? new SshTunnel(endpoint, sshDialer) : null;
    this.docker = new Docker(toDockerOptions(endpoint, apiVersion, this.tunnel));
  }

  async request(req: TransportRequest): Promise<unknown> {
    return this.dial(req, false);
  }

  async stream(req: TransportRequest): Promise<Readable> {
    const body = await this.dial(req, true);
    if (!isReadable(body)) {
      throw new TransportError(`${req.method} ${req.path}: response is not a stream`);
    }
    return body;
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.dial({ method: 'GET', path: '/libpod/_ping', signal }, false);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.shutdown.abort(new TransportError('connection is closed'));
    this.tunnel?.close();
  }

  private dial(req: TransportRequest, isStream: boolean): Promise<unknown> {
    const logger = getLogger('remote');

    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new TransportError('connection is closed'));
        return;
      }
      const scope = deriveScope(req.signal, this.shutdown.signal);
      if (scope.signal.aborted) {
        scope.release();
        reject(cancelled(req, scope.signal));
        return;
      }

      const onAbort = () => reject(cancelled(req, scope.signal));
      scope.signal.addEventListener('abort', onAbort, { once: true });

      // A trailing '?' makes the modem append the encoded query
      const dialOptions = {
        path: `${req.path}?`,
        method: req.method,
        options: req.method === 'POST' ? { _query: req.query ?? {}, _body: req.body ?? {} } : { _query: req.query ?? {} },
        authconfig: req.registryAuth ? { base64: req.registryAuth } : undefined,
        statusCodes: SUCCESS_CODES,
        isStream,
        abortSignal: scope.signal,
      };

      logger.debug({ method: req.method, path: req.path, query: req.query }, 'Dialing engine');

      this.docker.modem.dial(dialOptions, (err: unknown, data: unknown) => {
        scope.signal.removeEventListener('abort', onAbort);
        if (err) {
          scope.release();
          reject(dialError(err, req));
          return;
        }
        if (!isReadable(data)) {
          scope.release();
          resolve(data);
          return;
        }
        if (scope.signal.aborted) {
          scope.release();
          data.destroy();
          return;
        }
        // An open body stays bound to the scope until it closes
        data.once('close', () => scope.release());
        resolve(data);
      });
    });
  }
}
