import * as fs from 'fs/promises';
import { config } from '@/lib/config';
import { MachineNotRunningError, TransportError, classifyError, errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import { loadMachineConfig } from '@/lib/machine/machine-config';
import { machineTransportAddress } from '@/lib/machine/address';
import { getMachineStubber, resolveVMType } from '@/lib/machine/provider';
import { deriveScope, type CallScope } from '../scope';
import { parseEndpoint, type TransportEndpoint } from './endpoint';
import { ModemTransport, type Transport } from './transport';
import type { ConnectionDescriptor } from '../interfaces';
import type { MachineStubber } from '@/lib/machine/interfaces';
import type { MachineConfig } from '@/types/machine';

export interface ResolvedMachine {
  config: MachineConfig;
  stubber: MachineStubber;
}

export interface ConnectionDeps {
  platform: NodeJS.Platform;
  apiVersion: string;
  resolveMachine(name: string): Promise<ResolvedMachine>;
  createTransport(endpoint: TransportEndpoint, apiVersion: string): Transport;
  readFile(path: string): Promise<Buffer>;
}

async function resolveConfiguredMachine(name: string): Promise<ResolvedMachine> {
  const machine = config.machine;
  const vmType = resolveVMType(process.platform, machine.provider);
  return {
    config: await loadMachineConfig(machine.configDir, vmType, name),
    stubber: getMachineStubber(vmType),
  };
}

export function defaultConnectionDeps(): ConnectionDeps {
  return {
    platform: process.platform,
    apiVersion: config.connection.apiVersion,
    resolveMachine: resolveConfiguredMachine,
    createTransport: (endpoint, apiVersion) => new ModemTransport(endpoint, apiVersion),
    readFile: (path) => fs.readFile(path),
  };
}

/**
 * A negotiated connection shared by every remote call.
 * Each call runs in its own scope derived from the context's root scope,
 * so closing the context cancels everything while one caller's abort
 * stays local to that call.
 */
export class ClientContext {
  private root = new AbortController();
  private closed = false;

  constructor(
    readonly transport: Transport,
    readonly descriptor: Readonly<ConnectionDescriptor>
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  scope(signal?: AbortSignal): CallScope {
    if (this.closed) {
      throw new TransportError('client connection is closed');
    }
    return deriveScope(this.root.signal, signal);
  }

  /**
   * Close after a connection-level failure. Status errors from the
   * server leave the connection usable.
   */
  async fail(error: unknown): Promise<void> {
    if (this.closed || !(error instanceof TransportError)) {
      return;
    }
    getLogger('connection').warn({ uri: this.descriptor.uri, err: error }, 'Closing client connection after transport failure');
    await this.close();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.root.abort(new TransportError('client connection is closed'));
    await this.transport.close();
  }
}

async function readMaterial(deps: ConnectionDeps, path: string, what: string): Promise<Buffer> {
  try {
    return await deps.readFile(path);
  } catch (error) {
    throw new TransportError(`unable to read ${what} ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Reach the machine's endpoint. The VM is never started here.
 */
async function machineUri(descriptor: Readonly<ConnectionDescriptor>, deps: ConnectionDeps): Promise<string> {
  const logger = getLogger('connection');
  const name = descriptor.machineName ?? config.machine.name;
  const machine = await deps.resolveMachine(name);

  const report = await machine.stubber.state(machine.config);
  for (const message of report.messages) {
    logger.warn({ machine: name }, message);
  }
  if (report.state !== 'running') {
    throw new MachineNotRunningError(name, report.state);
  }

  const address = machineTransportAddress(deps.platform, machine.config);
  logger.debug({ machine: name, kind: address.kind, uri: address.uri }, 'Resolved machine address');
  return address.uri;
}

async function attachCredentials(
  endpoint: TransportEndpoint,
  descriptor: Readonly<ConnectionDescriptor>,
  deps: ConnectionDeps
): Promise<TransportEndpoint> {
  const { tlsCertFile, tlsKeyFile, tlsCAFile, identity } = descriptor;

  if (endpoint.kind === 'tcp') {
    if (Boolean(tlsCertFile) !== Boolean(tlsKeyFile)) {
      throw new TransportError('TLS client certificate and key must be given together');
    }
    if (!tlsCertFile && !tlsKeyFile && !tlsCAFile) {
      return endpoint;
    }
    return {
      ...endpoint,
      tls: {
        cert: tlsCertFile ? await readMaterial(deps, tlsCertFile, 'TLS certificate') : undefined,
        key: tlsKeyFile ? await readMaterial(deps, tlsKeyFile, 'TLS key') : undefined,
        ca: tlsCAFile ? await readMaterial(deps, tlsCAFile, 'TLS CA') : undefined,
      },
    };
  }

  if (endpoint.kind === 'ssh' && identity) {
    return { ...endpoint, privateKey: await readMaterial(deps, identity, 'identity') };
  }

  return endpoint;
}

/**
 * Turn a connection descriptor into a live client context.
 * Machine-mediated descriptors require the VM to be running.
 */
export async function negotiateConnection(
  descriptor: Readonly<ConnectionDescriptor>,
  deps: ConnectionDeps = defaultConnectionDeps()
): Promise<ClientContext> {
  const logger = getLogger('connection');

  const uri = descriptor.machine ? await machineUri(descriptor, deps) : descriptor.uri;
  if (!uri) {
    throw new TransportError('no connection URI configured');
  }

  const endpoint = await attachCredentials(parseEndpoint(uri), descriptor, deps);
  const transport = deps.createTransport(endpoint, deps.apiVersion);

  const probe = new AbortController();
  try {
    await transport.ping(probe.signal);
  } catch (error) {
    await transport.close();
    const classified = classifyError(error);
    throw classified instanceof TransportError
      ? classified
      : new TransportError(`unable to connect to ${uri}: ${classified.message}`, { cause: error });
  }

  logger.info({ uri, kind: endpoint.kind, machine: descriptor.machine }, 'Connected to engine');
  return new ClientContext(transport, descriptor);
}
