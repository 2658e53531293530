import { config } from '@/lib/config';
import { InternalError, UnsupportedModeError, ValidationError, errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import { DirectEngine } from './backends/direct-engine';
import { RemoteEngine } from './backends/remote-engine';
import { negotiateConnection, type ConnectionDeps } from './remote/connection';
import { PolicyTrustStore } from './trust/policy';
import {
  createConnectionDescriptor,
  isEngineMode,
  type ConnectionDescriptor,
  type IContainerEngine,
  type ImageStore,
  type LocalRuntimeOptions,
  type LocalRuntimeProvider,
  type TrustPolicyStore,
} from './interfaces';

export interface EngineOptions {
  // Raw value; anything but direct or remote is rejected
  mode: string;
  connection?: ConnectionDescriptor;
  local?: LocalRuntimeOptions;
}

export interface EngineDeps {
  runtimeProvider?: LocalRuntimeProvider;
  trustStore?: TrustPolicyStore;
  connection?: ConnectionDeps;
}

/**
 * Engine options from the environment configuration
 */
export function engineOptionsFromConfig(): EngineOptions {
  const connection = config.connection;
  return {
    mode: config.engine.mode,
    connection: createConnectionDescriptor({
      uri: connection.uri,
      identity: connection.identity,
      tlsCertFile: connection.tlsCertFile,
      tlsKeyFile: connection.tlsKeyFile,
      tlsCAFile: connection.tlsCAFile,
      machine: connection.machine,
      machineName: connection.machineName,
    }),
    local: config.local,
  };
}

async function createDirectEngine(options: EngineOptions, deps: EngineDeps): Promise<IContainerEngine> {
  const logger = getLogger('engine');
  const provider = deps.runtimeProvider;
  if (!provider) {
    throw new ValidationError('direct mode requires a local runtime provider');
  }
  const local = options.local ?? config.local;

  const runtime = await provider.createRuntime(local);
  let store: ImageStore;
  try {
    store = await provider.openStore(runtime.storageConfig());
  } catch (error) {
    // No half-built engine: release the runtime before failing
    try {
      await runtime.shutdown(true);
    } catch (shutdownError) {
      logger.warn({ err: shutdownError }, 'Runtime shutdown failed after store error');
    }
    throw error;
  }

  const trust = deps.trustStore ?? new PolicyTrustStore(local.policyPath);
  return new DirectEngine({ runtime, store }, trust);
}

async function createRemoteEngine(options: EngineOptions, deps: EngineDeps): Promise<IContainerEngine> {
  if (!options.connection) {
    throw new ValidationError('remote mode requires a connection descriptor');
  }
  const context = await negotiateConnection(options.connection, deps.connection);
  return new RemoteEngine(context);
}

/**
 * Build the engine for the configured mode. Fails without side effects
 * for unknown modes; any failure during construction is fatal.
 */
export async function createContainerEngine(options: EngineOptions, deps: EngineDeps = {}): Promise<IContainerEngine> {
  const mode = options.mode;
  if (!isEngineMode(mode)) {
    throw new UnsupportedModeError(mode);
  }

  getLogger('engine').debug({ mode }, 'Creating container engine');

  switch (mode) {
    case 'direct':
      return createDirectEngine(options, deps);
    case 'remote':
      return createRemoteEngine(options, deps);
  }
}

// Process-wide engine, bound once
let enginePromise: Promise<IContainerEngine> | null = null;
let engineInstance: IContainerEngine | null = null;

/**
 * Create the process engine on first call; later calls share the same promise.
 * A failed initialization can be retried.
 */
export function initializeEngine(
  options: EngineOptions = engineOptionsFromConfig(),
  deps: EngineDeps = {}
): Promise<IContainerEngine> {
  if (!enginePromise) {
    const logger = getLogger('engine');
    enginePromise = createContainerEngine(options, deps).then(
      (engine) => {
        engineInstance = engine;
        logger.info({ mode: engine.mode }, 'Container engine initialized');
        return engine;
      },
      (error: unknown) => {
        enginePromise = null;
        logger.error({ mode: options.mode, err: error }, `Container engine initialization failed: ${errorMessage(error)}`);
        throw error;
      }
    );
  }
  return enginePromise;
}

/**
 * The process engine. initializeEngine must have completed.
 */
export function getContainerEngine(): IContainerEngine {
  if (!engineInstance) {
    throw new InternalError('container engine is not initialized');
  }
  return engineInstance;
}

export async function shutdownEngine(): Promise<void> {
  const pending = enginePromise;
  enginePromise = null;
  engineInstance = null;
  if (!pending) {
    return;
  }

  let engine: IContainerEngine;
  try {
    engine = await pending;
  } catch {
    // Initialization already failed and was logged
    return;
  }
  await engine.close();
}
