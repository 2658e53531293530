import { InternalError, NotFoundError, ValidationError, classifyError } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import { DIRECT_CAPABILITIES, assertSupported, type EngineOperation } from '../capabilities';
import { consumeEventStream, parseEventFilters } from '../events';
import { classifyHealthCheckFailure, healthCheckStatusString } from '../healthcheck';
import { normalizeTag } from '../reference';
import { deriveScope, throwIfCancelled } from '../scope';
import type {
  AutoUpdateUnit,
  IContainerEngine,
  ImageStore,
  LocalRuntime,
  StoredImage,
  TrustPolicyStore,
} from '../interfaces';
import type {
  ArtifactPullOptions,
  ArtifactPullReport,
  AutoUpdateOptions,
  AutoUpdateResult,
  EventHandler,
  EventsOptions,
  HealthCheckOptions,
  HealthCheckResults,
  ImageData,
  ImageInspectResult,
  NetworkUpdateOptions,
  SetTrustOptions,
  ShowTrustOptions,
  ShowTrustReport,
  SystemInfo,
} from '@/types/engine';

/**
 * Runtime and storage collaborators owned by a direct engine
 */
export interface RuntimeHandle {
  runtime: LocalRuntime;
  store: ImageStore;
}

function toImageData(image: StoredImage): ImageData {
  return {
    Id: image.id,
    Digest: image.digest,
    RepoTags: image.names.filter((name) => !name.includes('@')),
    RepoDigests: image.repoDigests,
    Created: image.created.toISOString(),
    Size: image.size,
    Architecture: image.architecture,
    Os: image.os,
    Labels: image.labels,
  };
}

/**
 * Engine bound to in-process runtime and storage handles.
 * Adds no locking of its own; the collaborators serialize conflicting changes.
 */
export class DirectEngine implements IContainerEngine {
  readonly mode = 'direct';
  readonly capabilities = DIRECT_CAPABILITIES;

  private closed = false;

  constructor(
    private handle: RuntimeHandle,
    private trust: TrustPolicyStore
  ) {}

  async healthCheckRun(nameOrId: string, _options?: HealthCheckOptions, signal?: AbortSignal): Promise<HealthCheckResults> {
    return this.run('healthCheckRun', signal, async () => {
      const result = await this.handle.runtime.healthCheck(nameOrId);
      if (result.error) {
        throw classifyHealthCheckFailure(nameOrId, result.status, result.error);
      }
      return { Status: healthCheckStatusString(result.status) };
    });
  }

  async autoUpdate(options: AutoUpdateOptions, signal?: AbortSignal): Promise<AutoUpdateResult> {
    const logger = getLogger('direct');
    const result: AutoUpdateResult = { reports: [], errors: [] };

    try {
      this.guard('autoUpdate', signal);
    } catch (error) {
      result.errors.push(classifyError(error));
      return result;
    }

    const updater = this.handle.runtime.autoUpdater;
    let units: AutoUpdateUnit[];
    try {
      units = await updater.candidates(options);
    } catch (error) {
      result.errors.push(classifyError(error));
      return result;
    }

    // Units run one after another; a failed unit never stops the rest
    for (const unit of units) {
      if (signal?.aborted) {
        result.errors.push(new InternalError(`auto-update of ${unit.containerName} cancelled`, { cause: signal.reason }));
        continue;
      }
      try {
        result.reports.push(await updater.update(unit, options));
      } catch (error) {
        logger.warn({ container: unit.containerName, unit: unit.systemdUnit, err: error }, 'Auto-update failed');
        result.errors.push(classifyError(error));
      }
    }

    return result;
  }

  async events(options: EventsOptions, onEvent: EventHandler, signal?: AbortSignal): Promise<void> {
    this.guard('events', signal);
    const follow = options.stream ?? true;
    const filters = parseEventFilters(options.filter);

    const scope = deriveScope(signal);
    try {
      const source = this.handle.runtime.events(
        { filters, since: options.since, until: options.until, follow, fromStart: options.fromStart ?? false },
        scope.signal
      );
      await consumeEventStream(source, onEvent, scope.signal, follow);
    } catch (error) {
      throw classifyError(error);
    } finally {
      // Tell the runtime to stop producing for this subscription
      scope.abort();
      scope.release();
    }
  }

  async info(signal?: AbortSignal): Promise<SystemInfo> {
    return this.run('info', signal, () => this.handle.runtime.info());
  }

  async networkUpdate(name: string, options: NetworkUpdateOptions, signal?: AbortSignal): Promise<void> {
    return this.run('networkUpdate', signal, () => this.handle.runtime.updateNetwork(name, options));
  }

  async imageInspect(namesOrIds: string[], signal?: AbortSignal): Promise<ImageInspectResult> {
    return this.run('imageInspect', signal, async () => {
      const result: ImageInspectResult = { reports: [], errors: [] };
      for (const nameOrId of namesOrIds) {
        const image = await this.handle.store.lookupImage(nameOrId);
        if (!image) {
          result.errors.push(new NotFoundError('image', nameOrId, `${nameOrId}: image not known`));
          continue;
        }
        result.reports.push(toImageData(image));
      }
      return result;
    });
  }

  async untag(nameOrId: string, tags: string[], signal?: AbortSignal): Promise<void> {
    return this.run('untag', signal, async () => {
      const image = await this.handle.store.lookupImage(nameOrId);
      if (!image) {
        throw new NotFoundError('image', nameOrId, `${nameOrId}: image not known`);
      }

      if (tags.length === 0) {
        await this.handle.store.removeNames(image.id, image.names);
        return;
      }

      const names = tags.map((tag) => {
        const normalized = normalizeTag(tag);
        if (!image.names.includes(normalized)) {
          throw new NotFoundError('tag', tag, `${tag}: tag not known`);
        }
        return normalized;
      });
      await this.handle.store.removeNames(image.id, names);
    });
  }

  async artifactPull(name: string, options: ArtifactPullOptions, signal?: AbortSignal): Promise<ArtifactPullReport> {
    return this.run('artifactPull', signal, () =>
      this.handle.runtime.pullArtifact(name, {
        authfile: options.authfile,
        credentials: options.username ? { username: options.username, password: options.password ?? '' } : undefined,
        quiet: options.quiet,
        retry: options.retry,
        retryDelay: options.retryDelay,
        tlsVerify: options.tlsVerify,
        certDir: options.certDir,
      })
    );
  }

  async showTrust(_args: string[], options: ShowTrustOptions, signal?: AbortSignal): Promise<ShowTrustReport> {
    return this.run('showTrust', signal, () => this.trust.show(options));
  }

  async setTrust(args: string[], options: SetTrustOptions, signal?: AbortSignal): Promise<void> {
    return this.run('setTrust', signal, async () => {
      if (args.length !== 1) {
        throw new ValidationError('default or a registry name must be specified');
      }
      await this.trust.set(args[0], options);
    });
  }

  /**
   * Shut down the runtime, then the store. Both are attempted.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const logger = getLogger('direct');
    let failure: unknown = undefined;
    try {
      await this.handle.runtime.shutdown(false);
    } catch (error) {
      failure = error;
    }
    try {
      await this.handle.store.shutdown(false);
    } catch (error) {
      if (failure === undefined) {
        failure = error;
      } else {
        logger.error({ err: error }, 'Store shutdown failed after runtime shutdown failure');
      }
    }
    if (failure !== undefined) {
      throw classifyError(failure);
    }
  }

  private guard(operation: EngineOperation, signal: AbortSignal | undefined): void {
    if (this.closed) {
      throw new InternalError('engine is closed');
    }
    assertSupported(this.capabilities, operation, this.mode);
    throwIfCancelled(signal, operation);
  }

  private async run<T>(operation: EngineOperation, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    this.guard(operation, signal);
    try {
      return await fn();
    } catch (error) {
      throw classifyError(error);
    }
  }
}
