import * as readline from 'readline';
import { isInteger, isSafeNumber, parse } from 'lossless-json';
import type { Readable } from 'stream';
import {
  InternalError,
  UnsupportedOperationError,
  classifyError,
  errorMessage,
  isEngineError,
  type EngineError,
} from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import {
  REMOTE_CAPABILITIES,
  assertSupported,
  isSupported,
  type CapabilityTable,
  type EngineOperation,
} from '../capabilities';
import { consumeEventStream, parseEventFilters } from '../events';
import { splitTag } from '../reference';
import { encodeParams } from '../remote/params';
import { buildRegistryAuthHeader } from '../remote/registry-auth';
import { HttpStatusError, classifyStatus, decodeBody, type StatusContext } from '../remote/response';
import {
  artifactPullReportSchema,
  engineEventSchema,
  healthCheckResultsSchema,
  imageDataSchema,
  systemInfoSchema,
} from '../remote/schemas';
import type { ClientContext } from '../remote/connection';
import type { Transport } from '../remote/transport';
import type { IContainerEngine } from '../interfaces';
import type {
  ArtifactPullOptions,
  ArtifactPullReport,
  AutoUpdateResult,
  EngineEvent,
  EventHandler,
  EventsOptions,
  HealthCheckOptions,
  HealthCheckResults,
  ImageInspectResult,
  NetworkUpdateOptions,
  SetTrustOptions,
  ShowTrustOptions,
  ShowTrustReport,
  SystemInfo,
} from '@/types/engine';

function segment(value: string): string {
  return encodeURIComponent(value);
}

// Integers beyond 2^53 (timeNano) stay exact as bigint
function parseNumber(value: string): number | bigint {
  return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : Number(value);
}

/**
 * Decode a JSON-lines body into events
 */
async function* readEvents(body: Readable): AsyncGenerator<EngineEvent> {
  const lines = readline.createInterface({ input: body, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (!line.trim()) {
        continue;
      }
      let raw: unknown;
      try {
        raw = parse(line, null, parseNumber);
      } catch (error) {
        throw new InternalError(`events: malformed event: ${errorMessage(error)}`);
      }
      yield decodeBody(engineEventSchema, raw, 'events');
    }
  } finally {
    lines.close();
  }
}

/**
 * Engine bound to a negotiated client connection.
 * Each call encodes its options, sends one request and decodes the report;
 * non-success statuses are classified into the same errors the direct engine raises.
 */
export class RemoteEngine implements IContainerEngine {
  readonly mode = 'remote';

  constructor(
    private context: ClientContext,
    readonly capabilities: CapabilityTable = REMOTE_CAPABILITIES
  ) {}

  async healthCheckRun(nameOrId: string, _options?: HealthCheckOptions, signal?: AbortSignal): Promise<HealthCheckResults> {
    const target = { operation: 'healthCheckRun', resource: 'container', id: nameOrId };
    return this.call('healthCheckRun', target, signal, async (transport, scope) => {
      const body = await transport.request({
        method: 'GET',
        path: `/libpod/containers/${segment(nameOrId)}/healthcheck`,
        signal: scope,
      });
      return decodeBody(healthCheckResultsSchema, body, 'healthCheckRun');
    });
  }

  /**
   * Unsupported here is reported in the error list, not thrown
   */
  async autoUpdate(): Promise<AutoUpdateResult> {
    if (!isSupported(this.capabilities, 'autoUpdate')) {
      return { reports: [], errors: [new UnsupportedOperationError('autoUpdate', this.mode)] };
    }
    throw new InternalError('autoUpdate has no remote endpoint');
  }

  async events(options: EventsOptions, onEvent: EventHandler, signal?: AbortSignal): Promise<void> {
    assertSupported(this.capabilities, 'events', this.mode);
    const follow = options.stream ?? true;
    const filters = parseEventFilters(options.filter);

    const scope = this.context.scope(signal);
    let body: Readable | undefined;
    try {
      body = await this.context.transport.stream({
        method: 'GET',
        path: '/libpod/events',
        query: encodeParams(
          { filters: Object.keys(filters).length > 0 ? filters : undefined, since: options.since, until: options.until, stream: follow },
          ['filters', 'since', 'until', 'stream']
        ),
        signal: scope.signal,
      });
      await consumeEventStream(readEvents(body), onEvent, scope.signal, follow);
    } catch (error) {
      if (scope.signal.aborted) {
        return;
      }
      await this.context.fail(error);
      throw this.translate(error, { operation: 'events' });
    } finally {
      body?.destroy();
      scope.release();
    }
  }

  async info(signal?: AbortSignal): Promise<SystemInfo> {
    return this.call('info', { operation: 'info' }, signal, async (transport, scope) => {
      const body = await transport.request({ method: 'GET', path: '/libpod/info', signal: scope });
      return decodeBody(systemInfoSchema, body, 'info');
    });
  }

  async networkUpdate(name: string, options: NetworkUpdateOptions, signal?: AbortSignal): Promise<void> {
    const target = { operation: 'networkUpdate', resource: 'network', id: name };
    return this.call('networkUpdate', target, signal, async (transport, scope) => {
      await transport.request({
        method: 'POST',
        path: `/libpod/networks/${segment(name)}/update`,
        body: {
          adddnsservers: options.addDNSServers ?? [],
          removednsservers: options.removeDNSServers ?? [],
        },
        signal: scope,
      });
    });
  }

  async imageInspect(namesOrIds: string[], signal?: AbortSignal): Promise<ImageInspectResult> {
    const result: ImageInspectResult = { reports: [], errors: [] };
    for (const nameOrId of namesOrIds) {
      const target = { operation: 'imageInspect', resource: 'image', id: nameOrId };
      try {
        const report = await this.call('imageInspect', target, signal, async (transport, scope) => {
          const body = await transport.request({ method: 'GET', path: `/libpod/images/${segment(nameOrId)}/json`, signal: scope });
          return decodeBody(imageDataSchema, body, 'imageInspect');
        });
        result.reports.push(report);
      } catch (error) {
        // Missing images are reported per name, anything else aborts the call
        if (isEngineError(error) && error.kind === 'not_found') {
          result.errors.push(error);
          continue;
        }
        throw error;
      }
    }
    return result;
  }

  async untag(nameOrId: string, tags: string[], signal?: AbortSignal): Promise<void> {
    const target = { operation: 'untag', resource: 'image', id: nameOrId };
    const path = `/libpod/images/${segment(nameOrId)}/untag`;

    if (tags.length === 0) {
      return this.call('untag', target, signal, async (transport, scope) => {
        await transport.request({ method: 'POST', path, signal: scope });
      });
    }

    for (const tag of tags) {
      const { repo, tag: name } = splitTag(tag);
      await this.call('untag', target, signal, async (transport, scope) => {
        await transport.request({ method: 'POST', path, query: { repo, tag: name }, signal: scope });
      });
    }
  }

  async artifactPull(name: string, options: ArtifactPullOptions, signal?: AbortSignal): Promise<ArtifactPullReport> {
    const target = { operation: 'artifactPull', resource: 'artifact', id: name };
    return this.call('artifactPull', target, signal, async (transport, scope) => {
      // Credentials travel in the header, never in the query
      const query = {
        ...encodeParams(options, ['quiet', 'retry', 'retryDelay', 'tlsVerify', 'certDir']),
        name,
      };
      const registryAuth = await buildRegistryAuthHeader(
        { authFilePath: options.authfile },
        options.username,
        options.password
      );
      const body = await transport.request({
        method: 'POST',
        path: '/libpod/artifacts/pull',
        query,
        registryAuth,
        signal: scope,
      });
      return decodeBody(artifactPullReportSchema, body, 'artifactPull');
    });
  }

  async showTrust(_args: string[], _options: ShowTrustOptions): Promise<ShowTrustReport> {
    assertSupported(this.capabilities, 'showTrust', this.mode);
    throw new InternalError('showTrust has no remote endpoint');
  }

  async setTrust(_args: string[], _options: SetTrustOptions): Promise<void> {
    assertSupported(this.capabilities, 'setTrust', this.mode);
    throw new InternalError('setTrust has no remote endpoint');
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  /**
   * Run one request in its own scope. Unsupported operations fail here,
   * before any scope or request exists.
   */
  private async call<T>(
    operation: EngineOperation,
    target: StatusContext,
    signal: AbortSignal | undefined,
    fn: (transport: Transport, scope: AbortSignal) => Promise<T>
  ): Promise<T> {
    assertSupported(this.capabilities, operation, this.mode);
    const scope = this.context.scope(signal);
    try {
      return await fn(this.context.transport, scope.signal);
    } catch (error) {
      if (!scope.signal.aborted) {
        await this.context.fail(error);
      }
      throw this.translate(error, target);
    } finally {
      scope.release();
    }
  }

  private translate(error: unknown, target: StatusContext): EngineError {
    if (error instanceof HttpStatusError) {
      getLogger('remote').debug({ operation: target.operation, statusCode: error.statusCode }, 'Request failed');
      return classifyStatus(error.statusCode, error.body, target);
    }
    return classifyError(error);
  }
}
