import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'stream';
import { RemoteEngine } from '../backends/remote-engine';
import { REMOTE_CAPABILITIES } from '../capabilities';
import { HttpStatusError } from '../remote/response';
import {
  ConflictError,
  InternalError,
  NotFoundError,
  StreamClosedError,
  TransportError,
  UnsupportedOperationError,
} from '@/lib/errors';
import { FakeTransport, SAMPLE_INFO, eventLine, remoteContext, sampleEvent } from './fakes';
import type { TransportRequest } from '../remote/transport';
import type { EngineEvent } from '@/types/engine';

function decodeHeader(header: string | undefined): unknown {
  if (!header) {
    return undefined;
  }
  return JSON.parse(Buffer.from(header.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf8'));
}

describe('RemoteEngine', () => {
  let handler: (req: TransportRequest) => unknown;
  let transport: FakeTransport;
  let engine: RemoteEngine;

  beforeEach(() => {
    handler = () => ({});
    transport = new FakeTransport((req) => handler(req));
    engine = new RemoteEngine(remoteContext(transport));
  });

  describe('unsupported operations', () => {
    it('returns auto-update errors without a request', async () => {
      const result = await engine.autoUpdate();
      expect(result.reports).toEqual([]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(UnsupportedOperationError);
      expect(result.errors[0].message).toBe('not implemented');
      expect(transport.requests).toEqual([]);
    });

    it('rejects showTrust without a request', async () => {
      const err = await engine.showTrust([], {}).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnsupportedOperationError);
      expect(err).toHaveProperty('message', 'not implemented');
      expect(err).toHaveProperty('kind', 'unsupported');
      expect(transport.requests).toEqual([]);
    });

    it('rejects setTrust without a request', async () => {
      await expect(engine.setTrust(['default'], { type: 'accept' })).rejects.toThrow('not implemented');
      expect(transport.requests).toEqual([]);
    });
  });

  describe('healthCheckRun', () => {
    it('decodes the report', async () => {
      handler = () => ({ Status: 'healthy' });
      await expect(engine.healthCheckRun('web')).resolves.toEqual({ Status: 'healthy' });
      expect(transport.requests[0]).toMatchObject({ method: 'GET', path: '/libpod/containers/web/healthcheck' });
    });

    it('maps 404 to NotFoundError with the server message', async () => {
      handler = () => {
        throw new HttpStatusError(404, { cause: 'no such container', message: 'no container with name or ID "web" found' });
      };
      const err = await engine.healthCheckRun('web').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toHaveProperty('message', 'no container with name or ID "web" found');
    });

    it('maps 409 to ConflictError', async () => {
      handler = () => {
        throw new HttpStatusError(409, { message: 'container web has no defined healthcheck' });
      };
      await expect(engine.healthCheckRun('web')).rejects.toBeInstanceOf(ConflictError);
    });

    it('rejects malformed bodies as internal errors', async () => {
      handler = () => ({ status: 'healthy' });
      await expect(engine.healthCheckRun('web')).rejects.toBeInstanceOf(InternalError);
    });
  });

  it('decodes system info', async () => {
    handler = () => SAMPLE_INFO;
    await expect(engine.info()).resolves.toEqual(SAMPLE_INFO);
  });

  it('sends network updates as a JSON body', async () => {
    await engine.networkUpdate('podnet', { addDNSServers: ['10.0.0.53'] });
    expect(transport.requests[0]).toMatchObject({
      method: 'POST',
      path: '/libpod/networks/podnet/update',
      body: { adddnsservers: ['10.0.0.53'], removednsservers: [] },
    });
  });

  describe('artifactPull', () => {
    it('sends credentials in the registry auth header only', async () => {
      handler = () => ({ ArtifactDigest: 'sha256:2222' });
      const report = await engine.artifactPull('quay.io/test/artifact:1', {
        username: 'tester',
        password: 'test-secret',
        retry: 3,
        tlsVerify: false,
      });

      expect(report).toEqual({ ArtifactDigest: 'sha256:2222' });
      const req = transport.requests[0];
      expect(req.method).toBe('POST');
      expect(req.path).toBe('/libpod/artifacts/pull');
      expect(req.query).toEqual({ retry: '3', tlsverify: 'false', name: 'quay.io/test/artifact:1' });
      expect(decodeHeader(req.registryAuth)).toEqual({ username: 'tester', password: 'test-secret' });
    });

    it('omits the header without credentials', async () => {
      handler = () => ({ ArtifactDigest: 'sha256:3333' });
      await engine.artifactPull('quay.io/test/artifact:1', {});
      expect(transport.requests[0].registryAuth).toBeUndefined();
      expect(transport.requests[0].query).toEqual({ name: 'quay.io/test/artifact:1' });
    });
  });

  describe('imageInspect', () => {
    it('collects missing images and keeps the rest', async () => {
      handler = (req) => {
        if (req.path === '/libpod/images/missing/json') {
          throw new HttpStatusError(404, { message: 'missing: image not known' });
        }
        return {
          Id: 'f00d',
          Digest: 'sha256:f00d',
          RepoTags: null,
          RepoDigests: ['quay.io/test/app@sha256:f00d'],
          Created: '2024-01-02T03:04:05Z',
          Size: 10,
          Architecture: 'arm64',
          Os: 'linux',
          Labels: null,
        };
      };

      const result = await engine.imageInspect(['app', 'missing']);
      expect(result.reports).toEqual([
        {
          Id: 'f00d',
          Digest: 'sha256:f00d',
          RepoTags: [],
          RepoDigests: ['quay.io/test/app@sha256:f00d'],
          Created: '2024-01-02T03:04:05Z',
          Size: 10,
          Architecture: 'arm64',
          Os: 'linux',
          Labels: {},
        },
      ]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(NotFoundError);
      expect(result.errors[0].message).toBe('missing: image not known');
    });

    it('aborts on errors other than not found', async () => {
      handler = () => {
        throw new HttpStatusError(500, 'storage corrupted');
      };
      await expect(engine.imageInspect(['app'])).rejects.toThrow('storage corrupted');
    });
  });

  describe('untag', () => {
    it('sends no parameters when no tags are given', async () => {
      await engine.untag('app', []);
      expect(transport.requests).toHaveLength(1);
      expect(transport.requests[0].path).toBe('/libpod/images/app/untag');
      expect(transport.requests[0].query).toBeUndefined();
    });

    it('sends one request per normalized tag', async () => {
      await engine.untag('app', ['quay.io/test/app', 'localhost:5000/app:2.0']);
      expect(transport.requests.map((r) => r.query)).toEqual([
        { repo: 'quay.io/test/app', tag: 'latest' },
        { repo: 'localhost:5000/app', tag: '2.0' },
      ]);
    });
  });

  describe('events', () => {
    it('streams events until the caller aborts', async () => {
      const body = new PassThrough();
      transport.streamBody = body;
      const controller = new AbortController();
      const received: string[] = [];

      const done = engine.events({ filter: ['event=start'] }, (event) => {
        received.push(event.Action);
        controller.abort();
      }, controller.signal);
      body.write(eventLine(sampleEvent('start')));

      await expect(done).resolves.toBeUndefined();
      expect(received).toEqual(['start']);
      expect(body.destroyed).toBe(true);
      expect(transport.requests[0].query).toEqual({ filters: '{"event":["start"]}', stream: 'true' });
    });

    it('rejects with StreamClosedError when the server ends a followed stream', async () => {
      const body = new PassThrough();
      transport.streamBody = body;
      const received: string[] = [];

      const done = engine.events({}, (event) => received.push(event.Action));
      body.end(eventLine(sampleEvent('die')));

      await expect(done).rejects.toBeInstanceOf(StreamClosedError);
      expect(received).toEqual(['die']);
    });

    it('resolves when a bounded stream ends', async () => {
      const body = new PassThrough();
      transport.streamBody = body;
      const done = engine.events({ stream: false }, () => {});
      body.end();
      await expect(done).resolves.toBeUndefined();
      expect(transport.requests[0].query).toEqual({ stream: 'false' });
    });

    it('keeps nanosecond timestamps exact', async () => {
      const body = new PassThrough();
      transport.streamBody = body;
      const received: EngineEvent[] = [];

      const done = engine.events({ stream: false }, (event) => received.push(event));
      body.end(
        '{"Type":"container","Action":"start","Actor":{"ID":"abc123"},"time":1700000000,"timeNano":1700000000123456789}\n'
      );

      await expect(done).resolves.toBeUndefined();
      expect(received).toEqual([
        {
          Type: 'container',
          Action: 'start',
          Actor: { ID: 'abc123', Attributes: {} },
          time: 1700000000,
          timeNano: 1700000000123456789n,
        },
      ]);
    });

    it('passes the fixture timestamp through unchanged', async () => {
      const body = new PassThrough();
      transport.streamBody = body;
      const received: bigint[] = [];

      const done = engine.events({ stream: false }, (event) => received.push(event.timeNano));
      body.end(eventLine(sampleEvent('start')));

      await done;
      expect(received).toEqual([sampleEvent('start').timeNano]);
    });
  });

  describe('capability table', () => {
    it('consults the table before answering auto-update', async () => {
      const flipped = new RemoteEngine(remoteContext(transport), { ...REMOTE_CAPABILITIES, autoUpdate: true });
      await expect(flipped.autoUpdate()).rejects.toThrow('autoUpdate has no remote endpoint');
      expect(transport.requests).toEqual([]);
    });

    it('refuses operations the table marks unsupported', async () => {
      const restricted = new RemoteEngine(remoteContext(transport), { ...REMOTE_CAPABILITIES, info: false });
      await expect(restricted.info()).rejects.toBeInstanceOf(UnsupportedOperationError);
      expect(transport.requests).toEqual([]);
    });
  });

  describe('connection failures', () => {
    it('closes the context after a transport failure', async () => {
      const context = remoteContext(transport);
      const failing = new RemoteEngine(context);
      handler = () => {
        throw new TransportError('GET /libpod/info: connect ECONNREFUSED /tmp/engine-test.sock');
      };

      await expect(failing.info()).rejects.toThrow('GET /libpod/info: connect ECONNREFUSED /tmp/engine-test.sock');
      expect(context.isClosed).toBe(true);
      expect(transport.closed).toBe(true);
      await expect(failing.info()).rejects.toThrow('client connection is closed');
    });

    it('keeps the context open after a status error', async () => {
      const context = remoteContext(transport);
      const answering = new RemoteEngine(context);
      handler = () => {
        throw new HttpStatusError(409, { message: 'container web is not running' });
      };

      await expect(answering.healthCheckRun('web')).rejects.toBeInstanceOf(ConflictError);
      expect(context.isClosed).toBe(false);
    });

    it('keeps the context open when the caller cancels', async () => {
      const context = remoteContext(transport);
      const cancelled = new RemoteEngine(context);
      const controller = new AbortController();
      handler = (req) => {
        controller.abort();
        throw new TransportError(`${req.method} ${req.path} cancelled`);
      };

      await expect(cancelled.info(controller.signal)).rejects.toThrow('GET /libpod/info cancelled');
      expect(context.isClosed).toBe(false);
    });
  });

  describe('close', () => {
    it('closes the transport and rejects later calls', async () => {
      await engine.close();
      expect(transport.closed).toBe(true);
      await expect(engine.info()).rejects.toBeInstanceOf(TransportError);
    });
  });
});
