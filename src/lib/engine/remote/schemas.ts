import { z } from 'zod';

export const healthCheckResultsSchema = z.object({
  Status: z.string(),
});

export const systemInfoSchema = z.object({
  host: z.object({
    arch: z.string(),
    os: z.string(),
    hostname: z.string(),
    kernel: z.string(),
    remoteSocket: z.object({ path: z.string(), exists: z.boolean() }).optional(),
  }),
  store: z.object({
    graphDriverName: z.string(),
    graphRoot: z.string(),
    runRoot: z.string(),
    containerStore: z.object({ number: z.number() }),
    imageStore: z.object({ number: z.number() }),
  }),
  version: z.object({
    APIVersion: z.string(),
    Version: z.string(),
    OsArch: z.string(),
  }),
});

export const imageDataSchema = z.object({
  Id: z.string(),
  Digest: z.string().default(''),
  RepoTags: z.array(z.string()).nullable().transform((v) => v ?? []),
  RepoDigests: z.array(z.string()).nullable().transform((v) => v ?? []),
  Created: z.string(),
  Size: z.number(),
  Architecture: z.string().default(''),
  Os: z.string().default(''),
  Labels: z.record(z.string()).nullable().transform((v) => v ?? {}),
});

export const artifactPullReportSchema = z.object({
  ArtifactDigest: z.string(),
});

export const engineEventSchema = z.object({
  Type: z.enum(['container', 'image', 'network', 'pod', 'system', 'volume', 'secret', 'machine']),
  Action: z.string(),
  Actor: z.object({
    ID: z.string(),
    Attributes: z.record(z.string()).default({}),
  }),
  time: z.number(),
  timeNano: z.union([z.bigint(), z.number().int()]).transform((v) => BigInt(v)),
});
