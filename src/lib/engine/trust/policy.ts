import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { InternalError, ValidationError, errorMessage, hasErrorCode } from '@/lib/errors';
import { getLogger } from '@/lib/logger';
import type { TrustPolicyStore } from '../interfaces';
import type { SetTrustOptions, ShowTrustOptions, ShowTrustReport, TrustPolicy, TrustType } from '@/types/engine';

const requirementSchema = z
  .object({
    type: z.string(),
    keyType: z.string().optional(),
    keyPath: z.string().optional(),
    keyPaths: z.array(z.string()).optional(),
  })
  .passthrough();

const policySchema = z
  .object({
    default: z.array(requirementSchema).default([]),
    transports: z.record(z.record(z.array(requirementSchema))).optional(),
  })
  .passthrough();

type PolicyRequirement = z.infer<typeof requirementSchema>;
type PolicyContent = z.infer<typeof policySchema>;

const DEFAULT_SCOPE = 'default';

const REQUIREMENT_TYPES: Record<string, TrustType> = {
  insecureAcceptAnything: 'accept',
  reject: 'reject',
  signedBy: 'signed',
  sigstoreSigned: 'sigstoreSigned',
};

function emptyPolicy(): PolicyContent {
  return { default: [{ type: 'insecureAcceptAnything' }] };
}

function describe(requirements: PolicyRequirement[], base: Omit<TrustPolicy, 'type' | 'keys'>): TrustPolicy[] {
  return requirements.map((req) => {
    const keys = [...(req.keyPath ? [req.keyPath] : []), ...(req.keyPaths ?? [])];
    return {
      ...base,
      type: REQUIREMENT_TYPES[req.type] ?? req.type,
      ...(keys.length > 0 ? { keys } : {}),
    };
  });
}

function requirementsFor(options: SetTrustOptions): PolicyRequirement[] {
  const keys = options.pubKeysFile ?? [];

  switch (options.type) {
    case 'accept':
    case 'reject':
      if (keys.length > 0) {
        throw new ValidationError(`public keys are not supported for type "${options.type}"`);
      }
      return [{ type: options.type === 'accept' ? 'insecureAcceptAnything' : 'reject' }];
    case 'signedBy':
      if (keys.length === 0) {
        throw new ValidationError('at least one public key must be defined for type "signedBy"');
      }
      return keys.map((keyPath) => ({ type: 'signedBy', keyType: 'GPGKeys', keyPath }));
    case 'sigstoreSigned':
      if (keys.length === 0) {
        throw new ValidationError('at least one public key must be defined for type "sigstoreSigned"');
      }
      return keys.map((keyPath) => ({ type: 'sigstoreSigned', keyPath }));
  }
}

/**
 * Trust settings kept in a containers policy.json.
 * Only the `default` requirement and the `docker` transport scopes are managed.
 */
export class PolicyTrustStore implements TrustPolicyStore {
  constructor(private defaultPolicyPath: string) {}

  async show(options: ShowTrustOptions): Promise<ShowTrustReport> {
    const policyPath = options.policyPath ?? this.defaultPolicyPath;
    const text = await this.readText(policyPath);

    if (options.raw) {
      return { Raw: text ?? JSON.stringify(emptyPolicy(), null, 4), Policies: [] };
    }

    const policy = text === null ? emptyPolicy() : this.parse(text, policyPath);
    const policies = describe(policy.default, {
      transport: 'all',
      name: '* (default)',
      repo_name: 'default',
    });

    for (const [transport, scopes] of Object.entries(policy.transports ?? {})) {
      for (const scope of Object.keys(scopes).sort()) {
        policies.push(
          ...describe(scopes[scope], {
            transport: transport === 'docker' ? 'repository' : transport,
            name: scope,
            repo_name: scope,
          })
        );
      }
    }

    return { Policies: policies };
  }

  async set(scope: string, options: SetTrustOptions): Promise<void> {
    if (!scope) {
      throw new ValidationError('default or a registry name must be specified');
    }
    const policyPath = options.policyPath ?? this.defaultPolicyPath;
    const requirements = requirementsFor(options);

    const text = await this.readText(policyPath);
    const policy = text === null ? emptyPolicy() : this.parse(text, policyPath);

    if (scope === DEFAULT_SCOPE) {
      policy.default = requirements;
    } else {
      const transports = policy.transports ?? {};
      transports.docker = { ...(transports.docker ?? {}), [scope]: requirements };
      policy.transports = transports;
    }

    try {
      await fs.mkdir(path.dirname(policyPath), { recursive: true });
      await fs.writeFile(policyPath, `${JSON.stringify(policy, null, 4)}\n`, 'utf8');
    } catch (error) {
      throw new InternalError(`writing ${policyPath}: ${errorMessage(error)}`, { cause: error });
    }

    getLogger('trust').info({ scope, type: options.type, policyPath }, 'Updated trust policy');
  }

  private async readText(policyPath: string): Promise<string | null> {
    try {
      return await fs.readFile(policyPath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new InternalError(`reading ${policyPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private parse(text: string, policyPath: string): PolicyContent {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`policy ${policyPath} is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = policySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`invalid policy in ${policyPath}`, parsed.error.format());
    }
    return parsed.data;
  }
}
