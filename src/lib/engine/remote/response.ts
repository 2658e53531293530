import { z } from 'zod';
import {
  ConflictError,
  InternalError,
  NotFoundError,
  TransportError,
  UnsupportedOperationError,
  type EngineError,
} from '@/lib/errors';

const errorBodySchema = z.object({
  cause: z.string().optional(),
  message: z.string().optional(),
  response: z.number().optional(),
});

/**
 * Non-success status returned by the server, before classification
 */
export class HttpStatusError extends Error {
  constructor(
    public statusCode: number,
    public body: unknown
  ) {
    super(`server returned HTTP ${statusCode}`);
    this.name = 'HttpStatusError';
  }
}

export interface StatusContext {
  operation: string;
  resource?: string;
  id?: string;
}

function serverMessage(statusCode: number, body: unknown): string {
  if (typeof body === 'string' && body.trim()) {
    return body.trim();
  }
  const parsed = errorBodySchema.safeParse(body);
  if (parsed.success) {
    const { message, cause } = parsed.data;
    if (message) {
      return message;
    }
    if (cause) {
      return cause;
    }
  }
  return `server returned HTTP ${statusCode}`;
}

/**
 * Map an HTTP status onto the engine's error kinds
 */
export function classifyStatus(statusCode: number, body: unknown, context: StatusContext): EngineError {
  const message = serverMessage(statusCode, body);

  switch (statusCode) {
    case 404:
      return new NotFoundError(context.resource ?? 'resource', context.id ?? '', message);
    case 409:
      return new ConflictError(message);
    case 501:
      return new UnsupportedOperationError(context.operation, 'remote');
    case 401:
    case 403:
      return new TransportError(message);
    default:
      return new InternalError(message);
  }
}

/**
 * Validate a decoded body against the operation's report shape
 */
export function decodeBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, operation: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new InternalError(`${operation}: unexpected response body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
