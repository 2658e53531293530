/**
 * Query parameters as sent on the wire. Repeated keys hold arrays.
 */
export type QueryParams = Record<string, string | string[]>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function encodeValue(value: unknown): string | string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
  }
  if (isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Encode the listed option fields. Fields that are not set are left out
 * entirely; keys are lower-cased unless `rename` maps them.
 */
export function encodeParams<T extends object, K extends keyof T & string>(
  options: T,
  fields: readonly K[],
  rename: Partial<Record<K, string>> = {}
): QueryParams {
  const params: QueryParams = {};
  for (const field of fields) {
    const encoded = encodeValue(options[field]);
    if (encoded === undefined) {
      continue;
    }
    params[rename[field] ?? field.toLowerCase()] = encoded;
  }
  return params;
}
