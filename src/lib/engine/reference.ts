import { ValidationError } from '@/lib/errors';

/**
 * Append `:latest` to references that carry neither a tag nor a digest
 */
export function normalizeTag(reference: string): string {
  const ref = reference.trim();
  if (!ref) {
    throw new ValidationError('image reference must not be empty');
  }
  if (ref.includes('@')) {
    return ref;
  }
  const lastComponent = ref.slice(ref.lastIndexOf('/') + 1);
  return lastComponent.includes(':') ? ref : `${ref}:latest`;
}

/**
 * Split a normalized reference into repository and tag (or digest)
 */
export function splitTag(reference: string): { repo: string; tag: string } {
  const ref = normalizeTag(reference);
  const at = ref.indexOf('@');
  if (at >= 0) {
    return { repo: ref.slice(0, at), tag: ref.slice(at + 1) };
  }
  const colon = ref.lastIndexOf(':');
  return { repo: ref.slice(0, colon), tag: ref.slice(colon + 1) };
}
