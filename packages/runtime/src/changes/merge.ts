// JSON merge patch (RFC 7386)

import type { AspectPayload } from '@metagraph/protocol';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeValue(target: unknown, patch: unknown): unknown {
  if (!isPlainObject(patch)) {
    return structuredClone(patch);
  }
  return mergeObjects(isPlainObject(target) ? target : {}, patch);
}

function mergeObjects(
  target: Record<string, unknown>,
  patch: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = structuredClone(target);
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = mergeValue(result[key], value);
    }
  }
  return result;
}

/**
 * Apply a merge patch to a payload without modifying either.
 *
 * Objects merge key by key, `null` removes a key, and arrays and scalars
 * replace the previous value.
 */
export function applyMergePatch(payload: AspectPayload, patch: AspectPayload): AspectPayload {
  return mergeObjects(payload, patch);
}
