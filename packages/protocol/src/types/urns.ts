// URN helpers
//
// Format: urn:<namespace>:<entityType>:<key>
// Compound keys are parenthesised tuples whose parts may themselves be URNs:
//   urn:li:dataset:(urn:li:dataPlatform:hive,db.table,PROD)

import type { Urn } from './common.js';

export const DEFAULT_URN_NAMESPACE = 'li';

export type ParsedUrn = {
  namespace: string;
  entityType: string;

  /**
   * Everything after the entity type, tuple parentheses included
   */
  key: string;

  /**
   * Key parts; a single element for simple keys
   */
  parts: string[];
};

/**
 * Parse a URN into its components.
 * @returns null when the value is not a well-formed URN
 */
export function parseUrn(value: string): ParsedUrn | null {
  if (!value.startsWith('urn:')) {
    return null;
  }

  const rest = value.slice('urn:'.length);
  const namespaceEnd = rest.indexOf(':');
  if (namespaceEnd <= 0) {
    return null;
  }
  const namespace = rest.slice(0, namespaceEnd);

  const afterNamespace = rest.slice(namespaceEnd + 1);
  const typeEnd = afterNamespace.indexOf(':');
  if (typeEnd <= 0) {
    return null;
  }
  const entityType = afterNamespace.slice(0, typeEnd);
  const key = afterNamespace.slice(typeEnd + 1);
  if (key === '') {
    return null;
  }

  if (key.startsWith('(')) {
    if (!key.endsWith(')')) {
      return null;
    }
    const parts = splitTuple(key.slice(1, -1));
    return parts ? { namespace, entityType, key, parts } : null;
  }

  return { namespace, entityType, key, parts: [key] };
}

export function isUrn(value: unknown): value is Urn {
  return typeof value === 'string' && parseUrn(value) !== null;
}

/**
 * Split the inside of a tuple key on top-level commas.
 * Returns null for unbalanced parentheses or empty parts.
 */
function splitTuple(inner: string): string[] | null {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of inner) {
    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth < 0) return null;
    }

    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  if (depth !== 0) return null;
  parts.push(current);

  return parts.some((p) => p === '') ? null : parts;
}

/**
 * Build a URN from an entity type and key parts
 */
export function makeUrn(
  entityType: string,
  parts: string[],
  namespace: string = DEFAULT_URN_NAMESPACE
): Urn {
  if (parts.length === 1 && !/[(),]/.test(parts[0])) {
    return `urn:${namespace}:${entityType}:${parts[0]}`;
  }
  return `urn:${namespace}:${entityType}:(${parts.join(',')})`;
}

export function makeDataPlatformUrn(platform: string): Urn {
  if (platform.startsWith('urn:li:dataPlatform:')) {
    return platform;
  }
  return makeUrn('dataPlatform', [platform]);
}

export function makeDataPlatformInstanceUrn(platform: string, instance: string): Urn {
  return makeUrn('dataPlatformInstance', [makeDataPlatformUrn(platform), instance]);
}

export function makeDatasetUrn(platform: string, name: string, env = 'PROD'): Urn {
  return makeUrn('dataset', [makeDataPlatformUrn(platform), name, env]);
}

export function makeContainerUrn(guid: string): Urn {
  if (guid.startsWith('urn:li:container:')) {
    return guid;
  }
  return makeUrn('container', [guid]);
}

/**
 * Lowercase the name component of a dataset URN.
 * Platform and environment are left as they are; other URNs are returned unchanged.
 */
export function lowercaseDatasetUrn(urn: Urn): Urn {
  const parsed = parseUrn(urn);
  if (!parsed || parsed.entityType !== 'dataset' || parsed.parts.length !== 3) {
    return urn;
  }

  const [platform, name, env] = parsed.parts;
  return makeUrn('dataset', [platform, name.toLowerCase(), env], parsed.namespace);
}
