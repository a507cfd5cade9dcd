// Bundle import checked against the registry

import { bundle, type RepositoryContext, type TransactionalRepositoryContext } from '@metagraph/repositories';
import type { AspectRegistry } from '../registry/index.js';

/**
 * Accepts a bundle record only when its aspect is registered with the kind of
 * log it came from and its payload satisfies the descriptor.
 */
export function bundleRecordValidator(registry: AspectRegistry): bundle.BundleRecordValidator {
  return ({ kind, record }) => {
    const result = registry.validate(record.aspectName, record.payload);
    if (!result.valid) {
      return result.error.message;
    }
    const expected = kind === 'aspect' ? 'versioned' : 'timeseries';
    if (result.descriptor.kind !== expected) {
      return `Aspect ${record.aspectName} is ${result.descriptor.kind}, not ${expected}`;
    }
    return null;
  };
}

export type ImportBundleContext = {
  registry: AspectRegistry;
  repos: RepositoryContext | TransactionalRepositoryContext;
  reader: bundle.BundleReader;
};

/**
 * Import a bundle, refusing records the registry would not accept as changes
 */
export function importBundle(
  ctx: ImportBundleContext,
  bundlePath: string,
  options: Omit<bundle.ImportOptions, 'validateRecord'> = {}
): Promise<bundle.ImportSummary> {
  return bundle.importAspectBundle(ctx.repos, ctx.reader, bundlePath, {
    ...options,
    validateRecord: bundleRecordValidator(ctx.registry),
  });
}
