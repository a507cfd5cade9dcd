// Aspect Schema Registry - the catalogue of aspect descriptors
//
// Descriptors are registered while the service starts, then the registry is
// sealed. After sealing it is read-only and safe to share between concurrent
// change processors.

import {
  validateAspectDescriptor,
  WILDCARD_PATH,
  type AspectDescriptor,
  type AspectPayload,
  type FieldDescriptor,
  type SearchFieldType,
} from '@metagraph/protocol';
import {
  DuplicateAspectError,
  InvalidAspectDescriptorError,
  MissingRequiredFieldError,
  RegistrySealedError,
  UnknownAspectError,
  UnknownFieldError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/index.js';

/**
 * A searchable field with its hint defaults resolved
 */
export type SearchableField = {
  readonly field: FieldDescriptor;
  readonly fieldName: string;
  readonly fieldType: SearchFieldType;
  readonly queryByDefault: boolean;

  /**
   * One index op per array element instead of one for the whole array
   */
  readonly expandElements: boolean;
};

export type TimeseriesCollectionField = {
  readonly field: FieldDescriptor;
  readonly collectionKey: string;
};

/**
 * A registered descriptor plus the lookups derived from it at registration.
 * Frozen; the field map is exposed read-only.
 */
export type ResolvedAspectDescriptor = {
  readonly descriptor: AspectDescriptor;
  readonly name: string;
  readonly kind: AspectDescriptor['kind'];
  readonly fieldsByName: ReadonlyMap<string, FieldDescriptor>;
  readonly requiredFields: readonly FieldDescriptor[];
  readonly searchableFields: readonly SearchableField[];
  readonly timeseriesFields: readonly FieldDescriptor[];
  readonly timeseriesCollections: readonly TimeseriesCollectionField[];
};

export type PayloadValidationError = UnknownAspectError | UnknownFieldError | MissingRequiredFieldError;

export type PayloadValidationResult =
  | { valid: true; descriptor: ResolvedAspectDescriptor }
  | { valid: false; error: PayloadValidationError };

export type AspectRegistryOptions = {
  /**
   * Receives descriptor warnings (e.g. missing descriptions)
   */
  logger?: Logger;
};

/**
 * A value that is null or undefined counts as absent
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function resolve(source: AspectDescriptor): ResolvedAspectDescriptor {
  const descriptor = deepFreeze(structuredClone(source));

  const searchableFields: SearchableField[] = [];
  const timeseriesFields: FieldDescriptor[] = [];
  const timeseriesCollections: TimeseriesCollectionField[] = [];

  for (const field of descriptor.fields) {
    if (field.search) {
      searchableFields.push({
        field,
        fieldName: field.search.fieldName ?? field.name,
        fieldType: field.search.fieldType,
        queryByDefault: field.search.queryByDefault,
        expandElements: field.search.path === WILDCARD_PATH,
      });
    }
    if (field.timeseries?.isField) {
      timeseriesFields.push(field);
    }
    if (field.timeseries?.isCollection && field.timeseries.collectionKey) {
      timeseriesCollections.push({ field, collectionKey: field.timeseries.collectionKey });
    }
  }

  const resolved: ResolvedAspectDescriptor = {
    descriptor,
    name: descriptor.name,
    kind: descriptor.kind,
    fieldsByName: new Map(descriptor.fields.map((f) => [f.name, f])),
    requiredFields: descriptor.fields.filter((f) => !f.optional),
    searchableFields,
    timeseriesFields,
    timeseriesCollections,
  };

  return deepFreeze(resolved);
}

/**
 * Registry of aspect descriptors keyed by aspect name.
 */
export class AspectRegistry {
  private readonly descriptors = new Map<string, ResolvedAspectDescriptor>();
  private readonly logger: Logger;
  private isSealed = false;

  constructor(options: AspectRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate and add a descriptor.
   *
   * @throws RegistrySealedError after seal()
   * @throws DuplicateAspectError when the name is taken
   * @throws InvalidAspectDescriptorError when the descriptor is inconsistent
   */
  register(descriptor: AspectDescriptor): ResolvedAspectDescriptor {
    if (this.isSealed) {
      throw new RegistrySealedError(descriptor.name);
    }
    if (this.descriptors.has(descriptor.name)) {
      throw new DuplicateAspectError(descriptor.name);
    }

    const result = validateAspectDescriptor(descriptor);
    if (!result.valid) {
      throw new InvalidAspectDescriptorError(descriptor.name, result.errors);
    }
    for (const warning of result.warnings) {
      this.logger.warn(`Aspect ${descriptor.name}: ${warning.message}`, {
        path: warning.path,
        code: warning.code,
      });
    }

    const resolved = resolve(descriptor);
    this.descriptors.set(resolved.name, resolved);
    return resolved;
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  seal(): void {
    this.isSealed = true;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  has(aspectName: string): boolean {
    return this.descriptors.has(aspectName);
  }

  /**
   * @throws UnknownAspectError
   */
  describe(aspectName: string): ResolvedAspectDescriptor {
    const descriptor = this.descriptors.get(aspectName);
    if (!descriptor) {
      throw new UnknownAspectError(aspectName);
    }
    return descriptor;
  }

  /**
   * All descriptors in registration order
   */
  list(): ResolvedAspectDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /**
   * Check a payload against the named descriptor.
   *
   * Payload keys must be declared fields, whatever their value, and every
   * required field must be present with a non-null value. Unknown keys are reported before missing fields; within each
   * check the first offender wins (payload key order, then field order).
   */
  validate(aspectName: string, payload: AspectPayload): PayloadValidationResult {
    const descriptor = this.descriptors.get(aspectName);
    if (!descriptor) {
      return { valid: false, error: new UnknownAspectError(aspectName) };
    }

    for (const key of Object.keys(payload)) {
      if (!descriptor.fieldsByName.has(key)) {
        return { valid: false, error: new UnknownFieldError(aspectName, key) };
      }
    }

    for (const field of descriptor.requiredFields) {
      if (isAbsent(payload[field.name])) {
        return { valid: false, error: new MissingRequiredFieldError(aspectName, field.name) };
      }
    }

    return { valid: true, descriptor };
  }

  /**
   * Throwing form of validate()
   */
  assertValid(aspectName: string, payload: AspectPayload): ResolvedAspectDescriptor {
    const result = this.validate(aspectName, payload);
    if (!result.valid) {
      throw result.error;
    }
    return result.descriptor;
  }
}

/**
 * Create a registry holding the given descriptors, sealed.
 */
export function createAspectRegistry(
  descriptors: Iterable<AspectDescriptor>,
  options: AspectRegistryOptions = {}
): AspectRegistry {
  const registry = new AspectRegistry(options);
  for (const descriptor of descriptors) {
    registry.register(descriptor);
  }
  registry.seal();
  return registry;
}
