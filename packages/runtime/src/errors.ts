// Runtime error types

import type { ChangeEventIssue, ChangeType, DescriptorValidationIssue } from '@metagraph/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

// --- Registry ---

/**
 * Error when an aspect name is not registered.
 */
export class UnknownAspectError extends RuntimeError {
  readonly aspectName: string;

  constructor(aspectName: string) {
    super('UNKNOWN_ASPECT', `Unknown aspect: ${aspectName}`);
    this.name = 'UnknownAspectError';
    this.aspectName = aspectName;
  }
}

/**
 * Error when registering a name that is already taken.
 */
export class DuplicateAspectError extends RuntimeError {
  readonly aspectName: string;

  constructor(aspectName: string) {
    super('DUPLICATE_ASPECT', `Aspect already registered: ${aspectName}`);
    this.name = 'DuplicateAspectError';
    this.aspectName = aspectName;
  }
}

/**
 * Error when registering after the registry was sealed.
 */
export class RegistrySealedError extends RuntimeError {
  readonly aspectName: string;

  constructor(aspectName: string) {
    super('REGISTRY_SEALED', `Registry is sealed; cannot register ${aspectName}`);
    this.name = 'RegistrySealedError';
    this.aspectName = aspectName;
  }
}

/**
 * Error when a descriptor is internally inconsistent.
 */
export class InvalidAspectDescriptorError extends ValidationError {
  readonly aspectName: string;
  readonly issues: DescriptorValidationIssue<string>[];

  constructor(aspectName: string, issues: DescriptorValidationIssue<string>[]) {
    super(
      `Invalid aspect descriptor "${aspectName}": ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { code: 'INVALID_ASPECT_DESCRIPTOR', details: { aspectName, issues } }
    );
    this.name = 'InvalidAspectDescriptorError';
    this.aspectName = aspectName;
    this.issues = issues;
  }
}

/**
 * Error when a declaration cannot be parsed or compiled.
 */
export class InvalidAspectDeclarationError extends ValidationError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid aspect declaration (${source}): ${issues.join('; ')}`, {
      code: 'INVALID_ASPECT_DECLARATION',
      details: { source, issues },
    });
    this.name = 'InvalidAspectDeclarationError';
    this.source = source;
    this.issues = issues;
  }
}

// --- Payload validation ---

/**
 * Error when a payload carries a key the descriptor does not declare.
 */
export class UnknownFieldError extends ValidationError {
  readonly aspectName: string;
  readonly fieldName: string;

  constructor(aspectName: string, fieldName: string) {
    super(`Unknown field "${fieldName}" for aspect ${aspectName}`, {
      code: 'UNKNOWN_FIELD',
      field: fieldName,
    });
    this.name = 'UnknownFieldError';
    this.aspectName = aspectName;
    this.fieldName = fieldName;
  }
}

/**
 * Error when a non-optional field is absent (or null).
 */
export class MissingRequiredFieldError extends ValidationError {
  readonly aspectName: string;
  readonly fieldName: string;

  constructor(aspectName: string, fieldName: string) {
    super(`Missing required field "${fieldName}" for aspect ${aspectName}`, {
      code: 'MISSING_REQUIRED_FIELD',
      field: fieldName,
    });
    this.name = 'MissingRequiredFieldError';
    this.aspectName = aspectName;
    this.fieldName = fieldName;
  }
}

/**
 * Error when a field value cannot be used, e.g. a non-integer timestampMillis.
 */
export class InvalidFieldValueError extends ValidationError {
  readonly aspectName: string;
  readonly fieldName: string;

  constructor(aspectName: string, fieldName: string, reason: string) {
    super(`Invalid value for "${fieldName}" of aspect ${aspectName}: ${reason}`, {
      code: 'INVALID_FIELD_VALUE',
      field: fieldName,
    });
    this.name = 'InvalidFieldValueError';
    this.aspectName = aspectName;
    this.fieldName = fieldName;
  }
}

// --- State transitions ---

/**
 * Error when creating an aspect that is already present.
 */
export class AlreadyExistsError extends RuntimeError {
  readonly entityUrn: string;
  readonly aspectName: string;

  constructor(entityUrn: string, aspectName: string) {
    super('ALREADY_EXISTS', `Aspect ${aspectName} already exists for ${entityUrn}`);
    this.name = 'AlreadyExistsError';
    this.entityUrn = entityUrn;
    this.aspectName = aspectName;
  }
}

/**
 * Error when a change needs a present aspect and there is none.
 */
export class NotFoundError extends RuntimeError {
  readonly entityUrn: string;
  readonly aspectName: string;

  constructor(entityUrn: string, aspectName: string) {
    super('NOT_FOUND', `Aspect ${aspectName} not found for ${entityUrn}`);
    this.name = 'NotFoundError';
    this.entityUrn = entityUrn;
    this.aspectName = aspectName;
  }
}

/**
 * Error for change types that cannot be executed in the current state.
 */
export class UnsupportedOperationError extends RuntimeError {
  readonly changeType: ChangeType;
  readonly aspectName: string;

  constructor(changeType: ChangeType, aspectName: string) {
    super('UNSUPPORTED_OPERATION', `${changeType} is not supported for aspect ${aspectName}`);
    this.name = 'UnsupportedOperationError';
    this.changeType = changeType;
    this.aspectName = aspectName;
  }
}

/**
 * Error for change types that time-series aspects do not accept.
 */
export class UnsupportedForTimeseriesError extends RuntimeError {
  readonly changeType: ChangeType;
  readonly aspectName: string;

  constructor(changeType: ChangeType, aspectName: string) {
    super(
      'UNSUPPORTED_FOR_TIMESERIES',
      `${changeType} is not supported for time-series aspect ${aspectName}`
    );
    this.name = 'UnsupportedForTimeseriesError';
    this.changeType = changeType;
    this.aspectName = aspectName;
  }
}

/**
 * Error when a time-series query names a versioned aspect.
 */
export class NotTimeseriesAspectError extends RuntimeError {
  readonly aspectName: string;

  constructor(aspectName: string) {
    super('NOT_TIMESERIES_ASPECT', `Aspect ${aspectName} is not a time-series aspect`);
    this.name = 'NotTimeseriesAspectError';
    this.aspectName = aspectName;
  }
}

// --- Input ---

/**
 * Error when a value does not match the change event wire shape.
 */
export class InvalidChangeEventError extends ValidationError {
  readonly issues: ChangeEventIssue[];

  constructor(issues: ChangeEventIssue[]) {
    super(`Invalid change event: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, {
      code: 'INVALID_CHANGE_EVENT',
      details: { issues },
    });
    this.name = 'InvalidChangeEventError';
    this.issues = issues;
  }
}

export type ConfigIssue = {
  /** Environment variable name */
  path: string;
  message: string;
};

/**
 * Error when configuration values are missing or malformed.
 */
export class ConfigError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, {
      code: 'CONFIG_ERROR',
      details: { issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
