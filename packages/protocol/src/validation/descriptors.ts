// Aspect descriptor validation
//
// Checks that a descriptor is internally consistent before it is registered:
// names, field uniqueness, and annotation hints that fit the field types.

import {
  ASPECT_KINDS,
  SEARCH_FIELD_TYPES,
  TIMESTAMP_FIELD,
  WILDCARD_PATH,
  type AspectDescriptor,
  type FieldDescriptor,
} from '../types/aspects.js';

export type DescriptorValidationResult = {
  valid: boolean;
  errors: DescriptorValidationIssue<DescriptorValidationErrorCode>[];
  warnings: DescriptorValidationIssue<DescriptorValidationWarningCode>[];
};

export type DescriptorValidationIssue<TCode extends string> = {
  path: string;
  message: string;
  code: TCode;
};

export type DescriptorValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_NAME'
  | 'INVALID_VALUE'
  | 'INVALID_TYPE'
  | 'DUPLICATE_FIELD'
  | 'INVALID_HINT';

export type DescriptorValidationWarningCode = 'MISSING_DESCRIPTION' | 'EMPTY_FIELDS';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidAspectName(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Validate an aspect descriptor.
 *
 * @returns Validation result with errors (descriptor must not be registered)
 * and warnings (descriptor is usable)
 */
export function validateAspectDescriptor(descriptor: AspectDescriptor): DescriptorValidationResult {
  const errors: DescriptorValidationResult['errors'] = [];
  const warnings: DescriptorValidationResult['warnings'] = [];
  const path = 'aspect';

  if (descriptor.name.trim() === '') {
    errors.push({ path: `${path}.name`, message: 'Aspect must have a name', code: 'MISSING_FIELD' });
  } else if (!isValidAspectName(descriptor.name)) {
    errors.push({
      path: `${path}.name`,
      message: `Aspect name "${descriptor.name}" must be an identifier (letters, digits, underscores)`,
      code: 'INVALID_NAME',
    });
  }

  if (!ASPECT_KINDS.includes(descriptor.kind)) {
    errors.push({
      path: `${path}.kind`,
      message: `Aspect kind must be one of: ${ASPECT_KINDS.join(', ')}`,
      code: 'INVALID_VALUE',
    });
  }

  if (!descriptor.description) {
    warnings.push({
      path: `${path}.description`,
      message: 'Aspect should have a description',
      code: 'MISSING_DESCRIPTION',
    });
  }

  if (descriptor.fields.length === 0) {
    warnings.push({ path: `${path}.fields`, message: 'Aspect declares no fields', code: 'EMPTY_FIELDS' });
  }

  const seen = new Set<string>();
  descriptor.fields.forEach((field, index) => {
    const fieldPath = `${path}.fields[${index}]`;

    if (!IDENTIFIER_PATTERN.test(field.name)) {
      errors.push({
        path: `${fieldPath}.name`,
        message: `Field name "${field.name}" must be an identifier`,
        code: 'INVALID_NAME',
      });
    }

    if (seen.has(field.name)) {
      errors.push({
        path: `${fieldPath}.name`,
        message: `Duplicate field: ${field.name}`,
        code: 'DUPLICATE_FIELD',
      });
    }
    seen.add(field.name);

    errors.push(...validateSearchHint(field, fieldPath));
    errors.push(...validateTimeseriesHint(field, fieldPath, descriptor.kind));
  });

  if (descriptor.kind === 'timeseries') {
    const timestamp = descriptor.fields.find((f) => f.name === TIMESTAMP_FIELD);
    if (!timestamp) {
      errors.push({
        path: `${path}.fields`,
        message: `Time-series aspects must declare a "${TIMESTAMP_FIELD}" field`,
        code: 'MISSING_FIELD',
      });
    } else if (
      timestamp.optional ||
      timestamp.type.kind !== 'primitive' ||
      timestamp.type.name !== 'long'
    ) {
      errors.push({
        path: `${path}.fields.${TIMESTAMP_FIELD}`,
        message: `"${TIMESTAMP_FIELD}" must be a required long`,
        code: 'INVALID_TYPE',
      });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateSearchHint(
  field: FieldDescriptor,
  fieldPath: string
): DescriptorValidationResult['errors'] {
  const hint = field.search;
  if (!hint) return [];

  const errors: DescriptorValidationResult['errors'] = [];

  if (!SEARCH_FIELD_TYPES.includes(hint.fieldType)) {
    errors.push({
      path: `${fieldPath}.search.fieldType`,
      message: `Unknown search field type: ${hint.fieldType}`,
      code: 'INVALID_VALUE',
    });
  }

  if (hint.fieldName !== undefined && !IDENTIFIER_PATTERN.test(hint.fieldName)) {
    errors.push({
      path: `${fieldPath}.search.fieldName`,
      message: `Search field name "${hint.fieldName}" must be an identifier`,
      code: 'INVALID_NAME',
    });
  }

  if (hint.path === WILDCARD_PATH && field.type.kind !== 'array') {
    errors.push({
      path: `${fieldPath}.search.path`,
      message: `Wildcard search hint on "${field.name}" requires an array field`,
      code: 'INVALID_HINT',
    });
  }

  return errors;
}

function validateTimeseriesHint(
  field: FieldDescriptor,
  fieldPath: string,
  kind: AspectDescriptor['kind']
): DescriptorValidationResult['errors'] {
  const hint = field.timeseries;
  if (!hint) return [];

  const path = `${fieldPath}.timeseries`;

  if (kind !== 'timeseries') {
    return [
      {
        path,
        message: `Field "${field.name}" has a time-series hint but the aspect is not a time-series aspect`,
        code: 'INVALID_HINT',
      },
    ];
  }

  if (hint.isField === hint.isCollection) {
    return [
      {
        path,
        message: `Field "${field.name}" must be either a time-series field or a collection`,
        code: 'INVALID_HINT',
      },
    ];
  }

  if (hint.isCollection) {
    const errors: DescriptorValidationResult['errors'] = [];
    if (field.type.kind !== 'array') {
      errors.push({
        path,
        message: `Time-series collection "${field.name}" must be an array field`,
        code: 'INVALID_HINT',
      });
    }
    if (!hint.collectionKey) {
      errors.push({
        path: `${path}.collectionKey`,
        message: `Time-series collection "${field.name}" must name its key`,
        code: 'MISSING_FIELD',
      });
    }
    return errors;
  }

  return [];
}
