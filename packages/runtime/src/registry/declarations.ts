// Aspect declarations - compile annotated schema declarations into descriptors
//
// Declarations are the authoring format (builtins in @metagraph/protocol plus
// JSON files on disk). The registry only ever sees the compiled descriptors.

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  PRIMITIVE_TYPE_NAMES,
  SEARCH_FIELD_TYPES,
  WILDCARD_PATH,
  type AspectDescriptor,
  type FieldDescriptor,
  type FieldValueType,
  type PrimitiveTypeName,
  type ScalarValueType,
  type SearchFieldType,
  type SearchHint,
  type TimeseriesHint,
} from '@metagraph/protocol';
import { InvalidAspectDeclarationError } from '../errors.js';

function isSearchFieldType(value: unknown): value is SearchFieldType {
  return SEARCH_FIELD_TYPES.some((t) => t === value);
}

const SearchableAnnotationSchema = z
  .object({
    fieldName: z.string().min(1).optional(),
    fieldType: z
      .custom<SearchFieldType>(isSearchFieldType, { message: 'unknown search field type' })
      .optional(),
    queryByDefault: z.boolean().optional(),
  })
  .strict();

const FieldDeclarationSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().min(1),
    optional: z.boolean().optional(),
    doc: z.string().optional(),
    annotations: z
      .object({
        Searchable: z
          .union([
            SearchableAnnotationSchema,
            z.object({ [WILDCARD_PATH]: SearchableAnnotationSchema }).strict(),
          ])
          .optional(),
        TimeseriesField: z.object({}).strict().optional(),
        TimeseriesFieldCollection: z.object({ key: z.string().min(1) }).strict().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const AspectDeclarationSchema = z
  .object({
    Aspect: z
      .object({
        name: z.string().min(1),
        type: z.enum(['versioned', 'timeseries']).optional(),
      })
      .strict(),
    doc: z.string().optional(),
    fields: z.array(FieldDeclarationSchema),
  })
  .strict();

type ParsedFieldDeclaration = z.infer<typeof FieldDeclarationSchema>;
type ParsedSearchable = z.infer<typeof SearchableAnnotationSchema>;

// Search types that free-text queries match unless told otherwise
const QUERY_BY_DEFAULT_TYPES: readonly SearchFieldType[] = [
  'TEXT',
  'TEXT_PARTIAL',
  'WORD_GRAM',
  'URN',
  'URN_PARTIAL',
];

const NUMERIC_TYPES: readonly PrimitiveTypeName[] = ['int', 'long', 'float', 'double'];

const ARRAY_PATTERN = /^array\s*\[(.+)\]$/;
const MAP_PATTERN = /^map\s*\[.*\]$/;
const RECORD_PATTERN = /^[A-Z][A-Za-z0-9_]*$/;

function parseScalarType(type: string): ScalarValueType | null {
  if (MAP_PATTERN.test(type)) {
    return { kind: 'primitive', name: 'map' };
  }
  const primitive = PRIMITIVE_TYPE_NAMES.find((name) => name === type);
  if (primitive) {
    return { kind: 'primitive', name: primitive };
  }
  if (type.endsWith('Urn')) {
    return { kind: 'urn' };
  }
  if (RECORD_PATTERN.test(type)) {
    return { kind: 'primitive', name: 'record' };
  }
  return null;
}

/**
 * Parse a declared type such as "long", "Urn", "array[Urn]" or "map[string, string]".
 * Names ending in "Urn" are URN references; other capitalised names are records.
 *
 * @returns The value type, or null when the type is not understood
 */
export function parseFieldType(type: string): FieldValueType | null {
  const trimmed = type.trim();
  const array = ARRAY_PATTERN.exec(trimmed);
  if (array) {
    const inner = array[1].trim();
    if (ARRAY_PATTERN.test(inner)) {
      return null;
    }
    const items = parseScalarType(inner);
    return items ? { kind: 'array', items } : null;
  }
  return parseScalarType(trimmed);
}

function defaultSearchFieldType(type: FieldValueType): SearchFieldType {
  const scalar = type.kind === 'array' ? type.items : type;
  if (scalar.kind === 'urn') {
    return 'URN';
  }
  if (scalar.name === 'boolean') {
    return 'BOOLEAN';
  }
  if (NUMERIC_TYPES.includes(scalar.name)) {
    return 'COUNT';
  }
  return 'KEYWORD';
}

function compileSearchHint(
  field: ParsedFieldDeclaration,
  type: FieldValueType
): SearchHint | null {
  const annotation = field.annotations?.Searchable;
  if (!annotation) {
    return null;
  }

  let body: ParsedSearchable;
  let wildcard = false;
  if (WILDCARD_PATH in annotation) {
    body = annotation[WILDCARD_PATH];
    wildcard = true;
  } else {
    body = annotation;
  }

  const fieldType = body.fieldType ?? defaultSearchFieldType(type);
  const hint: SearchHint = {
    fieldName: body.fieldName ?? field.name,
    fieldType,
    queryByDefault: body.queryByDefault ?? QUERY_BY_DEFAULT_TYPES.includes(fieldType),
  };
  if (wildcard) {
    hint.path = WILDCARD_PATH;
  }
  return hint;
}

function compileTimeseriesHint(field: ParsedFieldDeclaration): TimeseriesHint | null {
  const annotations = field.annotations;
  if (annotations?.TimeseriesFieldCollection) {
    return {
      isField: false,
      isCollection: true,
      collectionKey: annotations.TimeseriesFieldCollection.key,
    };
  }
  if (annotations?.TimeseriesField) {
    return { isField: true, isCollection: false };
  }
  return null;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
  );
}

/**
 * Compile a declaration into an aspect descriptor.
 *
 * Applies the search hint defaults: the index field name is the field name,
 * the index type follows the value type (URN, BOOLEAN, COUNT, else KEYWORD),
 * and queryByDefault is on for text-like and URN types.
 *
 * The result is not validated for consistency; the registry does that on register.
 *
 * @param source - Where the declaration came from, used in error messages
 * @throws InvalidAspectDeclarationError when the declaration is malformed
 */
export function compileAspectDeclaration(declaration: unknown, source = 'inline'): AspectDescriptor {
  const parsed = AspectDeclarationSchema.safeParse(declaration);
  if (!parsed.success) {
    throw new InvalidAspectDeclarationError(source, describeIssues(parsed.error));
  }

  const { Aspect, doc, fields } = parsed.data;
  const issues: string[] = [];
  const compiled: FieldDescriptor[] = [];

  fields.forEach((field, index) => {
    const type = parseFieldType(field.type);
    if (!type) {
      issues.push(`fields.${index}.type: unknown type "${field.type}" for field ${field.name}`);
      return;
    }
    if (field.annotations?.TimeseriesField && field.annotations.TimeseriesFieldCollection) {
      issues.push(
        `fields.${index}.annotations: ${field.name} cannot be both TimeseriesField and TimeseriesFieldCollection`
      );
      return;
    }

    const descriptor: FieldDescriptor = {
      name: field.name,
      type,
      optional: field.optional ?? false,
      search: compileSearchHint(field, type),
      timeseries: compileTimeseriesHint(field),
    };
    if (field.doc !== undefined) {
      descriptor.description = field.doc;
    }
    compiled.push(descriptor);
  });

  if (issues.length > 0) {
    throw new InvalidAspectDeclarationError(source, issues);
  }

  const descriptor: AspectDescriptor = {
    name: Aspect.name,
    kind: Aspect.type ?? 'versioned',
    fields: compiled,
  };
  if (doc !== undefined) {
    descriptor.description = doc;
  }
  return descriptor;
}

/**
 * Load declarations from every *.json file in a directory, in file name order.
 * A file holds one declaration or an array of them.
 *
 * @throws InvalidAspectDeclarationError naming the file when it is not JSON or not a declaration
 */
export async function loadDeclarationsFromDirectory(dir: string): Promise<AspectDescriptor[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .sort();

  const descriptors: AspectDescriptor[] = [];
  for (const file of files) {
    const content = await readFile(join(dir, file), 'utf-8');

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new InvalidAspectDeclarationError(file, [
        `not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }

    const declarations: unknown[] = Array.isArray(json) ? json : [json];
    declarations.forEach((declaration, index) => {
      const source = declarations.length > 1 ? `${file}[${index}]` : file;
      descriptors.push(compileAspectDeclaration(declaration, source));
    });
  }

  return descriptors;
}
