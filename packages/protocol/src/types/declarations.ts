// Declarations - the structured form of annotated aspect schema files
//
// A declaration mirrors what a schema author writes:
//
//   @Aspect = { "name": "schemaFieldAliases" }
//   record SchemaFieldAliases {
//     @Searchable = { "/*": { "fieldName": "schemaFieldAliases", "fieldType": "URN", "queryByDefault": false } }
//     aliases: optional array[Urn]
//   }
//
// Declarations are compiled into AspectDescriptors when the registry loads.

import type { AspectKind, SearchFieldType } from './aspects.js';

/**
 * Body of a `Searchable` annotation
 */
export type SearchableAnnotation = {
  fieldName?: string;
  fieldType?: SearchFieldType;
  queryByDefault?: boolean;
};

export type FieldAnnotations = {
  /**
   * Either the hint itself, or `{ "/*": hint }` for array elements
   */
  Searchable?: SearchableAnnotation | { '/*': SearchableAnnotation };
  TimeseriesField?: Record<string, never>;
  TimeseriesFieldCollection?: { key: string };
};

export type FieldDeclaration = {
  name: string;

  /**
   * Type as written in the schema, e.g. "string", "long", "Urn", "array[Urn]"
   */
  type: string;
  optional?: boolean;
  doc?: string;
  annotations?: FieldAnnotations;
};

export type AspectDeclaration = {
  Aspect: {
    name: string;
    type?: AspectKind;
  };
  doc?: string;
  fields: FieldDeclaration[];
};
