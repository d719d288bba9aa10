// Schema types - field layout and snapshot identity
//
// A schema is a static table of field descriptors. Snapshots are frozen
// objects whose own enumerable string keys are the schema's fields and
// which carry their schema descriptor under the SCHEMA symbol.

import type { FieldName, SchemaName } from './common.js';
import type { CustomCheck, ValidatorSpec } from './validators.js';

export type PrimitiveType = 'string' | 'integer' | 'number' | 'boolean' | 'any' | 'map' | 'list';

export const PRIMITIVE_TYPES: readonly PrimitiveType[] = [
  'string',
  'integer',
  'number',
  'boolean',
  'any',
  'map',
  'list',
];

/**
 * Type specification for a field value
 */
export type TypeSpec =
  | PrimitiveType
  | { kind: 'list'; of: TypeSpec }
  | { kind: 'map'; key: TypeSpec; value: TypeSpec }
  | { kind: 'nullable'; of: TypeSpec }
  | { kind: 'enum'; values: readonly unknown[] }
  | { kind: 'schema'; name: SchemaName }
  | { kind: 'tuple'; items: readonly TypeSpec[] };

export type EmbedCardinality = 'one' | 'many';

/**
 * Static metadata for one field. Read-only to the engines.
 */
export type FieldDescriptor = {
  name: FieldName;
  type: TypeSpec;
  nullable: boolean;
  validators: readonly ValidatorSpec[];
  default: unknown;
  required: boolean;
  /** Hidden from inspect() output */
  redact: boolean;
  doc?: string;
  embed?: {
    schema: SchemaName;
    cardinality: EmbedCardinality;
  };
};

/**
 * What the engines need to know about a declared schema.
 */
export type SchemaDescriptor = {
  readonly name: SchemaName;
  /** Field names in declaration order */
  readonly fieldNames: readonly FieldName[];
  field(name: FieldName): FieldDescriptor | undefined;
};

/**
 * Field definition as written by schema authors
 */
export type ValueFieldDefinition = {
  type: TypeSpec;
  default?: unknown;
  nullable?: boolean;
  required?: boolean;
  redact?: boolean;
  doc?: string;
  validate?: readonly ValidatorSpec[] | CustomCheck;
};

export type EmbedOneFieldDefinition = {
  embed: SchemaName;
  nullable?: boolean;
  doc?: string;
};

export type EmbedManyFieldDefinition = {
  embedMany: SchemaName;
  doc?: string;
};

export type FieldDefinition =
  | ValueFieldDefinition
  | EmbedOneFieldDefinition
  | EmbedManyFieldDefinition;

/**
 * Schema definition: field definitions keyed by field name, in declaration order.
 */
export type SchemaDefinition<S extends object = Record<string, unknown>> = {
  [K in keyof S & string]: FieldDefinition;
};

// --- Snapshot identity ---

export const SCHEMA: unique symbol = Symbol.for('lumen-state.schema');

/**
 * An immutable state value of a declared schema.
 */
export type Snapshot<S extends object = Record<string, unknown>> = Readonly<S> & {
  readonly [SCHEMA]: SchemaDescriptor;
};

function isSchemaDescriptor(value: unknown): value is SchemaDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'fieldNames' in value &&
    Array.isArray(value.fieldNames) &&
    'field' in value &&
    typeof value.field === 'function'
  );
}

/**
 * Read the schema descriptor a snapshot was created from.
 *
 * @returns The descriptor, or undefined if the value is not a snapshot
 */
export function schemaOf(value: unknown): SchemaDescriptor | undefined {
  if (typeof value !== 'object' || value === null || !(SCHEMA in value)) {
    return undefined;
  }
  const descriptor = value[SCHEMA];
  return isSchemaDescriptor(descriptor) ? descriptor : undefined;
}

export function isSnapshot(value: unknown): value is Snapshot {
  return schemaOf(value) !== undefined;
}

export function isPrimitiveType(value: unknown): value is PrimitiveType {
  return PRIMITIVE_TYPES.some((type) => type === value);
}
