// Schema registry
//
// Data-driven schema declarations. Each schema is a static table of field
// descriptors consulted at run time by the validation engine, the
// dispatcher and the diff engine. Snapshots are frozen plain objects
// tagged with their schema under the SCHEMA symbol.

import {
  SCHEMA,
  isNullish,
  isRecord,
  schemaOf,
  validateSchemaDefinition,
  type FieldDefinition,
  type FieldDescriptor,
  type FieldName,
  type RuntimeConfig,
  type SchemaDefinition,
  type SchemaDescriptor,
  type SchemaName,
  type Snapshot,
  type ValidatorSpec,
} from '@lumen-state/protocol';
import { resolveConfig, validationEnabled, type RuntimeConfigInput } from '../config.js';
import { SchemaDefinitionError } from '../errors.js';
import { formatValue } from '../inspect.js';
import { consoleLogger, type Logger } from '../logging.js';
import { span, type TelemetryBus } from '../telemetry/index.js';
import { defaultForType, handleError, validateField } from '../validation/index.js';

export type CreateResult<S extends object> =
  | { ok: true; state: Snapshot<S> }
  | { ok: false; missing: FieldName[] };

/**
 * What the registry needs from a schema to embed it in another.
 */
export interface EmbeddableSchema extends SchemaDescriptor {
  initial(): object;
  createWith(attrs: Record<string, unknown>, config: Readonly<RuntimeConfig>): CreateResult<object>;
}

type RegistryContext = {
  config(): Readonly<RuntimeConfig>;
  logger: Logger;
  telemetry?: TelemetryBus;
  resolve(name: SchemaName): EmbeddableSchema | undefined;
};

function describeField(name: FieldName, definition: FieldDefinition): FieldDescriptor {
  if ('embed' in definition) {
    return {
      name,
      type: { kind: 'schema', name: definition.embed },
      nullable: definition.nullable ?? true,
      validators: [],
      default: null,
      required: false,
      redact: false,
      doc: definition.doc,
      embed: { schema: definition.embed, cardinality: 'one' },
    };
  }

  if ('embedMany' in definition) {
    return {
      name,
      type: { kind: 'list', of: { kind: 'schema', name: definition.embedMany } },
      nullable: false,
      validators: [],
      default: [],
      required: false,
      redact: false,
      doc: definition.doc,
      embed: { schema: definition.embedMany, cardinality: 'many' },
    };
  }

  const nullable =
    definition.nullable ?? (typeof definition.type === 'object' && definition.type.kind === 'nullable');

  let validators: readonly ValidatorSpec[] = [];
  if (typeof definition.validate === 'function') {
    validators = [{ kind: 'custom', check: definition.validate }];
  } else if (definition.validate) {
    validators = definition.validate;
  }

  return {
    name,
    type: definition.type,
    nullable,
    validators,
    default: 'default' in definition ? definition.default : nullable ? null : defaultForType(definition.type),
    required: definition.required ?? false,
    redact: definition.redact ?? false,
    doc: definition.doc,
  };
}

// Fresh copies so snapshots never share a mutable default
function copyDefault(value: unknown): unknown {
  if (Array.isArray(value)) return [...value];
  if (isRecord(value)) return { ...value };
  return value;
}

/**
 * A declared schema. Produces and updates snapshots of shape S.
 */
export class Schema<S extends object> implements EmbeddableSchema {
  readonly name: SchemaName;
  readonly fieldNames: readonly FieldName[];
  /** Fields that hold nested schemas */
  readonly embeds: readonly FieldName[];

  private readonly descriptors: ReadonlyMap<FieldName, FieldDescriptor>;

  constructor(
    name: SchemaName,
    definition: SchemaDefinition<S>,
    private readonly context: RegistryContext
  ) {
    this.name = name;
    const entries: [FieldName, FieldDefinition][] = Object.entries(definition);
    this.descriptors = new Map(entries.map(([field, def]) => [field, Object.freeze(describeField(field, def))]));
    this.fieldNames = Object.freeze(entries.map(([field]) => field));
    this.embeds = Object.freeze(this.fieldNames.filter((field) => this.descriptors.get(field)?.embed));
  }

  field(name: FieldName): FieldDescriptor | undefined {
    return this.descriptors.get(name);
  }

  /**
   * Whether a value is a snapshot of this schema.
   */
  is(value: unknown): value is Snapshot<S> {
    return schemaOf(value)?.name === this.name;
  }

  /**
   * Snapshot holding every field's default. Single embeds start as their
   * schema's initial snapshot.
   */
  initial(): Snapshot<S> {
    const values: Record<string, unknown> = {};
    for (const [name, descriptor] of this.descriptors) {
      values[name] =
        descriptor.embed?.cardinality === 'one'
          ? this.embedded(descriptor.embed.schema).initial()
          : copyDefault(descriptor.default);
    }
    return this.tag(values);
  }

  /**
   * Build a snapshot from attributes merged over the defaults.
   * Unknown keys are ignored; plain objects under embed fields become
   * snapshots of the embedded schema.
   */
  create(attrs: Record<string, unknown> = {}): CreateResult<S> {
    return this.createWith(attrs, this.context.config());
  }

  /**
   * @throws SchemaDefinitionError listing missing required fields
   */
  createOrThrow(attrs: Record<string, unknown> = {}): Snapshot<S> {
    const result = this.create(attrs);
    if (!result.ok) {
      throw new SchemaDefinitionError(
        this.name,
        `missing required fields ${formatValue(result.missing)}`
      );
    }
    return result.state;
  }

  createWith(attrs: Record<string, unknown>, config: Readonly<RuntimeConfig>): CreateResult<S> {
    const values = this.valuesOf(this.initial());
    const missing: FieldName[] = [];

    for (const [name, raw] of Object.entries(attrs)) {
      const descriptor = this.descriptors.get(name);
      if (!descriptor) continue;

      const converted = this.convertEmbed(descriptor, raw, config);
      if (!converted.ok) {
        missing.push(...converted.missing.map((child) => `${name}.${child}`));
        continue;
      }
      this.check(descriptor, converted.value, config);
      values[name] = converted.value;
    }

    for (const [name, descriptor] of this.descriptors) {
      if (descriptor.required && isNullish(values[name]) && !missing.includes(name)) {
        missing.push(name);
      }
    }

    return missing.length > 0 ? { ok: false, missing } : { ok: true, state: this.tag(values) };
  }

  /**
   * New snapshot with one field replaced. The value is validated when
   * validateAt is "runtime"; failures follow onError.
   *
   * @throws SchemaDefinitionError for a field the schema does not declare
   * @throws TypeMismatchError on a failing value when onError is "raise"
   */
  set<K extends keyof S & string>(state: Snapshot<S>, field: K, value: unknown): Snapshot<S> {
    return this.apply(state, [[field, value]]);
  }

  /**
   * New snapshot with several fields replaced, in patch order.
   * Configuration is read once for the whole patch.
   */
  update(state: Snapshot<S>, patch: Partial<Record<keyof S & string, unknown>>): Snapshot<S> {
    return this.apply(state, Object.entries(patch));
  }

  inspect(state: Snapshot<S>): string {
    return formatValue(state);
  }

  private apply(state: Snapshot<S>, entries: [string, unknown][]): Snapshot<S> {
    const config = this.context.config();
    const values = this.valuesOf(state);

    for (const [name, value] of entries) {
      const descriptor = this.descriptors.get(name);
      if (!descriptor) {
        throw new SchemaDefinitionError(this.name, `unknown field "${name}"`, { field: name });
      }
      this.check(descriptor, value, config);
      values[name] = value;
    }

    return this.tag(values);
  }

  private check(descriptor: FieldDescriptor, value: unknown, config: Readonly<RuntimeConfig>): void {
    if (!validationEnabled(config)) return;

    const { logger, telemetry } = this.context;
    span(telemetry, 'validation', { schema: this.name, action: `set_${descriptor.name}`, args: [value] }, () =>
      handleError(validateField(descriptor.name, value, descriptor), this.name, descriptor.name, {
        config,
        logger,
        telemetry,
      })
    );
  }

  private convertEmbed(
    descriptor: FieldDescriptor,
    raw: unknown,
    config: Readonly<RuntimeConfig>
  ): { ok: true; value: unknown } | { ok: false; missing: FieldName[] } {
    const embed = descriptor.embed;
    if (!embed) return { ok: true, value: raw };

    const child = this.embedded(embed.schema);
    if (embed.cardinality === 'one') {
      if (!isRecord(raw) || schemaOf(raw)) return { ok: true, value: raw };
      const result = child.createWith(raw, config);
      return result.ok ? { ok: true, value: result.state } : result;
    }

    if (!Array.isArray(raw)) return { ok: true, value: raw };
    const items: unknown[] = [];
    for (const [index, item] of raw.entries()) {
      if (!isRecord(item) || schemaOf(item)) {
        items.push(item);
        continue;
      }
      const result = child.createWith(item, config);
      if (!result.ok) {
        return { ok: false, missing: result.missing.map((field) => `${index}.${field}`) };
      }
      items.push(result.state);
    }
    return { ok: true, value: items };
  }

  private embedded(name: SchemaName): EmbeddableSchema {
    const child = this.context.resolve(name);
    if (!child) {
      throw new SchemaDefinitionError(this.name, `embedded schema "${name}" is not defined`);
    }
    return child;
  }

  private valuesOf(state: object): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const name of this.fieldNames) {
      values[name] = Reflect.get(state, name);
    }
    return values;
  }

  private tag(values: Record<string, unknown>): Snapshot<S> {
    const snapshot = Object.freeze({ ...values, [SCHEMA]: this });
    if (!this.is(snapshot)) {
      throw new SchemaDefinitionError(this.name, 'snapshot lost its schema tag');
    }
    return snapshot;
  }
}

export type SchemaRegistryOptions = {
  config?: RuntimeConfigInput;
  logger?: Logger;
  telemetry?: TelemetryBus;
};

/**
 * Registry of declared schemas sharing one configuration, logger and
 * telemetry bus.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<SchemaName, EmbeddableSchema>();
  private config: Readonly<RuntimeConfig>;
  private readonly context: RegistryContext;

  constructor(options: SchemaRegistryOptions = {}) {
    this.config = resolveConfig(options.config);
    this.context = {
      config: () => this.config,
      logger: options.logger ?? consoleLogger,
      telemetry: options.telemetry,
      resolve: (name) => this.schemas.get(name),
    };
  }

  /**
   * Declare a schema.
   *
   * @throws SchemaDefinitionError if the definition is malformed or the name is taken
   */
  define<S extends object>(name: SchemaName, fields: SchemaDefinition<S>): Schema<S> {
    const result = validateSchemaDefinition(name, fields);
    if (!result.valid) {
      throw new SchemaDefinitionError(
        name,
        `invalid definition: ${result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
        { issues: result.errors }
      );
    }
    if (this.schemas.has(name)) {
      throw new SchemaDefinitionError(name, 'already defined');
    }

    for (const warning of result.warnings) {
      this.context.logger.warn(`Schema ${name}: ${warning.message}`, { path: warning.path, code: warning.code });
    }

    const schema = new Schema<S>(name, fields, this.context);
    this.schemas.set(name, schema);
    return schema;
  }

  get(name: SchemaName): SchemaDescriptor | undefined {
    return this.schemas.get(name);
  }

  has(name: SchemaName): boolean {
    return this.schemas.has(name);
  }

  names(): SchemaName[] {
    return [...this.schemas.keys()];
  }

  /**
   * Replace configuration for subsequent operations.
   */
  configure(input: RuntimeConfigInput): Readonly<RuntimeConfig> {
    this.config = resolveConfig({ ...this.config, ...input });
    return this.config;
  }

  currentConfig(): Readonly<RuntimeConfig> {
    return this.config;
  }
}

export function createSchemaRegistry(options: SchemaRegistryOptions = {}): SchemaRegistry {
  return new SchemaRegistry(options);
}
