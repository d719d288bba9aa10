// Tests for the schema registry

import { describe, it, expect } from 'vitest';
import {
  VALIDATION_START,
  VALIDATION_STOP,
  eventKey,
  schemaOf,
  type Snapshot,
} from '@lumen-state/protocol';
import { SchemaDefinitionError, TypeMismatchError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logging.js';
import { createTelemetryBus } from '../telemetry/index.js';
import { createSchemaRegistry, type SchemaRegistryOptions } from './registry.js';

type Counter = { count: number; label: string | null };

function defineCounter(options: SchemaRegistryOptions = {}) {
  const registry = createSchemaRegistry({ logger: silentLogger, ...options });
  const counter = registry.define<Counter>('Counter', {
    count: { type: 'integer', default: 0, required: true },
    label: { type: 'string', nullable: true },
  });
  return { registry, counter };
}

describe('SchemaRegistry.define', () => {
  it('exposes fields in declaration order with their descriptors', () => {
    const { counter } = defineCounter();

    expect(counter.name).toBe('Counter');
    expect(counter.fieldNames).toEqual(['count', 'label']);
    expect(counter.field('count')).toEqual({
      name: 'count',
      type: 'integer',
      nullable: false,
      validators: [],
      default: 0,
      required: true,
      redact: false,
    });
    expect(counter.field('label')?.nullable).toBe(true);
    expect(counter.field('label')?.default).toBeNull();
    expect(counter.field('missing')).toBeUndefined();
  });

  it('turns a check function into a custom validator', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const check = (value: unknown) => value !== '';
    const schema = registry.define<{ name: string }>('Named', { name: { type: 'string', validate: check } });

    expect(schema.field('name')?.validators).toEqual([{ kind: 'custom', check }]);
  });

  it('rejects malformed definitions', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });

    let thrown: unknown;
    try {
      registry.define<{ count: number }>('bad name', { count: { type: 'integer' } });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(SchemaDefinitionError);
    if (thrown instanceof SchemaDefinitionError) {
      expect(thrown.code).toBe('SCHEMA_DEFINITION_ERROR');
      expect(thrown.issues.map((issue) => issue.code)).toEqual(['INVALID_NAME']);
    }
  });

  it('rejects a duplicate schema name', () => {
    const { registry } = defineCounter();

    expect(() => registry.define<{ count: number }>('Counter', { count: { type: 'integer' } })).toThrow(
      'Schema Counter: already defined'
    );
  });

  it('logs definition warnings', () => {
    const logger = createCapturingLogger();
    const registry = createSchemaRegistry({ logger });

    registry.define('Empty', {});

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0].level).toBe('warn');
    expect(logger.entries[0].message).toBe('Schema Empty: Schema declares no fields');
  });

  it('tracks defined names', () => {
    const { registry } = defineCounter();

    expect(registry.names()).toEqual(['Counter']);
    expect(registry.has('Counter')).toBe(true);
    expect(registry.get('Counter')?.fieldNames).toEqual(['count', 'label']);
  });
});

describe('Schema snapshots', () => {
  it('starts from defaults as a frozen, tagged snapshot', () => {
    const { counter } = defineCounter();

    const state = counter.initial();

    expect(state.count).toBe(0);
    expect(state.label).toBeNull();
    expect(Object.isFrozen(state)).toBe(true);
    expect(schemaOf(state)?.name).toBe('Counter');
    expect(counter.is(state)).toBe(true);
    expect(counter.is({ count: 0, label: null })).toBe(false);
  });

  it('gives each snapshot its own copy of collection defaults', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const todo = registry.define<{ tags: string[] }>('Todo', { tags: { type: { kind: 'list', of: 'string' } } });

    const a = todo.initial();
    const b = todo.initial();

    expect(a.tags).toEqual([]);
    expect(a.tags).not.toBe(b.tags);
  });

  it('creates snapshots from attributes, ignoring unknown keys', () => {
    const { counter } = defineCounter();

    const result = counter.create({ count: 5, extra: true });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.state.count).toBe(5);
      expect(result.state.label).toBeNull();
      expect(Object.keys(result.state)).toEqual(['count', 'label']);
    }
  });

  it('reports missing required fields', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const post = registry.define<{ title: string; body: string }>('Post', {
      title: { type: 'string', required: true },
      body: { type: 'string', default: '' },
    });

    expect(post.create({ body: 'text' })).toEqual({ ok: false, missing: ['title'] });
    expect(() => post.createOrThrow({})).toThrow('Schema Post: missing required fields ["title"]');
    expect(post.createOrThrow({ title: 'Hello' }).title).toBe('Hello');
  });

  it('sets a field on a new snapshot, leaving the old one alone', () => {
    const { counter } = defineCounter();
    const before = counter.initial();

    const after = counter.set(before, 'count', 3);

    expect(after.count).toBe(3);
    expect(before.count).toBe(0);
    expect(counter.is(after)).toBe(true);
    expect(Object.isFrozen(after)).toBe(true);
  });

  it('updates several fields at once', () => {
    const { counter } = defineCounter();

    const state = counter.update(counter.initial(), { count: 2, label: 'two' });

    expect(state.count).toBe(2);
    expect(state.label).toBe('two');
  });

  it('rejects unknown fields on update', () => {
    const { counter } = defineCounter();
    const patch: Record<string, unknown> = { missing: 1 };

    expect(() => counter.update(counter.initial(), patch)).toThrow('Schema Counter: unknown field "missing"');
  });

  it('hides redacted fields when inspected', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const account = registry.define<{ email: string; password: string }>('Account', {
      email: { type: 'string' },
      password: { type: 'string', redact: true },
    });

    const state = account.createOrThrow({ email: 'a@b.c', password: 'test-secret' });

    expect(account.inspect(state)).toBe('#Account<{email: "a@b.c", redacted: [password]}>');
  });
});

describe('setter validation', () => {
  it('raises on a type mismatch when validation runs and on_error is raise', () => {
    const { counter } = defineCounter({ config: { validateAt: 'runtime', onError: 'raise' } });

    expect(() => counter.set(counter.initial(), 'count', 'abc')).toThrow(TypeMismatchError);
  });

  it('assigns the value when on_error is ignore', () => {
    const { counter } = defineCounter({ config: { validateAt: 'runtime', onError: 'ignore' } });

    const state = counter.set(counter.initial(), 'count', 'abc');

    expect(state.count).toBe('abc');
  });

  it('logs and assigns when on_error is log', () => {
    const logger = createCapturingLogger();
    const { counter } = defineCounter({ config: { validateAt: 'runtime' }, logger });

    const state = counter.set(counter.initial(), 'count', 'abc');

    expect(state.count).toBe('abc');
    expect(logger.entries.map((e) => e.level)).toEqual(['warn']);
  });

  it('does not validate when validateAt is none', () => {
    const { counter } = defineCounter({ config: { validateAt: 'none', onError: 'raise' } });

    expect(counter.set(counter.initial(), 'count', 'abc').count).toBe('abc');
  });

  it('picks up configure() on the next operation', () => {
    const { registry, counter } = defineCounter({ config: { validateAt: 'runtime', onError: 'ignore' } });
    const state = counter.set(counter.initial(), 'count', 'abc');

    registry.configure({ onError: 'raise' });

    expect(registry.currentConfig()).toEqual({ validateAt: 'runtime', onError: 'raise' });
    expect(() => counter.set(state, 'count', 'def')).toThrow(TypeMismatchError);
  });

  it('reads configuration once per update', () => {
    const registry = createSchemaRegistry({ logger: silentLogger, config: { validateAt: 'runtime', onError: 'ignore' } });
    const form = registry.define<{ first: string; second: number }>('Form', {
      first: {
        type: 'string',
        validate: () => {
          registry.configure({ onError: 'raise' });
          return true;
        },
      },
      second: { type: 'integer', default: 0 },
    });

    const state = form.update(form.initial(), { first: 'x', second: 'bad' });

    expect(state.second).toBe('bad');
    expect(() => form.set(state, 'second', 'worse')).toThrow(TypeMismatchError);
  });

  it('wraps each validation in a telemetry span', () => {
    const bus = createTelemetryBus({ logger: silentLogger });
    const seen: string[] = [];
    bus.attachMany('recorder', [VALIDATION_START, VALIDATION_STOP], (event, _measurements, metadata) => {
      seen.push(`${eventKey(event)} ${JSON.stringify(metadata)}`);
    });
    const { counter } = defineCounter({ config: { validateAt: 'runtime' }, telemetry: bus });

    counter.set(counter.initial(), 'count', 3);

    expect(seen).toEqual([
      'lumen_state.validation.start {"schema":"Counter","action":"set_count","args":[3]}',
      'lumen_state.validation.stop {"schema":"Counter","action":"set_count","args":[3]}',
    ]);
  });
});

describe('embedded schemas', () => {
  type Child = { value: number };
  type Parent = { name: string; child: Snapshot<Child> | null; items: Snapshot<Child>[] };

  function defineParent() {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const child = registry.define<Child>('Child', { value: { type: 'integer', default: 0 } });
    const parent = registry.define<Parent>('Parent', {
      name: { type: 'string', default: '' },
      child: { embed: 'Child' },
      items: { embedMany: 'Child' },
    });
    return { child, parent };
  }

  it('lists embed fields and describes them', () => {
    const { parent } = defineParent();

    expect(parent.embeds).toEqual(['child', 'items']);
    expect(parent.field('child')?.type).toEqual({ kind: 'schema', name: 'Child' });
    expect(parent.field('items')?.type).toEqual({ kind: 'list', of: { kind: 'schema', name: 'Child' } });
  });

  it('initialises single embeds to the child initial snapshot', () => {
    const { child, parent } = defineParent();

    const state = parent.initial();

    expect(child.is(state.child)).toBe(true);
    expect(state.child?.value).toBe(0);
    expect(state.items).toEqual([]);
  });

  it('converts plain objects under embed fields on create', () => {
    const { child, parent } = defineParent();

    const state = parent.createOrThrow({ child: { value: 10 }, items: [{ value: 1 }, { value: 2 }] });

    expect(child.is(state.child)).toBe(true);
    expect(state.child?.value).toBe(10);
    expect(state.items.map((item) => item.value)).toEqual([1, 2]);
    expect(state.items.every((item) => child.is(item))).toBe(true);
  });

  it('fails when an embedded schema is not defined', () => {
    const registry = createSchemaRegistry({ logger: silentLogger });
    const orphan = registry.define<{ child: null }>('Orphan', { child: { embed: 'Missing' } });

    expect(() => orphan.initial()).toThrow('Schema Orphan: embedded schema "Missing" is not defined');
  });
});
