// Action registry - ordered handlers and hooks for one schema
//
// Handlers are kept in registration order as (name, arity, guard?, body)
// entries. The same name may be registered several times with different
// arities or guards; the dispatcher takes the first entry that matches.

import type {
  ActionDefinition,
  ActionInvocation,
  DeferredContext,
  Snapshot,
} from '@lumen-state/protocol';

export type Guard<S extends object> = (args: readonly unknown[], state: Snapshot<S>) => boolean;

export type SyncBody<S extends object> = (state: Snapshot<S>, args: readonly unknown[]) => Snapshot<S>;

export type AsyncBody<S extends object> = (context: DeferredContext<Snapshot<S>>) => Promise<Snapshot<S>>;

export type ReplyBody<S extends object, P = unknown> = (
  state: Snapshot<S>,
  args: readonly unknown[]
) => readonly [Snapshot<S>, P];

export type BeforeHook<S extends object> = (state: Snapshot<S>, action: ActionInvocation) => void;

export type AfterHook<S extends object> = (
  oldState: Snapshot<S>,
  newState: Snapshot<S>,
  action: ActionInvocation
) => void;

export type HandlerOptions<S extends object> = {
  /** Positional parameter names; their count is the arity (default none) */
  params?: readonly string[];
  guard?: Guard<S>;
  description?: string;
};

type HandlerBase<S extends object> = {
  name: string;
  params: readonly string[];
  guard?: Guard<S>;
  description?: string;
};

export type RegisteredHandler<S extends object> =
  | (HandlerBase<S> & { mode: 'sync'; body: SyncBody<S> })
  | (HandlerBase<S> & { mode: 'async'; body: AsyncBody<S> })
  | (HandlerBase<S> & { mode: 'reply'; body: ReplyBody<S> });

export class ActionRegistry<S extends object> {
  private readonly entries: RegisteredHandler<S>[] = [];
  private readonly before: BeforeHook<S>[] = [];
  private readonly after: AfterHook<S>[] = [];

  /**
   * Register a handler that returns the next state.
   *
   * @example
   * actions.on('increment_by', (state, [amount]) => counter.set(state, 'count', state.count + Number(amount)), {
   *   params: ['amount'],
   * });
   */
  on(name: string, body: SyncBody<S>, options: HandlerOptions<S> = {}): this {
    this.entries.push({ ...base(name, options), mode: 'sync', body });
    return this;
  }

  /**
   * Register a handler whose work is deferred to the caller.
   * The body receives a context captured by value at dispatch time.
   */
  onAsync(name: string, body: AsyncBody<S>, options: HandlerOptions<S> = {}): this {
    this.entries.push({ ...base(name, options), mode: 'async', body });
    return this;
  }

  /**
   * Register a handler that returns `[nextState, payload]`.
   */
  onReply<P>(name: string, body: ReplyBody<S, P>, options: HandlerOptions<S> = {}): this {
    this.entries.push({ ...base(name, options), mode: 'reply', body });
    return this;
  }

  /**
   * Run a side-effect before every dispatched action. Return values are ignored.
   */
  beforeAction(hook: BeforeHook<S>): this {
    this.before.push(hook);
    return this;
  }

  /**
   * Run a side-effect after every non-deferred action. Return values are ignored.
   */
  afterAction(hook: AfterHook<S>): this {
    this.after.push(hook);
    return this;
  }

  handlers(): readonly RegisteredHandler<S>[] {
    return this.entries;
  }

  beforeHooks(): readonly BeforeHook<S>[] {
    return this.before;
  }

  afterHooks(): readonly AfterHook<S>[] {
    return this.after;
  }

  /**
   * Declared action names, without duplicates, in registration order.
   */
  actionNames(): string[] {
    return [...new Set(this.entries.map((entry) => entry.name))];
  }

  definitions(): ActionDefinition[] {
    return this.entries.map((entry) => ({
      name: entry.name,
      params: entry.params,
      mode: entry.mode,
      guarded: entry.guard !== undefined,
      description: entry.description,
    }));
  }

  has(name: string): boolean {
    return this.entries.some((entry) => entry.name === name);
  }
}

function base<S extends object>(name: string, options: HandlerOptions<S>): HandlerBase<S> {
  return {
    name,
    params: Object.freeze([...(options.params ?? [])]),
    guard: options.guard,
    description: options.description,
  };
}

export function createActionRegistry<S extends object>(): ActionRegistry<S> {
  return new ActionRegistry<S>();
}
