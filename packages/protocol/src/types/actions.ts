// Action types - messages, handler modes and dispatch outcomes

import type { SchemaName } from './common.js';

/**
 * A request to transition state: an action name plus positional arguments.
 */
export type ActionInvocation = {
  readonly name: string;
  readonly args: readonly unknown[];
};

/**
 * Build an action invocation.
 *
 * @example
 * dispatcher.dispatch(state, action('increment_by', 5));
 */
export function action(name: string, ...args: unknown[]): ActionInvocation {
  return Object.freeze({ name, args: Object.freeze([...args]) });
}

/**
 * How a handler hands back its result
 * - sync: returns the new state
 * - async: returns deferred work the caller schedules
 * - reply: returns a [state, payload] pair
 */
export type ActionMode = 'sync' | 'async' | 'reply';

/**
 * Declared shape of an action handler
 */
export type ActionDefinition = {
  /** Action name, matched against ActionInvocation.name */
  name: string;

  /** Positional parameter names; their count is the handler's arity */
  params: readonly string[];

  mode: ActionMode;

  /** Whether the handler carries a guard predicate */
  guarded: boolean;

  description?: string;
};

/**
 * Immutable values captured when an async handler was selected.
 */
export type DeferredContext<S> = {
  readonly schema: SchemaName;
  readonly state: S;
  readonly action: ActionInvocation;
};

/**
 * An uninvoked unit of work. Nothing runs until `run()` is called;
 * applying the resulting state is the caller's job.
 */
export type DeferredWork<S> = {
  readonly context: DeferredContext<S>;
  run(): Promise<S>;
};

export type SyncOutcome<S> = { kind: 'sync'; state: S };
export type DeferredOutcome<S> = { kind: 'deferred'; work: DeferredWork<S> };
export type ReplyOutcome<S, P = unknown> = { kind: 'reply'; state: S; payload: P };

/**
 * Result of dispatching an action
 */
export type Outcome<S, P = unknown> = SyncOutcome<S> | DeferredOutcome<S> | ReplyOutcome<S, P>;
