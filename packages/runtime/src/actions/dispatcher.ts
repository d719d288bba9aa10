// Action dispatcher
//
// dispatch(state, action):
// 1. before-hooks, in registration order
// 2. first handler whose name, arity and guard match
// 3. after-hooks, for sync and reply outcomes only
// The whole call runs inside an action telemetry span.

import {
  action as buildAction,
  type ActionInvocation,
  type DeferredContext,
  type Outcome,
  type SchemaName,
  type Snapshot,
} from '@lumen-state/protocol';
import { InvalidReplyError, RuntimeError, UnknownActionError } from '../errors.js';
import { span, type TelemetryBus } from '../telemetry/index.js';
import { captureValue } from './capture.js';
import type { ActionRegistry, RegisteredHandler } from './registry.js';
import { suggestName } from './similarity.js';

export type DispatcherOptions = {
  telemetry?: TelemetryBus;
};

export class Dispatcher<S extends object> {
  constructor(
    private readonly schema: { readonly name: SchemaName },
    private readonly actions: ActionRegistry<S>,
    private readonly options: DispatcherOptions = {}
  ) {}

  /**
   * Dispatch an action against a state snapshot.
   *
   * @throws UnknownActionError if no handler matches
   * @throws InvalidReplyError if a reply handler does not return a pair
   * Anything a hook, guard or handler throws propagates unchanged.
   */
  dispatch(state: Snapshot<S>, invocation: ActionInvocation): Outcome<Snapshot<S>> {
    return span(
      this.options.telemetry,
      'action',
      { schema: this.schema.name, action: invocation.name, args: invocation.args },
      () => this.run(state, invocation)
    );
  }

  /**
   * Dispatch and return the next state, rejecting deferred and reply outcomes.
   */
  apply(state: Snapshot<S>, invocation: ActionInvocation): Snapshot<S> {
    const outcome = this.dispatch(state, invocation);
    if (outcome.kind !== 'sync') {
      throw new RuntimeError('UNEXPECTED_OUTCOME', `Action "${invocation.name}" returned a ${outcome.kind} outcome`);
    }
    return outcome.state;
  }

  private run(state: Snapshot<S>, invocation: ActionInvocation): Outcome<Snapshot<S>> {
    for (const hook of this.actions.beforeHooks()) {
      hook(state, invocation);
    }

    const handler = this.select(state, invocation);
    const outcome = this.execute(handler, state, invocation);

    if (outcome.kind !== 'deferred') {
      for (const hook of this.actions.afterHooks()) {
        hook(state, outcome.state, invocation);
      }
    }

    return outcome;
  }

  private select(state: Snapshot<S>, invocation: ActionInvocation): RegisteredHandler<S> {
    const { name, args } = invocation;
    const handler = this.actions
      .handlers()
      .find(
        (entry) =>
          entry.name === name &&
          entry.params.length === args.length &&
          (!entry.guard || entry.guard(args, state))
      );

    if (!handler) {
      const available = this.actions.actionNames();
      throw new UnknownActionError({
        attempted: name,
        available,
        schema: this.schema.name,
        suggestion: suggestName(name, available),
      });
    }
    return handler;
  }

  private execute(
    handler: RegisteredHandler<S>,
    state: Snapshot<S>,
    invocation: ActionInvocation
  ): Outcome<Snapshot<S>> {
    switch (handler.mode) {
      case 'sync':
        return { kind: 'sync', state: handler.body(state, invocation.args) };

      case 'reply': {
        const result = handler.body(state, invocation.args);
        if (!isPair(result)) {
          throw new InvalidReplyError(this.schema.name, invocation.name);
        }
        const [next, payload] = result;
        return { kind: 'reply', state: next, payload };
      }

      case 'async': {
        const context: DeferredContext<Snapshot<S>> = Object.freeze({
          schema: this.schema.name,
          state: captureValue(state),
          action: buildAction(invocation.name, ...captureValue(invocation.args)),
        });
        const body = handler.body;
        return { kind: 'deferred', work: Object.freeze({ context, run: () => body(context) }) };
      }
    }
  }
}

function isPair(value: unknown): boolean {
  return Array.isArray(value) && value.length === 2;
}

export function createDispatcher<S extends object>(
  schema: { readonly name: SchemaName },
  actions: ActionRegistry<S>,
  options: DispatcherOptions = {}
): Dispatcher<S> {
  return new Dispatcher(schema, actions, options);
}
