// Test fixtures - building states and stubbing deferred work

import type { Snapshot } from '@lumen-state/protocol';
import { ActionRegistry, type AsyncBody } from '../actions/index.js';
import { RuntimeError } from '../errors.js';
import type { Schema } from '../schema/index.js';

/**
 * Build a snapshot for a test, failing on missing required fields.
 *
 * @example
 * const state = build(counter, { count: 5 });
 */
export function build<S extends object>(
  schema: Schema<S>,
  attrs: Partial<Record<keyof S & string, unknown>> = {}
): Snapshot<S> {
  return schema.createOrThrow(attrs);
}

/**
 * Copy of an action registry where every async handler named `name` runs
 * `body` instead. Other handlers and all hooks are kept in order; the
 * original registry is left untouched.
 *
 * @throws RuntimeError if no async handler has that name
 *
 * @example
 * const actions = mockAsync(postActions, 'load_posts', async ({ state }) =>
 *   posts.set(state, 'items', [{ id: 1, title: 'Test' }])
 * );
 */
export function mockAsync<S extends object>(
  actions: ActionRegistry<S>,
  name: string,
  body: AsyncBody<S>
): ActionRegistry<S> {
  if (!actions.handlers().some((handler) => handler.mode === 'async' && handler.name === name)) {
    throw new RuntimeError('NO_ASYNC_HANDLER', `No async handler "${name}" to replace`);
  }

  const copy = new ActionRegistry<S>();

  for (const handler of actions.handlers()) {
    const options = { params: handler.params, guard: handler.guard, description: handler.description };
    switch (handler.mode) {
      case 'sync':
        copy.on(handler.name, handler.body, options);
        break;
      case 'async':
        copy.onAsync(handler.name, handler.name === name ? body : handler.body, options);
        break;
      case 'reply':
        copy.onReply(handler.name, handler.body, options);
        break;
    }
  }
  for (const hook of actions.beforeHooks()) copy.beforeAction(hook);
  for (const hook of actions.afterHooks()) copy.afterAction(hook);

  return copy;
}
