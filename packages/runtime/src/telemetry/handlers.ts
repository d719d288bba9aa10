// Default telemetry handlers - route span events to a logger

import {
  ACTION_EXCEPTION,
  ACTION_START,
  ACTION_STOP,
  VALIDATION_FAILURE,
  eventKey,
  type TelemetryMetadata,
} from '@lumen-state/protocol';
import type { Logger } from '../logging.js';
import { formatValue } from '../inspect.js';
import type { TelemetryBus, TelemetryHandler } from './bus.js';

export const DEFAULT_HANDLER_ID = 'lumen_state-default-handlers';

function describe(metadata: TelemetryMetadata): string {
  return 'action' in metadata ? `"${metadata.action}" in ${metadata.schema}` : metadata.schema;
}

/**
 * Build the handler that logs action and validation events.
 */
export function createLoggingHandler(logger: Logger): TelemetryHandler {
  return (event, measurements, metadata) => {
    const duration = `${(measurements.duration ?? 0).toFixed(2)}ms`;

    switch (eventKey(event)) {
      case eventKey(ACTION_START):
        logger.debug(`Action starting: ${describe(metadata)}`);
        break;
      case eventKey(ACTION_STOP):
        logger.debug(`Action completed: ${describe(metadata)} (${duration})`);
        break;
      case eventKey(ACTION_EXCEPTION):
        logger.error(`Action failed: ${describe(metadata)}`, {
          kind: 'kind' in metadata ? metadata.kind : undefined,
          reason: 'reason' in metadata ? formatValue(metadata.reason) : undefined,
          duration,
        });
        break;
      case eventKey(VALIDATION_FAILURE):
        if ('field' in metadata) {
          logger.warn(`Validation failed for "${metadata.field}" in ${metadata.schema}`, {
            errors: metadata.errors.map((e) => `${e.kind}: ${e.message}`),
          });
        }
        break;
    }
  };
}

/**
 * Attach logging handlers for action start/stop/exception and
 * validation failure events.
 *
 * @returns false if the default handlers are already attached
 */
export function attachDefaultHandlers(bus: TelemetryBus, logger: Logger): boolean {
  return bus.attachMany(
    DEFAULT_HANDLER_ID,
    [ACTION_START, ACTION_STOP, ACTION_EXCEPTION, VALIDATION_FAILURE],
    createLoggingHandler(logger)
  );
}

/**
 * @returns false if the default handlers were not attached
 */
export function detachDefaultHandlers(bus: TelemetryBus): boolean {
  return bus.detach(DEFAULT_HANDLER_ID);
}
