// Telemetry - instrumentation around dispatch and validation

export {
  TelemetryBus,
  createTelemetryBus,
  type TelemetryHandler,
  type TelemetryBusOptions,
} from './bus.js';

export { span, classifyException, emitValidationFailure } from './span.js';

export {
  attachDefaultHandlers,
  detachDefaultHandlers,
  createLoggingHandler,
  DEFAULT_HANDLER_ID,
} from './handlers.js';
