// @lumen-state/runtime
// Action dispatch, field validation and structural diffs for immutable state

// Error types
export {
  RuntimeError,
  TypeMismatchError,
  ValidationError,
  UnknownActionError,
  InvalidReplyError,
  SchemaDefinitionError,
  StateAssertionError,
  ChangesetError,
  type TypeMismatchHint,
} from './errors.js';

// Configuration
export {
  runtimeConfigSchema,
  resolveConfig,
  configFromEnv,
  lookupConfig,
  validationEnabled,
  CONFIG_ENV_VARS,
  type RuntimeConfigInput,
} from './config.js';

// Logging
export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  withLogContext,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Value rendering and equality
export { formatValue, formatNames } from './inspect.js';
export { deepEqual, includesEqual } from './equality.js';

// Telemetry
export {
  TelemetryBus,
  createTelemetryBus,
  span,
  classifyException,
  emitValidationFailure,
  attachDefaultHandlers,
  detachDefaultHandlers,
  createLoggingHandler,
  DEFAULT_HANDLER_ID,
  type TelemetryHandler,
  type TelemetryBusOptions,
} from './telemetry/index.js';

// Validation engine
export {
  validateType,
  defaultForType,
  typeOf,
  runValidator,
  runCustomCheck,
  validateField,
  handleError,
  toTypeMismatch,
  type TypeCheckResult,
  type FieldValidationResult,
  type ValidateFieldOptions,
  type PolicyContext,
} from './validation/index.js';

// Schema registry
export {
  Schema,
  SchemaRegistry,
  createSchemaRegistry,
  type CreateResult,
  type EmbeddableSchema,
  type SchemaRegistryOptions,
} from './schema/index.js';

// Action dispatch
export {
  ActionRegistry,
  createActionRegistry,
  Dispatcher,
  createDispatcher,
  captureValue,
  jaroSimilarity,
  suggestName,
  SUGGESTION_THRESHOLD,
  type Guard,
  type SyncBody,
  type AsyncBody,
  type ReplyBody,
  type BeforeHook,
  type AfterHook,
  type HandlerOptions,
  type RegisteredHandler,
  type DispatcherOptions,
} from './actions/index.js';

// Diff engine
export {
  diff,
  formatChanges,
  formatDiff,
  assertChanged,
  diffWireSchema,
  toWire,
  fromWire,
  serializeDiff,
  parseDiff,
} from './diff/index.js';

// Changesets
export {
  change,
  putChange,
  putChanges,
  validateChanges,
  validateChange,
  addError,
  applyChanges,
  applyChangesOrThrow,
  getField,
  getChange,
  isChanged,
  changedFields,
  type Changeset,
  type ApplyResult,
} from './changeset/index.js';

// Test helpers
export {
  assertValidState,
  assertActionResult,
  refuteDispatches,
  assertFieldsChanged,
  type ExpectedResult,
  build,
  mockAsync,
} from './testing/index.js';
