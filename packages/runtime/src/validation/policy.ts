// Error policy - what happens to a failing validation result

import type { FieldName, RuntimeConfig, SchemaName } from '@lumen-state/protocol';
import { lookupConfig } from '../config.js';
import { TypeMismatchError, type ValidationError } from '../errors.js';
import { formatValue } from '../inspect.js';
import type { Logger } from '../logging.js';
import { emitValidationFailure, type TelemetryBus } from '../telemetry/index.js';
import type { FieldValidationResult } from './field.js';

export type PolicyContext = {
  /** Resolved once by the caller for the whole operation */
  config: Partial<RuntimeConfig>;
  logger: Logger;
  telemetry?: TelemetryBus;
};

/**
 * Convert a validation error into the fatal error raised under on_error "raise".
 */
export function toTypeMismatch(error: ValidationError): TypeMismatchError {
  const mismatch = new TypeMismatchError({
    field: error.field,
    expected: error.errors.map((e) => `${e.kind}: ${e.message}`).join(', '),
    got: formatValue(error.value),
    path: error.path,
  });

  if (error.value === null || error.value === undefined) {
    return mismatch.withHint('nil_value');
  }
  if (typeof error.value === 'string' && error.errors.some((e) => /^expected (integer|number)\b/.test(e.message))) {
    return mismatch.withHint('string_to_number');
  }
  if (error.errors.some((e) => e.message.startsWith('expected schema '))) {
    return mismatch.withHint('wrong_schema');
  }
  return mismatch;
}

/**
 * Apply the configured policy to a validation result.
 *
 * Failures always emit a validation failure event first. Then:
 * - raise: throws TypeMismatchError
 * - log: warns and returns (the value is still assigned)
 * - ignore: returns silently
 *
 * @throws TypeMismatchError when on_error is "raise"
 */
export function handleError(
  result: FieldValidationResult,
  schema: SchemaName,
  field: FieldName,
  context: PolicyContext
): void {
  if (result.ok) return;

  const { error } = result;
  emitValidationFailure(context.telemetry, schema, field, error.errors);

  switch (lookupConfig(context.config, 'onError')) {
    case 'raise':
      throw toTypeMismatch(error);
    case 'log':
      context.logger.warn(`Validation error in ${schema}: ${error.message}`, {
        schema,
        field,
        errors: error.errors.map((e) => `${e.kind}: ${e.message}`),
      });
      return;
    case 'ignore':
      return;
  }
}
