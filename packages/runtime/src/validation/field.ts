// Field validation - type check plus every validator, all failures collected

import {
  isNullish,
  type FieldDescriptor,
  type FieldName,
  type ValidationIssue,
} from '@lumen-state/protocol';
import { ValidationError } from '../errors.js';
import { validateType } from './types.js';
import { runValidator } from './validators.js';

export type FieldValidationResult = { ok: true } | { ok: false; error: ValidationError };

export type ValidateFieldOptions = {
  /** Nesting path of the field, outermost first */
  path?: readonly FieldName[];
};

/**
 * Validate a candidate value for a field.
 *
 * A nullable field holding null passes without running anything.
 * Otherwise the type check and every validator run, in that order,
 * and the result carries every failure in the order produced.
 */
export function validateField(
  name: FieldName,
  value: unknown,
  descriptor: Pick<FieldDescriptor, 'type' | 'nullable' | 'validators'>,
  options: ValidateFieldOptions = {}
): FieldValidationResult {
  if (descriptor.nullable && isNullish(value)) {
    return { ok: true };
  }

  const errors: ValidationIssue[] = [];

  const typeResult = validateType(value, descriptor.type);
  if (!typeResult.ok) {
    errors.push({ kind: 'type', message: typeResult.message });
  }

  for (const validator of descriptor.validators) {
    const failure = runValidator(validator, value);
    if (failure) errors.push(failure);
  }

  if (errors.length === 0) {
    return { ok: true };
  }

  return {
    ok: false,
    error: new ValidationError({ field: name, value, errors, path: options.path }),
  };
}
