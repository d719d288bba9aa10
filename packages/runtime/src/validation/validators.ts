// Built-in validators
//
// Each validator returns null on success or a single issue on failure.
// A value of the wrong shape for a validator fails with a message
// instead of throwing.

import type {
  CustomCheck,
  LengthValidator,
  NumberBounds,
  ValidationIssue,
  ValidatorSpec,
} from '@lumen-state/protocol';
import { includesEqual } from '../equality.js';
import { formatValue } from '../inspect.js';

function issue(kind: string, message: string): ValidationIssue {
  return { kind, message };
}

/**
 * Run one validator against a value.
 */
export function runValidator(spec: ValidatorSpec, value: unknown): ValidationIssue | null {
  switch (spec.kind) {
    case 'format':
      if (typeof value !== 'string') {
        return issue('format', `format validation requires a string, got ${formatValue(value)}`);
      }
      return matchesPattern(spec.pattern, value) ? null : issue('format', `must match pattern ${String(spec.pattern)}`);

    case 'length': {
      const length = measure(value);
      if (length === undefined) {
        return issue('length', `length validation requires string or list, got ${formatValue(value)}`);
      }
      return checkLength(length, spec);
    }

    case 'inclusion':
      return includesEqual(spec.values, value)
        ? null
        : issue('inclusion', `must be one of ${formatValue(spec.values)}`);

    case 'exclusion':
      return includesEqual(spec.values, value)
        ? issue('exclusion', `must not be one of ${formatValue(spec.values)}`)
        : null;

    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return issue('number', `number validation requires a number, got ${formatValue(value)}`);
      }
      return checkBounds(value, spec);

    case 'custom':
      return runCustomCheck(spec.check, value);

    default:
      return unknownValidator(spec);
  }
}

/**
 * Validator kinds outside the built-in set fail instead of throwing.
 */
function unknownValidator(spec: never): ValidationIssue {
  const kind = String(Reflect.get(spec, 'kind'));
  return issue(kind, `unknown validator: ${kind}`);
}

// A global or sticky pattern keeps lastIndex between calls
function matchesPattern(pattern: RegExp, value: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(value);
}

function measure(value: unknown): number | undefined {
  if (typeof value === 'string') return [...value].length;
  if (Array.isArray(value)) return value.length;
  return undefined;
}

function checkLength(length: number, spec: LengthValidator): ValidationIssue | null {
  if (spec.is !== undefined && length !== spec.is) {
    return issue('length', `must be exactly ${spec.is} characters/items`);
  }
  if (spec.min !== undefined && length < spec.min) {
    return issue('length', `must be at least ${spec.min} characters/items`);
  }
  if (spec.max !== undefined && length > spec.max) {
    return issue('length', `must be at most ${spec.max} characters/items`);
  }
  return null;
}

function checkBounds(value: number, bounds: NumberBounds): ValidationIssue | null {
  if (bounds.equalTo !== undefined && value !== bounds.equalTo) {
    return issue('number', `must be equal to ${bounds.equalTo}`);
  }
  if (bounds.greaterThan !== undefined && value <= bounds.greaterThan) {
    return issue('number', `must be greater than ${bounds.greaterThan}`);
  }
  if (bounds.greaterThanOrEqualTo !== undefined && value < bounds.greaterThanOrEqualTo) {
    return issue('number', `must be greater than or equal to ${bounds.greaterThanOrEqualTo}`);
  }
  if (bounds.lessThan !== undefined && value >= bounds.lessThan) {
    return issue('number', `must be less than ${bounds.lessThan}`);
  }
  if (bounds.lessThanOrEqualTo !== undefined && value > bounds.lessThanOrEqualTo) {
    return issue('number', `must be less than or equal to ${bounds.lessThanOrEqualTo}`);
  }
  return null;
}

/**
 * Interpret a custom check's result.
 */
export function runCustomCheck(check: CustomCheck, value: unknown): ValidationIssue | null {
  const result = check(value);
  if (result === true) return null;
  if (result === false) return issue('custom', 'validation failed');
  return result.ok ? null : issue('custom', result.message);
}
