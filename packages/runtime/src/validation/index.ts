// Validation engine

export { validateType, defaultForType, typeOf, type TypeCheckResult } from './types.js';
export { runValidator, runCustomCheck } from './validators.js';
export { validateField, type FieldValidationResult, type ValidateFieldOptions } from './field.js';
export { handleError, toTypeMismatch, type PolicyContext } from './policy.js';
