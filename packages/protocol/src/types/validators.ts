// Validator specifications - per-field business rules

/**
 * What a custom check may return.
 * `true` / `{ ok: true }` pass; `false` / `{ ok: false, message }` fail.
 */
export type CustomCheckResult = boolean | { ok: true } | { ok: false; message: string };

export type CustomCheck = (value: unknown) => CustomCheckResult;

/**
 * Numeric bounds. Every bound that is present must hold.
 */
export type NumberBounds = {
  greaterThan?: number;
  greaterThanOrEqualTo?: number;
  lessThan?: number;
  lessThanOrEqualTo?: number;
  equalTo?: number;
};

export type FormatValidator = { kind: 'format'; pattern: RegExp };

/**
 * `is` forces an exact length; otherwise `min` and `max` bound it (inclusive).
 */
export type LengthValidator = { kind: 'length'; min?: number; max?: number; is?: number };

export type InclusionValidator = { kind: 'inclusion'; values: readonly unknown[] };

export type ExclusionValidator = { kind: 'exclusion'; values: readonly unknown[] };

export type NumberValidator = { kind: 'number' } & NumberBounds;

export type CustomValidator = { kind: 'custom'; check: CustomCheck };

/**
 * A built-in validator, run in declaration order against a field value.
 */
export type ValidatorSpec =
  | FormatValidator
  | LengthValidator
  | InclusionValidator
  | ExclusionValidator
  | NumberValidator
  | CustomValidator;

export type ValidatorKind = ValidatorSpec['kind'];

export const VALIDATOR_KINDS: readonly ValidatorKind[] = [
  'format',
  'length',
  'inclusion',
  'exclusion',
  'number',
  'custom',
];

/**
 * One failure entry: `type` for type-check failures, the validator kind
 * otherwise (including kinds the runtime does not recognise).
 */
export type ValidationIssue = {
  kind: string;
  message: string;
};
