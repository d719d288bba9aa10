// Telemetry event names and metadata

import type { FieldName, MonotonicTime, SchemaName } from './common.js';
import type { ValidationIssue } from './validators.js';

export const TELEMETRY_DOMAIN = 'lumen_state';

/**
 * Hierarchical event name: (domain, subject, phase)
 */
export type TelemetryEventName = readonly [domain: string, subject: string, phase: string];

export type SpanSubject = 'action' | 'validation';

export type SpanPhase = 'start' | 'stop' | 'exception';

export const ACTION_START: TelemetryEventName = [TELEMETRY_DOMAIN, 'action', 'start'];
export const ACTION_STOP: TelemetryEventName = [TELEMETRY_DOMAIN, 'action', 'stop'];
export const ACTION_EXCEPTION: TelemetryEventName = [TELEMETRY_DOMAIN, 'action', 'exception'];
export const VALIDATION_START: TelemetryEventName = [TELEMETRY_DOMAIN, 'validation', 'start'];
export const VALIDATION_STOP: TelemetryEventName = [TELEMETRY_DOMAIN, 'validation', 'stop'];
export const VALIDATION_EXCEPTION: TelemetryEventName = [
  TELEMETRY_DOMAIN,
  'validation',
  'exception',
];
export const VALIDATION_FAILURE: TelemetryEventName = [TELEMETRY_DOMAIN, 'validation', 'failure'];

/**
 * How an instrumented unit of work terminated abnormally
 * - error: an Error instance was thrown
 * - exit: the work was aborted (AbortError)
 * - throw: a non-Error value was thrown
 */
export type ExceptionKind = 'error' | 'exit' | 'throw';

export type TelemetryMeasurements = {
  /** Start time on the monotonic clock (start events) */
  monotonicTime?: MonotonicTime;
  /** Wall clock in epoch milliseconds (start events) */
  systemTime?: number;
  /** Elapsed milliseconds (stop and exception events) */
  duration?: number;
};

/**
 * Identifying metadata shared by every span event
 */
export type SpanMetadata = {
  schema: SchemaName;
  action: string;
  args: readonly unknown[];
};

export type ExceptionMetadata = SpanMetadata & {
  kind: ExceptionKind;
  reason: unknown;
  stack: string;
};

export type ValidationFailureMetadata = {
  schema: SchemaName;
  field: FieldName;
  errors: readonly ValidationIssue[];
};

export type TelemetryMetadata = SpanMetadata | ExceptionMetadata | ValidationFailureMetadata;

/**
 * Dotted key for an event name, e.g. "lumen_state.action.start"
 */
export function eventKey(name: TelemetryEventName): string {
  return name.join('.');
}
