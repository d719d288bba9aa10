// Telemetry span - start/stop/exception events around a unit of work

import {
  TELEMETRY_DOMAIN,
  VALIDATION_FAILURE,
  type ExceptionKind,
  type FieldName,
  type SchemaName,
  type SpanMetadata,
  type SpanSubject,
  type ValidationIssue,
} from '@lumen-state/protocol';
import type { TelemetryBus } from './bus.js';

/**
 * Classify how a unit of work terminated abnormally.
 */
export function classifyException(thrown: unknown): ExceptionKind {
  if (thrown instanceof Error) {
    return thrown.name === 'AbortError' ? 'exit' : 'error';
  }
  return 'throw';
}

/**
 * Run `work` inside a span.
 *
 * Emits `[domain, subject, 'start']` immediately before the call,
 * `[domain, subject, 'stop']` on return and `[domain, subject, 'exception']`
 * on a throw. The original failure is always rethrown unchanged.
 * With no bus the work simply runs.
 */
export function span<T>(
  bus: TelemetryBus | undefined,
  subject: SpanSubject,
  metadata: SpanMetadata,
  work: () => T
): T {
  if (!bus) {
    return work();
  }

  const startTime = performance.now();
  bus.execute([TELEMETRY_DOMAIN, subject, 'start'], { monotonicTime: startTime, systemTime: Date.now() }, metadata);

  let result: T;
  try {
    result = work();
  } catch (thrown) {
    bus.execute(
      [TELEMETRY_DOMAIN, subject, 'exception'],
      { duration: performance.now() - startTime },
      {
        ...metadata,
        kind: classifyException(thrown),
        reason: thrown,
        stack: thrown instanceof Error ? (thrown.stack ?? '') : '',
      }
    );
    throw thrown;
  }

  bus.execute([TELEMETRY_DOMAIN, subject, 'stop'], { duration: performance.now() - startTime }, metadata);
  return result;
}

/**
 * Emit a standalone validation failure event.
 * Emitted whether or not the error policy goes on to raise.
 */
export function emitValidationFailure(
  bus: TelemetryBus | undefined,
  schema: SchemaName,
  field: FieldName,
  errors: readonly ValidationIssue[]
): void {
  bus?.execute(VALIDATION_FAILURE, {}, { schema, field, errors });
}
