// In-process telemetry bus
//
// Handlers attach under a unique id to one or more event names and are
// invoked synchronously, in attach order, on the emitting call stack.
// A handler that throws is detached so it cannot break instrumented work.

import {
  eventKey,
  type TelemetryEventName,
  type TelemetryMeasurements,
  type TelemetryMetadata,
} from '@lumen-state/protocol';
import { consoleLogger, type Logger } from '../logging.js';

export type TelemetryHandler = (
  event: TelemetryEventName,
  measurements: TelemetryMeasurements,
  metadata: TelemetryMetadata
) => void;

type Attachment = {
  id: string;
  events: Set<string>;
  handler: TelemetryHandler;
};

export type TelemetryBusOptions = {
  /** Where handler failures are reported (defaults to console) */
  logger?: Logger;
};

export class TelemetryBus {
  private attachments = new Map<string, Attachment>();
  private readonly logger: Logger;

  constructor(options: TelemetryBusOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Attach a handler to a single event.
   *
   * @returns false if a handler is already attached under this id
   */
  attach(id: string, event: TelemetryEventName, handler: TelemetryHandler): boolean {
    return this.attachMany(id, [event], handler);
  }

  /**
   * Attach a handler to several events.
   *
   * @returns false if a handler is already attached under this id
   */
  attachMany(id: string, events: readonly TelemetryEventName[], handler: TelemetryHandler): boolean {
    if (this.attachments.has(id)) {
      return false;
    }
    this.attachments.set(id, { id, events: new Set(events.map(eventKey)), handler });
    return true;
  }

  /**
   * Detach a handler.
   *
   * @returns false if nothing was attached under this id
   */
  detach(id: string): boolean {
    return this.attachments.delete(id);
  }

  /**
   * Emit an event to every handler attached to it.
   */
  execute(
    event: TelemetryEventName,
    measurements: TelemetryMeasurements,
    metadata: TelemetryMetadata
  ): void {
    const key = eventKey(event);
    for (const attachment of [...this.attachments.values()]) {
      if (!attachment.events.has(key)) continue;
      try {
        attachment.handler(event, measurements, metadata);
      } catch (error) {
        this.attachments.delete(attachment.id);
        this.logger.error(`Telemetry handler "${attachment.id}" failed and was detached`, {
          event: key,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Ids of the handlers attached to an event, in attach order.
   */
  handlersFor(event: TelemetryEventName): string[] {
    const key = eventKey(event);
    return [...this.attachments.values()].filter((a) => a.events.has(key)).map((a) => a.id);
  }

  /**
   * Total number of attached handlers.
   */
  handlerCount(): number {
    return this.attachments.size;
  }
}

export function createTelemetryBus(options: TelemetryBusOptions = {}): TelemetryBus {
  return new TelemetryBus(options);
}
