import { ConsoleLogger, Logger } from "../logger";
import {
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  isEventOf,
} from "./types";

/**
 * In-memory bus implementation for tests and single-process dev mode.
 *
 * Handlers run inside publish(). Unlike the Redis bus, a handler failure is
 * rethrown to the publisher once every handler has run, so an in-process
 * pipeline sees the failure of its downstream step.
 */
export class MemoryBus implements BusPort {
  private handlers = new Map<EventType, EventHandler[]>();
  private publishedEvents: BusEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    const list = this.handlers.get(topic) ?? [];
    if (list.length === 0) {
      this.logger.debug(`Subscribed to topic: ${topic}`);
    }

    list.push(async (event) => {
      if (isEventOf(topic, event)) await handler(event);
    });
    this.handlers.set(topic, list);
  }

  async publish(event: BusEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);
    this.publishedEvents.push(event);

    const handlers = this.handlers.get(event.type) ?? [];
    const results = await Promise.allSettled(handlers.map((h) => h(event)));

    const failure = results.find(
      (r): r is PromiseRejectedResult => r.status === "rejected"
    );
    if (failure) {
      this.logger.error(
        `Handler error for ${event.type} (${event.id}):`,
        failure.reason
      );
      throw failure.reason;
    }
  }

  async close(): Promise<void> {
    this.handlers.clear();
    this.publishedEvents = [];
  }

  /**
   * Get all published events (useful for testing)
   */
  getPublishedEvents(): BusEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }
}

export function createMemoryBus(serviceName?: string): MemoryBus {
  return new MemoryBus(serviceName);
}
