export type {
  BaseEvent,
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  NotificationCreatedEvent,
  NotificationStatusChangedEvent,
  PassCompletedEvent,
} from "./types";
export { isBusEvent, isEventOf } from "./types";

export { createMemoryBus, MemoryBus } from "./memory-bus";
export { createRedisBus, RedisBus } from "./redis-bus";

import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusPort } from "./types";

export interface BusFactoryConfig {
  type: "redis" | "memory";
  serviceName: string;
  redisUrl?: string;
  retryAttempts?: number;
}

/**
 * Factory function to create the appropriate bus based on configuration
 */
export function createBus(config: BusFactoryConfig): BusPort {
  switch (config.type) {
    case "redis":
      if (!config.redisUrl) {
        throw new Error("Redis URL is required for Redis bus");
      }
      return createRedisBus({
        redisUrl: config.redisUrl,
        serviceName: config.serviceName,
        retryAttempts: config.retryAttempts,
      });

    case "memory":
      return createMemoryBus(config.serviceName);
  }
}
