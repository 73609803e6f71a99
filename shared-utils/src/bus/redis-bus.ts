import Redis from "ioredis";
import { ConsoleLogger, Logger } from "../logger";
import {
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  isBusEvent,
  isEventOf,
} from "./types";

/**
 * Redis bus implementation using pub/sub.
 *
 * Separate connections are used for publishing and subscribing since a
 * subscribed ioredis connection cannot issue other commands.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private handlers = new Map<EventType, EventHandler[]>();
  private isConnected = false;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(config.serviceName);
    const retryAttempts = config.retryAttempts ?? 3;

    this.subscriber = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.subscriber.on("connect", () => {
      this.logger.info("Redis subscriber connected");
      this.isConnected = true;
    });

    this.subscriber.on("error", (error) => {
      this.logger.error("Redis subscriber error:", error);
      this.isConnected = false;
    });

    this.publisher.on("error", (error) => {
      this.logger.error("Redis publisher error:", error);
    });

    this.subscriber.on("close", () => {
      this.isConnected = false;
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      this.handleMessage(channel, message).catch((error) =>
        this.logger.error(`Failed to handle message on ${channel}:`, error)
      );
    });
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    const list = this.handlers.get(topic) ?? [];
    if (list.length === 0) {
      await this.subscriber.subscribe(topic);
      this.logger.info(`Subscribed to topic: ${topic}`);
    }

    list.push(async (event) => {
      if (isEventOf(topic, event)) await handler(event);
    });
    this.handlers.set(topic, list);
  }

  async publish(event: BusEvent): Promise<void> {
    await this.publisher.publish(event.type, JSON.stringify(event));
    this.logger.debug(`Published event: ${event.type} (${event.id})`);
  }

  private async handleMessage(channel: string, message: string): Promise<void> {
    const parsed: unknown = JSON.parse(message);
    if (!isBusEvent(parsed) || parsed.type !== channel) {
      this.logger.warn(`Dropping malformed event on ${channel}`, message);
      return;
    }

    const handlers = this.handlers.get(parsed.type) ?? [];
    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(parsed);
        } catch (error) {
          // the other handlers still run; the publisher is in another process
          this.logger.error(
            `Handler error for ${parsed.type} (${parsed.id}):`,
            error
          );
        }
      })
    );
  }

  async close(): Promise<void> {
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.logger.info("Redis bus connections closed");
  }

  isHealthy(): boolean {
    return this.isConnected;
  }
}

export function createRedisBus(config: BusConfig): RedisBus {
  return new RedisBus(config);
}
