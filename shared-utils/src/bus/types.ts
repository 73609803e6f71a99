/**
 * Standard event types used across the auto scouter services
 */
export type EventType =
  | "notification_created"
  | "notification_status_changed"
  | "pass_completed";

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

/**
 * Hand-off of a freshly persisted notification to the delivery collaborator
 */
export interface NotificationCreatedEvent extends BaseEvent {
  type: "notification_created";
  data: {
    notificationId: string;
    alertId: string | null;
    listingId: string | null;
    userId: string;
    kind: "alert_match" | "digest";
    title: string;
    message: string;
    priority: number;
    maxRetries: number;
  };
}

/**
 * Delivery report sent back by the delivery collaborator
 */
export interface NotificationStatusChangedEvent extends BaseEvent {
  type: "notification_status_changed";
  data: {
    notificationId: string;
    status: "sent" | "delivered" | "failed";
    retryCount?: number;
    errorMessage?: string;
    occurredAt: string;
  };
}

export interface PassCompletedEvent extends BaseEvent {
  type: "pass_completed";
  data: {
    passId: string;
    status: "completed" | "failed";
    received: number;
    created: number;
    priceUpdates: number;
    notifications: number;
    suppressed: number;
    durationMs: number;
  };
}

export interface EventMap {
  notification_created: NotificationCreatedEvent;
  notification_status_changed: NotificationStatusChangedEvent;
  pass_completed: PassCompletedEvent;
}

export type BusEvent = EventMap[EventType];

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BusEvent> = (
  event: T
) => Promise<void>;

const EVENT_TYPES: readonly EventType[] = [
  "notification_created",
  "notification_status_changed",
  "pass_completed",
];

export function isEventOf<K extends EventType>(
  topic: K,
  event: BusEvent
): event is EventMap[K] {
  return event.type === topic;
}

/**
 * Shape check for events arriving from outside the process
 */
export function isBusEvent(value: unknown): value is BusEvent {
  if (typeof value !== "object" || value === null) return false;
  const type: unknown = Reflect.get(value, "type");
  const id: unknown = Reflect.get(value, "id");
  const data: unknown = Reflect.get(value, "data");
  return (
    typeof type === "string" &&
    EVENT_TYPES.some((t) => t === type) &&
    typeof id === "string" &&
    typeof data === "object" &&
    data !== null
  );
}

/**
 * Standard bus port interface
 */
export interface BusPort {
  /**
   * Subscribe to events of a specific type
   */
  subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void>;

  /**
   * Publish an event to its topic
   */
  publish(event: BusEvent): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
}
