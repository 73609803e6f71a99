import crypto from "crypto";
import { BusPort, NotificationCreatedEvent } from "@autoscout/shared-utils";
import { Notification } from "../core/dto";
import { DeliveryPort } from "../core/ports";

export function toCreatedEvent(n: Notification): NotificationCreatedEvent {
  return {
    type: "notification_created",
    id: crypto.randomUUID(),
    timestamp: new Date().toISOString(),
    version: "1",
    data: {
      notificationId: n.id,
      alertId: n.alertId,
      listingId: n.listingId,
      userId: n.userId,
      kind: n.type,
      title: n.title,
      message: n.message,
      priority: n.priority,
      maxRetries: n.maxRetries,
    },
  };
}

// Publishes notification_created for the delivery collaborator to pick up
export class BusDelivery implements DeliveryPort {
  constructor(private bus: BusPort) {}

  async deliver(n: Notification): Promise<void> {
    await this.bus.publish(toCreatedEvent(n));
  }
}
