import type { Alert } from "@autoscout/alerts";

// Sample alerts for dev mode, so a local pass can notify
export function devAlerts(now: string): Alert[] {
  return [
    {
      id: "dev-alert-1",
      userId: "user-123",
      name: "BMW under 25k",
      criteria: { make: "BMW", price: { max: 25000 } },
      isActive: true,
      frequency: "immediate",
      maxNotificationsPerDay: 5,
      triggerCount: 0,
      createdAt: now,
      updatedAt: now,
    },
  ];
}
