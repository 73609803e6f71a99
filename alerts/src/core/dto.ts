export type ISO = string;

export type GeoPoint = {
  lat: number;
  lng: number;
};

// The listing fields alerts are evaluated against; a stored listing
// record satisfies this shape as-is
export type ListingSnapshot = {
  id: string;
  sourceWebsite: string;
  listingUrl?: string;
  make: string;
  model: string;
  year?: number;
  price: number;
  currency: string;
  mileage?: number;
  fuelType?: string;
  transmission?: string;
  bodyType?: string;
  condition?: string;
  enginePowerKw?: number;
  city?: string;
  region?: string;
  location?: GeoPoint;
};

export type Range = {
  min?: number; // inclusive
  max?: number; // inclusive
};

// Every field is optional; an absent field means "don't care"
export type AlertCriteria = {
  make?: string;
  model?: string; // substring of the listing's model
  year?: Range;
  price?: Range;
  maxMileage?: number;
  fuelType?: string;
  transmission?: string;
  bodyType?: string;
  condition?: string;
  city?: string;
  radiusKm?: number;
  origin?: GeoPoint; // coordinates of `city`, resolved when the alert is saved
  enginePowerKw?: Range;
};

export type AlertFrequency = "immediate" | "daily" | "weekly";

export type Alert = {
  id: string;
  userId: string;
  name: string;
  criteria: AlertCriteria;
  isActive: boolean;
  frequency: AlertFrequency;
  maxNotificationsPerDay: number;
  lastTriggeredAt?: ISO;
  triggerCount: number;
  createdAt: ISO;
  updatedAt: ISO;
};

export type CriterionName =
  | "make"
  | "model"
  | "year"
  | "price"
  | "mileage"
  | "fuelType"
  | "transmission"
  | "bodyType"
  | "condition"
  | "enginePower"
  | "location";

export type MatchResult = {
  alertId: string;
  listingId: string;
  matchedCriteria: CriterionName[];
  newlySatisfied: boolean; // false when the previous listing state already matched
  listing: ListingSnapshot;
};

export type NotificationType = "alert_match" | "digest";
export type NotificationStatus = "pending" | "sent" | "delivered" | "failed";

export const PRIORITY_DIGEST = 1;
export const PRIORITY_MATCH = 2;

export type DigestEntry = {
  listingId: string;
  make: string;
  model: string;
  year?: number;
  price: number;
  currency: string;
  city?: string;
  listingUrl?: string;
};

export type NotificationContent = {
  listing?: ListingSnapshot;
  criteria?: AlertCriteria;
  matchedCriteria?: CriterionName[];
  items?: DigestEntry[];
  periodKey?: string;
};

export type Notification = {
  id: string;
  alertId: string | null; // null once the alert is deleted
  userId: string;
  listingId: string | null; // null for digests
  generation: number;
  type: NotificationType;
  status: NotificationStatus;
  title: string;
  message: string;
  content: NotificationContent;
  priority: number;
  isRead: boolean;
  createdAt: ISO;
  sentAt?: ISO;
  deliveredAt?: ISO;
  retryCount: number;
  maxRetries: number;
  errorMessage?: string;
};

// dropped: the alert was paused or deleted before its digest went out
export type DigestItemStatus = "pending" | "sent" | "suppressed" | "dropped";

export type DigestItem = {
  alertId: string;
  listingId: string;
  generation: number;
  periodKey: string; // "2024-03-04" (daily) or "2024-W10" (weekly), UTC
  matchedAt: ISO;
  listing: ListingSnapshot;
  matchedCriteria: CriterionName[];
  status: DigestItemStatus;
  notificationId: string | null;
};

export type SuppressedMatch = {
  id: string;
  alertId: string;
  listingId: string;
  reason: "daily_cap";
  countInWindow: number;
  suppressedAt: ISO;
};

export type StatusUpdate = {
  notificationId: string;
  status: "sent" | "delivered" | "failed";
  errorMessage?: string;
  retryCount?: number;
  occurredAt: ISO;
};
