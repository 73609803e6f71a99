import { Alert, AlertCriteria, ISO, ListingSnapshot } from "./dto";
import { validateCriteria } from "./criteria";
import { explainMatch, findMatchingAlerts, MatchExplanation } from "./match";
import { RecentListingsPort } from "./ports";

export type AlertTestResult = {
  criteria: AlertCriteria;
  evaluated: number;
  matches: (MatchExplanation & { listing: ListingSnapshot })[];
};

const DRY_RUN_ID = "dry-run";

/**
 * Dry run of criteria against a set of listings; nothing is persisted.
 * Invalid criteria throw CriteriaValidationError before any listing is read.
 */
export function testAlert(input: unknown, listings: ListingSnapshot[], now: ISO): AlertTestResult {
  const criteria = validateCriteria(input);
  const alert: Alert = {
    id: DRY_RUN_ID,
    userId: DRY_RUN_ID,
    name: DRY_RUN_ID,
    criteria,
    isActive: true,
    frequency: "immediate",
    maxNotificationsPerDay: 0,
    triggerCount: 0,
    createdAt: now,
    updatedAt: now,
  };

  const matches = listings
    .filter((l) => findMatchingAlerts(l, [alert]).length > 0)
    .map((listing) => ({ ...explainMatch(alert, listing), listing }));

  return { criteria, evaluated: listings.length, matches };
}

export type AlertTesterOptions = {
  windowDays: number;
  limit: number;
};

export class AlertTester {
  constructor(private listings: RecentListingsPort, private opts: AlertTesterOptions) {}

  async run(input: unknown, now: ISO): Promise<AlertTestResult> {
    // criteria errors surface before the window is read
    validateCriteria(input);
    const since = new Date(Date.parse(now) - this.opts.windowDays * 86_400_000).toISOString();
    const window = await this.listings.listRecent(since, this.opts.limit);
    return testAlert(input, window, now);
  }
}
