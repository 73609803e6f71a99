import { Alert, CriterionName, ListingSnapshot, MatchResult } from "./dto";
import { checkCriteria, CriterionCheck, criteriaMatch } from "./rules";

function byId(a: Alert, b: Alert): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Active alerts whose every specified criterion holds for the listing,
 * ordered by alert id whatever the input order
 */
export function findMatchingAlerts(listing: ListingSnapshot, alerts: Alert[]): Alert[] {
  return alerts
    .filter((a) => a.isActive && criteriaMatch(a.criteria, listing))
    .sort(byId);
}

// Swappable for an indexed implementation once alert counts call for it
export interface AlertEvaluator {
  /**
   * Matches for the listing. With `previous` (the stored state before an
   * update) a match is newly satisfied only if `previous` did not match.
   */
  evaluate(listing: ListingSnapshot, previous?: ListingSnapshot): MatchResult[];
}

export class LinearScanEvaluator implements AlertEvaluator {
  constructor(private alerts: Alert[]) {}

  evaluate(listing: ListingSnapshot, previous?: ListingSnapshot): MatchResult[] {
    return findMatchingAlerts(listing, this.alerts).map((alert) => ({
      alertId: alert.id,
      listingId: listing.id,
      matchedCriteria: checkCriteria(alert.criteria, listing).map((c) => c.criterion),
      newlySatisfied: !previous || !criteriaMatch(alert.criteria, previous),
      listing,
    }));
  }
}

export type MatchExplanation = {
  alertId: string;
  listingId: string;
  matched: boolean;
  checks: CriterionCheck[];
  passedCriteria: CriterionName[];
  failedCriteria: CriterionName[];
  matchPercentage: number; // display only, never gates delivery
};

export function explainMatch(alert: Alert, listing: ListingSnapshot): MatchExplanation {
  const checks = checkCriteria(alert.criteria, listing);
  const passedCriteria = checks.filter((c) => c.passed).map((c) => c.criterion);
  const failedCriteria = checks.filter((c) => !c.passed).map((c) => c.criterion);

  return {
    alertId: alert.id,
    listingId: listing.id,
    matched: failedCriteria.length === 0,
    checks,
    passedCriteria,
    failedCriteria,
    matchPercentage:
      checks.length === 0 ? 100 : Math.round((passedCriteria.length / checks.length) * 100),
  };
}
