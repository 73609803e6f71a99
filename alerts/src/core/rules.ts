import { AlertCriteria, CriterionName, ListingSnapshot, Range } from "./dto";
import { distanceKm } from "./geo";

export type CriterionCheck = {
  criterion: CriterionName;
  passed: boolean;
};

function norm(s: string): string {
  return s.trim().toLowerCase();
}

// A criterion set on the alert fails when the listing lacks the field
function sameText(wanted: string, actual: string | undefined): boolean {
  return actual !== undefined && norm(wanted) === norm(actual);
}

function hasBounds(r: Range | undefined): r is Range {
  return r !== undefined && (r.min !== undefined || r.max !== undefined);
}

export function inRange(r: Range, value: number | undefined): boolean {
  if (value === undefined) return false;
  if (r.min !== undefined && value < r.min) return false;
  if (r.max !== undefined && value > r.max) return false;
  return true;
}

export function locationMatches(c: AlertCriteria, snap: ListingSnapshot): boolean {
  if (!c.city) return true;
  if (c.radiusKm !== undefined && c.origin && snap.location) {
    return distanceKm(c.origin, snap.location) <= c.radiusKm;
  }
  return sameText(c.city, snap.city);
}

/**
 * One entry per criterion the alert specifies, in a fixed order
 */
export function checkCriteria(c: AlertCriteria, snap: ListingSnapshot): CriterionCheck[] {
  const out: CriterionCheck[] = [];
  const push = (criterion: CriterionName, passed: boolean) =>
    out.push({ criterion, passed });

  if (c.make) push("make", sameText(c.make, snap.make));
  if (c.model) push("model", norm(snap.model).includes(norm(c.model)));
  if (hasBounds(c.year)) push("year", inRange(c.year, snap.year));
  if (hasBounds(c.price)) push("price", inRange(c.price, snap.price));
  if (c.maxMileage !== undefined) {
    push("mileage", inRange({ max: c.maxMileage }, snap.mileage));
  }
  if (c.fuelType) push("fuelType", sameText(c.fuelType, snap.fuelType));
  if (c.transmission) push("transmission", sameText(c.transmission, snap.transmission));
  if (c.bodyType) push("bodyType", sameText(c.bodyType, snap.bodyType));
  if (c.condition) push("condition", sameText(c.condition, snap.condition));
  if (hasBounds(c.enginePowerKw)) {
    push("enginePower", inRange(c.enginePowerKw, snap.enginePowerKw));
  }
  if (c.city) push("location", locationMatches(c, snap));

  return out;
}

export function criteriaMatch(c: AlertCriteria, snap: ListingSnapshot): boolean {
  return checkCriteria(c, snap).every((check) => check.passed);
}
