import { ISO } from "./dto";

const DAY_MS = 86_400_000;

export type DigestFrequency = "daily" | "weekly";

/** UTC calendar day, e.g. "2024-03-04" */
export function dailyPeriodKey(at: ISO): string {
  return new Date(at).toISOString().slice(0, 10);
}

/** ISO-8601 week (weeks start Monday, UTC), e.g. "2024-W10" */
export function weeklyPeriodKey(at: ISO): string {
  const t = new Date(at);
  const d = new Date(Date.UTC(t.getUTCFullYear(), t.getUTCMonth(), t.getUTCDate()));
  const dayNum = d.getUTCDay() || 7;
  // the Thursday of this week decides the week-numbering year
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / DAY_MS + 1) / 7);
  return `${d.getUTCFullYear()}-W${String(week).padStart(2, "0")}`;
}

export function periodKeyFor(frequency: DigestFrequency, at: ISO): string {
  return frequency === "daily" ? dailyPeriodKey(at) : weeklyPeriodKey(at);
}

export function rollingWindowStart(now: ISO, hours = 24): ISO {
  return new Date(Date.parse(now) - hours * 3600e3).toISOString();
}
