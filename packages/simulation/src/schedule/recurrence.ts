import type { SimDate } from "../types.js";

export const RECURRENCES = ["once", "daily", "monthly", "yearly"] as const;

export type Recurrence = (typeof RECURRENCES)[number];

export interface RecurrenceRule {
  startDate: SimDate;
  recurrence: Recurrence;
}

/**
 * Whether a rule fires on `date`. Nothing fires before the start date.
 * Monthly rules keep the start's day of month, so a rule starting on the
 * 31st skips shorter months; yearly rules starting on 29 February fire in
 * leap years only.
 */
export function occursOn(rule: RecurrenceRule, date: SimDate): boolean {
  if (date < rule.startDate) return false;
  switch (rule.recurrence) {
    case "once":
      return date === rule.startDate;
    case "daily":
      return true;
    case "monthly":
      return date.slice(8, 10) === rule.startDate.slice(8, 10);
    case "yearly":
      return date.slice(5, 10) === rule.startDate.slice(5, 10);
  }
}

/** Rules among `rules` that fire on `date`, in their given order. */
export function dueOn<T extends RecurrenceRule>(rules: readonly T[], date: SimDate): T[] {
  return rules.filter((rule) => occursOn(rule, date));
}
