// Remaining-time arithmetic — pure functions, no I/O.

import type { RemainingDuration } from "./domain.ts";

const DAYS_PER_YEAR = 365;
const DAYS_PER_MONTH = Math.floor(DAYS_PER_YEAR / 12); // 30
const MONTHS_PER_YEAR = 12;

/** Round half away from zero: 2.5 → 3, -2.5 → -3. */
export function roundHalfAwayFromZero(x: number): number {
  const rounded = x < 0 ? Math.ceil(x - 0.5) : Math.floor(x + 0.5);
  return Math.trunc(rounded);
}

const div = (a: number, b: number): number => Math.trunc(a / b);

/** Break whole seconds into years, 30-day months and days.
 *  `secsToGo` must not be negative. */
export function normalizeDuration(secsToGo: number): RemainingDuration {
  const minutes = div(secsToGo, 60);
  const hours = div(minutes, 60);
  let days = div(hours, 24);
  let years = div(days, DAYS_PER_YEAR);
  let months = div(days, DAYS_PER_MONTH);

  months -= years * MONTHS_PER_YEAR;
  days -= years * DAYS_PER_YEAR;
  if (months < 0) months = 0;

  days -= months * DAYS_PER_MONTH;
  if (days < 0) days = 0;

  // Never show "1 month 30 days"; fold it into "2 months".
  if (days > DAYS_PER_MONTH - 1) {
    days -= DAYS_PER_MONTH;
    months += 1;
    if (months >= MONTHS_PER_YEAR) {
      months -= MONTHS_PER_YEAR;
      years += 1;
    }
  }

  return { seconds: secsToGo, years, months, days };
}

function segment(amount: number, unit: string): string {
  if (amount <= 0) return "";
  return ` ${amount} ${unit}${amount === 1 ? "" : "s"}`;
}

/** Render remaining seconds as " 1 year 2 months 3 days". Zero-valued parts
 *  are left out, so less than a day renders as "". */
export function formatRemaining(secsToGo: number): string {
  const { years, months, days } = normalizeDuration(secsToGo);
  return segment(years, "year") + segment(months, "month") + segment(days, "day");
}
