// Vesting arithmetic — pure functions, no I/O.

import type { Grant, VestingReport } from "./domain.ts";
import { roundHalfAwayFromZero } from "./duration.ts";

/** Value a grant at `currentPrice`, given the vesting window and the time
 *  `now` (all instants in epoch ms). The caller guarantees
 *  `vestEnd > vestStart`. */
export function computeVestingReport(
  now: number,
  vestStart: number,
  vestEnd: number,
  totalShares: number,
  sharesSold: number,
  strikePrice: number,
  currentPrice: number,
): VestingReport {
  const elapsed = (now - vestStart) / 1000;
  const window = (vestEnd - vestStart) / 1000;
  const portionDone = elapsed / window;

  const sharesVested = totalShares * portionDone;
  const sharesUnvested = totalShares - sharesVested;
  const sharesVestedAndUnsold = sharesVested - sharesSold;

  const valuePerShare = currentPrice - strikePrice;

  return {
    portionDone,
    sharesVested,
    sharesUnvested,
    sharesVestedAndUnsold,
    valuePerShare,
    totalUnsoldValue: totalShares * valuePerShare,
  };
}

export function reportForGrant(
  grant: Grant,
  currentPrice: number,
  now: number,
): VestingReport {
  return computeVestingReport(
    now,
    grant.vestStart,
    grant.vestEnd,
    grant.shares,
    grant.sharesSold,
    grant.strikePrice,
    currentPrice,
  );
}

export function isFullyVested(report: VestingReport): boolean {
  return report.portionDone >= 1;
}

/** Whole seconds from `now` until `vestEnd`. */
export function secondsRemaining(vestEnd: number, now: number): number {
  return roundHalfAwayFromZero((vestEnd - now) / 1000);
}
