// The report program: quote → vesting report → console lines.

import { Clock, Console, Effect } from "effect";
import type { Grant, MoneyFormat } from "./domain.ts";
import { formatRemaining } from "./duration.ts";
import {
  formatFullyVested,
  formatProgress,
  formatSummary,
} from "./format.ts";
import type { ConfigurationError } from "./grant.ts";
import { StockApi, type StockApiError } from "./stock-api.ts";
import { isFullyVested, reportForGrant, secondsRemaining } from "./vesting.ts";

export type WorthError = StockApiError | ConfigurationError;

export interface WorthResult {
  readonly fullyVested: boolean;
  readonly lines: readonly string[];
}

/** Build the report for `grant` at the current Clock time. */
export function buildReport(
  grant: Grant,
  money: MoneyFormat,
): Effect.Effect<WorthResult, StockApiError, StockApi> {
  return Effect.gen(function* () {
    const api = yield* StockApi;
    const quote = yield* api.getQuote(grant.ticker);
    yield* Effect.logDebug(`${api.name}: ${quote.symbol} at ${quote.price}`);

    const now = yield* Clock.currentTimeMillis;
    const report = reportForGrant(grant, quote.price, now);
    yield* Effect.logDebug(`portion done: ${report.portionDone}`);

    const summary = formatSummary(grant.ticker, quote.price, report, money);

    if (isFullyVested(report)) {
      return { fullyVested: true, lines: [summary, formatFullyVested()] };
    }

    const remaining = formatRemaining(secondsRemaining(grant.vestEnd, now));
    return {
      fullyVested: false,
      lines: [summary, formatProgress(report, remaining, money)],
    };
  });
}

/** Build the report and print it. */
export function worth(
  grant: Grant,
  money: MoneyFormat,
): Effect.Effect<WorthResult, StockApiError, StockApi> {
  return buildReport(grant, money).pipe(
    Effect.tap(({ lines }) => Effect.forEach(lines, (line) => Console.log(line))),
  );
}
