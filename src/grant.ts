// Grant validation — turns raw settings into a Grant, or a ConfigurationError.

import { Data, Effect } from "effect";
import type { Grant } from "./domain.ts";

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
}> {}

/** Grant settings as they come from flags, environment or config file. */
export interface GrantInput {
  readonly ticker: string;
  readonly shares: number;
  readonly sharesSold: number;
  readonly strikePrice: number;
  readonly vestStart: string;
  readonly vestEnd: string;
}

// RFC 3339 date-time; the offset is mandatory so the instant is unambiguous.
const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

/** Epoch ms for `text`, or NaN. `Date.parse` rolls 2021-02-30 over into
 *  March, so every field is range-checked first. */
function parseRfc3339(text: string): number {
  const match = RFC3339.exec(text);
  if (match === null) return Number.NaN;

  const [year, month, day, hour, minute, second, offsetHour, offsetMinute] =
    match.slice(1).map((field) => (field === undefined ? 0 : Number(field)));
  const inRange =
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59 &&
    offsetHour <= 23 &&
    offsetMinute <= 59;

  return inRange ? Date.parse(text) : Number.NaN;
}

export function parseTimestamp(
  field: string,
  text: string,
): Effect.Effect<number, ConfigurationError> {
  const millis = parseRfc3339(text.trim());
  return Number.isNaN(millis)
    ? Effect.fail(
        new ConfigurationError({
          message: `${field}: "${text}" is not an RFC 3339 timestamp (e.g. 2021-01-01T00:00:00Z)`,
        }),
      )
    : Effect.succeed(millis);
}

function requireCount(
  field: string,
  value: number,
): Effect.Effect<number, ConfigurationError> {
  return Number.isInteger(value) && value >= 0
    ? Effect.succeed(value)
    : Effect.fail(
        new ConfigurationError({
          message: `${field}: expected a whole number of shares, got ${value}`,
        }),
      );
}

export function makeGrant(
  input: GrantInput,
): Effect.Effect<Grant, ConfigurationError> {
  return Effect.gen(function* () {
    const ticker = input.ticker.trim();
    if (ticker.length === 0) {
      return yield* new ConfigurationError({ message: "ticker: must not be empty" });
    }

    const shares = yield* requireCount("shares", input.shares);
    // Selling more than has vested is allowed; the report just goes negative.
    const sharesSold = yield* requireCount("shares-sold", input.sharesSold);

    if (!(input.strikePrice >= 0)) {
      return yield* new ConfigurationError({
        message: `strike-price: must not be negative, got ${input.strikePrice}`,
      });
    }

    const vestStart = yield* parseTimestamp("vest-start", input.vestStart);
    const vestEnd = yield* parseTimestamp("vest-end", input.vestEnd);
    if (vestEnd <= vestStart) {
      return yield* new ConfigurationError({
        message: "vest-end must be later than vest-start",
      });
    }

    return {
      ticker,
      shares,
      sharesSold,
      strikePrice: input.strikePrice,
      vestStart,
      vestEnd,
    };
  });
}
