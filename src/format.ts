// Pure formatting functions — no I/O.

import type { MoneyFormat, VestingReport } from "./domain.ts";
import type { HttpError } from "./stock-api.ts";
import type { WorthError } from "./worth.ts";

// --- ANSI escape codes ---

const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Money ---

export const defaultMoneyFormat: MoneyFormat = { symbol: "$", precision: 2 };

/** `-1234.5` → `-$1,234.50`. */
export function formatMoney(
  amount: number,
  { symbol, precision }: MoneyFormat = defaultMoneyFormat,
): string {
  const digits = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: precision,
    maximumFractionDigits: precision,
  }).format(Math.abs(amount));
  // Something that rounds to zero is not shown as "-$0.00".
  const negative = amount < 0 && /[1-9]/.test(digits);
  return `${negative ? "-" : ""}${symbol}${digits}`;
}

// --- Report ---

export function formatSummary(
  ticker: string,
  price: number,
  report: VestingReport,
  money: MoneyFormat = defaultMoneyFormat,
): string {
  return (
    `Today's ${ticker} price is ${formatMoney(price, money)}; ` +
    `your total unsold shares are worth ${formatMoney(report.totalUnsoldValue, money)}.`
  );
}

export function formatFullyVested(): string {
  return "You are 100% vested.  Why are you still here?\n";
}

/** The "not there yet" block; `remaining` comes from formatRemaining. */
export function formatProgress(
  report: VestingReport,
  remaining: string,
  money: MoneyFormat = defaultMoneyFormat,
): string {
  const percent = Math.trunc(report.portionDone * 100);
  const unsold = Math.trunc(report.sharesVestedAndUnsold);
  const unsoldValue = report.sharesVestedAndUnsold * report.valuePerShare;
  const forfeited = report.sharesUnvested * report.valuePerShare;

  return [
    `You are ${percent}% vested, for a total of ${unsold} vested unsold shares (${formatMoney(unsoldValue, money)})`,
    `But if you quit today, you will walk away from ${formatMoney(forfeited, money)}`,
    `Hang in there, little trooper! Only${remaining} to go!`,
  ].join("\n");
}

// --- Error formatting ---

export function formatError(error: WorthError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: WorthError): ClassifiedError {
  switch (error._tag) {
    case "ConfigurationError":
      return { title: "Configuration error", hint: error.message };
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the quote provider. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "SymbolNotFound":
      return {
        title: "Symbol not found",
        hint: `No quote for "${error.symbol}". Double-check the ticker symbol.`,
      };
    case "ServiceError":
      return { title: "Service unavailable", hint: error.message };
    case "ParseError":
      return { title: "Unexpected response", hint: error.message };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests, wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The quote provider is having issues. Try again in a few minutes.",
    };
  }
  return { title: "HTTP error", hint: `HTTP ${error.status}` };
}
