// Pure domain types — no framework dependency, no I/O.

export interface StockQuote {
  readonly symbol: string;
  readonly price: number;
  readonly latestTradingDay: number; // epoch ms
}

/** A single stock grant. Instants are epoch ms; `vestEnd` is after `vestStart`. */
export interface Grant {
  readonly ticker: string;
  readonly shares: number;
  readonly sharesSold: number;
  readonly strikePrice: number;
  readonly vestStart: number;
  readonly vestEnd: number;
}

export interface VestingReport {
  /** Elapsed share of the vesting window. Not clamped: below 0 before the
   *  window opens, above 1 once it has closed. */
  readonly portionDone: number;
  readonly sharesVested: number;
  readonly sharesUnvested: number;
  readonly sharesVestedAndUnsold: number;
  /** Current price net of the strike price; negative when underwater. */
  readonly valuePerShare: number;
  /** Paper value of every granted share, vested or not. */
  readonly totalUnsoldValue: number;
}

export interface RemainingDuration {
  readonly seconds: number;
  readonly years: number;
  readonly months: number;
  readonly days: number;
}

export interface MoneyFormat {
  readonly symbol: string;
  readonly precision: number;
}
