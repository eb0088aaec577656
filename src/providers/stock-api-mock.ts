// StockApiTest — fixed quotes for offline runs (STOCK_PROVIDER=test).

import { Effect, Layer } from "effect";
import type { StockQuote } from "../domain.ts";
import { SymbolNotFound, StockApi } from "../stock-api.ts";

const tradingDay = Date.parse("2025-06-13");

const quotes: Record<string, StockQuote> = {
  AAPL: { symbol: "AAPL", price: 196.45, latestTradingDay: tradingDay },
  GOOGL: { symbol: "GOOGL", price: 174.67, latestTradingDay: tradingDay },
  TSLA: { symbol: "TSLA", price: 325.31, latestTradingDay: tradingDay },
};

/** A StockApi answering from `table`; unknown symbols fail with SymbolNotFound. */
export function makeStockApiStub(
  table: Readonly<Record<string, StockQuote>>,
): Layer.Layer<StockApi> {
  return Layer.succeed(
    StockApi,
    StockApi.of({
      name: "test",
      getQuote: (symbol: string) => {
        const quote = table[symbol.toUpperCase()];
        return quote !== undefined
          ? Effect.succeed(quote)
          : Effect.fail(new SymbolNotFound({ symbol }));
      },
    }),
  );
}

export const StockApiTestLive = makeStockApiStub(quotes);
