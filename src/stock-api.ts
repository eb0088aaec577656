// Quote provider — service definition and the errors it can fail with.

import { Context, Data, Effect } from "effect";
import type { StockQuote } from "./domain.ts";

// --- Errors ---

/** The request never got an HTTP response. */
export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

/** The provider answered with a non-2xx status. */
export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

/** The body was not JSON, or not the shape we expect (including a price
 *  that is not a number). */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

/** The provider refused the request: bad key, rate limit, and the like. */
export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type StockApiError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

// --- Service ---

export class StockApi extends Context.Tag("StockApi")<
  StockApi,
  {
    readonly name: string;
    readonly getQuote: (
      symbol: string,
    ) => Effect.Effect<StockQuote, StockApiError>;
  }
>() {}
