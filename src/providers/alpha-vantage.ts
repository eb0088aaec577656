// Alpha Vantage — implementation of StockApi on the GLOBAL_QUOTE endpoint.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Redacted, Schema } from "effect";
import type { StockQuote } from "../domain.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  ServiceError,
  SymbolNotFound,
  StockApi,
} from "../stock-api.ts";

// --- Alpha Vantage response schema ---

// Service-level failures come back as 200s carrying one of these strings.
const AlphaVantageEnvelope = Schema.Struct({
  "Error Message": Schema.optional(Schema.String),
  "Note": Schema.optional(Schema.String),
  "Information": Schema.optional(Schema.String),
  "Global Quote": Schema.optional(Schema.Unknown),
});

type AlphaVantageEnvelopeType = typeof AlphaVantageEnvelope.Type;

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
  "07. latest trading day": Schema.String,
});

type AlphaVantageGlobalQuoteType = typeof AlphaVantageGlobalQuote.Type;

// --- Decode Alpha Vantage response into StockQuote ---

export function decodeAlphaVantageResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<StockQuote, ParseError | SymbolNotFound | ServiceError> {
  return Schema.decodeUnknown(AlphaVantageEnvelope)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap((envelope) => interpretEnvelope(envelope, symbol)),
  );
}

function interpretEnvelope(
  envelope: AlphaVantageEnvelopeType,
  symbol: string,
): Effect.Effect<StockQuote, ParseError | SymbolNotFound | ServiceError> {
  const refusal =
    envelope["Error Message"] ?? envelope["Note"] ?? envelope["Information"];
  if (refusal !== undefined) {
    return Effect.fail(new ServiceError({ message: refusal }));
  }

  const globalQuote = envelope["Global Quote"];
  if (
    typeof globalQuote !== "object" ||
    globalQuote === null ||
    Object.keys(globalQuote).length === 0
  ) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap(toStockQuote),
  );
}

/** `Number("")` is 0; an empty field is not a price. */
function parseDecimal(text: string): number {
  return text.trim() === "" ? Number.NaN : Number(text);
}

function toStockQuote(
  q: AlphaVantageGlobalQuoteType,
): Effect.Effect<StockQuote, ParseError> {
  const price = parseDecimal(q["05. price"]);
  if (Number.isNaN(price)) {
    return Effect.fail(
      new ParseError({ message: `Non-numeric price: "${q["05. price"]}"` }),
    );
  }

  const latestTradingDay = Date.parse(q["07. latest trading day"]);
  if (Number.isNaN(latestTradingDay)) {
    return Effect.fail(
      new ParseError({
        message: `Invalid trading day: "${q["07. latest trading day"]}"`,
      }),
    );
  }

  return Effect.succeed({ symbol: q["01. symbol"], price, latestTradingDay });
}

// --- Alpha Vantage layer ---

export const AlphaVantageLive = Layer.effect(
  StockApi,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    // "apikey" is the key older config files use.
    const apiKey = yield* Config.redacted("alphaVantageApiKey").pipe(
      Config.orElse(() => Config.redacted("apikey")),
    );
    const baseUrl = yield* Config.string("alphaVantageBaseUrl").pipe(
      Config.withDefault("https://www.alphavantage.co/query"),
    );

    return StockApi.of({
      name: "alphavantage",
      getQuote: (symbol: string) =>
        Effect.gen(function* () {
          const request = HttpClientRequest.get(baseUrl).pipe(
            HttpClientRequest.setUrlParams({
              function: "GLOBAL_QUOTE",
              symbol,
              apikey: Redacted.value(apiKey),
            }),
          );
          yield* Effect.logDebug(`GET ${baseUrl} GLOBAL_QUOTE ${symbol}`);
          const response = yield* client.execute(request);
          const json = yield* response.json;
          return yield* decodeAlphaVantageResponse(json, symbol);
        }).pipe(
          // The response body is released when the request's scope closes.
          Effect.scoped,
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? Effect.fail(new HttpError({ status: e.response.status }))
                : Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  ),
          }),
        ),
    });
  }),
);
