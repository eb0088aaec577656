import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Cause,
  Config,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
} from "effect";
import { formatError } from "./src/format.ts";
import { ConfigurationError, makeGrant } from "./src/grant.ts";
import { AlphaVantageLive } from "./src/providers/alpha-vantage.ts";
import { StockApiTestLive } from "./src/providers/stock-api-mock.ts";
import {
  defaultConfigPath,
  loadConfigFile,
  makeConfigProvider,
  resolveSettings,
} from "./src/settings.ts";
import { worth } from "./src/worth.ts";

// --- CLI ---
// Every grant flag may also come from the environment (TICKER, VEST_START,
// ...) or the config file (ticker, vestStart, ...).

const ticker = Options.text("ticker").pipe(
  Options.withDescription("Stock ticker symbol (e.g. AAPL, GOOGL, TSLA)"),
  Options.optional,
);

const strikePrice = Options.float("strike-price").pipe(
  Options.withDescription("Strike price per share (default 0)"),
  Options.optional,
);

const shares = Options.integer("shares").pipe(
  Options.withDescription("Number of shares granted (default 1)"),
  Options.optional,
);

const sharesSold = Options.integer("shares-sold").pipe(
  Options.withDescription("Number of shares already sold (default 0)"),
  Options.optional,
);

const vestStart = Options.text("vest-start").pipe(
  Options.withDescription("Vesting start date (RFC 3339, e.g. 2021-01-01T00:00:00Z)"),
  Options.optional,
);

const vestEnd = Options.text("vest-end").pipe(
  Options.withDescription("Vesting end date (RFC 3339)"),
  Options.optional,
);

const config = Options.file("config", { exists: "yes" }).pipe(
  Options.withDescription("Config file (default $HOME/.config/worth/config.json)"),
  Options.optional,
);

const verbose = Options.boolean("verbose").pipe(
  Options.withDescription("Log diagnostics"),
);

// --- Layers ---
// Set STOCK_PROVIDER to "alphavantage" (default) or "test".

const StockApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.literal("alphavantage", "test")(
      "stockProvider",
    ).pipe(Config.withDefault("alphavantage"));
    switch (provider) {
      case "test":
        return StockApiTestLive;
      case "alphavantage":
        return AlphaVantageLive;
    }
  }),
).pipe(
  Layer.provide(FetchHttpClient.layer),
  Layer.mapError(
    (e) => new ConfigurationError({ message: `Quote provider: ${String(e)}` }),
  ),
);

// --- Command ---

const command = Command.make("worth", {
  ticker,
  strikePrice,
  shares,
  sharesSold,
  vestStart,
  vestEnd,
  config,
  verbose,
}).pipe(
  Command.withDescription(
    "Find out the value of your stock, and how much longer you have to wait until you're fully vested.",
  ),
  Command.withHandler(({ config, verbose, ...flags }) =>
    Effect.gen(function* () {
      const file = yield* Option.match(config, {
        onNone: () =>
          defaultConfigPath().pipe(
            Effect.flatMap((path) => loadConfigFile(path, { create: true })),
          ),
        onSome: (path) => loadConfigFile(path, { create: false }),
      });

      yield* Effect.gen(function* () {
        const settings = yield* resolveSettings(flags);
        const grant = yield* makeGrant(settings.grant);
        yield* worth(grant, settings.money).pipe(Effect.provide(StockApiLive));
      }).pipe(Effect.withConfigProvider(makeConfigProvider(file)));
    }).pipe(
      // The one place errors are reported; the process then exits 1.
      Effect.tapError((e) => Console.error(formatError(e))),
      Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
    ),
  ),
);

// --- Run ---

const cli = Command.run(command, {
  name: "worth",
  version: "0.1.0",
});

NodeRuntime.runMain(
  cli(process.argv).pipe(
    Effect.tapDefect((cause) => Console.error(Cause.pretty(cause))),
    Effect.provide(NodeContext.layer),
  ),
  { disableErrorReporting: true },
);
