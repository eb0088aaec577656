// Settings — one immutable value resolved at startup from flags, the
// environment and the config file, in that order of precedence.

import { FileSystem, Path } from "@effect/platform";
import {
  Config,
  ConfigProvider,
  Effect,
  Option,
  Schema,
  String as Str,
} from "effect";
import { homedir } from "node:os";
import process from "node:process";
import type { MoneyFormat } from "./domain.ts";
import { ConfigurationError, type GrantInput } from "./grant.ts";

export interface Settings {
  readonly grant: GrantInput;
  readonly money: MoneyFormat;
}

/** Values given on the command line; `None` defers to env / config file. */
export interface SettingsFlags {
  readonly ticker: Option.Option<string>;
  readonly strikePrice: Option.Option<number>;
  readonly shares: Option.Option<number>;
  readonly sharesSold: Option.Option<number>;
  readonly vestStart: Option.Option<string>;
  readonly vestEnd: Option.Option<string>;
}

export const noFlags: SettingsFlags = {
  ticker: Option.none(),
  strikePrice: Option.none(),
  shares: Option.none(),
  sharesSold: Option.none(),
  vestStart: Option.none(),
  vestEnd: Option.none(),
};

// --- Config file ---

export function defaultConfigPath(): Effect.Effect<string, never, Path.Path> {
  return Effect.map(Path.Path, (path) =>
    path.join(homedir(), ".config", "worth", "config.json"),
  );
}

const ConfigFile = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Unknown }),
);

/** Read a JSON config file. With `create`, a missing file (and its
 *  directory) is created first, holding an empty object. */
export function loadConfigFile(
  file: string,
  options: { readonly create: boolean },
): Effect.Effect<
  Readonly<Record<string, unknown>>,
  ConfigurationError,
  FileSystem.FileSystem | Path.Path
> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    if (options.create && !(yield* fs.exists(file))) {
      yield* fs.makeDirectory(path.dirname(file), {
        recursive: true,
        mode: 0o700,
      });
      yield* fs.writeFileString(file, "{}\n", { mode: 0o600 });
      yield* Effect.logDebug(`created empty config file ${file}`);
    }

    const text = yield* fs.readFileString(file);
    yield* Effect.logDebug(`read config file ${file}`);
    return yield* Schema.decodeUnknown(ConfigFile)(text);
  }).pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `${file}: ${e.message}` }),
    ),
  );
}

// Every key read through Config, in camelCase as the config file spells it.
const settingKeys = [
  "ticker",
  "strikePrice",
  "shares",
  "sharesSold",
  "vestStart",
  "vestEnd",
  "currencySymbol",
  "currencyPrecision",
  "stockProvider",
  "alphaVantageApiKey",
  "alphaVantageBaseUrl",
  "apikey",
] as const;

/** `strikePrice` → `STRIKE_PRICE`. */
export const envName = (key: string): string =>
  Str.camelToSnake(key).toUpperCase();

/** The config file with environment variables (CONSTANT_CASE) laid over
 *  it key by key. An environment value that is set always wins, so a bad
 *  one is reported rather than skipped in favour of the file. */
export function makeConfigProvider(
  file: Readonly<Record<string, unknown>>,
  env: Readonly<Record<string, string | undefined>> = process.env,
): ConfigProvider.ConfigProvider {
  const merged: Record<string, unknown> = { ...file };
  for (const key of settingKeys) {
    const value = env[envName(key)];
    if (value !== undefined) merged[key] = value;
  }
  return ConfigProvider.fromJson(merged);
}

// --- Resolution ---

const fromFlag = <A>(
  flag: Option.Option<A>,
  config: Config.Config<A>,
): Config.Config<A> =>
  Option.match(flag, {
    onNone: () => config,
    onSome: (value) => Config.succeed(value),
  });

/** Resolve settings against the current ConfigProvider. */
export function resolveSettings(
  flags: SettingsFlags,
): Effect.Effect<Settings, ConfigurationError> {
  return Effect.gen(function* () {
    const grant = yield* Config.all({
      ticker: fromFlag(flags.ticker, Config.string("ticker")),
      strikePrice: fromFlag(
        flags.strikePrice,
        Config.number("strikePrice").pipe(Config.withDefault(0)),
      ),
      shares: fromFlag(
        flags.shares,
        Config.integer("shares").pipe(Config.withDefault(1)),
      ),
      sharesSold: fromFlag(
        flags.sharesSold,
        Config.integer("sharesSold").pipe(Config.withDefault(0)),
      ),
      vestStart: fromFlag(flags.vestStart, Config.string("vestStart")),
      vestEnd: fromFlag(flags.vestEnd, Config.string("vestEnd")),
    });

    const money = yield* Config.all({
      symbol: Config.string("currencySymbol").pipe(Config.withDefault("$")),
      precision: Config.integer("currencyPrecision").pipe(
        Config.validate({
          message: "Expected a precision between 0 and 10",
          validation: (n) => n >= 0 && n <= 10,
        }),
        Config.withDefault(2),
      ),
    });

    return { grant, money };
  }).pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `Invalid settings: ${String(e)}` }),
    ),
  );
}
