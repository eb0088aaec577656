import { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Option } from "effect";
import { expect, test } from "vitest";
import type { ConfigurationError } from "./grant.ts";
import {
  loadConfigFile,
  envName,
  makeConfigProvider,
  noFlags,
  resolveSettings,
  type Settings,
  type SettingsFlags,
} from "./settings.ts";

// --- Helpers ---

const file = {
  ticker: "FILECO",
  shares: 100,
  vestStart: "2021-01-01T00:00:00Z",
  vestEnd: "2025-01-01T00:00:00Z",
};

function resolve(
  flags: SettingsFlags,
  json: Record<string, unknown>,
  env: Record<string, string> = {},
): Either.Either<Settings, ConfigurationError> {
  const provider = makeConfigProvider(json, env);
  return Effect.runSync(
    Effect.either(resolveSettings(flags).pipe(Effect.withConfigProvider(provider))),
  );
}

function resolveSuccess(
  flags: SettingsFlags,
  json: Record<string, unknown>,
  env: Record<string, string> = {},
): Settings {
  const result = resolve(flags, json, env);
  if (Either.isLeft(result))
    throw new Error(`Expected success, got: ${result.left.message}`);
  return result.right;
}

function withTempDir<A, E>(
  body: (
    dir: string,
  ) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>,
): Promise<A> {
  return Effect.runPromise(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const dir = yield* fs.makeTempDirectoryScoped();
      return yield* body(dir);
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)),
  );
}

// --- resolveSettings ---

test("resolveSettings: config file with defaults", () => {
  expect(resolveSuccess(noFlags, file)).toEqual({
    grant: {
      ticker: "FILECO",
      strikePrice: 0,
      shares: 100,
      sharesSold: 0,
      vestStart: "2021-01-01T00:00:00Z",
      vestEnd: "2025-01-01T00:00:00Z",
    },
    money: { symbol: "$", precision: 2 },
  });
});

test("resolveSettings: shares default to one", () => {
  const { shares: _, ...withoutShares } = file;
  expect(resolveSuccess(noFlags, withoutShares).grant.shares).toBe(1);
});

test("resolveSettings: environment overrides the config file", () => {
  const settings = resolveSuccess(noFlags, file, {
    TICKER: "ENVCO",
    STRIKE_PRICE: "12.5",
    SHARES_SOLD: "20",
  });
  expect(settings.grant.ticker).toBe("ENVCO");
  expect(settings.grant.strikePrice).toBe(12.5);
  expect(settings.grant.sharesSold).toBe(20);
  expect(settings.grant.shares).toBe(100);
});

test("resolveSettings: flags override the environment", () => {
  const settings = resolveSuccess(
    { ...noFlags, ticker: Option.some("FLAGCO"), shares: Option.some(7) },
    file,
    { TICKER: "ENVCO", SHARES: "500" },
  );
  expect(settings.grant.ticker).toBe("FLAGCO");
  expect(settings.grant.shares).toBe(7);
});

test("resolveSettings: currency settings", () => {
  const settings = resolveSuccess(noFlags, {
    ...file,
    currencySymbol: "€",
    currencyPrecision: 0,
  });
  expect(settings.money).toEqual({ symbol: "€", precision: 0 });
});

test("resolveSettings: missing vest start is a ConfigurationError", () => {
  const { vestStart: _, ...withoutStart } = file;
  const result = resolve(noFlags, withoutStart);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("ConfigurationError");
});

test("resolveSettings: non-numeric shares is a ConfigurationError", () => {
  const result = resolve(noFlags, file, { SHARES: "many" });
  expect(Either.isLeft(result)).toBe(true);
});

test("resolveSettings: an invalid environment value is not replaced by the file", () => {
  const result = resolve(noFlags, { ...file, strikePrice: 10 }, { STRIKE_PRICE: "ten" });
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("ConfigurationError");
});

test("resolveSettings: out of range precision is a ConfigurationError", () => {
  const result = resolve(noFlags, { ...file, currencyPrecision: 12 });
  expect(Either.isLeft(result)).toBe(true);
});

// --- envName ---

test("envName: camelCase keys become CONSTANT_CASE", () => {
  expect(envName("ticker")).toBe("TICKER");
  expect(envName("sharesSold")).toBe("SHARES_SOLD");
  expect(envName("alphaVantageApiKey")).toBe("ALPHA_VANTAGE_API_KEY");
  expect(envName("apikey")).toBe("APIKEY");
});

// --- loadConfigFile ---

test("loadConfigFile: reads a JSON object", async () => {
  const json = await withTempDir((dir) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const file = path.join(dir, "config.json");
      yield* fs.writeFileString(file, '{ "ticker": "ACME", "shares": 10 }');
      return yield* loadConfigFile(file, { create: false });
    }),
  );
  expect(json).toEqual({ ticker: "ACME", shares: 10 });
});

test("loadConfigFile: creates a missing file and its directory", async () => {
  const result = await withTempDir((dir) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const file = path.join(dir, "worth", "config.json");
      const json = yield* loadConfigFile(file, { create: true });
      return { json, text: yield* fs.readFileString(file) };
    }),
  );
  expect(result).toEqual({ json: {}, text: "{}\n" });
});

test("loadConfigFile: missing file without create is a ConfigurationError", async () => {
  const result = await withTempDir((dir) =>
    Effect.either(loadConfigFile(`${dir}/absent.json`, { create: false })),
  );
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("ConfigurationError");
});

test("loadConfigFile: a file that is not JSON is a ConfigurationError", async () => {
  const result = await withTempDir((dir) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = `${dir}/config.json`;
      yield* fs.writeFileString(file, "ticker: ACME\n");
      return yield* Effect.either(loadConfigFile(file, { create: false }));
    }),
  );
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("ConfigurationError");
});
