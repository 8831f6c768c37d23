import { fc, test } from "@fast-check/vitest";
import { Config, ConfigProvider, Effect, Either, LogLevel } from "effect";
import { describe, expect, it } from "vitest";
import { LedgerConfig, LoggingConfig } from "./index.js";

// ============================================================================
// Test Helpers
// ============================================================================

const load = <A>(config: Config.Config<A>, entries: Array<[string, string]>) =>
  Effect.runSync(
    Effect.either(
      Effect.withConfigProvider(
        config,
        ConfigProvider.fromMap(new Map(entries)),
      ),
    ),
  );

describe("LedgerConfig", () => {
  it("should default to the legacy policy and 1000 seats", () => {
    const result = load(LedgerConfig, []);

    expect(Either.getOrThrow(result)).toEqual({
      cancellationPolicy: "legacy",
      maxSeats: 1000,
    });
  });

  it.each(["legacy", "exact", "pooled"] as const)(
    "should read the %s cancellation policy",
    (policy) => {
      const result = load(LedgerConfig, [
        ["LEDGER_CANCELLATION_POLICY", policy],
      ]);

      expect(Either.getOrThrow(result).cancellationPolicy).toBe(policy);
    },
  );

  it("should reject an unknown cancellation policy", () => {
    const result = load(LedgerConfig, [
      ["LEDGER_CANCELLATION_POLICY", "partial"],
    ]);

    expect(Either.isLeft(result)).toBe(true);
  });

  test.prop([fc.integer({ min: 1, max: 100_000 })])(
    "should read any positive seat ceiling",
    (maxSeats) => {
      const result = load(LedgerConfig, [
        ["LEDGER_MAX_SEATS", String(maxSeats)],
      ]);

      expect(Either.getOrThrow(result).maxSeats).toBe(maxSeats);
    },
  );

  test.prop([fc.integer({ min: -100, max: 0 })])(
    "should reject a non-positive seat ceiling",
    (maxSeats) => {
      const result = load(LedgerConfig, [
        ["LEDGER_MAX_SEATS", String(maxSeats)],
      ]);

      expect(Either.isLeft(result)).toBe(true);
    },
  );
});

describe("LoggingConfig", () => {
  it("should default to Info in development", () => {
    const config = Either.getOrThrow(load(LoggingConfig, []));

    expect(config.level).toBe(LogLevel.Info);
    expect(config.nodeEnv).toBe("development");
  });

  it("should read the log level by name", () => {
    const config = Either.getOrThrow(
      load(LoggingConfig, [
        ["LOG_LEVEL", "Debug"],
        ["NODE_ENV", "production"],
      ]),
    );

    expect(config.level).toBe(LogLevel.Debug);
    expect(config.nodeEnv).toBe("production");
  });
});
