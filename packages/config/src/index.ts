import { Config, LogLevel } from "effect";

// ============================================================================
// Shared Configs
// ============================================================================

const nodeEnv = Config.string("NODE_ENV").pipe(
  Config.withDefault("development"),
);

// ============================================================================
// Ledger Config
// ============================================================================

export const LedgerConfig = Config.all({
  cancellationPolicy: Config.literal(
    "legacy",
    "exact",
    "pooled",
  )("LEDGER_CANCELLATION_POLICY").pipe(Config.withDefault("legacy" as const)),
  maxSeats: Config.integer("LEDGER_MAX_SEATS").pipe(
    Config.withDefault(1000),
    Config.validate({
      message: "LEDGER_MAX_SEATS must be a positive integer",
      validation: (n) => n > 0,
    }),
  ),
});

export type LedgerConfig = Config.Config.Success<typeof LedgerConfig>;

// ============================================================================
// Logging Config
// ============================================================================

export const LoggingConfig = Config.all({
  level: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  nodeEnv,
});

export type LoggingConfig = Config.Config.Success<typeof LoggingConfig>;
