import { LoggingConfig } from "@seat-ledger/config";
import { Effect, Layer, Logger } from "effect";

/**
 * Logger Layer: JSON lines in production, pretty output elsewhere,
 * with the minimum level taken from LOG_LEVEL.
 */
export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const { level, nodeEnv } = yield* LoggingConfig;
    const format = nodeEnv === "production" ? Logger.json : Logger.pretty;
    return Layer.merge(format, Logger.minimumLogLevel(level));
  }),
);
