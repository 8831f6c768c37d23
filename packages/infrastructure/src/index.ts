import { LedgerService } from "@seat-ledger/application";
import { ConfigProvider, Layer } from "effect";
import { InMemoryLedgerQueriesLive } from "./queries/ledger-queries.js";
import { InMemoryLedgerRepositoryLive } from "./repositories/in-memory-ledger.repository.js";
import { LoggerLive } from "./services/logger.js";

export { InMemoryLedgerQueriesLive } from "./queries/ledger-queries.js";
export { InMemoryLedgerRepositoryLive } from "./repositories/in-memory-ledger.repository.js";
export { LoggerLive } from "./services/logger.js";

// --- 1. Adapters (Repository, Queries) ---
// Queries read through the same repository instance the service writes to
export const LedgerAdaptersLive = InMemoryLedgerQueriesLive.pipe(
  Layer.provideMerge(InMemoryLedgerRepositoryLive),
);

// --- 2. Application Services ---
export const LedgerServicesLive = LedgerService.Live.pipe(
  Layer.provideMerge(LedgerAdaptersLive),
);

// --- 3. Final Unified Layer, configured from the environment ---
export const SeatLedgerLive = Layer.merge(LedgerServicesLive, LoggerLive).pipe(
  Layer.provide(Layer.setConfigProvider(ConfigProvider.fromEnv())),
);
