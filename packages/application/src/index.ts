export * from "./models/read-models.js";
export * from "./models/results.js";
export * from "./queries/ledger-queries.js";
export * from "./repositories/ledger.repository.js";
export * from "./services/ledger.service.js";
