export * from "./booking.js";
export * from "./flight-ledger.js";
