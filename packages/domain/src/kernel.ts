/**
 * @file kernel.ts
 * @module @seat-ledger/domain/kernel
 * @description The shared kernel of the seat ledger.
 *
 * Branded scalars that every other module speaks in. A value of one of these
 * types has already passed its rule (a seat count is a positive integer, a
 * passenger identifier is not blank), so the aggregate never re-checks them.
 */

import { randomUUID } from "node:crypto";
import { Schema } from "effect";

// =============================================================================
// PRIMITIVE VALUE OBJECTS (Scalars with Rules)
// =============================================================================

// --- Aggregate IDs ---
export const FlightId = Schema.String.pipe(Schema.brand("FlightId"));
export type FlightId = typeof FlightId.Type;
export const makeFlightId = (id: string): FlightId => FlightId.make(id);
export const generateFlightId = (): FlightId =>
  FlightId.make(`FL-${randomUUID()}`);

// --- Passenger Identifier (e.g. an email) ---
export const PassengerIdentifier = Schema.NonEmptyTrimmedString.pipe(
  Schema.brand("PassengerIdentifier"),
);
export type PassengerIdentifier = typeof PassengerIdentifier.Type;
export const makePassengerIdentifier = (id: string): PassengerIdentifier =>
  PassengerIdentifier.make(id);

// --- Seat Count ---
export const SeatCount = Schema.Number.pipe(
  Schema.int(),
  Schema.positive(),
  Schema.brand("SeatCount"),
);
export type SeatCount = typeof SeatCount.Type;
export const makeSeatCount = (n: number): SeatCount => SeatCount.make(n);

// =============================================================================
// DOMAIN ENUMS (Finite Sets)
// =============================================================================

// --- Cancellation Policy ---
export const CancellationPolicy = {
  LEGACY: "legacy", // any booking for the passenger; remove an exact match if present
  EXACT: "exact", // an exact (passenger, seatCount) booking is required
  POOLED: "pooled", // draw from the passenger's booked seats, newest first
} as const;

export type CancellationPolicy =
  (typeof CancellationPolicy)[keyof typeof CancellationPolicy];

export const CancellationPolicySchema = Schema.Enums(CancellationPolicy);
