/**
 * @file read-models.ts
 * @module @seat-ledger/application/models
 * @description Read models for the query side
 */

import { FlightId, SeatCount } from "@seat-ledger/domain/kernel";
import { Schema } from "effect";

// --- Ledger Read Models ---

/**
 * Seat availability summary of one flight
 */
export class SeatAvailability extends Schema.Class<SeatAvailability>(
  "SeatAvailability",
)({
  flightId: FlightId,
  totalSeats: SeatCount,
  remainingSeats: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  bookedSeats: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  bookingCount: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  utilization: Schema.Number.pipe(Schema.between(0, 1)),
}) {
  get isFull(): boolean {
    return this.remainingSeats === 0;
  }
}
