/**
 * @file results.ts
 * @module @seat-ledger/application/models
 * @description Command result models
 */

import {
  CancellationPolicySchema,
  FlightId,
  PassengerIdentifier,
  SeatCount,
} from "@seat-ledger/domain/kernel";
import { Booking } from "@seat-ledger/domain/ledger";
import { Schema } from "effect";

// --- Ledger Service Results ---

export class BookSeatsResult extends Schema.Class<BookSeatsResult>(
  "BookSeatsResult",
)({
  flightId: FlightId,
  booking: Booking,
  remainingSeats: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {}

export class CancelSeatsResult extends Schema.Class<CancelSeatsResult>(
  "CancelSeatsResult",
)({
  flightId: FlightId,
  passengerIdentifier: PassengerIdentifier,
  seatsCancelled: SeatCount,
  policy: CancellationPolicySchema,
  bookingsRemoved: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  remainingSeats: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {}
