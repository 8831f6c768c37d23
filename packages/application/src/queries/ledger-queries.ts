/**
 * @file ledger-queries.ts
 * @module @seat-ledger/application/queries
 * @description Query service for ledger read models
 */

import type { FlightNotFoundError } from "@seat-ledger/domain/errors";
import type { FlightId } from "@seat-ledger/domain/kernel";
import type { Booking } from "@seat-ledger/domain/ledger";
import { Context, type Effect } from "effect";
import type { SeatAvailability } from "../models/read-models.js";

/**
 * Query service for ledger read operations, separate from the command side
 */
export interface LedgerQueriesPort {
  /**
   * Get the seat availability summary of one flight
   */
  getSeatAvailability(
    flightId: FlightId,
  ): Effect.Effect<SeatAvailability, FlightNotFoundError>;

  /**
   * Get one passenger's bookings in insertion order
   */
  getPassengerBookings(
    flightId: FlightId,
    passengerIdentifier: string,
  ): Effect.Effect<ReadonlyArray<Booking>, FlightNotFoundError>;

  /**
   * Find flights with at least `minSeats` seats remaining
   */
  findAvailableFlights(
    minSeats: number,
  ): Effect.Effect<ReadonlyArray<SeatAvailability>>;
}

export class LedgerQueries extends Context.Tag("LedgerQueries")<
  LedgerQueries,
  LedgerQueriesPort
>() {}
