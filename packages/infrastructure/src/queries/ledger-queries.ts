/**
 * @file ledger-queries.ts
 * @module @seat-ledger/infrastructure/queries
 * @description Read-side implementation of the ledger queries over the repository
 */

import {
  LedgerQueries,
  type LedgerQueriesPort,
  LedgerRepository,
  SeatAvailability,
} from "@seat-ledger/application";
import type { FlightLedger } from "@seat-ledger/domain/ledger";
import { Effect, Layer } from "effect";

const toAvailability = (ledger: FlightLedger): SeatAvailability =>
  new SeatAvailability({
    flightId: ledger.id,
    totalSeats: ledger.totalSeats,
    remainingSeats: ledger.remainingSeats,
    bookedSeats: ledger.bookedSeats,
    bookingCount: ledger.bookings.length,
    utilization:
      (ledger.totalSeats - ledger.remainingSeats) / ledger.totalSeats,
  });

export const InMemoryLedgerQueriesLive = Layer.effect(
  LedgerQueries,
  Effect.gen(function* () {
    const repo = yield* LedgerRepository;

    const getSeatAvailability: LedgerQueriesPort["getSeatAvailability"] = (
      flightId,
    ) => repo.getById(flightId).pipe(Effect.map(toAvailability));

    const getPassengerBookings: LedgerQueriesPort["getPassengerBookings"] = (
      flightId,
      passengerIdentifier,
    ) =>
      repo
        .getById(flightId)
        .pipe(
          Effect.map((ledger) =>
            ledger.bookings.filter(
              (booking) => booking.passengerIdentifier === passengerIdentifier,
            ),
          ),
        );

    const findAvailableFlights: LedgerQueriesPort["findAvailableFlights"] = (
      minSeats,
    ) =>
      repo
        .list()
        .pipe(
          Effect.map((ledgers) =>
            ledgers
              .filter((ledger) => ledger.remainingSeats >= minSeats)
              .map(toAvailability),
          ),
        );

    return LedgerQueries.of({
      getSeatAvailability,
      getPassengerBookings,
      findAvailableFlights,
    });
  }),
);
