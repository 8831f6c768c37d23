import { LedgerConfig } from "@seat-ledger/config";
import {
  type FlightNotFoundError,
  InvalidBookingRequestError,
  InvalidCapacityError,
  type OverbookingError,
} from "@seat-ledger/domain/errors";
import {
  FlightId,
  PassengerIdentifier,
  SeatCount,
} from "@seat-ledger/domain/kernel";
import {
  Booking,
  type CancelSeatsError,
  FlightLedger,
} from "@seat-ledger/domain/ledger";
import {
  Context,
  Effect,
  HashMap,
  Layer,
  Metric,
  Option,
  Schema,
  SynchronizedRef,
} from "effect";
import { BookSeatsResult, CancelSeatsResult } from "../models/results.js";
import { LedgerRepository } from "../repositories/ledger.repository.js";

// ============================================================================
// TYPES
// ============================================================================

const SeatRequest = Schema.Struct({
  flightId: FlightId,
  passengerIdentifier: PassengerIdentifier,
  seatCount: SeatCount,
});

/**
 * Raw booking or cancellation request, validated by the service.
 */
export type SeatRequestInput = typeof SeatRequest.Encoded;

export type CreateFlightInput = {
  totalSeats: number;
};

export type BookError =
  | InvalidBookingRequestError
  | FlightNotFoundError
  | OverbookingError;

export type CancelError =
  | InvalidBookingRequestError
  | FlightNotFoundError
  | CancelSeatsError;

// ============================================================================
// METRICS
// ============================================================================

const seatsBookedCounter = Metric.counter("ledger_seats_booked_total", {
  description: "Total number of seats booked",
});

const overbookingCounter = Metric.counter("ledger_overbooking_total", {
  description: "Booking requests refused for lack of seats",
});

const seatsCancelledCounter = Metric.counter("ledger_seats_cancelled_total", {
  description: "Total number of seats returned by cancellations",
});

const cancellationFailureCounter = Metric.counter(
  "ledger_cancellation_failure_total",
  { description: "Refused cancellation requests" },
);

// ============================================================================
// HELPERS
// ============================================================================

const decodeSeatRequest = (input: SeatRequestInput) =>
  Schema.decodeUnknown(SeatRequest)(input).pipe(
    Effect.mapError(
      (error) => new InvalidBookingRequestError({ message: error.message }),
    ),
  );

// ============================================================================
// SERVICE INTERFACE & IMPLEMENTATION
// ============================================================================

export interface LedgerServiceSignature {
  readonly createFlight: (
    input: CreateFlightInput,
  ) => Effect.Effect<FlightLedger, InvalidCapacityError>;
  readonly bookSeats: (
    input: SeatRequestInput,
  ) => Effect.Effect<BookSeatsResult, BookError>;
  readonly cancelBookedSeats: (
    input: SeatRequestInput,
  ) => Effect.Effect<CancelSeatsResult, CancelError>;
  readonly getLedger: (
    flightId: FlightId,
  ) => Effect.Effect<FlightLedger, FlightNotFoundError>;
}

export class LedgerService extends Context.Tag("LedgerService")<
  LedgerService,
  LedgerServiceSignature
>() {
  /**
   * Live Layer with one serialized owner per flight.
   *
   * Every read-modify-write of a flight runs under that flight's single-permit
   * semaphore; different flights never wait on each other.
   */
  static readonly Live = Layer.effect(
    LedgerService,
    Effect.gen(function* () {
      const repo = yield* LedgerRepository;
      const config = yield* LedgerConfig;
      const locks = yield* SynchronizedRef.make(
        HashMap.empty<FlightId, Effect.Semaphore>(),
      );

      const lockFor = (flightId: FlightId) =>
        SynchronizedRef.modifyEffect(locks, (held) =>
          Option.match(HashMap.get(held, flightId), {
            onSome: (lock) => Effect.succeed([lock, held] as const),
            onNone: () =>
              Effect.map(
                Effect.makeSemaphore(1),
                (lock) => [lock, HashMap.set(held, flightId, lock)] as const,
              ),
          }),
        );

      const withFlightLock =
        (flightId: FlightId) =>
        <A, E>(effect: Effect.Effect<A, E>): Effect.Effect<A, E> =>
          Effect.flatMap(lockFor(flightId), (lock) => lock.withPermits(1)(effect));

      // Publish then clear domain events before persisting
      const commit = (ledger: FlightLedger) =>
        Effect.gen(function* () {
          yield* Effect.forEach(
            ledger.domainEvents,
            (event) =>
              Effect.logDebug("Ledger event raised", {
                eventId: event.eventId,
                flightId: event.flightId,
                passengerIdentifier: event.passengerIdentifier,
                seatCount: event.seatCount,
              }),
            { discard: true },
          );
          return yield* repo.save(ledger.clearEvents());
        });

      yield* Effect.logDebug(
        `[Service] Ledger service initialized (cancellation policy: ${config.cancellationPolicy})`,
      );

      return {
        createFlight: ({ totalSeats }: CreateFlightInput) =>
          Effect.gen(function* () {
            if (
              !Number.isInteger(totalSeats) ||
              totalSeats <= 0 ||
              totalSeats > config.maxSeats
            ) {
              return yield* Effect.fail(
                new InvalidCapacityError({
                  totalSeats,
                  maxSeats: config.maxSeats,
                }),
              );
            }

            const ledger = yield* commit(
              FlightLedger.create({ totalSeats: SeatCount.make(totalSeats) }),
            );
            yield* Effect.logInfo(
              `Opened ledger ${ledger.id} with ${ledger.totalSeats} seats`,
            );
            return ledger;
          }),

        bookSeats: (input: SeatRequestInput) =>
          Effect.gen(function* () {
            const request = yield* decodeSeatRequest(input);

            return yield* withFlightLock(request.flightId)(
              Effect.gen(function* () {
                const ledger = yield* repo.getById(request.flightId);
                const next = yield* ledger
                  .bookSeats(request.passengerIdentifier, request.seatCount)
                  .pipe(
                    Effect.tapError(() =>
                      Metric.increment(overbookingCounter).pipe(
                        Effect.zipRight(
                          Effect.logWarning("Overbooking refused", {
                            requested: request.seatCount,
                            remaining: ledger.remainingSeats,
                          }),
                        ),
                      ),
                    ),
                  );
                const saved = yield* commit(next);

                yield* Metric.incrementBy(seatsBookedCounter, request.seatCount);
                yield* Effect.logInfo(
                  `Booked ${request.seatCount} seat(s) for ${request.passengerIdentifier}`,
                );

                return new BookSeatsResult({
                  flightId: saved.id,
                  booking: new Booking({
                    passengerIdentifier: request.passengerIdentifier,
                    seatCount: request.seatCount,
                  }),
                  remainingSeats: saved.remainingSeats,
                });
              }),
            );
          }).pipe(
            Effect.annotateLogs({ flightId: input.flightId }),
            Effect.withLogSpan("ledger.bookSeats"),
          ),

        cancelBookedSeats: (input: SeatRequestInput) =>
          Effect.gen(function* () {
            const request = yield* decodeSeatRequest(input);
            const policy = config.cancellationPolicy;

            return yield* withFlightLock(request.flightId)(
              Effect.gen(function* () {
                const ledger = yield* repo.getById(request.flightId);
                const next = yield* ledger
                  .cancelBookedSeats(
                    request.passengerIdentifier,
                    request.seatCount,
                    policy,
                  )
                  .pipe(
                    Effect.tapError((error) =>
                      Metric.increment(cancellationFailureCounter).pipe(
                        Effect.zipRight(
                          Effect.logWarning("Cancellation refused", {
                            reason: error._tag,
                            policy,
                          }),
                        ),
                      ),
                    ),
                  );
                const saved = yield* commit(next);

                yield* Metric.incrementBy(
                  seatsCancelledCounter,
                  request.seatCount,
                );
                yield* Effect.logInfo(
                  `Cancelled ${request.seatCount} seat(s) for ${request.passengerIdentifier}`,
                );

                return new CancelSeatsResult({
                  flightId: saved.id,
                  passengerIdentifier: request.passengerIdentifier,
                  seatsCancelled: request.seatCount,
                  policy,
                  bookingsRemoved:
                    ledger.bookings.length - saved.bookings.length,
                  remainingSeats: saved.remainingSeats,
                });
              }),
            );
          }).pipe(
            Effect.annotateLogs({ flightId: input.flightId }),
            Effect.withLogSpan("ledger.cancelBookedSeats"),
          ),

        getLedger: (flightId: FlightId) => repo.getById(flightId),
      };
    }),
  );
}
