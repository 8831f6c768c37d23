import {
  LedgerRepository,
  type LedgerRepositoryPort,
} from "@seat-ledger/application";
import { FlightNotFoundError } from "@seat-ledger/domain/errors";
import type { FlightId } from "@seat-ledger/domain/kernel";
import type { FlightLedger } from "@seat-ledger/domain/ledger";
import { Effect, HashMap, Layer, Option, Ref } from "effect";

/**
 * In-memory implementation of the LedgerRepository.
 * State lives for as long as the layer that built it.
 */
export const InMemoryLedgerRepositoryLive = Layer.effect(
  LedgerRepository,
  Effect.gen(function* () {
    const store = yield* Ref.make(HashMap.empty<FlightId, FlightLedger>());

    const save: LedgerRepositoryPort["save"] = (ledger) =>
      Ref.update(store, HashMap.set(ledger.id, ledger)).pipe(
        Effect.as(ledger),
        Effect.tap(() =>
          Effect.logDebug("Ledger saved", {
            flightId: ledger.id,
            remainingSeats: ledger.remainingSeats,
          }),
        ),
      );

    const getById: LedgerRepositoryPort["getById"] = (id) =>
      Ref.get(store).pipe(
        Effect.flatMap(
          (ledgers): Effect.Effect<FlightLedger, FlightNotFoundError> =>
            Option.match(HashMap.get(ledgers, id), {
              onNone: () =>
                Effect.fail(new FlightNotFoundError({ flightId: id })),
              onSome: (ledger) => Effect.succeed(ledger),
            }),
        ),
      );

    const list: LedgerRepositoryPort["list"] = () =>
      Ref.get(store).pipe(
        Effect.map((ledgers) => Array.from(HashMap.values(ledgers))),
      );

    return LedgerRepository.of({ save, getById, list });
  }),
);
