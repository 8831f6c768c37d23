import { LedgerRepository } from "@seat-ledger/application";
import { makeFlightId, makeSeatCount } from "@seat-ledger/domain/kernel";
import { FlightLedger } from "@seat-ledger/domain/ledger";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { InMemoryLedgerRepositoryLive } from "./in-memory-ledger.repository.js";

describe("InMemoryLedgerRepository", () => {
  const run = <A, E>(program: Effect.Effect<A, E, LedgerRepository>) =>
    Effect.runPromise(program.pipe(Effect.provide(InMemoryLedgerRepositoryLive)));

  it("should return a saved ledger by id", async () => {
    const ledger = FlightLedger.create({ totalSeats: makeSeatCount(5) });

    const found = await run(
      Effect.gen(function* () {
        const repo = yield* LedgerRepository;
        yield* repo.save(ledger);
        return yield* repo.getById(ledger.id);
      }),
    );

    expect(found).toBe(ledger);
  });

  it("should replace the previous state of the same flight", async () => {
    const id = makeFlightId("FL-REPLACE");
    const first = FlightLedger.create({ id, totalSeats: makeSeatCount(5) });
    const second = FlightLedger.create({ id, totalSeats: makeSeatCount(8) });

    const result = await run(
      Effect.gen(function* () {
        const repo = yield* LedgerRepository;
        yield* repo.save(first);
        yield* repo.save(second);
        return {
          found: yield* repo.getById(id),
          all: yield* repo.list(),
        };
      }),
    );

    expect(result.found.totalSeats).toBe(8);
    expect(result.all).toHaveLength(1);
  });

  it("should fail with FlightNotFoundError for an unknown id", async () => {
    const error = await run(
      Effect.gen(function* () {
        const repo = yield* LedgerRepository;
        return yield* repo.getById(makeFlightId("FL-MISSING"));
      }).pipe(Effect.flip),
    );

    expect(error).toMatchObject({
      _tag: "FlightNotFoundError",
      flightId: "FL-MISSING",
    });
  });

  it("should start empty for every layer build", async () => {
    const all = await run(
      Effect.gen(function* () {
        const repo = yield* LedgerRepository;
        return yield* repo.list();
      }),
    );

    expect(all).toEqual([]);
  });
});
