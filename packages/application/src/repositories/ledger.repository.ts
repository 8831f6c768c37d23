import type { FlightNotFoundError } from "@seat-ledger/domain/errors";
import type { FlightId } from "@seat-ledger/domain/kernel";
import type { FlightLedger } from "@seat-ledger/domain/ledger";
import { Context, type Effect } from "effect";

export interface LedgerRepositoryPort {
	/**
	 * Save the ledger, replacing any previous state of the same flight.
	 */
	save(ledger: FlightLedger): Effect.Effect<FlightLedger>;

	/**
	 * Get a ledger by flight ID.
	 */
	getById(id: FlightId): Effect.Effect<FlightLedger, FlightNotFoundError>;

	list(): Effect.Effect<ReadonlyArray<FlightLedger>>;
}

export class LedgerRepository extends Context.Tag("LedgerRepository")<
	LedgerRepository,
	LedgerRepositoryPort
>() {}
