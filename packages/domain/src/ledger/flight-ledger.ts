import { Effect, Schema } from "effect";
import {
	BookingNotFoundError,
	OverbookingError,
	SeatCountMismatchError,
	SeatOvercapacityError,
} from "../errors.js";
import {
	LedgerEventSchema,
	SeatsBooked,
	SeatsCancelled,
	nextEventId,
} from "../events.js";
import {
	CancellationPolicy,
	FlightId,
	type PassengerIdentifier,
	SeatCount,
	generateFlightId,
} from "../kernel.js";
import { Booking } from "./booking.js";

export type CancelSeatsError =
	| BookingNotFoundError
	| SeatCountMismatchError
	| SeatOvercapacityError;

// --- Flight Ledger Aggregate Root ---
export class FlightLedger extends Schema.Class<FlightLedger>("FlightLedger")({
	id: FlightId,
	totalSeats: SeatCount,
	remainingSeats: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
	bookings: Schema.Array(Booking),
	domainEvents: Schema.Array(LedgerEventSchema).pipe(
		Schema.annotations({
			description: "Domain events raised by this aggregate",
		}),
	),
}) {
	static readonly schema = this.pipe(
		Schema.filter((l) => l.remainingSeats <= l.totalSeats, {
			message: () => "Remaining seats cannot exceed total seats",
		}),
	);

	// Factory method for opening a ledger on a new flight
	static create(props: { totalSeats: SeatCount; id?: FlightId }): FlightLedger {
		return Schema.validateSync(FlightLedger.schema)(
			new FlightLedger({
				id: props.id ?? generateFlightId(),
				totalSeats: props.totalSeats,
				remainingSeats: props.totalSeats,
				bookings: [],
				domainEvents: [],
			}),
		);
	}

	get bookedSeats(): number {
		return this.bookings.reduce((sum, booking) => sum + booking.seatCount, 0);
	}

	bookingsFor(passenger: PassengerIdentifier): ReadonlyArray<Booking> {
		return this.bookings.filter((booking) => booking.isFor(passenger));
	}

	bookSeats(
		passenger: PassengerIdentifier,
		seatCount: SeatCount,
	): Effect.Effect<FlightLedger, OverbookingError> {
		return Effect.gen(this, function* () {
			if (seatCount > this.remainingSeats) {
				return yield* Effect.fail(new OverbookingError());
			}

			const event = new SeatsBooked({
				eventId: nextEventId(),
				occurredAt: new Date(),
				aggregateId: this.id,
				aggregateType: "FlightLedger",
				flightId: this.id,
				passengerIdentifier: passenger,
				seatCount,
			});

			// Repeated bookings by one passenger stay separate entries
			return new FlightLedger({
				...this,
				remainingSeats: this.remainingSeats - seatCount,
				bookings: [
					...this.bookings,
					new Booking({ passengerIdentifier: passenger, seatCount }),
				],
				domainEvents: [...this.domainEvents, event],
			});
		});
	}

	cancelBookedSeats(
		passenger: PassengerIdentifier,
		seatCount: SeatCount,
		policy: CancellationPolicy = CancellationPolicy.LEGACY,
	): Effect.Effect<FlightLedger, CancelSeatsError> {
		return Effect.gen(this, function* () {
			// 1. The passenger must hold at least one booking
			if (this.bookingsFor(passenger).length === 0) {
				return yield* Effect.fail(
					new BookingNotFoundError({
						flightId: this.id,
						passengerIdentifier: passenger,
					}),
				);
			}

			// 2. Work out which bookings survive under the policy
			const bookings = yield* this.remainingBookingsAfter(
				passenger,
				seatCount,
				policy,
			);

			// 3. Check Capacity
			if (this.remainingSeats + seatCount > this.totalSeats) {
				return yield* Effect.fail(
					new SeatOvercapacityError({
						flightId: this.id,
						requested: seatCount,
						remaining: this.remainingSeats,
						totalSeats: this.totalSeats,
					}),
				);
			}

			const event = new SeatsCancelled({
				eventId: nextEventId(),
				occurredAt: new Date(),
				aggregateId: this.id,
				aggregateType: "FlightLedger",
				flightId: this.id,
				passengerIdentifier: passenger,
				seatCount,
				policy,
				bookingsRemoved: this.bookings.length - bookings.length,
			});

			return new FlightLedger({
				...this,
				remainingSeats: this.remainingSeats + seatCount,
				bookings,
				domainEvents: [...this.domainEvents, event],
			});
		});
	}

	// Clear events after publishing
	clearEvents(): FlightLedger {
		return new FlightLedger({
			...this,
			domainEvents: [],
		});
	}

	private remainingBookingsAfter(
		passenger: PassengerIdentifier,
		seatCount: SeatCount,
		policy: CancellationPolicy,
	): Effect.Effect<ReadonlyArray<Booking>, SeatCountMismatchError> {
		const index = this.bookings.findIndex((booking) =>
			booking.matches(passenger, seatCount),
		);
		const withoutMatch = this.bookings.filter((_, i) => i !== index);
		const mismatch = new SeatCountMismatchError({
			flightId: this.id,
			passengerIdentifier: passenger,
			requested: seatCount,
			booked: this.bookingsFor(passenger).reduce(
				(sum, booking) => sum + booking.seatCount,
				0,
			),
		});

		switch (policy) {
			case CancellationPolicy.LEGACY:
				// No exact match leaves the list untouched; the seats are still returned
				return Effect.succeed(index === -1 ? this.bookings : withoutMatch);
			case CancellationPolicy.EXACT:
				return index === -1
					? Effect.fail(mismatch)
					: Effect.succeed(withoutMatch);
			case CancellationPolicy.POOLED:
				return seatCount > mismatch.booked
					? Effect.fail(mismatch)
					: Effect.succeed(this.drawNewestFirst(passenger, seatCount));
		}
	}

	private drawNewestFirst(
		passenger: PassengerIdentifier,
		seatCount: SeatCount,
	): ReadonlyArray<Booking> {
		let outstanding: number = seatCount;
		const kept: Array<Booking> = [];

		for (const booking of [...this.bookings].reverse()) {
			if (outstanding === 0 || !booking.isFor(passenger)) {
				kept.push(booking);
				continue;
			}
			const taken = Math.min(outstanding, booking.seatCount);
			outstanding -= taken;
			if (taken < booking.seatCount) {
				kept.push(
					new Booking({
						passengerIdentifier: passenger,
						seatCount: SeatCount.make(booking.seatCount - taken),
					}),
				);
			}
		}

		return kept.reverse();
	}
}
