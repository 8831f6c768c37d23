import { Data } from "effect";

// --- Ledger Errors ---

/**
 * The requested seats exceed the seats still available.
 * Carries nothing beyond its tag: the caller knows both the request and the capacity.
 */
export class OverbookingError extends Data.TaggedError("OverbookingError") {}

export class BookingNotFoundError extends Data.TaggedError(
	"BookingNotFoundError",
)<{
	readonly flightId: string;
	readonly passengerIdentifier: string;
}> {}

export class SeatCountMismatchError extends Data.TaggedError(
	"SeatCountMismatchError",
)<{
	readonly flightId: string;
	readonly passengerIdentifier: string;
	readonly requested: number;
	readonly booked: number;
}> {}

export class SeatOvercapacityError extends Data.TaggedError(
	"SeatOvercapacityError",
)<{
	readonly flightId: string;
	readonly requested: number;
	readonly remaining: number;
	readonly totalSeats: number;
}> {}

export class InvalidCapacityError extends Data.TaggedError(
	"InvalidCapacityError",
)<{
	readonly totalSeats: number;
	readonly maxSeats: number;
}> {}

// --- Lookup / Request Errors ---

export class FlightNotFoundError extends Data.TaggedError(
	"FlightNotFoundError",
)<{
	readonly flightId: string;
}> {}

export class InvalidBookingRequestError extends Data.TaggedError(
	"InvalidBookingRequestError",
)<{
	readonly message: string;
}> {}
