import { Schema } from "effect";
import { PassengerIdentifier, SeatCount } from "../kernel.js";

// --- Booking Value Record ---
export class Booking extends Schema.Class<Booking>("Booking")({
	passengerIdentifier: PassengerIdentifier,
	seatCount: SeatCount,
}) {
	isFor(passenger: PassengerIdentifier): boolean {
		return this.passengerIdentifier === passenger;
	}

	// Equality by value, never by identity
	matches(passenger: PassengerIdentifier, seatCount: SeatCount): boolean {
		return this.isFor(passenger) && this.seatCount === seatCount;
	}
}
