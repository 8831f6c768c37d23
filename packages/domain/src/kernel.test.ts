import { faker } from "@faker-js/faker";
import { Either, Schema } from "effect";
import { describe, expect, it } from "vitest";
import {
	CancellationPolicySchema,
	PassengerIdentifier,
	SeatCount,
	generateFlightId,
	makePassengerIdentifier,
	makeSeatCount,
} from "./kernel.js";

const decodeSeatCount = Schema.decodeUnknownEither(SeatCount);
const decodePassenger = Schema.decodeUnknownEither(PassengerIdentifier);

describe("Shared Kernel", () => {
	describe("SeatCount", () => {
		it("should accept positive integers", () => {
			const seats = faker.number.int({ min: 1, max: 500 });
			expect(Either.getOrThrow(decodeSeatCount(seats))).toBe(seats);
		});

		it.each([0, -1, 1.5, Number.NaN, "3"])("should reject %s", (value) => {
			expect(Either.isLeft(decodeSeatCount(value))).toBe(true);
		});

		it("should throw when made from an invalid number", () => {
			expect(() => makeSeatCount(0)).toThrow();
		});
	});

	describe("PassengerIdentifier", () => {
		it("should accept an email", () => {
			const email = faker.internet.email();
			expect(makePassengerIdentifier(email)).toBe(email);
		});

		it.each(["", "   ", " padded "])("should reject %j", (value) => {
			expect(Either.isLeft(decodePassenger(value))).toBe(true);
		});
	});

	describe("FlightId", () => {
		it("should generate prefixed unique ids", () => {
			const first = generateFlightId();
			const second = generateFlightId();
			expect(first).toMatch(/^FL-[0-9a-f-]{36}$/);
			expect(first).not.toBe(second);
		});
	});

	describe("CancellationPolicy", () => {
		it("should decode the known policies only", () => {
			const decode = Schema.decodeUnknownEither(CancellationPolicySchema);
			expect(Either.getOrThrow(decode("pooled"))).toBe("pooled");
			expect(Either.isLeft(decode("partial"))).toBe(true);
		});
	});
});
