/**
 * @file events.ts
 * @module @seat-ledger/domain/events
 * @description Domain events raised by the flight ledger
 */

import { randomUUID } from "node:crypto";
import { Schema } from "effect";
import {
  CancellationPolicySchema,
  FlightId,
  PassengerIdentifier,
  SeatCount,
} from "./kernel.js";

export const EventId = Schema.String.pipe(Schema.brand("EventId"));
export type EventId = typeof EventId.Type;
export const nextEventId = (): EventId => EventId.make(`evt-${randomUUID()}`);

/**
 * Base class for all ledger events
 */
export class LedgerEventBase extends Schema.Class<LedgerEventBase>(
  "LedgerEventBase",
)({
  eventId: EventId,
  occurredAt: Schema.Union(Schema.DateFromSelf, Schema.Date),
  aggregateType: Schema.Literal("FlightLedger"),
  aggregateId: Schema.String,
  flightId: FlightId,
  passengerIdentifier: PassengerIdentifier,
  seatCount: SeatCount,
}) {}

/**
 * Emitted when seats are appended to the ledger as a new booking.
 */
export class SeatsBooked extends LedgerEventBase.extend<SeatsBooked>(
  "SeatsBooked",
)({}) {}

/**
 * Emitted when seats are returned to the ledger by a cancellation.
 * `bookingsRemoved` is 0 when the legacy policy found no exact match.
 */
export class SeatsCancelled extends LedgerEventBase.extend<SeatsCancelled>(
  "SeatsCancelled",
)({
  policy: CancellationPolicySchema,
  bookingsRemoved: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {}

export const LedgerEventSchema = Schema.Union(SeatsBooked, SeatsCancelled);

export type LedgerEvent = typeof LedgerEventSchema.Type;
