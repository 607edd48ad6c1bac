import type { RentAHumanClient } from "../client.js";
import { type Booking, BOOKING_ALIASES, BookingSchema, toWire } from "../models.js";
import { sanitizePathParam } from "../sanitize.js";
import type { BookingCreateParams, BookingListParams } from "../types.js";
import {
  clampLimit,
  parseEntities,
  parseEntity,
  unwrapEntity,
  unwrapList,
} from "./envelope.js";

/**
 * Booking operations. Accessed via `client.bookings`.
 * Booking status is owned by the server; the client only reads it.
 */
export class BookingsResource {
  constructor(private readonly client: RentAHumanClient) {}

  /**
   * Books a human for a task. Requires an API key.
   *
   * @example
   * ```typescript
   * const booking = await client.bookings.create({
   *   humanId: 'human_123',
   *   taskTitle: 'Pick up package',
   *   startTime: '2026-02-10T14:00:00Z',
   *   estimatedHours: 1.5,
   * });
   * console.log(booking.status); // 'pending'
   * ```
   */
  async create(params: BookingCreateParams): Promise<Booking> {
    const body = toWire(
      {
        humanId: params.humanId,
        agentId: params.agentId ?? this.client.agentId,
        taskTitle: params.taskTitle,
        startTime:
          params.startTime instanceof Date
            ? params.startTime.toISOString()
            : params.startTime,
        estimatedHours: params.estimatedHours,
        description: params.description,
      },
      BOOKING_ALIASES,
    );
    const data = await this.client.request({
      method: "POST",
      path: "/bookings",
      body,
    });
    return parseEntity(
      BookingSchema,
      unwrapEntity(data, "booking", this.client.logger),
      "booking",
    );
  }

  /**
   * Retrieves a booking by ID.
   */
  async get(bookingId: string): Promise<Booking> {
    const id = sanitizePathParam(bookingId);
    const data = await this.client.request({
      method: "GET",
      path: `/bookings/${id}`,
    });
    return parseEntity(
      BookingSchema,
      unwrapEntity(data, "booking", this.client.logger),
      "booking",
    );
  }

  /**
   * Lists bookings, optionally filtered by human, agent or status.
   */
  async list(params: BookingListParams = {}): Promise<Booking[]> {
    const data = await this.client.request({
      method: "GET",
      path: "/bookings",
      query: {
        limit: clampLimit(params.limit),
        humanId: params.humanId || undefined,
        agentId: params.agentId || undefined,
        status: params.status || undefined,
      },
    });
    return parseEntities(
      BookingSchema,
      unwrapList(data, "bookings", this.client.logger),
      "booking",
    );
  }
}
