import type { RentAHumanClient } from "../client.js";
import {
  type Human,
  type Review,
  HumanSchema,
  ReviewSchema,
} from "../models.js";
import { sanitizePathParam } from "../sanitize.js";
import type { SearchHumansParams } from "../types.js";
import {
  clampLimit,
  parseEntities,
  parseEntity,
  unwrapEntity,
  unwrapList,
} from "./envelope.js";

/**
 * Human discovery. Accessed via `client.humans`.
 * None of these calls need an API key.
 */
export class HumansResource {
  constructor(private readonly client: RentAHumanClient) {}

  /**
   * Searches humans available for hire, in the order the server ranks them.
   *
   * @example
   * ```typescript
   * const photographers = await client.humans.search({ skill: 'Photography', maxRate: 60 });
   * ```
   */
  async search(params: SearchHumansParams = {}): Promise<Human[]> {
    const data = await this.client.request({
      method: "GET",
      path: "/humans",
      query: {
        limit: clampLimit(params.limit),
        offset: Math.max(0, params.offset ?? 0),
        skill: params.skill || undefined,
        minRate: params.minRate,
        maxRate: params.maxRate,
        name: params.name || undefined,
      },
    });
    return parseEntities(
      HumanSchema,
      unwrapList(data, "humans", this.client.logger),
      "human",
    );
  }

  /**
   * Retrieves a full profile, including availability and wallets.
   *
   * @throws {ValidationError} If `humanId` is not a safe path segment.
   * @throws {NotFoundError} If the human does not exist.
   */
  async get(humanId: string): Promise<Human> {
    const id = sanitizePathParam(humanId);
    const data = await this.client.request({
      method: "GET",
      path: `/humans/${id}`,
    });
    return parseEntity(
      HumanSchema,
      unwrapEntity(data, "human", this.client.logger),
      "human",
    );
  }

  /**
   * Lists reviews left for a human. Useful for checking reliability
   * before booking.
   */
  async reviews(humanId: string): Promise<Review[]> {
    const id = sanitizePathParam(humanId);
    const data = await this.client.request({
      method: "GET",
      path: `/humans/${id}/reviews`,
    });
    return parseEntities(
      ReviewSchema,
      unwrapList(data, "reviews", this.client.logger),
      "review",
    );
  }
}
