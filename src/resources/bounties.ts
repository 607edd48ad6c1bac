import type { RentAHumanClient } from "../client.js";
import {
  type AcceptApplicationResult,
  type Bounty,
  type BountyApplication,
  AcceptApplicationResultSchema,
  BOUNTY_ALIASES,
  BountyApplicationSchema,
  BountySchema,
  toWire,
} from "../models.js";
import { sanitizePathParam } from "../sanitize.js";
import type {
  BountyCreateParams,
  BountyListParams,
  BountyUpdateParams,
} from "../types.js";
import {
  clampLimit,
  parseEntities,
  parseEntity,
  unwrapEntity,
  unwrapList,
} from "./envelope.js";

/**
 * Bounty operations. Accessed via `client.bounties`.
 */
export class BountiesResource {
  constructor(private readonly client: RentAHumanClient) {}

  /**
   * Posts a task bounty for humans to apply to. Requires an API key.
   *
   * @example
   * ```typescript
   * const bounty = await client.bounties.create({
   *   title: 'Photograph storefront',
   *   description: 'Take 5 photos of 123 Broadway from the street.',
   *   price: 50,
   *   estimatedHours: 1,
   *   location: 'New York',
   * });
   * ```
   */
  async create(params: BountyCreateParams): Promise<Bounty> {
    const body = toWire(
      {
        agentType: params.agentType ?? this.client.agentId,
        title: params.title,
        description: params.description,
        price: params.price,
        priceType: params.priceType ?? "fixed",
        estimatedHours: params.estimatedHours,
        skills: params.skills,
        location: params.location,
      },
      BOUNTY_ALIASES,
    );
    const data = await this.client.request({
      method: "POST",
      path: "/bounties",
      body,
    });
    return this.parseBounty(data);
  }

  async get(bountyId: string): Promise<Bounty> {
    const id = sanitizePathParam(bountyId);
    const data = await this.client.request({
      method: "GET",
      path: `/bounties/${id}`,
    });
    return this.parseBounty(data);
  }

  async list(params: BountyListParams = {}): Promise<Bounty[]> {
    const data = await this.client.request({
      method: "GET",
      path: "/bounties",
      query: {
        limit: clampLimit(params.limit),
        status: params.status || undefined,
      },
    });
    return parseEntities(
      BountySchema,
      unwrapList(data, "bounties", this.client.logger),
      "bounty",
    );
  }

  /**
   * Updates or cancels a bounty. Only the fields present in `updates`
   * are sent.
   *
   * @example
   * ```typescript
   * await client.bounties.update('bounty_001', { status: 'cancelled' });
   * ```
   */
  async update(bountyId: string, updates: BountyUpdateParams): Promise<Bounty> {
    const id = sanitizePathParam(bountyId);
    const data = await this.client.request({
      method: "PATCH",
      path: `/bounties/${id}`,
      body: toWire(updates, BOUNTY_ALIASES),
    });
    return this.parseBounty(data);
  }

  /**
   * Lists the applications humans have sent for a bounty.
   */
  async applications(bountyId: string): Promise<BountyApplication[]> {
    const id = sanitizePathParam(bountyId);
    const data = await this.client.request({
      method: "GET",
      path: `/bounties/${id}/applications`,
    });
    return parseEntities(
      BountyApplicationSchema,
      unwrapList(data, "applications", this.client.logger),
      "application",
    );
  }

  /**
   * Accepts one application, hiring that human for the bounty.
   * The application itself is not returned; read it again to see its
   * new status.
   */
  async acceptApplication(
    bountyId: string,
    applicationId: string,
  ): Promise<AcceptApplicationResult> {
    const id = sanitizePathParam(bountyId);
    const appId = sanitizePathParam(applicationId);
    const data = await this.client.request({
      method: "POST",
      path: `/bounties/${id}/applications/${appId}/accept`,
    });
    return parseEntity(AcceptApplicationResultSchema, data, "accept result");
  }

  private parseBounty(data: unknown): Bounty {
    return parseEntity(
      BountySchema,
      unwrapEntity(data, "bounty", this.client.logger),
      "bounty",
    );
  }
}
