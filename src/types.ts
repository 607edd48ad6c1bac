import type { Logger } from "./logger.js";
import type { BookingStatus, BountyStatus, PriceType } from "./models.js";

/**
 * Options for the RentAHumanClient constructor.
 */
export interface RentAHumanClientOptions {
  /**
   * API key (starts with `rah_`). Required for write operations; search,
   * profile, skill and review reads work without one.
   * @default process.env.RENTAHUMAN_API_KEY
   */
  apiKey?: string;

  /**
   * Base URL of the API. Override for testing.
   * @default process.env.RENTAHUMAN_BASE_URL ?? "https://rentahuman.ai/api"
   */
  baseUrl?: string;

  /**
   * Per-attempt request timeout in milliseconds.
   * @default 30000
   */
  timeout?: number;

  /**
   * Maximum number of retries. Only HTTP 429 and transport failures
   * (network errors, timeouts, unparseable bodies) are retried.
   * 0 disables retry.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Seconds to wait after a 429 without a usable Retry-After header.
   * @default 1
   */
  rateLimitFallbackSeconds?: number;

  /**
   * Unit of the linear backoff after a transport failure:
   * 0.5s, 1.0s, 1.5s, ... with the default.
   * @default 0.5
   */
  transportBackoffSeconds?: number;

  /**
   * Identifier sent as `agentId` / `agentType` on bookings, bounties and
   * conversations when the call does not set one.
   * @default "rentahuman-sdk-ts"
   */
  agentId?: string;

  /**
   * `fetch` implementation used for every request.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;

  /**
   * Logger for request and retry diagnostics.
   * @default silentLogger
   */
  logger?: Logger;
}

/**
 * HTTP method for API requests.
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined;

/**
 * Request options passed to the request executor.
 */
export interface RequestOptions {
  method: HttpMethod;
  /** Path below the base URL, starting with `/`. */
  path: string;
  /** Query parameters; `null` and `undefined` values are omitted. */
  query?: Record<string, QueryValue>;
  /** JSON body; ignored for GET. */
  body?: unknown;
}

/**
 * Error body returned by the API: `{"error": "<message>"}`.
 */
export interface ApiErrorBody {
  error?: unknown;
  [key: string]: unknown;
}

// ── Humans ──────────────────────────────────────────────────────────────────

export interface SearchHumansParams {
  /** Skill name, e.g. "Photography" or "Packages". */
  skill?: string;
  /** Minimum hourly rate in USD. */
  minRate?: number;
  /** Maximum hourly rate in USD. */
  maxRate?: number;
  /** Case-insensitive name filter. */
  name?: string;
  /** Clamped to 1-500. @default 20 */
  limit?: number;
  /** @default 0 */
  offset?: number;
}

// ── Bookings ────────────────────────────────────────────────────────────────

export interface BookingCreateParams {
  humanId: string;
  /** @default the client's `agentId` */
  agentId?: string;
  taskTitle: string;
  /** ISO 8601 start time. A Date is serialized with `toISOString()`. */
  startTime: string | Date;
  estimatedHours: number;
  description?: string;
}

export interface BookingListParams {
  humanId?: string;
  agentId?: string;
  status?: BookingStatus;
  /** Clamped to 1-500. @default 20 */
  limit?: number;
}

// ── Bounties ────────────────────────────────────────────────────────────────

export interface BountyCreateParams {
  title: string;
  description: string;
  /** Price in USD. */
  price: number;
  /** @default "fixed" */
  priceType?: PriceType;
  estimatedHours?: number;
  skills?: string[];
  location?: string;
  /** @default the client's `agentId` */
  agentType?: string;
}

/** Partial update; only the fields set are sent. */
export interface BountyUpdateParams {
  title?: string;
  description?: string;
  price?: number;
  priceType?: PriceType;
  estimatedHours?: number;
  skills?: string[];
  location?: string;
  /** e.g. "cancelled" to withdraw the bounty. */
  status?: BountyStatus;
}

export interface BountyListParams {
  status?: BountyStatus;
  /** Clamped to 1-500. @default 20 */
  limit?: number;
}

// ── Conversations ───────────────────────────────────────────────────────────

export interface StartConversationParams {
  humanId: string;
  subject: string;
  /** Opening message. */
  message: string;
  /** @default the client's `agentId` */
  agentType?: string;
}

export interface ConversationListParams {
  /** Clamped to 1-500. @default 20 */
  limit?: number;
}
