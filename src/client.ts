import {
  RateLimitError,
  TimeoutError,
  TransportError,
  buildApiError,
} from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { isRecord } from "./models.js";
import { BookingsResource } from "./resources/bookings.js";
import { BountiesResource } from "./resources/bounties.js";
import { ConversationsResource } from "./resources/conversations.js";
import { HumansResource } from "./resources/humans.js";
import { SkillsResource } from "./resources/skills.js";
import {
  type AttemptResult,
  type RetryConfig,
  DEFAULT_RATE_LIMIT_FALLBACK_SECONDS,
  DEFAULT_TRANSPORT_BACKOFF_SECONDS,
  executeWithRetry,
  parseRetryAfter,
} from "./retry.js";
import type {
  ApiErrorBody,
  QueryValue,
  RentAHumanClientOptions,
  RequestOptions,
} from "./types.js";

export { sanitizePathParam } from "./sanitize.js";

export const DEFAULT_BASE_URL = "https://rentahuman.ai/api";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_AGENT_ID = "rentahuman-sdk-ts";
export const SDK_VERSION = "0.2.0";

/**
 * Client for the rentahuman.ai REST API.
 *
 * One instance holds the transport configuration and is safe to share
 * between concurrent calls; nothing is mutated per request.
 *
 * @example
 * ```typescript
 * import { RentAHumanClient } from 'rentahuman-sdk';
 *
 * const client = new RentAHumanClient({
 *   apiKey: process.env.RENTAHUMAN_API_KEY,
 * });
 *
 * const humans = await client.humans.search({ skill: 'Photography', maxRate: 60 });
 * const booking = await client.bookings.create({
 *   humanId: humans[0].id,
 *   taskTitle: 'Photograph storefront',
 *   startTime: '2026-02-10T14:00:00Z',
 *   estimatedHours: 1,
 * });
 * ```
 */
export class RentAHumanClient {
  readonly baseUrl: string;
  readonly timeout: number;
  readonly agentId: string;
  readonly logger: Logger;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly retryConfig: RetryConfig;
  private readonly fetchImpl: typeof fetch | undefined;

  /** Search humans and read their profiles. */
  public readonly humans: HumansResource;
  /** Skill catalog. */
  public readonly skills: SkillsResource;
  /** Direct engagements with one human. */
  public readonly bookings: BookingsResource;
  /** Open task postings and their applications. */
  public readonly bounties: BountiesResource;
  /** Message threads with humans. */
  public readonly conversations: ConversationsResource;

  constructor(options: RentAHumanClientOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.baseUrl = (
      options.baseUrl ??
      process.env.RENTAHUMAN_BASE_URL ??
      DEFAULT_BASE_URL
    ).replace(/\/+$/, "");
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.agentId = options.agentId ?? DEFAULT_AGENT_ID;
    this.fetchImpl = options.fetch;
    this.retryConfig = {
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      rateLimitFallbackSeconds:
        options.rateLimitFallbackSeconds ?? DEFAULT_RATE_LIMIT_FALLBACK_SECONDS,
      transportBackoffSeconds:
        options.transportBackoffSeconds ?? DEFAULT_TRANSPORT_BACKOFF_SECONDS,
    };

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `rentahuman-sdk-typescript/${SDK_VERSION}`,
    };
    const apiKey = options.apiKey ?? process.env.RENTAHUMAN_API_KEY;
    if (apiKey) {
      if (!apiKey.startsWith("rah_")) {
        this.logger.warn("API key does not start with rah_; the API may reject it");
      }
      headers["X-API-Key"] = apiKey;
    }
    this.headers = Object.freeze(headers);

    this.humans = new HumansResource(this);
    this.skills = new SkillsResource(this);
    this.bookings = new BookingsResource(this);
    this.bounties = new BountiesResource(this);
    this.conversations = new ConversationsResource(this);
  }

  /** Whether write operations will carry an API key. */
  get hasApiKey(): boolean {
    return "X-API-Key" in this.headers;
  }

  /**
   * Sends one logical API call, retrying on HTTP 429 and transport failures.
   * Returns the parsed JSON body; unwrapping is left to the caller.
   *
   * @internal
   */
  async request(options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(options.path, options.query);
    const label = `${options.method} ${options.path}`;
    const maxAttempts = this.retryConfig.maxRetries + 1;

    return executeWithRetry<unknown>(
      async (attempt): Promise<AttemptResult<unknown>> => {
        this.logger.debug(`${label} (attempt ${attempt + 1}/${maxAttempts})`);

        const init: RequestInit = {
          method: options.method,
          headers: this.headers,
        };
        if (options.body !== undefined && options.method !== "GET") {
          init.body = JSON.stringify(options.body);
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);
        init.signal = controller.signal;

        try {
          const response = await (this.fetchImpl ?? fetch)(url, init);

          if (response.status === 429) {
            // Release the connection before waiting out Retry-After.
            await response.body?.cancel();
            const retryAfter = parseRetryAfter(
              response.headers.get("retry-after"),
              this.retryConfig.rateLimitFallbackSeconds,
            );
            return {
              ok: false,
              error: new RateLimitError(retryAfter),
              retry: "rate_limited",
              retryAfterSeconds: retryAfter,
            };
          }

          const text = await response.text();

          if (response.status >= 400) {
            return {
              ok: false,
              error: buildApiError(
                response.status,
                parseErrorBody(text),
                response.statusText,
              ),
            };
          }

          if (text.trim() === "") {
            return { ok: true, response: {} };
          }

          try {
            const data: unknown = JSON.parse(text);
            return { ok: true, response: data };
          } catch (err) {
            return {
              ok: false,
              error: new TransportError(`Malformed JSON response from ${label}`, {
                cause: err,
              }),
              retry: "transport",
            };
          }
        } catch (err) {
          return {
            ok: false,
            error: this.toTransportError(err, label),
            retry: "transport",
          };
        } finally {
          clearTimeout(timeoutId);
        }
      },
      this.retryConfig,
      {
        onRetry: ({ attempt, reason, delayMs, error }) => {
          this.logger.warn(
            `${label} failed (${reason}: ${error.message}); retrying in ${delayMs}ms (attempt ${attempt + 2}/${maxAttempts})`,
          );
        },
      },
    );
  }

  private toTransportError(err: unknown, label: string): TransportError {
    if (err instanceof Error && err.name === "AbortError") {
      return new TimeoutError(
        `Request to ${label} timed out after ${this.timeout}ms`,
        { timeoutMs: this.timeout, cause: err },
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError(`Request failed: ${message}`, { cause: err });
  }

  /**
   * Builds a full URL, skipping `null` and `undefined` query values.
   */
  private buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined && value !== null) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }
}

function parseErrorBody(text: string): ApiErrorBody | undefined {
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    // Error pages are not always JSON; the status text is used instead.
    return undefined;
  }
}
