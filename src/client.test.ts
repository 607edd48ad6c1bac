import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RentAHumanClient } from "./client.js";
import {
  ApiError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  RateLimitError,
  ServerError,
  TimeoutError,
  TransportError,
  ValidationError,
} from "./errors.js";
import {
  TEST_BASE_URL,
  alice,
  callAt,
  createMockLogger,
  createTestClient,
  jsonResponse,
  mockFetch,
  sentBody,
} from "./test-utils.js";

describe("RentAHumanClient", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  // ── Configuration ──

  describe("configuration", () => {
    it("sends the JSON, user-agent and API key headers", async () => {
      const fetchMock = mockFetch(jsonResponse({ skills: [] }));
      const client = createTestClient(fetchMock);

      await client.skills.list();

      expect(callAt(fetchMock).init.headers).toEqual({
        "Content-Type": "application/json",
        Accept: "application/json",
        "User-Agent": "rentahuman-sdk-typescript/0.2.0",
        "X-API-Key": "rah_test_key",
      });
    });

    it("omits X-API-Key when no key is configured", async () => {
      vi.stubEnv("RENTAHUMAN_API_KEY", "");
      const fetchMock = mockFetch(jsonResponse({ skills: [] }));
      const client = new RentAHumanClient({ baseUrl: TEST_BASE_URL, fetch: fetchMock });

      await client.skills.list();

      expect(client.hasApiKey).toBe(false);
      expect(callAt(fetchMock).init.headers).not.toHaveProperty("X-API-Key");
    });

    it("falls back to environment variables and strips trailing slashes", async () => {
      vi.stubEnv("RENTAHUMAN_API_KEY", "rah_env_key");
      vi.stubEnv("RENTAHUMAN_BASE_URL", "https://env.test/api/");
      const fetchMock = mockFetch(jsonResponse({ skills: [] }));
      const client = new RentAHumanClient({ fetch: fetchMock });

      await client.skills.list();

      expect(client.baseUrl).toBe("https://env.test/api");
      expect(callAt(fetchMock).url.toString()).toBe("https://env.test/api/skills");
      expect(callAt(fetchMock).init.headers).toHaveProperty("X-API-Key", "rah_env_key");
    });

    it("uses the documented defaults", () => {
      const client = new RentAHumanClient({ baseUrl: TEST_BASE_URL });

      expect(client.timeout).toBe(30_000);
      expect(client.agentId).toBe("rentahuman-sdk-ts");
    });

    it("warns about keys without the rah_ prefix", () => {
      const logger = createMockLogger();
      createTestClient(mockFetch(), { apiKey: "test-secret", logger });

      expect(logger.warn).toHaveBeenCalledWith(
        "API key does not start with rah_; the API may reject it",
      );
    });

    it("resolves the global fetch at call time when none is injected", async () => {
      const fetchMock = mockFetch(jsonResponse({ skills: ["Packages"] }));
      vi.stubGlobal("fetch", fetchMock);
      const client = new RentAHumanClient({ apiKey: "rah_test_key", baseUrl: TEST_BASE_URL });

      const skills = await client.skills.list();

      expect(skills).toEqual([{ name: "Packages" }]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  // ── Request building ──

  describe("request building", () => {
    it("drops absent and empty query parameters", async () => {
      const fetchMock = mockFetch(jsonResponse({ humans: [] }));
      const client = createTestClient(fetchMock);

      await client.humans.search({ skill: "", name: undefined, maxRate: 60 });

      expect(callAt(fetchMock).url.toString()).toBe(
        `${TEST_BASE_URL}/humans?limit=20&offset=0&maxRate=60`,
      );
    });

    it("never sends a body with GET", async () => {
      const fetchMock = mockFetch(jsonResponse({ humans: [] }));
      const client = createTestClient(fetchMock);

      await client.request({ method: "GET", path: "/humans", body: { ignored: true } });

      expect(callAt(fetchMock).init.body).toBeUndefined();
    });

    it("serializes the body of write requests", async () => {
      const fetchMock = mockFetch(jsonResponse({ ok: true }));
      const client = createTestClient(fetchMock);

      await client.request({ method: "POST", path: "/things", body: { a: 1 } });

      expect(callAt(fetchMock).init.method).toBe("POST");
      expect(sentBody(fetchMock)).toEqual({ a: 1 });
    });

    it("cancels a 429 body before retrying", async () => {
      const limited = jsonResponse(
        { error: "slow down" },
        { status: 429, headers: { "Retry-After": "0" } },
      );
      const body = limited.body;
      if (!body) {
        throw new Error("expected a response body");
      }
      const cancel = vi.spyOn(body, "cancel");
      const fetchMock = mockFetch(limited, jsonResponse({ skills: [] }));
      const client = createTestClient(fetchMock);

      await client.skills.list();

      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it("treats an empty success body as an empty object", async () => {
      const fetchMock = mockFetch(new Response("", { status: 200 }));
      const client = createTestClient(fetchMock);

      await expect(client.request({ method: "POST", path: "/noop" })).resolves.toEqual({});
    });
  });

  // ── Rate limiting ──

  describe("rate limiting", () => {
    it("waits for Retry-After and then succeeds", async () => {
      const fetchMock = mockFetch(
        jsonResponse({ error: "slow down" }, { status: 429, headers: { "Retry-After": "0.01" } }),
        jsonResponse({ humans: [alice] }),
      );
      const logger = createMockLogger();
      const client = createTestClient(fetchMock, { logger });

      const humans = await client.humans.search();

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(humans.map((h) => h.id)).toEqual(["human_test_001"]);
      expect(logger.warn).toHaveBeenCalledWith(
        "GET /humans failed (rate_limited: Rate limited. Retry after 0.01s); retrying in 10ms (attempt 2/4)",
      );
    });

    it("throws RateLimitError at once when retries are disabled", async () => {
      const fetchMock = mockFetch(
        jsonResponse({}, { status: 429, headers: { "Retry-After": "7" } }),
      );
      const client = createTestClient(fetchMock, { maxRetries: 0 });

      const error = await client.skills.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({
        retryAfter: 7,
        statusCode: 429,
        message: "Rate limited. Retry after 7s",
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("reports the last Retry-After once retries run out", async () => {
      const fetchMock = mockFetch(
        jsonResponse({}, { status: 429, headers: { "Retry-After": "0.01" } }),
        jsonResponse({}, { status: 429, headers: { "Retry-After": "0" } }),
      );
      const client = createTestClient(fetchMock, { maxRetries: 1 });

      await expect(client.skills.list()).rejects.toMatchObject({ retryAfter: 0 });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("uses the fallback wait when Retry-After is missing", async () => {
      const fetchMock = mockFetch(new Response("", { status: 429 }));
      const client = createTestClient(fetchMock, {
        maxRetries: 0,
        rateLimitFallbackSeconds: 1,
      });

      await expect(client.skills.list()).rejects.toMatchObject({ retryAfter: 1 });
    });
  });

  // ── Error mapping ──

  describe("error mapping", () => {
    it.each([
      [400, ApiError],
      [401, AuthenticationError],
      [403, AuthorizationError],
      [404, NotFoundError],
      [409, ConflictError],
      [500, ServerError],
      [503, ServerError],
    ])("maps HTTP %i to the matching error class", async (status, ErrorClass) => {
      const fetchMock = mockFetch(jsonResponse({ error: "nope" }, { status }));
      const client = createTestClient(fetchMock);

      const error = await client.skills.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ErrorClass);
      expect(error).toMatchObject({ statusCode: status, message: "nope" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("prefers the body's error field for the message", async () => {
      const fetchMock = mockFetch(
        jsonResponse({ error: "Human not found" }, { status: 404, statusText: "Not Found" }),
      );
      const client = createTestClient(fetchMock);

      await expect(client.humans.get("human_missing")).rejects.toThrow("Human not found");
    });

    it("falls back to the status text for non-JSON error bodies", async () => {
      const fetchMock = mockFetch(
        new Response("<html>oops</html>", { status: 502, statusText: "Bad Gateway" }),
      );
      const client = createTestClient(fetchMock);

      const error = await client.skills.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ message: "Bad Gateway", body: undefined });
    });

    it("falls back to HTTP {status} when nothing else is available", async () => {
      const fetchMock = mockFetch(new Response("", { status: 418 }));
      const client = createTestClient(fetchMock);

      await expect(client.skills.list()).rejects.toThrow("HTTP 418");
    });

    it("keeps the parsed error body", async () => {
      const fetchMock = mockFetch(
        jsonResponse({ error: "Bounty already filled", code: "filled" }, { status: 409 }),
      );
      const client = createTestClient(fetchMock);

      await expect(
        client.bounties.acceptApplication("bounty_001", "app_001"),
      ).rejects.toMatchObject({
        body: { error: "Bounty already filled", code: "filled" },
      });
    });
  });

  // ── Transport failures ──

  describe("transport failures", () => {
    it("retries network errors and then succeeds", async () => {
      const fetchMock = mockFetch(
        new TypeError("fetch failed"),
        jsonResponse({ skills: ["Errands"] }),
      );
      const client = createTestClient(fetchMock);

      await expect(client.skills.list()).resolves.toEqual([{ name: "Errands" }]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("backs off linearly between attempts", async () => {
      const logger = createMockLogger();
      const fetchMock = mockFetch(
        new TypeError("boom"),
        new TypeError("boom"),
        new TypeError("boom"),
      );
      const client = createTestClient(fetchMock, {
        maxRetries: 2,
        transportBackoffSeconds: 0.01,
        logger,
      });

      const error = await client.skills.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: "Request failed: boom" });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(logger.warn.mock.calls.map(([message]) => message)).toEqual([
        "GET /skills failed (transport: Request failed: boom); retrying in 10ms (attempt 2/3)",
        "GET /skills failed (transport: Request failed: boom); retrying in 20ms (attempt 3/3)",
      ]);
    });

    it("turns an aborted attempt into a TimeoutError", async () => {
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              const abort = new Error("This operation was aborted");
              abort.name = "AbortError";
              reject(abort);
            });
          }),
      );
      const client = createTestClient(fetchMock, { timeout: 20, maxRetries: 0 });

      const error = await client.skills.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({
        message: "Request to GET /skills timed out after 20ms",
        timeoutMs: 20,
      });
    });

    it("retries a malformed JSON body as a transport failure", async () => {
      const fetchMock = mockFetch(
        new Response("not json", { status: 200 }),
        new Response("not json", { status: 200 }),
      );
      const client = createTestClient(fetchMock, { maxRetries: 1 });

      await expect(client.skills.list()).rejects.toThrow(
        "Malformed JSON response from GET /skills",
      );
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("does not retry a body that parses but has the wrong shape", async () => {
      const fetchMock = mockFetch(jsonResponse({ human: { id: 42 } }));
      const client = createTestClient(fetchMock);

      await expect(client.humans.get("human_test_001")).rejects.toThrow(TransportError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe("logging", () => {
    it("logs each attempt at debug", async () => {
      const logger = createMockLogger();
      const fetchMock = mockFetch(jsonResponse({ skills: [] }));
      const client = createTestClient(fetchMock, { logger });

      await client.skills.list();

      expect(logger.debug).toHaveBeenCalledWith("GET /skills (attempt 1/4)");
    });
  });
});

type IdOperation = (client: RentAHumanClient, id: string) => Promise<unknown>;

const idOperations: Array<[string, IdOperation]> = [
  ["humans.get", (client, id) => client.humans.get(id)],
  ["humans.reviews", (client, id) => client.humans.reviews(id)],
  ["bookings.get", (client, id) => client.bookings.get(id)],
  ["bounties.get", (client, id) => client.bounties.get(id)],
  ["bounties.update", (client, id) => client.bounties.update(id, { status: "cancelled" })],
  ["bounties.applications", (client, id) => client.bounties.applications(id)],
  [
    "bounties.acceptApplication (bounty id)",
    (client, id) => client.bounties.acceptApplication(id, "app_001"),
  ],
  [
    "bounties.acceptApplication (application id)",
    (client, id) => client.bounties.acceptApplication("bounty_001", id),
  ],
  [
    "conversations.sendMessage",
    (client, id) => client.conversations.sendMessage(id, "On my way"),
  ],
  ["conversations.get", (client, id) => client.conversations.get(id)],
];

describe.each(idOperations)("path parameters of %s", (_name, call) => {
  it.each(["", "../etc/passwd", "a/b", "a\\b", "x..y", "%2e%2e", "%2E%2E", "a%2Fb"])(
    "rejects %j without any request",
    async (value) => {
      const fetchMock = mockFetch();
      const client = createTestClient(fetchMock);

      await expect(call(client, value)).rejects.toThrow(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    },
  );

  it("encodes query and fragment characters into the path", async () => {
    const fetchMock = mockFetch(jsonResponse({}));
    const client = createTestClient(fetchMock);

    await call(client, "x?humanId=other#top");

    const { url } = callAt(fetchMock);
    expect(url.pathname).toContain("/x%3FhumanId%3Dother%23top");
    expect(url.search).toBe("");
    expect(url.hash).toBe("");
  });
});

describe("RentAHumanClient with the default transport settings", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits 0.5s then 1.0s between transport retries", async () => {
    const fetchMock = mockFetch(
      new TypeError("boom"),
      new TypeError("boom"),
      jsonResponse({ skills: [] }),
    );
    const client = new RentAHumanClient({
      apiKey: "rah_test_key",
      baseUrl: TEST_BASE_URL,
      fetch: fetchMock,
    });

    const pending = client.skills.list();
    await vi.advanceTimersByTimeAsync(499);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1000);
    await expect(pending).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
