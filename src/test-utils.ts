import { type Mock, vi } from "vitest";
import { RentAHumanClient } from "./client.js";
import type { Logger } from "./logger.js";
import type { RentAHumanClientOptions } from "./types.js";

export const TEST_BASE_URL = "https://api.test/api";
export const TEST_API_KEY = "rah_test_key";

export type FetchMock = Mock<typeof fetch>;

export const alice = {
  id: "human_test_001",
  name: "Alice",
  location: "San Francisco",
  rate: 45,
  skills: ["Photography", "Packages"],
  rating: 4.8,
};

export const bob = {
  id: "human_test_002",
  name: "Bob",
  location: "New York",
  rate: 55,
  skills: ["Photography", "In-Person Meetings"],
};

export const pendingBooking = {
  id: "booking_001",
  humanId: "human_test_001",
  agentId: "rentahuman-sdk-ts",
  taskTitle: "Photograph storefront",
  status: "pending",
  startTime: "2026-02-10T14:00:00.000Z",
  estimatedHours: 1,
};

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

/**
 * A fetch stub answering with the given responses in order; an `Error`
 * entry makes that call reject.
 */
export function mockFetch(...responses: Array<Response | Error>): FetchMock {
  const fn = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      fn.mockRejectedValueOnce(response);
    } else {
      fn.mockResolvedValueOnce(response);
    }
  }
  return fn;
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/** Client pointed at a fake host, with zero backoff so retries are instant. */
export function createTestClient(
  fetchImpl: FetchMock,
  overrides: RentAHumanClientOptions = {},
): RentAHumanClient {
  return new RentAHumanClient({
    apiKey: TEST_API_KEY,
    baseUrl: TEST_BASE_URL,
    fetch: fetchImpl,
    rateLimitFallbackSeconds: 0,
    transportBackoffSeconds: 0,
    ...overrides,
  });
}

export function callAt(
  fetchMock: FetchMock,
  index = 0,
): { url: URL; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  return {
    url: new URL(input instanceof Request ? input.url : input),
    init: init ?? {},
  };
}

export function sentBody(fetchMock: FetchMock, index = 0): unknown {
  const { init } = callAt(fetchMock, index);
  return typeof init.body === "string" ? JSON.parse(init.body) : undefined;
}
