import { describe, expect, it } from "vitest";
import { TransportError } from "../errors.js";
import { createTestClient, jsonResponse, mockFetch } from "../test-utils.js";

describe("SkillsResource", () => {
  it("normalizes bare names and objects to skills", async () => {
    const fetchMock = mockFetch(
      jsonResponse({
        skills: ["Packages", { name: "Photography", category: "creative" }],
      }),
    );
    const client = createTestClient(fetchMock);

    await expect(client.skills.list()).resolves.toEqual([
      { name: "Packages" },
      { name: "Photography", category: "creative" },
    ]);
  });

  it("rejects entries that are neither", async () => {
    const fetchMock = mockFetch(jsonResponse({ skills: [42] }));
    const client = createTestClient(fetchMock);

    await expect(client.skills.list()).rejects.toBeInstanceOf(TransportError);
  });
});
