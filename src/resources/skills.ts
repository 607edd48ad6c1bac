import type { RentAHumanClient } from "../client.js";
import { type Skill, SkillEntrySchema } from "../models.js";
import { parseEntities, unwrapList } from "./envelope.js";

/**
 * Skill catalog. Accessed via `client.skills`.
 */
export class SkillsResource {
  constructor(private readonly client: RentAHumanClient) {}

  /**
   * Lists every skill offered on the platform. The endpoint returns either
   * bare names or `{ name, category }` objects; both become `Skill`s.
   */
  async list(): Promise<Skill[]> {
    const data = await this.client.request({ method: "GET", path: "/skills" });
    return parseEntities(
      SkillEntrySchema,
      unwrapList(data, "skills", this.client.logger),
      "skill",
    );
  }
}
