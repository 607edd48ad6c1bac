/**
 * Bounty Example
 *
 * Posts a bounty, lists the applications it received, and hires the
 * applicant with the lowest proposed rate.
 *
 * Run with: RENTAHUMAN_API_KEY=rah_... npx tsx examples/post-bounty.ts [bountyId]
 */

import { RentAHumanClient } from "../src/index.js";

async function main() {
  const client = new RentAHumanClient();

  const existingId = process.argv[2];
  const bounty = existingId
    ? await client.bounties.get(existingId)
    : await client.bounties.create({
        title: "Pick up a package downtown",
        description: "Collect a small parcel from the front desk and drop it at our office.",
        price: 25,
        estimatedHours: 1,
        skills: ["Packages", "Errands"],
        location: "San Francisco",
      });
  console.log(`Bounty ${bounty.id}: ${bounty.title} [${bounty.status}]`);

  const applications = await client.bounties.applications(bounty.id);
  if (applications.length === 0) {
    console.log("No applications yet; run again later with the bounty ID.");
    return;
  }

  const cheapest = [...applications].sort(
    (a, b) => (a.proposedRate ?? Infinity) - (b.proposedRate ?? Infinity),
  )[0];
  if (!cheapest) {
    return;
  }

  const result = await client.bounties.acceptApplication(bounty.id, cheapest.id);
  console.log(`Hired ${cheapest.humanName}: ${result.message ?? "accepted"}`);
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
