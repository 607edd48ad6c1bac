/**
 * Basic Search & Booking Example
 *
 * Finds a photographer under $60/hr, reads their reviews, and books them
 * for an hour.
 *
 * Run with: npx tsx examples/basic-search.ts
 */

import {
  NotFoundError,
  RateLimitError,
  RentAHumanClient,
  createLogger,
} from "../src/index.js";

async function main() {
  const client = new RentAHumanClient({
    apiKey: process.env.RENTAHUMAN_API_KEY,
    // baseUrl defaults to https://rentahuman.ai/api
    // timeout defaults to 30s, maxRetries to 3
    logger: createLogger("debug"),
  });

  // Search works without an API key
  const humans = await client.humans.search({
    skill: "Photography",
    maxRate: 60,
    limit: 5,
  });
  console.log(`Found ${humans.length} photographer(s)`);
  for (const human of humans) {
    console.log(`  ${human.name} - $${human.hourlyRate ?? "?"}/hr in ${human.location ?? "?"}`);
  }

  const pick = humans[0];
  if (!pick) {
    return;
  }

  const reviews = await client.humans.reviews(pick.id);
  console.log(`\n${pick.name} has ${reviews.length} review(s)`);

  if (!client.hasApiKey) {
    console.log("Set RENTAHUMAN_API_KEY to create a booking.");
    return;
  }

  try {
    const booking = await client.bookings.create({
      humanId: pick.id,
      taskTitle: "Photograph storefront",
      startTime: new Date(Date.now() + 24 * 60 * 60 * 1000),
      estimatedHours: 1,
      description: "Three exterior shots of the shop front, daylight.",
    });
    console.log(`\nBooking ${booking.id} is ${booking.status}`);
  } catch (err) {
    if (err instanceof RateLimitError) {
      console.error(`Still rate limited; retry in ${err.retryAfter}s`);
    } else if (err instanceof NotFoundError) {
      console.error(`${pick.name} is no longer listed`);
    } else {
      throw err;
    }
  }
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
