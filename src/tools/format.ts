import type {
  Booking,
  Bounty,
  BountyApplication,
  Conversation,
  Human,
  Review,
  Skill,
} from "../models.js";

const MESSAGE_PREVIEW_LENGTH = 80;

/**
 * One-line summary of a human for agent consumption.
 *
 * @example
 * summarizeHuman(alice) // "Alice (human_001) | in San Francisco | $45/hr | skills: Packages, Errands | rating: 4.8"
 */
export function summarizeHuman(human: Human): string {
  const parts = [`${human.name} (${human.id})`];
  if (human.location) {
    parts.push(`in ${human.location}`);
  }
  if (human.hourlyRate) {
    parts.push(`$${human.hourlyRate}/hr`);
  }
  if (human.skills.length > 0) {
    parts.push(`skills: ${human.skills.slice(0, 5).join(", ")}`);
  }
  if (human.rating) {
    parts.push(`rating: ${human.rating.toFixed(1)}`);
  }
  return parts.join(" | ");
}

export function formatHumanList(humans: Human[]): string {
  if (humans.length === 0) {
    return "No humans found matching your criteria.";
  }
  return [
    `Found ${humans.length} human(s):`,
    ...humans.map((h) => `  - ${summarizeHuman(h)}`),
  ].join("\n");
}

export function formatHumanProfile(human: Human): string {
  const lines = [`Name: ${human.name}`, `ID: ${human.id}`];
  if (human.location) {
    lines.push(`Location: ${human.location}`);
  }
  if (human.hourlyRate) {
    lines.push(`Rate: $${human.hourlyRate}/hr`);
  }
  if (human.skills.length > 0) {
    lines.push(`Skills: ${human.skills.join(", ")}`);
  }
  if (human.bio) {
    lines.push(`Bio: ${human.bio}`);
  }
  if (human.availability) {
    lines.push(`Availability: ${human.availability}`);
  }
  if (human.rating) {
    lines.push(`Rating: ${human.rating.toFixed(1)}`);
  }
  if (human.completedTasks) {
    lines.push(`Completed tasks: ${human.completedTasks}`);
  }
  return lines.join("\n");
}

export function formatReviews(reviews: Review[]): string {
  if (reviews.length === 0) {
    return "No reviews found for this human.";
  }
  return [
    `${reviews.length} review(s):`,
    ...reviews.map(
      (r) => `  - ${r.rating ?? "?"}/5: ${r.comment ?? "No comment"}`,
    ),
  ].join("\n");
}

export function formatSkills(skills: Skill[]): string {
  if (skills.length === 0) {
    return "No skills found.";
  }
  return `Available skills: ${skills.map((s) => s.name).join(", ")}`;
}

export function formatBookingCreated(booking: Booking): string {
  return [
    "Booking created!",
    `  ID: ${booking.id}`,
    `  Status: ${booking.status}`,
    `  Task: ${booking.taskTitle}`,
  ].join("\n");
}

export function formatBooking(booking: Booking): string {
  return `Booking ${booking.id}: ${booking.taskTitle} | Status: ${booking.status} | Hours: ${booking.estimatedHours ?? "?"}`;
}

export function formatBookingList(bookings: Booking[]): string {
  if (bookings.length === 0) {
    return "No bookings found.";
  }
  return [
    `${bookings.length} booking(s):`,
    ...bookings.map((b) => `  - ${b.id}: ${b.taskTitle} [${b.status}]`),
  ].join("\n");
}

export function formatBountyCreated(bounty: Bounty): string {
  return [
    "Bounty posted!",
    `  ID: ${bounty.id}`,
    `  Title: ${bounty.title}`,
    `  Price: $${bounty.price}`,
    `  Status: ${bounty.status}`,
  ].join("\n");
}

export function formatBounty(bounty: Bounty): string {
  return [
    `Bounty ${bounty.id}: ${bounty.title}`,
    `  Description: ${bounty.description}`,
    `  Price: $${bounty.price} (${bounty.priceType})`,
    `  Status: ${bounty.status}`,
    `  Applications: ${bounty.applicationCount}`,
  ].join("\n");
}

export function formatApplications(applications: BountyApplication[]): string {
  if (applications.length === 0) {
    return "No applications yet.";
  }
  return [
    `${applications.length} application(s):`,
    ...applications.map((a) => {
      const preview =
        a.message.length > MESSAGE_PREVIEW_LENGTH
          ? `${a.message.slice(0, MESSAGE_PREVIEW_LENGTH)}...`
          : a.message;
      return `  - ${a.humanName} (${a.humanId}): $${a.proposedRate ?? "?"}/hr | ${preview}`;
    }),
  ].join("\n");
}

export function formatConversationStarted(conversation: Conversation): string {
  return [
    "Conversation started!",
    `  ID: ${conversation.id}`,
    `  Subject: ${conversation.subject}`,
  ].join("\n");
}

export function formatConversation(conversation: Conversation): string {
  return [
    `Conversation: ${conversation.subject} (ID: ${conversation.id})`,
    ...conversation.messages.map((m) => `  [${m.sender}]: ${m.content}`),
  ].join("\n");
}

export function formatConversationList(conversations: Conversation[]): string {
  if (conversations.length === 0) {
    return "No conversations.";
  }
  return [
    `${conversations.length} conversation(s):`,
    ...conversations.map((c) => `  - ${c.id}: ${c.subject}`),
  ].join("\n");
}
