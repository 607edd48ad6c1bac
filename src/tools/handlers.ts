import type { z } from "zod";
import type { RentAHumanClient } from "../client.js";
import { ValidationError } from "../errors.js";
import {
  formatApplications,
  formatBooking,
  formatBookingCreated,
  formatBookingList,
  formatBounty,
  formatBountyCreated,
  formatConversation,
  formatConversationList,
  formatConversationStarted,
  formatHumanList,
  formatHumanProfile,
  formatReviews,
  formatSkills,
} from "./format.js";
import { type ToolName, toolArgSchemas } from "./schemas.js";

export type ToolHandler = (
  client: RentAHumanClient,
  rawArgs: unknown,
) => Promise<string>;

/**
 * Validates raw tool-call arguments.
 *
 * @throws {ValidationError} Listing every offending field.
 */
export function parseToolArgs<S extends z.ZodTypeAny>(
  schema: S,
  rawArgs: unknown,
  toolName: string,
): z.output<S> {
  const result = schema.safeParse(rawArgs ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid arguments for ${toolName}: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * One handler per tool: validate arguments, call the client, and render a
 * plain-text answer for the model.
 */
export const toolHandlers: Record<ToolName, ToolHandler> = {
  async search_humans(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.search_humans, rawArgs, "search_humans");
    const humans = await client.humans.search({
      skill: args.skill,
      minRate: args.min_rate,
      maxRate: args.max_rate,
      name: args.name,
      limit: args.limit,
    });
    return formatHumanList(humans);
  },

  async get_human_profile(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.get_human_profile, rawArgs, "get_human_profile");
    return formatHumanProfile(await client.humans.get(args.human_id));
  },

  async get_reviews(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.get_reviews, rawArgs, "get_reviews");
    return formatReviews(await client.humans.reviews(args.human_id));
  },

  async list_skills(client, rawArgs) {
    parseToolArgs(toolArgSchemas.list_skills, rawArgs, "list_skills");
    return formatSkills(await client.skills.list());
  },

  async create_booking(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.create_booking, rawArgs, "create_booking");
    const booking = await client.bookings.create({
      humanId: args.human_id,
      taskTitle: args.task_title,
      startTime: args.start_time,
      estimatedHours: args.estimated_hours,
      description: args.description,
    });
    return formatBookingCreated(booking);
  },

  async get_booking(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.get_booking, rawArgs, "get_booking");
    return formatBooking(await client.bookings.get(args.booking_id));
  },

  async list_bookings(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.list_bookings, rawArgs, "list_bookings");
    const bookings = await client.bookings.list({
      status: args.status,
      limit: args.limit,
    });
    return formatBookingList(bookings);
  },

  async create_bounty(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.create_bounty, rawArgs, "create_bounty");
    const bounty = await client.bounties.create({
      title: args.title,
      description: args.description,
      price: args.price,
      estimatedHours: args.estimated_hours,
      skills: args.skills,
      location: args.location,
    });
    return formatBountyCreated(bounty);
  },

  async get_bounty(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.get_bounty, rawArgs, "get_bounty");
    return formatBounty(await client.bounties.get(args.bounty_id));
  },

  async get_bounty_applications(client, rawArgs) {
    const args = parseToolArgs(
      toolArgSchemas.get_bounty_applications,
      rawArgs,
      "get_bounty_applications",
    );
    return formatApplications(await client.bounties.applications(args.bounty_id));
  },

  async accept_application(client, rawArgs) {
    const args = parseToolArgs(
      toolArgSchemas.accept_application,
      rawArgs,
      "accept_application",
    );
    const result = await client.bounties.acceptApplication(
      args.bounty_id,
      args.application_id,
    );
    return `Application accepted! ${result.message ?? "Human has been hired."}`;
  },

  async start_conversation(client, rawArgs) {
    const args = parseToolArgs(
      toolArgSchemas.start_conversation,
      rawArgs,
      "start_conversation",
    );
    const conversation = await client.conversations.start({
      humanId: args.human_id,
      subject: args.subject,
      message: args.message,
    });
    return formatConversationStarted(conversation);
  },

  async send_message(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.send_message, rawArgs, "send_message");
    const message = await client.conversations.sendMessage(
      args.conversation_id,
      args.message,
    );
    return `Message sent (ID: ${message.id})`;
  },

  async get_conversation(client, rawArgs) {
    const args = parseToolArgs(toolArgSchemas.get_conversation, rawArgs, "get_conversation");
    return formatConversation(await client.conversations.get(args.conversation_id));
  },

  async list_conversations(client, rawArgs) {
    const args = parseToolArgs(
      toolArgSchemas.list_conversations,
      rawArgs,
      "list_conversations",
    );
    return formatConversationList(await client.conversations.list({ limit: args.limit }));
  },
};
