import { z } from "zod";

const id = (what: string) => z.string().describe(`The ${what} ID`);

/**
 * Argument schemas for every tool, keyed by tool name. Arguments use
 * snake_case because that is how LLM tool calls are usually phrased.
 */
export const toolArgSchemas = {
  search_humans: z.object({
    skill: z
      .string()
      .optional()
      .describe("Skill to search for (e.g. 'Photography', 'Packages', 'Meetings')"),
    min_rate: z.number().optional().describe("Minimum hourly rate in USD"),
    max_rate: z.number().optional().describe("Maximum hourly rate in USD"),
    name: z.string().optional().describe("Filter by name (case-insensitive)"),
    limit: z.number().int().default(10).describe("Max results to return (1-500)"),
  }),
  get_human_profile: z.object({ human_id: id("human's") }),
  get_reviews: z.object({ human_id: id("human's") }),
  list_skills: z.object({}),
  create_booking: z.object({
    human_id: z.string().describe("ID of the human to book"),
    task_title: z.string().describe("Brief title of the task"),
    start_time: z
      .string()
      .describe("ISO 8601 datetime for when the task should start"),
    estimated_hours: z.number().positive().describe("Estimated duration in hours"),
    description: z.string().optional().describe("Detailed task description"),
  }),
  get_booking: z.object({ booking_id: id("booking") }),
  list_bookings: z.object({
    status: z
      .string()
      .optional()
      .describe("Filter by status: pending, confirmed, in_progress, completed"),
    limit: z.number().int().default(20).describe("Max results"),
  }),
  create_bounty: z.object({
    title: z.string().describe("Task title"),
    description: z
      .string()
      .describe("Detailed description of what needs to be done"),
    price: z.number().nonnegative().describe("Fixed price in USD"),
    estimated_hours: z
      .number()
      .positive()
      .optional()
      .describe("Estimated hours to complete"),
    skills: z.array(z.string()).optional().describe("Required skills"),
    location: z.string().optional().describe("Required location (city/region)"),
  }),
  get_bounty: z.object({ bounty_id: id("bounty") }),
  get_bounty_applications: z.object({ bounty_id: id("bounty") }),
  accept_application: z.object({
    bounty_id: id("bounty"),
    application_id: z.string().describe("The application ID to accept"),
  }),
  start_conversation: z.object({
    human_id: z.string().describe("ID of the human to message"),
    subject: z.string().describe("Conversation subject line"),
    message: z.string().describe("Opening message"),
  }),
  send_message: z.object({
    conversation_id: id("conversation"),
    message: z.string().describe("Message content"),
  }),
  get_conversation: z.object({ conversation_id: id("conversation") }),
  list_conversations: z.object({
    limit: z.number().int().default(20).describe("Max results"),
  }),
};

export type ToolName = keyof typeof toolArgSchemas;

export type ToolArgs<K extends ToolName> = z.output<(typeof toolArgSchemas)[K]>;
