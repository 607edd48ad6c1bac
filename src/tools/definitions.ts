import type { ToolName } from "./schemas.js";

export type ToolGroup = "search" | "bookings" | "bounties" | "conversations";

export type JsonSchemaProperty = {
  type: "string" | "number" | "integer" | "boolean" | "array";
  description: string;
  items?: { type: "string" };
  minimum?: number;
  maximum?: number;
  default?: number;
};

/** JSON Schema for a tool's arguments, as OpenAI, Anthropic and MCP expect it. */
export type JsonSchemaObject = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolDefinition = {
  name: ToolName;
  group: ToolGroup;
  description: string;
  inputSchema: JsonSchemaObject;
};

const idProperty = (description: string): JsonSchemaProperty => ({
  type: "string",
  description,
});

const limitProperty = (fallback: number): JsonSchemaProperty => ({
  type: "integer",
  description: "Max results to return (1-500)",
  minimum: 1,
  maximum: 500,
  default: fallback,
});

export const toolDefinitions: ToolDefinition[] = [
  // Discovery
  {
    name: "search_humans",
    group: "search",
    description:
      "Search for humans available for hire on rentahuman.ai. " +
      "Filter by skill (e.g. 'Photography', 'Packages', 'In-Person Meetings'), " +
      "hourly rate range, or name. Returns a list of matching human profiles.",
    inputSchema: {
      type: "object",
      properties: {
        skill: { type: "string", description: "Skill to search for" },
        min_rate: { type: "number", description: "Minimum hourly rate in USD" },
        max_rate: { type: "number", description: "Maximum hourly rate in USD" },
        name: { type: "string", description: "Filter by name (case-insensitive)" },
        limit: limitProperty(10),
      },
      additionalProperties: false,
    },
  },
  {
    name: "get_human_profile",
    group: "search",
    description:
      "Get full profile for a specific human on rentahuman.ai, " +
      "including skills, availability, rate, location, and crypto wallets.",
    inputSchema: {
      type: "object",
      properties: { human_id: idProperty("The human's ID") },
      required: ["human_id"],
      additionalProperties: false,
    },
  },
  {
    name: "get_reviews",
    group: "search",
    description:
      "Get reviews and ratings for a specific human. Useful for evaluating reliability before booking.",
    inputSchema: {
      type: "object",
      properties: { human_id: idProperty("The human's ID") },
      required: ["human_id"],
      additionalProperties: false,
    },
  },
  {
    name: "list_skills",
    group: "search",
    description:
      "Get all available skills that humans offer on rentahuman.ai. Useful for discovering what tasks humans can do.",
    inputSchema: { type: "object", properties: {}, additionalProperties: false },
  },

  // Bookings
  {
    name: "create_booking",
    group: "bookings",
    description:
      "Create a booking to hire a human for a specific task. " +
      "Requires the human's ID, a task title, start time (ISO 8601), and estimated hours.",
    inputSchema: {
      type: "object",
      properties: {
        human_id: idProperty("ID of the human to book"),
        task_title: { type: "string", description: "Brief title of the task" },
        start_time: {
          type: "string",
          description: "ISO 8601 datetime for when the task should start",
        },
        estimated_hours: { type: "number", description: "Estimated duration in hours" },
        description: { type: "string", description: "Detailed task description" },
      },
      required: ["human_id", "task_title", "start_time", "estimated_hours"],
      additionalProperties: false,
    },
  },
  {
    name: "get_booking",
    group: "bookings",
    description: "Get details and status of a booking by its ID.",
    inputSchema: {
      type: "object",
      properties: { booking_id: idProperty("The booking ID") },
      required: ["booking_id"],
      additionalProperties: false,
    },
  },
  {
    name: "list_bookings",
    group: "bookings",
    description:
      "List your bookings, optionally filtered by status (pending, confirmed, in_progress, completed).",
    inputSchema: {
      type: "object",
      properties: {
        status: {
          type: "string",
          description: "Filter by status: pending, confirmed, in_progress, completed",
        },
        limit: limitProperty(20),
      },
      additionalProperties: false,
    },
  },

  // Bounties
  {
    name: "create_bounty",
    group: "bounties",
    description:
      "Post a task bounty on rentahuman.ai for humans to apply to. " +
      "Describe what needs to be done, set a price, and optionally specify " +
      "required skills and location. Humans will apply and you can review them.",
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Task title" },
        description: {
          type: "string",
          description: "Detailed description of what needs to be done",
        },
        price: { type: "number", description: "Fixed price in USD", minimum: 0 },
        estimated_hours: { type: "number", description: "Estimated hours to complete" },
        skills: {
          type: "array",
          items: { type: "string" },
          description: "Required skills",
        },
        location: { type: "string", description: "Required location (city/region)" },
      },
      required: ["title", "description", "price"],
      additionalProperties: false,
    },
  },
  {
    name: "get_bounty",
    group: "bounties",
    description: "Get details of a specific bounty by ID.",
    inputSchema: {
      type: "object",
      properties: { bounty_id: idProperty("The bounty ID") },
      required: ["bounty_id"],
      additionalProperties: false,
    },
  },
  {
    name: "get_bounty_applications",
    group: "bounties",
    description:
      "View all applications from humans for a specific bounty. Use this to review candidates.",
    inputSchema: {
      type: "object",
      properties: { bounty_id: idProperty("The bounty ID") },
      required: ["bounty_id"],
      additionalProperties: false,
    },
  },
  {
    name: "accept_application",
    group: "bounties",
    description:
      "Accept a specific application for a bounty. This hires the human for the task.",
    inputSchema: {
      type: "object",
      properties: {
        bounty_id: idProperty("The bounty ID"),
        application_id: idProperty("The application ID to accept"),
      },
      required: ["bounty_id", "application_id"],
      additionalProperties: false,
    },
  },

  // Conversations
  {
    name: "start_conversation",
    group: "conversations",
    description:
      "Start a direct conversation with a human on rentahuman.ai. " +
      "Use this to discuss task details, negotiate terms, or ask questions " +
      "before making a booking.",
    inputSchema: {
      type: "object",
      properties: {
        human_id: idProperty("ID of the human to message"),
        subject: { type: "string", description: "Conversation subject line" },
        message: { type: "string", description: "Opening message" },
      },
      required: ["human_id", "subject", "message"],
      additionalProperties: false,
    },
  },
  {
    name: "send_message",
    group: "conversations",
    description: "Send a message in an existing conversation with a human.",
    inputSchema: {
      type: "object",
      properties: {
        conversation_id: idProperty("The conversation ID"),
        message: { type: "string", description: "Message content" },
      },
      required: ["conversation_id", "message"],
      additionalProperties: false,
    },
  },
  {
    name: "get_conversation",
    group: "conversations",
    description: "Get a conversation and all messages in it.",
    inputSchema: {
      type: "object",
      properties: { conversation_id: idProperty("The conversation ID") },
      required: ["conversation_id"],
      additionalProperties: false,
    },
  },
  {
    name: "list_conversations",
    group: "conversations",
    description: "List all your conversations with humans.",
    inputSchema: {
      type: "object",
      properties: { limit: limitProperty(20) },
      additionalProperties: false,
    },
  },
];
