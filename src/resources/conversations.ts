import type { RentAHumanClient } from "../client.js";
import {
  type Conversation,
  type Message,
  CONVERSATION_ALIASES,
  ConversationSchema,
  MessageSchema,
  toWire,
} from "../models.js";
import { sanitizePathParam } from "../sanitize.js";
import type {
  ConversationListParams,
  StartConversationParams,
} from "../types.js";
import {
  clampLimit,
  parseEntities,
  parseEntity,
  unwrapEntity,
  unwrapList,
} from "./envelope.js";

/**
 * Direct messaging with humans. Accessed via `client.conversations`.
 * Message order is assigned by the server.
 */
export class ConversationsResource {
  constructor(private readonly client: RentAHumanClient) {}

  /**
   * Opens a conversation with a human, e.g. to agree on details before
   * booking. Requires an API key.
   */
  async start(params: StartConversationParams): Promise<Conversation> {
    const data = await this.client.request({
      method: "POST",
      path: "/conversations",
      body: toWire(
        {
          humanId: params.humanId,
          agentType: params.agentType ?? this.client.agentId,
          subject: params.subject,
          message: params.message,
        },
        CONVERSATION_ALIASES,
      ),
    });
    return this.parseConversation(data);
  }

  async sendMessage(conversationId: string, message: string): Promise<Message> {
    const id = sanitizePathParam(conversationId);
    const data = await this.client.request({
      method: "POST",
      path: `/conversations/${id}/messages`,
      body: { message },
    });
    return parseEntity(
      MessageSchema,
      unwrapEntity(data, "message", this.client.logger),
      "message",
    );
  }

  /**
   * Retrieves a conversation with all of its messages.
   */
  async get(conversationId: string): Promise<Conversation> {
    const id = sanitizePathParam(conversationId);
    const data = await this.client.request({
      method: "GET",
      path: `/conversations/${id}`,
    });
    return this.parseConversation(data);
  }

  async list(params: ConversationListParams = {}): Promise<Conversation[]> {
    const data = await this.client.request({
      method: "GET",
      path: "/conversations",
      query: { limit: clampLimit(params.limit) },
    });
    return parseEntities(
      ConversationSchema,
      unwrapList(data, "conversations", this.client.logger),
      "conversation",
    );
  }

  private parseConversation(data: unknown): Conversation {
    return parseEntity(
      ConversationSchema,
      unwrapEntity(data, "conversation", this.client.logger),
      "conversation",
    );
  }
}
