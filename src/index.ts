/**
 * rentahuman-sdk
 *
 * TypeScript client for the rentahuman.ai marketplace: search humans,
 * book them, post bounties and talk to them, plus ready-made tools for
 * LangChain, the Vercel AI SDK, OpenAI, Anthropic and MCP.
 *
 * @packageDocumentation
 */

// ── Client ──────────────────────────────────────────────────────────────────
export {
  RentAHumanClient,
  sanitizePathParam,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_AGENT_ID,
  SDK_VERSION,
} from "./client.js";

// ── Resources ───────────────────────────────────────────────────────────────
export { HumansResource } from "./resources/humans.js";
export { SkillsResource } from "./resources/skills.js";
export { BookingsResource } from "./resources/bookings.js";
export { BountiesResource } from "./resources/bounties.js";
export { ConversationsResource } from "./resources/conversations.js";
export { clampLimit, MIN_LIMIT, MAX_LIMIT, DEFAULT_LIMIT } from "./resources/envelope.js";

// ── Errors ──────────────────────────────────────────────────────────────────
export {
  RentAHumanError,
  ValidationError,
  RateLimitError,
  ApiError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ConflictError,
  ServerError,
  TransportError,
  TimeoutError,
  buildApiError,
} from "./errors.js";

// ── Retry Utilities ─────────────────────────────────────────────────────────
export {
  parseRetryAfter,
  calculateDelay,
  executeWithRetry,
  DEFAULT_RATE_LIMIT_FALLBACK_SECONDS,
  DEFAULT_TRANSPORT_BACKOFF_SECONDS,
} from "./retry.js";
export type { RetryConfig, RetryReason, RetryHooks, AttemptResult } from "./retry.js";

// ── Logging ─────────────────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

// ── Models ──────────────────────────────────────────────────────────────────
export {
  fromWire,
  toWire,
  CryptoWalletSchema,
  HumanSchema,
  HUMAN_ALIASES,
  SkillSchema,
  SkillEntrySchema,
  ReviewSchema,
  BookingSchema,
  BountySchema,
  BountyApplicationSchema,
  BOUNTY_APPLICATION_ALIASES,
  AcceptApplicationResultSchema,
  MessageSchema,
  ConversationSchema,
} from "./models.js";
export type {
  AliasTable,
  CryptoWallet,
  Human,
  Skill,
  Review,
  Booking,
  BookingStatus,
  Bounty,
  BountyStatus,
  PriceType,
  BountyApplication,
  AcceptApplicationResult,
  Message,
  Conversation,
} from "./models.js";

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  RentAHumanClientOptions,
  HttpMethod,
  QueryValue,
  RequestOptions,
  ApiErrorBody,
  SearchHumansParams,
  BookingCreateParams,
  BookingListParams,
  BountyCreateParams,
  BountyUpdateParams,
  BountyListParams,
  StartConversationParams,
  ConversationListParams,
} from "./types.js";

// ── Tools ───────────────────────────────────────────────────────────────────
export { RentAHumanToolkit } from "./tools/toolkit.js";
export type { RentAHumanTool } from "./tools/toolkit.js";
export { toolDefinitions } from "./tools/definitions.js";
export type {
  ToolDefinition,
  ToolGroup,
  JsonSchemaObject,
  JsonSchemaProperty,
} from "./tools/definitions.js";
export { toolArgSchemas } from "./tools/schemas.js";
export type { ToolName, ToolArgs } from "./tools/schemas.js";
export { toolHandlers, parseToolArgs } from "./tools/handlers.js";
export type { ToolHandler } from "./tools/handlers.js";

// ── Framework Integrations ──────────────────────────────────────────────────
export { toLangChainTools } from "./integrations/langchain.js";
export type { LangChainToolDefinition } from "./integrations/langchain.js";
export { toVercelAITools } from "./integrations/vercel-ai.js";
export type { VercelAITool } from "./integrations/vercel-ai.js";
export { toOpenAITools, handleOpenAIToolCall } from "./integrations/openai.js";
export type {
  OpenAIFunctionTool,
  OpenAIToolCall,
  OpenAIToolMessage,
} from "./integrations/openai.js";
export { toAnthropicTools, handleAnthropicToolUse } from "./integrations/anthropic.js";
export type {
  AnthropicTool,
  AnthropicToolUseBlock,
  AnthropicToolResultBlock,
} from "./integrations/anthropic.js";
export { createMcpServer } from "./integrations/mcp.js";
export type { McpServerOptions } from "./integrations/mcp.js";
