import { z } from "zod";

/**
 * Static field-name table for one entity: internal name → wire name.
 * Fields missing from the table have the same name on both sides.
 */
export type AliasTable = Readonly<Record<string, string>>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Renames wire keys to internal keys. Internal names are accepted as-is;
 * when both are present the wire value wins.
 */
export function fromWire(
  raw: Record<string, unknown>,
  aliases: AliasTable,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  for (const [internal, wire] of Object.entries(aliases)) {
    if (wire in raw) {
      out[internal] = raw[wire];
      delete out[wire];
    }
  }
  return out;
}

/**
 * Renames internal keys to wire keys and drops `undefined` fields, so unset
 * optionals are never sent.
 */
export function toWire(
  value: object,
  aliases: AliasTable = {},
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    const fieldValue: unknown = field;
    if (fieldValue === undefined) {
      continue;
    }
    out[aliases[key] ?? key] = fieldValue;
  }
  return out;
}

function entity<T extends z.ZodRawShape>(shape: T, aliases: AliasTable = {}) {
  return z.preprocess(
    (value) => (isRecord(value) ? fromWire(value, aliases) : value),
    z.object(shape),
  );
}

const text = z.string().nullish().transform((v) => v ?? "");
const optionalText = z.string().nullish().transform((v) => v ?? undefined);
const optionalNumber = z.number().nullish().transform((v) => v ?? undefined);
const numberOrZero = z.number().nullish().transform((v) => v ?? 0);
const textList = z.array(z.string()).nullish().transform((v) => v ?? []);
const textOr = (initial: string) =>
  z.string().nullish().transform((v) => v ?? initial);

// ── Humans ──────────────────────────────────────────────────────────────────

export const CRYPTO_WALLET_ALIASES: AliasTable = {};

export const CryptoWalletSchema = entity(
  { chain: text, address: text },
  CRYPTO_WALLET_ALIASES,
);
export type CryptoWallet = z.infer<typeof CryptoWalletSchema>;

export const HUMAN_ALIASES: AliasTable = {
  hourlyRate: "rate",
  wallets: "cryptoWallets",
};

/** A human available for hire. */
export const HumanSchema = entity(
  {
    id: text,
    name: text,
    location: optionalText,
    /** Hourly rate in USD. */
    hourlyRate: optionalNumber,
    skills: textList,
    bio: optionalText,
    availability: optionalText,
    rating: optionalNumber,
    completedTasks: optionalNumber,
    wallets: z
      .array(CryptoWalletSchema)
      .nullish()
      .transform((v) => v ?? []),
    createdAt: optionalText,
  },
  HUMAN_ALIASES,
);
export type Human = z.infer<typeof HumanSchema>;

export const SKILL_ALIASES: AliasTable = {};

export const SkillSchema = entity(
  { name: z.string(), category: optionalText },
  SKILL_ALIASES,
);
export type Skill = z.infer<typeof SkillSchema>;

/** `/skills` answers with either bare names or skill objects. */
export const SkillEntrySchema = z.union([
  z.string().transform((name): Skill => ({ name })),
  SkillSchema,
]);

export const REVIEW_ALIASES: AliasTable = {};

function looseString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  return typeof value === "number" ? String(value) : undefined;
}

function looseNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * A review as the server sends it. The shape is not fixed by the API, so
 * the known fields are read leniently and every other key is kept.
 */
export const ReviewSchema = z.preprocess(
  (value) => (isRecord(value) ? fromWire(value, REVIEW_ALIASES) : value),
  z
    .object({
      id: z.unknown().transform((v) => looseString(v) ?? ""),
      bookingId: z.unknown().transform(looseString),
      rating: z.unknown().transform(looseNumber),
      comment: z.unknown().transform(looseString),
      reviewerName: z.unknown().transform(looseString),
      createdAt: z.unknown().transform(looseString),
    })
    .passthrough(),
);
export type Review = z.infer<typeof ReviewSchema>;

// ── Bookings ────────────────────────────────────────────────────────────────

/** Booking lifecycle as reported by the server. Unknown states pass through. */
export type BookingStatus =
  | "pending"
  | "confirmed"
  | "in_progress"
  | "completed"
  | (string & {});

export const BOOKING_ALIASES: AliasTable = {};

export const BookingSchema = entity(
  {
    id: text,
    humanId: text,
    agentId: text,
    taskTitle: text,
    status: textOr("pending"),
    startTime: optionalText,
    estimatedHours: optionalNumber,
    description: optionalText,
    createdAt: optionalText,
  },
  BOOKING_ALIASES,
);
export type Booking = z.infer<typeof BookingSchema>;

// ── Bounties ────────────────────────────────────────────────────────────────

export type PriceType = "fixed" | "hourly";

export type BountyStatus = "open" | "closed" | "cancelled" | (string & {});

export const BOUNTY_ALIASES: AliasTable = {};

export const BountySchema = entity(
  {
    id: text,
    title: text,
    description: text,
    agentType: text,
    price: numberOrZero,
    priceType: textOr("fixed"),
    status: textOr("open"),
    estimatedHours: optionalNumber,
    skills: textList,
    location: optionalText,
    applicationCount: numberOrZero,
    createdAt: optionalText,
  },
  BOUNTY_ALIASES,
);
export type Bounty = z.infer<typeof BountySchema>;

export const BOUNTY_APPLICATION_ALIASES: AliasTable = {
  proposedRate: "rate",
};

export const BountyApplicationSchema = entity(
  {
    id: text,
    bountyId: text,
    humanId: text,
    humanName: text,
    message: text,
    proposedRate: optionalNumber,
    status: textOr("pending"),
    createdAt: optionalText,
  },
  BOUNTY_APPLICATION_ALIASES,
);
export type BountyApplication = z.infer<typeof BountyApplicationSchema>;

/** Body returned by the accept-application call; extra keys are kept. */
export const AcceptApplicationResultSchema = z
  .object({
    success: z.boolean().optional(),
    message: optionalText,
  })
  .passthrough();
export type AcceptApplicationResult = z.infer<
  typeof AcceptApplicationResultSchema
>;

// ── Conversations ───────────────────────────────────────────────────────────

export const MESSAGE_ALIASES: AliasTable = {};

export const MessageSchema = entity(
  {
    id: text,
    conversationId: text,
    sender: text,
    content: text,
    createdAt: optionalText,
  },
  MESSAGE_ALIASES,
);
export type Message = z.infer<typeof MessageSchema>;

export const CONVERSATION_ALIASES: AliasTable = {};

export const ConversationSchema = entity(
  {
    id: text,
    humanId: text,
    agentType: text,
    subject: text,
    /** In server order; never re-sorted locally. */
    messages: z
      .array(MessageSchema)
      .nullish()
      .transform((v) => v ?? []),
    createdAt: optionalText,
  },
  CONVERSATION_ALIASES,
);
export type Conversation = z.infer<typeof ConversationSchema>;
