import type { z } from "zod";
import { TransportError } from "../errors.js";
import type { Logger } from "../logger.js";
import { isRecord } from "../models.js";

/** Smallest and largest `limit` the API accepts. */
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 500;
export const DEFAULT_LIMIT = 20;

export function clampLimit(limit: number | undefined): number {
  const value = Math.trunc(limit ?? DEFAULT_LIMIT);
  if (Number.isNaN(value)) {
    return DEFAULT_LIMIT;
  }
  return Math.max(MIN_LIMIT, Math.min(value, MAX_LIMIT));
}

/**
 * Picks the entity out of a response. Most endpoints wrap it
 * (`{"booking": {...}}`), some return it bare.
 */
export function unwrapEntity(data: unknown, key: string, logger: Logger): unknown {
  if (isRecord(data) && isRecord(data[key])) {
    return data[key];
  }
  logger.debug(`Response has no "${key}" object; treating the whole body as the ${key}`);
  return data;
}

/**
 * Picks the list out of a response: `body[key]`, else a bare array body,
 * else an empty list.
 */
export function unwrapList(data: unknown, key: string, logger: Logger): unknown[] {
  if (isRecord(data)) {
    const list = data[key];
    if (Array.isArray(list)) {
      return list;
    }
    logger.debug(`Response has no "${key}" array; returning an empty list`);
    return [];
  }
  if (Array.isArray(data)) {
    logger.debug(`Response is a bare array; using it as ${key}`);
    return data;
  }
  return [];
}

/**
 * Validates a response value against an entity schema.
 *
 * @throws {TransportError} If the value does not have the entity's shape.
 */
export function parseEntity<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new TransportError(
      `Malformed ${what} in response: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      { cause: result.error },
    );
  }
  return result.data;
}

export function parseEntities<S extends z.ZodTypeAny>(
  schema: S,
  values: unknown[],
  what: string,
): z.output<S>[] {
  return values.map((value) => parseEntity(schema, value, what));
}
