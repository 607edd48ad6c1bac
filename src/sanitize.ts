import { ValidationError } from "./errors.js";

function percentDecoded(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    // A stray "%" is not an escape; it is encoded below like any other character.
    if (err instanceof URIError) {
      return value;
    }
    throw err;
  }
}

function isUnsafeSegment(value: string): boolean {
  return value.includes("/") || value.includes("\\") || value.includes("..");
}

/**
 * Validates an identifier and encodes it for use as one URL path segment.
 * Percent-encoded separators and dot segments are rejected as well.
 *
 * @throws {ValidationError} If the value is empty or contains `/`, `\` or `..`,
 *   literally or percent-encoded.
 */
export function sanitizePathParam(value: string): string {
  if (!value || isUnsafeSegment(value) || isUnsafeSegment(percentDecoded(value))) {
    throw new ValidationError(
      `Invalid path parameter: ${JSON.stringify(value)}`,
    );
  }
  return encodeURIComponent(value);
}
