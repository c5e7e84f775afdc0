import { decodeTime, ulid } from 'ulid';

const ulidPattern = /^[0-7][0-9A-HJKMNP-TV-Z]{25}$/i;

/**
 * Generates a ULID (26 characters, Crockford base32, sortable by creation time).
 *
 * @param seedTime - Optional timestamp in milliseconds to seed the ID with
 * @throws {TypeError} If `seedTime` is not a non-negative finite number
 *
 * @example
 * ```typescript
 * const id = generateID();            // "01ARZ3NDEKTSV4RRFFQ69G5FAV"
 * const seeded = generateID(Date.now());
 * ```
 */
export function generateID(seedTime?: number): string {
  if (seedTime !== undefined && (!Number.isFinite(seedTime) || seedTime < 0)) {
    throw new TypeError(
      `seedTime must be a non-negative finite number (milliseconds), got: ${seedTime}`,
    );
  }

  return seedTime !== undefined ? ulid(seedTime) : ulid();
}

/**
 * Validates that a string is a ULID. Non-string values return `false`.
 */
export function validateID(id: unknown): id is string {
  return typeof id === 'string' && ulidPattern.test(id);
}

/**
 * Returns the millisecond timestamp encoded in a ULID
 *
 * @throws {TypeError} If the ID is not a valid ULID
 */
export function getIDTimestamp(id: string): number {
  if (!validateID(id)) {
    throw new TypeError(`Invalid ID given: "${id}"`);
  }

  return decodeTime(id.toUpperCase());
}
