/**
 * UUID v7 Generator
 *
 * Time-sortable UUIDs per RFC 9562, used for call ids and history record ids.
 * Sorting the strings sorts by creation time (millisecond precision, then
 * a monotonic sequence within the millisecond).
 */

import { v7, validate, version } from "uuid";

/**
 * Generate a UUID v7 string
 */
export function uuidv7(): string {
  return v7();
}

/**
 * Check that a string is a well-formed UUID v7
 */
export function isUuidv7(value: string): boolean {
  return validate(value) && version(value) === 7;
}
